/**
 * packages/core/src/ui/message.ts: Feedback messages affixed to widgets.
 *
 * Message types:
 *   - notice: informational
 *   - warning: the user should double-check something
 *   - error: submitted data was rejected
 *   - system-error: something failed on the server side
 *   - cart: item added to / removed from a cart
 */

import { FormworkError } from "../errors.js";
import { HtmlTag, type ContentType } from "../html/tag.js";
import type { HtmlWriter } from "../html/writer.js";

export const MESSAGE_TYPES = Object.freeze([
  "notice",
  "warning",
  "error",
  "system-error",
  "cart",
] as const);

export type MessageType = (typeof MESSAGE_TYPES)[number];

export type Message = Readonly<{
  primaryContent: string;
  secondaryContent: string | null;
  type: MessageType;
  contentType: ContentType;
}>;

export type MessageOptions = Readonly<{
  secondaryContent?: string | null;
  contentType?: ContentType;
}>;

export function isMessageType(value: string): value is MessageType {
  return MESSAGE_TYPES.some((type) => type === value);
}

/**
 * Create a message. `type` is checked at run time because message types often
 * come from untyped sources (configuration, query strings).
 */
export function createMessage(
  primaryContent: string,
  type: string = "notice",
  opts?: MessageOptions,
): Message {
  if (!isMessageType(type)) {
    throw new FormworkError(
      "FW_UNDEFINED_MESSAGE_TYPE",
      `The message type "${type}" is not a defined type.`,
      { messageType: type },
    );
  }
  return Object.freeze({
    primaryContent,
    secondaryContent: opts?.secondaryContent ?? null,
    type,
    contentType: opts?.contentType ?? "text/plain",
  });
}

export function isErrorMessage(message: Message): boolean {
  return message.type === "error" || message.type === "system-error";
}

export function getMessageCSSClassNames(message: Message): readonly string[] {
  return Object.freeze(["formwork-message", `formwork-message-${message.type}`]);
}

export function displayMessage(out: HtmlWriter, message: Message): void {
  const div = new HtmlTag("div", { class: getMessageCSSClassNames(message).join(" ") });
  div.open(out);

  new HtmlTag("h3", { class: "formwork-message-primary-content" })
    .setContent(message.primaryContent, message.contentType)
    .display(out);

  if (message.secondaryContent !== null) {
    new HtmlTag("p", { class: "formwork-message-secondary-content" })
      .setContent(message.secondaryContent, message.contentType)
      .display(out);
  }

  div.close(out);
}
