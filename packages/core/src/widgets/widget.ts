/**
 * packages/core/src/widgets/widget.ts: Base class for all widgets.
 *
 * Lifecycle: init → process → display.
 *   - init: post-construction setup (generated id, stylesheet, composites).
 *   - process: consume submitted form data; runs once per submission.
 *   - display: write markup. A widget may be displayed without having been
 *     processed (first render before any submission).
 * process() and display() initialize the widget first when needed, so callers
 * rarely have to call init() themselves.
 *
 * Composite widgets:
 *   A widget can be assembled from private sub-widgets (a date picker built
 *   from day/month/year flydowns). Subclasses create them in
 *   `createCompositeWidgets()` with `addCompositeWidget()`; they are created
 *   lazily, exactly once, and are initialized and processed together with
 *   their owner. Only the owner's display() decides which composites render.
 *   A widget whose children should be public belongs in a Container instead.
 */

import { getToolkitConfig } from "../config.js";
import { createTraceLogger } from "../debug/trace.js";
import { FormworkError } from "../errors.js";
import type { HtmlHeadEntrySet } from "../head/entrySet.js";
import type { HtmlWriter } from "../html/writer.js";
import type { Message } from "../ui/message.js";
import { UIObject, type UiMatcher, ofType } from "../ui/uiObject.js";
import {
  type FormDataProvider,
  type SubmittedValue,
  firstSubmittedValue,
  isFormDataProvider,
} from "./formData.js";

const trace = createTraceLogger("widget");

/** CSS class applied to widgets that do not react to user input. */
export const INSENSITIVE_CLASS = "formwork-insensitive";

export abstract class Widget extends UIObject {
  /** Non-visible unique id; also the form field name for input widgets. */
  id: string | null;

  /**
   * Whether the widget reacts to user input. Effective sensitivity also
   * depends on ancestor widgets; see `isSensitive()`.
   */
  sensitive = true;

  /** Stylesheet URI added to the head entries at init(). */
  stylesheet: string | null = null;

  /** Messages affixed to this widget. */
  protected messages: Message[] = [];

  /** When true, init() generates an id if none was set. */
  protected requiresId = false;

  private initialized = false;
  private processed = false;
  private displayed = false;

  private compositeWidgets = new Map<string, Widget>();
  private compositeWidgetsCreated = false;

  constructor(id: string | null = null) {
    super();
    this.id = id;
    const base = getToolkitConfig().baseStylesheet;
    if (base !== null) this.addStyleSheet(base);
  }

  /**
   * Initialize this widget and its composite widgets. Safe to call again:
   * an id that is already set is never replaced.
   */
  init(): void {
    if (this.requiresId && this.id === null) {
      this.id = this.getUniqueId();
    }

    if (this.stylesheet !== null) {
      this.addStyleSheet(this.stylesheet);
    }

    for (const widget of this.getCompositeWidgets().values()) {
      widget.init();
    }

    this.initialized = true;
    trace.emit("init", { kind: this.kind, id: this.id });
  }

  /** Process submitted data for this widget and its composite widgets. */
  process(): void {
    if (!this.isInitialized()) this.init();

    for (const widget of this.getCompositeWidgets().values()) {
      widget.process();
    }

    this.markProcessed();
  }

  /** Record that processing ran, including runs that had nothing to consume. */
  protected markProcessed(): void {
    this.processed = true;
    trace.emit("process", { kind: this.kind, id: this.id });
  }

  /**
   * Display this widget. The base implementation writes nothing; subclasses
   * render markup after calling it.
   */
  display(_out: HtmlWriter): void {
    if (!this.isInitialized()) this.init();

    this.displayed = true;
    trace.emit("display", { kind: this.kind, id: this.id });
  }

  /** Write the head entries of this widget's subtree, one per line. */
  displayHtmlHeadEntries(out: HtmlWriter): void {
    this.getHtmlHeadEntrySet().display(out);
  }

  override getHtmlHeadEntrySet(): HtmlHeadEntrySet {
    const set = super.getHtmlHeadEntrySet();
    for (const widget of this.getCompositeWidgets().values()) {
      set.addEntrySet(widget.getHtmlHeadEntrySet());
    }
    return set;
  }

  override getAvailableHtmlHeadEntrySet(): HtmlHeadEntrySet {
    const set = super.getAvailableHtmlHeadEntrySet();
    for (const widget of this.getCompositeWidgets().values()) {
      set.addEntrySet(widget.getAvailableHtmlHeadEntrySet());
    }
    return set;
  }

  addMessage(message: Message): void {
    this.messages.push(message);
  }

  /** Messages of this widget followed by those of its composite widgets. */
  getMessages(): readonly Message[] {
    const messages = [...this.messages];
    for (const widget of this.getCompositeWidgets().values()) {
      messages.push(...widget.getMessages());
    }
    return messages;
  }

  hasMessage(): boolean {
    if (this.messages.length > 0) return true;
    for (const widget of this.getCompositeWidgets().values()) {
      if (widget.hasMessage()) return true;
    }
    return false;
  }

  /** Own flag AND-ed with the sensitivity of the nearest ancestor widget. */
  isSensitive(): boolean {
    const ancestor = this.getFirstAncestor(ofType(Widget));
    if (ancestor !== null) {
      return ancestor.isSensitive() && this.sensitive;
    }
    return this.sensitive;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  isProcessed(): boolean {
    return this.processed;
  }

  isDisplayed(): boolean {
    return this.displayed;
  }

  areCompositeWidgetsCreated(): boolean {
    return this.compositeWidgetsCreated;
  }

  /**
   * Id of the element that should receive focus (for `<label for>` and
   * scripted focus), or null when the widget is not focusable.
   */
  getFocusableHtmlId(): string | null {
    return null;
  }

  /** Indented outline of this widget's subtree, one widget per line. */
  printWidgetTree(): string {
    return this.describeTree(0).join("\n");
  }

  /**
   * Copy this widget. A non-empty suffix is appended to the id. Composite
   * widgets are not copied: their ids are usually derived from the owner's,
   * so the copy recreates them on demand with the right values. Lifecycle
   * flags start over.
   */
  override copy(idSuffix = ""): this {
    const copy = super.copy(idSuffix);

    if (idSuffix !== "" && copy.id !== null) {
      copy.id = `${copy.id}${idSuffix}`;
    }

    copy.messages = [...this.messages];
    copy.compositeWidgets = new Map();
    copy.compositeWidgetsCreated = false;
    copy.initialized = false;
    copy.processed = false;
    copy.displayed = false;

    return copy;
  }

  protected override getCSSClassNames(): readonly string[] {
    const classes: string[] = [];
    if (!this.isSensitive()) classes.push(INSENSITIVE_CLASS);
    return [...classes, ...super.getCSSClassNames()];
  }

  describeTree(depth: number): string[] {
    const label = this.id === null ? this.kind : `${this.kind}#${this.id}`;
    return [`${"  ".repeat(depth)}${label}`];
  }

  /** Nearest ancestor that provides submitted form data. */
  protected getFormDataProvider(): FormDataProvider | null {
    return this.getFirstAncestor(isFormDataProvider);
  }

  /**
   * Submitted value for `name` (defaults to this widget's id), or undefined
   * when nothing was submitted under that name.
   */
  protected getSubmittedValue(name: string | null = this.id): SubmittedValue | undefined {
    if (name === null) return undefined;
    const provider = this.getFormDataProvider();
    if (provider === null || !provider.isSubmitted()) return undefined;
    return provider.getFormData()[name];
  }

  protected getSubmittedText(name: string | null = this.id): string | undefined {
    return firstSubmittedValue(this.getSubmittedValue(name));
  }

  // ---------------------------------------------------------------------------
  // Composite widgets
  // ---------------------------------------------------------------------------

  /**
   * Create composite widgets with `addCompositeWidget()`. Called at most once
   * per widget (and once more per copy).
   */
  protected createCompositeWidgets(): void {}

  /**
   * Register `widget` as a composite of this widget under `key`. The key only
   * has to be unique within this widget.
   *
   * @throws FormworkError FW_DUPLICATE_ID when `key` is already registered
   * @throws FormworkError FW_CONSTRUCTION when `widget` already has a parent
   */
  protected addCompositeWidget(widget: Widget, key: string): void {
    if (this.compositeWidgets.has(key)) {
      throw new FormworkError(
        "FW_DUPLICATE_ID",
        `A composite widget with the key '${key}' already exists in this widget.`,
        { key },
      );
    }

    if (widget.parent !== null) {
      throw new FormworkError(
        "FW_CONSTRUCTION",
        "Cannot add a composite widget that already has a parent.",
      );
    }

    this.compositeWidgets.set(key, widget);
    widget.parent = this;
  }

  /**
   * @throws FormworkError FW_NOT_FOUND when no composite widget has `key`
   */
  protected getCompositeWidget(key: string): Widget;
  protected getCompositeWidget<T extends Widget>(key: string, match: UiMatcher<T>): T;
  protected getCompositeWidget<T extends Widget>(key: string, match?: UiMatcher<T>): Widget | T {
    this.confirmCompositeWidgets();

    const widget = this.compositeWidgets.get(key);
    if (widget === undefined) {
      throw new FormworkError(
        "FW_NOT_FOUND",
        `Composite widget with key of '${key}' not found in ${this.kind}. ` +
          "Make sure the composite widget was created and added to this widget.",
        { key },
      );
    }
    if (match !== undefined && !match(widget)) {
      throw new FormworkError(
        "FW_INVALID_CLASS",
        `Composite widget '${key}' in ${this.kind} is a ${widget.kind}.`,
        { key, value: widget },
      );
    }
    return widget;
  }

  /** Composite widgets in insertion order, optionally narrowed by `match`. */
  protected getCompositeWidgets(): ReadonlyMap<string, Widget>;
  protected getCompositeWidgets<T extends Widget>(match: UiMatcher<T>): ReadonlyMap<string, T>;
  protected getCompositeWidgets<T extends Widget>(
    match?: UiMatcher<T>,
  ): ReadonlyMap<string, Widget | T> {
    this.confirmCompositeWidgets();

    if (match === undefined) return new Map(this.compositeWidgets);

    const out = new Map<string, T>();
    for (const [key, widget] of this.compositeWidgets) {
      if (match(widget)) out.set(key, widget);
    }
    return out;
  }

  /** Create composite widgets if that has not happened yet. */
  protected confirmCompositeWidgets(): void {
    if (!this.compositeWidgetsCreated) {
      // Flag first: a hook that looks up its own composites must not recurse.
      this.compositeWidgetsCreated = true;
      this.createCompositeWidgets();
    }
  }
}
