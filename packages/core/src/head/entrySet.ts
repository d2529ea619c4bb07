/**
 * packages/core/src/head/entrySet.ts: Ordered, deduplicated head entries.
 *
 * A resource referenced by several UI objects appears once, at the position
 * where it was first added.
 */

import { getToolkitConfig } from "../config.js";
import type { HtmlWriter } from "../html/writer.js";
import {
  HEAD_ENTRY_DISPLAY_ORDER,
  type HtmlHeadEntry,
  type HtmlHeadEntryKind,
  displayHeadEntry,
  headEntryKey,
} from "./entries.js";

export type HeadEntryDisplayOptions = Readonly<{
  /** Prefix for relative stylesheet and script URIs. Defaults to the toolkit config. */
  baseUri?: string;
}>;

export class HtmlHeadEntrySet implements Iterable<HtmlHeadEntry> {
  private readonly entries = new Map<string, HtmlHeadEntry>();

  constructor(source?: Iterable<HtmlHeadEntry>) {
    if (source) this.addEntries(source);
  }

  addEntry(entry: HtmlHeadEntry): this {
    const key = headEntryKey(entry);
    if (!this.entries.has(key)) this.entries.set(key, entry);
    return this;
  }

  addEntries(entries: Iterable<HtmlHeadEntry>): this {
    for (const entry of entries) this.addEntry(entry);
    return this;
  }

  addEntrySet(set: HtmlHeadEntrySet): this {
    return this.addEntries(set);
  }

  has(entry: HtmlHeadEntry): boolean {
    return this.entries.has(headEntryKey(entry));
  }

  get size(): number {
    return this.entries.size;
  }

  toArray(): readonly HtmlHeadEntry[] {
    return Object.freeze(Array.from(this.entries.values()));
  }

  getByKind<K extends HtmlHeadEntryKind>(
    kind: K,
  ): readonly Extract<HtmlHeadEntry, Readonly<{ kind: K }>>[] {
    const out: Extract<HtmlHeadEntry, Readonly<{ kind: K }>>[] = [];
    for (const entry of this.entries.values()) {
      if (isEntryOfKind(entry, kind)) out.push(entry);
    }
    return Object.freeze(out);
  }

  [Symbol.iterator](): Iterator<HtmlHeadEntry> {
    return this.entries.values();
  }

  /** Write every entry on its own line, grouped by kind. */
  display(out: HtmlWriter, opts?: HeadEntryDisplayOptions): void {
    const baseUri = opts?.baseUri ?? getToolkitConfig().resourceBaseUri;
    for (const kind of HEAD_ENTRY_DISPLAY_ORDER) {
      for (const entry of this.entries.values()) {
        if (entry.kind !== kind) continue;
        displayHeadEntry(out, entry, baseUri);
        out.write("\n");
      }
    }
  }
}

function isEntryOfKind<K extends HtmlHeadEntryKind>(
  entry: HtmlHeadEntry,
  kind: K,
): entry is Extract<HtmlHeadEntry, Readonly<{ kind: K }>> {
  return entry.kind === kind;
}
