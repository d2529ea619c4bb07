/**
 * packages/core/src/table/cellRendererSet.ts: Renderers of one column and
 * the row-field → renderer-property mappings that feed them.
 */

import { FormworkError } from "../errors.js";
import type { CellRenderer } from "./cellRenderer.js";

export type CellRendererMapping = Readonly<{
  /** Renderer property to set. */
  property: string;
  /** Row field to read. */
  field: string;
}>;

export class CellRendererSet implements Iterable<CellRenderer> {
  private renderers: CellRenderer[] = [];
  private mappings = new Map<CellRenderer, CellRendererMapping[]>();
  private applied = false;

  addRenderer(renderer: CellRenderer): void {
    this.renderers.push(renderer);
    this.mappings.set(renderer, []);
  }

  addRendererWithMappings(renderer: CellRenderer, mappings: readonly CellRendererMapping[]): void {
    this.addRenderer(renderer);
    this.addMappingsToRenderer(renderer, mappings);
  }

  /**
   * @throws FormworkError FW_NOT_FOUND when `renderer` is not in this set
   * @throws FormworkError FW_INVALID_PROPERTY when a mapping targets a
   *   property the renderer does not declare
   */
  addMappingsToRenderer(renderer: CellRenderer, mappings: readonly CellRendererMapping[]): void {
    const list = this.requireMappings(renderer);
    for (const mapping of mappings) {
      if (!renderer.isMappableProperty(mapping.property)) {
        throw new FormworkError(
          "FW_INVALID_PROPERTY",
          `Cannot map field '${mapping.field}' to undefined property '${mapping.property}' of ${renderer.kind}.`,
          { key: mapping.property },
        );
      }
      list.push(Object.freeze({ property: mapping.property, field: mapping.field }));
    }
  }

  addMappingToRenderer(renderer: CellRenderer, field: string, property: string): void {
    this.addMappingsToRenderer(renderer, [{ field, property }]);
  }

  getMappingsByRenderer(renderer: CellRenderer): readonly CellRendererMapping[] {
    return this.requireMappings(renderer).slice();
  }

  /**
   * Copy the mapped fields of `row` onto `renderer`.
   *
   * @throws FormworkError FW_INVALID_PROPERTY when `row` lacks a mapped field
   */
  applyMappingsToRenderer(renderer: CellRenderer, row: object): void {
    for (const { field, property } of this.requireMappings(renderer)) {
      if (!(field in row)) {
        throw new FormworkError(
          "FW_INVALID_PROPERTY",
          `Row data does not have a field '${field}' to map to '${property}' of ${renderer.kind}.`,
          { key: field },
        );
      }
      const value: unknown = Reflect.get(row, field);
      renderer.setMappedProperty(property, value);
    }
    this.applied = true;
  }

  /** Whether mappings have been applied to any renderer of this set. */
  mappingsApplied(): boolean {
    return this.applied;
  }

  getFirst(): CellRenderer | null {
    return this.renderers[0] ?? null;
  }

  getCount(): number {
    return this.renderers.length;
  }

  getRenderers(): readonly CellRenderer[] {
    return this.renderers.slice();
  }

  /** Renderer with the given id, or null. */
  getRenderer(id: string): CellRenderer | null {
    return this.renderers.find((renderer) => renderer.id === id) ?? null;
  }

  /** Copy every renderer and its mappings. */
  copy(idSuffix = ""): CellRendererSet {
    const copy = new CellRendererSet();
    for (const renderer of this.renderers) {
      copy.addRendererWithMappings(renderer.copy(idSuffix), this.requireMappings(renderer));
    }
    return copy;
  }

  [Symbol.iterator](): Iterator<CellRenderer> {
    return this.renderers.slice()[Symbol.iterator]();
  }

  private requireMappings(renderer: CellRenderer): CellRendererMapping[] {
    const list = this.mappings.get(renderer);
    if (list === undefined) {
      throw new FormworkError("FW_NOT_FOUND", `The ${renderer.kind} is not part of this renderer set.`);
    }
    return list;
  }
}
