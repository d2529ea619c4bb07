/**
 * packages/core/src/ui/uiParent.ts: Objects that accept children generically.
 *
 * Tree builders (markup loaders, factories) add children without knowing the
 * parent's concrete type. Each parent accepts only the child kinds it
 * understands and throws FW_INVALID_CLASS for anything else.
 */

import type { UIObject } from "./uiObject.js";

export interface UIParent {
  addChild(child: UIObject): void;
}

export function isUIParent(object: UIObject): object is UIObject & UIParent {
  return "addChild" in object && typeof object.addChild === "function";
}
