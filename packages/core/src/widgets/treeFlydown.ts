/**
 * packages/core/src/widgets/treeFlydown.ts: Flydown over a tree of options.
 *
 * The root node is never displayed. Each option's value is the path of values
 * from the first level down to the option, so equal values in different
 * branches stay distinguishable. `value` holds the selected path.
 */

import { FormworkError } from "../errors.js";
import {
  Flydown,
  type FlydownOption,
  type FlydownValue,
  flydownDivider,
  flydownOption,
} from "./flydown.js";

/** Indent per tree level in flattened option titles (two no-break spaces). */
const LEVEL_INDENT = "\u00a0\u00a0";

export class TreeFlydownNode {
  readonly option: FlydownOption;
  private readonly children: TreeFlydownNode[] = [];

  constructor(value: FlydownValue, title: string);
  constructor(option: FlydownOption);
  constructor(valueOrOption: FlydownValue | FlydownOption, title?: string) {
    if (title === undefined && isFlydownOption(valueOrOption)) {
      this.option = valueOrOption;
    } else {
      this.option = flydownOption(valueOrOption, title ?? "");
    }
  }

  static divider(title?: string): TreeFlydownNode {
    return new TreeFlydownNode(flydownDivider(title));
  }

  get value(): FlydownValue {
    return this.option.value;
  }

  get title(): string {
    return this.option.title;
  }

  addChild(child: TreeFlydownNode): TreeFlydownNode {
    this.children.push(child);
    return child;
  }

  getChildren(): readonly TreeFlydownNode[] {
    return this.children.slice();
  }

  /** Copy of this subtree. Options are frozen and shared. */
  copy(): TreeFlydownNode {
    const copy = new TreeFlydownNode(this.option);
    for (const child of this.children) copy.addChild(child.copy());
    return copy;
  }

  /** Number of nodes in this subtree, this node included. */
  count(): number {
    let total = 1;
    for (const child of this.children) total += child.count();
    return total;
  }
}

function isFlydownOption(value: FlydownValue | FlydownOption): value is FlydownOption {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    "divider" in value &&
    typeof value.divider === "boolean" &&
    "title" in value &&
    typeof value.title === "string" &&
    "value" in value
  );
}

export class TreeFlydown extends Flydown {
  override readonly kind: string = "treeFlydown";

  protected tree = new TreeFlydownNode(null, "root");

  setTree(tree: TreeFlydownNode): void {
    this.tree = tree;
  }

  getTree(): TreeFlydownNode {
    return this.tree;
  }

  /** Last value of the selected path, or null when nothing is selected. */
  getLeafValue(): FlydownValue {
    if (!Array.isArray(this.value)) return null;
    const path: readonly FlydownValue[] = this.value;
    return path[path.length - 1] ?? null;
  }

  /** The tree flattened depth-first; titles indented by level. */
  override getOptions(): readonly FlydownOption[] {
    const options: FlydownOption[] = [];
    const visit = (node: TreeFlydownNode, depth: number, path: readonly FlydownValue[]): void => {
      const nodePath = [...path, node.value];
      const title = `${LEVEL_INDENT.repeat(depth)}${node.title}`;
      options.push(
        node.option.divider
          ? Object.freeze({ value: nodePath, title, divider: true })
          : flydownOption(nodePath, title),
      );
      for (const child of node.getChildren()) visit(child, depth + 1, nodePath);
    };
    for (const child of this.tree.getChildren()) visit(child, 0, []);
    return options;
  }

  override copy(idSuffix = ""): this {
    const copy = super.copy(idSuffix);
    copy.tree = this.tree.copy();
    return copy;
  }

  protected override parseSubmittedValue(raw: string): FlydownValue {
    const value = super.parseSubmittedValue(raw);
    if (value !== null && !Array.isArray(value)) {
      throw new FormworkError("FW_INVALID_SERIALIZED_DATA", "Submitted tree flydown data is not a path.", {
        data: raw,
      });
    }
    return value;
  }

  protected override getCSSClassNames(): readonly string[] {
    return ["formwork-tree-flydown", ...super.getCSSClassNames()];
  }
}
