/**
 * packages/core/src/widgets/groupedFlydown.ts: Tree flydown rendered with
 * `<optgroup>` elements.
 *
 * The tree may have at most three levels counting the root. A first-level
 * node with children, a null value and no divider flag becomes an optgroup
 * labelled with its title; its children are the group's options. Every other
 * node is an option whose value is the JSON path from the first level.
 */

import { FormworkError } from "../errors.js";
import { HtmlTag } from "../html/tag.js";
import type { HtmlWriter } from "../html/writer.js";
import { type FlydownValue, flydownValuesEqual } from "./flydown.js";
import { TreeFlydown, TreeFlydownNode } from "./treeFlydown.js";

const MAX_TREE_LEVEL = 2;

export class GroupedFlydown extends TreeFlydown {
  override readonly kind: string = "groupedFlydown";

  private blankNode: TreeFlydownNode | null = null;

  /**
   * @throws FormworkError FW_CONSTRUCTION when the tree is deeper than three
   *   levels including the root
   */
  override setTree(tree: TreeFlydownNode): void {
    this.checkTree(tree);
    super.setTree(tree);
  }

  protected override displayControl(out: HtmlWriter): void {
    const displayTree = this.getDisplayTree();
    const count = displayTree.count() - 1;

    if (count > 1) {
      const select = new HtmlTag("select", {
        name: this.id,
        id: this.id,
        class: this.getCSSClassString(),
        disabled: !this.isSensitive(),
      });
      this.applyDataAttributes(select);
      select.open(out);
      const state = { selected: false };
      for (const child of displayTree.getChildren()) {
        this.displayNode(out, child, 1, [], state);
      }
      select.close(out);
    } else if (count === 1) {
      const [first] = displayTree.getChildren();
      if (first !== undefined) {
        this.displaySingle(out, { ...first.option, value: this.isBlankNode(first) ? null : [first.value] });
      }
    }
  }

  protected checkTree(tree: TreeFlydownNode, level = 0): void {
    if (level > MAX_TREE_LEVEL) {
      throw new FormworkError(
        "FW_CONSTRUCTION",
        "GroupedFlydown tree must not be more than 3 levels including the root node.",
      );
    }
    for (const child of tree.getChildren()) {
      this.checkTree(child, level + 1);
    }
  }

  /** Copy of the tree with the blank node first when shown. */
  protected getDisplayTree(): TreeFlydownNode {
    const displayTree = new TreeFlydownNode(null, "root");
    if (this.showBlank) {
      displayTree.addChild(this.createBlankNode());
    }
    for (const child of this.tree.getChildren()) {
      displayTree.addChild(child.copy());
    }
    return displayTree;
  }

  protected displayNode(
    out: HtmlWriter,
    node: TreeFlydownNode,
    level: number,
    path: readonly FlydownValue[],
    state: { selected: boolean },
  ): void {
    const option = node.option;
    const children = node.getChildren();

    if (this.isBlankNode(node)) {
      const selected = !state.selected && this.value === null;
      if (selected) state.selected = true;
      this.displayOption(out, { ...option, value: null }, selected);
      return;
    }

    const nodePath = [...path, option.value];

    if (level === 1 && children.length > 0 && option.value === null && !option.divider) {
      const optgroup = new HtmlTag("optgroup", { label: option.title });
      optgroup.open(out);
      for (const child of children) {
        this.displayNode(out, child, level + 1, nodePath, state);
      }
      optgroup.close(out);
      return;
    }

    const selected = !state.selected && !option.divider && flydownValuesEqual(this.value, nodePath);
    if (selected) state.selected = true;
    this.displayOption(out, { ...option, value: nodePath }, selected);

    for (const child of children) {
      this.displayNode(out, child, level + 1, nodePath, state);
    }
  }

  protected override getCSSClassNames(): readonly string[] {
    return ["formwork-grouped-flydown", ...super.getCSSClassNames()];
  }

  private createBlankNode(): TreeFlydownNode {
    this.blankNode = new TreeFlydownNode(null, this.getBlankTitle());
    return this.blankNode;
  }

  private isBlankNode(node: TreeFlydownNode): boolean {
    return node === this.blankNode;
  }
}
