import { compareLabels, LABEL_SEPARATOR } from "../schema/Label";
import { LabelBuffer } from "./LabelBuffer";

export interface LabelNode {
  /** Buffer offset of this node's label record; 0 for the root. */
  readonly offset: number;
  /** Sorted ascending by `compareLabels`. */
  readonly children: LabelNode[];
}

/**
 * Suffix trie over hostname labels. Paths from the root read TLD first, so
 * names sharing trailing labels share nodes. Every node owns exactly one
 * record in the label buffer.
 */
export class LabelTrie {
  readonly root: LabelNode = { offset: 0, children: [] };
  private nodes = 0;

  constructor(private readonly buffer: LabelBuffer) {}

  get nodeCount(): number {
    return this.nodes;
  }

  find(
    children: readonly LabelNode[],
    label: Uint8Array
  ): LabelNode | undefined {
    const index = this.search(children, label);
    return index >= 0 ? children[index] : undefined;
  }

  insert(children: LabelNode[], label: Uint8Array): LabelNode {
    const index = this.search(children, label);
    if (index >= 0) {
      return children[index];
    }

    const node: LabelNode = { offset: this.buffer.append(label), children: [] };
    children.splice(-index - 1, 0, node);
    this.nodes++;

    return node;
  }

  /**
   * Inserts a rightmost-first label path starting at the root and returns the
   * offset of every node along it.
   */
  walk(labels: readonly Uint8Array[]): number[] {
    const offsets: number[] = [];
    let node = this.root;

    for (const label of labels) {
      node = this.insert(node.children, label);
      offsets.push(node.offset);
    }

    return offsets;
  }

  depth(): number {
    let deepest = 0;
    const stack: Array<[LabelNode, number]> = [[this.root, 0]];

    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry) break;

      const [node, level] = entry;
      deepest = Math.max(deepest, level);
      for (const child of node.children) {
        stack.push([child, level + 1]);
      }
    }

    return deepest;
  }

  isSorted(): boolean {
    const stack: LabelNode[] = [this.root];

    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;

      const { children } = node;
      for (let i = 1; i < children.length; i++) {
        const previous = this.buffer.readLabel(children[i - 1].offset);
        const current = this.buffer.readLabel(children[i].offset);
        if (compareLabels(previous, current) >= 0) {
          return false;
        }
      }
      stack.push(...children);
    }

    return true;
  }

  /** Yields the dotted suffix spelled by every node, parents before children. */
  *entries(): Generator<string> {
    const stack: Array<[LabelNode, string]> = this.root.children
      .map((child): [LabelNode, string] => [child, this.labelText(child)])
      .reverse();

    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry) break;

      const [node, suffix] = entry;
      yield suffix;

      for (let i = node.children.length - 1; i >= 0; i--) {
        const child = node.children[i];
        stack.push([
          child,
          this.labelText(child) + String.fromCharCode(LABEL_SEPARATOR) + suffix,
        ]);
      }
    }
  }

  // Binary search; a miss returns -(insertion point) - 1.
  private search(children: readonly LabelNode[], label: Uint8Array): number {
    let low = 0;
    let high = children.length - 1;

    while (low <= high) {
      const mid = (low + high) >>> 1;
      const order = compareLabels(
        this.buffer.readLabel(children[mid].offset),
        label
      );
      if (order === 0) {
        return mid;
      }
      if (order < 0) {
        low = mid + 1;
      } else {
        high = mid - 1;
      }
    }

    return -low - 1;
  }

  private labelText(node: LabelNode): string {
    return this.buffer.readLabel(node.offset).toString("utf8");
  }
}
