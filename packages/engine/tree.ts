import { InvalidStateTransition, NotFound } from './errors.js';
import type { NodeReader } from './store/types.js';
import type { Node, TreePosition } from './types.js';

/**
 * Read-only navigation over the content tree. Every call reads through to the
 * store, so writes made earlier in the same unit of work are visible.
 */
export class TreeNavigator {
  constructor(private readonly source: NodeReader) {}

  get(id: string): Node {
    const node = this.source.getNode(id);
    if (!node) {
      throw new NotFound('node', id);
    }
    return node;
  }

  parent(node: Node): Node | null {
    return node.parentId === null ? null : this.get(node.parentId);
  }

  /** Root first, ending with the node's parent. */
  ancestors(node: Node): Node[] {
    const chain: Node[] = [];
    const seen = new Set<string>([node.id]);
    let current = this.parent(node);
    while (current) {
      if (seen.has(current.id)) {
        throw new InvalidStateTransition(`Cycle in ancestor chain of node ${node.id}`, { nodeId: node.id });
      }
      seen.add(current.id);
      chain.push(current);
      current = this.parent(current);
    }
    return chain.reverse();
  }

  children(node: Node): Node[] {
    return node.childIds.map(id => this.get(id));
  }

  /** Pre-order, so every node comes after its parent. */
  descendants(node: Node): Node[] {
    const out: Node[] = [];
    const seen = new Set<string>([node.id]);
    const stack = [...this.children(node)].reverse();
    while (stack.length) {
      const next = stack.pop();
      if (!next) break;
      if (seen.has(next.id)) {
        throw new InvalidStateTransition(`Cycle below node ${node.id}`, { nodeId: node.id });
      }
      seen.add(next.id);
      out.push(next);
      stack.push(...this.children(next).reverse());
    }
    return out;
  }

  isDescendantOf(a: Node, b: Node): boolean {
    return this.ancestors(a).some(ancestor => ancestor.id === b.id);
  }

  depth(node: Node): number {
    return this.ancestors(node).length;
  }

  roots(): Node[] {
    return this.source
      .listNodes()
      .filter(node => node.parentId === null)
      .sort((a, b) => a.treeId - b.treeId);
  }

  /**
   * Nested-set numbering of every tree: `lft`/`rght` count from 1 within each
   * root's tree, `level` is 0 at the root.
   */
  positions(): Map<string, TreePosition> {
    const positions = new Map<string, TreePosition>();
    for (const root of this.roots()) {
      let counter = 1;
      const stack: Array<{ node: Node; level: number; entered: boolean }> = [{ node: root, level: 0, entered: false }];
      while (stack.length) {
        const frame = stack[stack.length - 1];
        if (!frame.entered) {
          frame.entered = true;
          positions.set(frame.node.id, {
            treeId: root.treeId,
            lft: counter++,
            rght: 0,
            level: frame.level,
            parentId: frame.node.parentId,
          });
          const kids = this.children(frame.node);
          for (let i = kids.length - 1; i >= 0; i--) {
            stack.push({ node: kids[i], level: frame.level + 1, entered: false });
          }
          continue;
        }
        stack.pop();
        const position = positions.get(frame.node.id);
        if (position) {
          position.rght = counter++;
        }
      }
    }
    return positions;
  }
}
