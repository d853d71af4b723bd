/**
 * Scheduler Module
 *
 * OpenSet is the crawl frontier: a binary max-heap of unexplored nodes keyed
 * by their average ancestral score. The key is computed once at insert time.
 * Equal keys pop in insertion order.
 *
 * Removal is lazy. `invalidate` drops the node from the live set in O(1) and
 * the stale heap entry is discarded when it reaches the top.
 */

import { averageAncestralScore, type NodeId, type WebsiteNode, type WebsiteTree } from '../tree/index.js';

interface HeapEntry {
  key: number;
  seq: number;
  nodeId: NodeId;
}

export class OpenSet {
  private readonly heap: HeapEntry[] = [];
  private readonly live = new Set<NodeId>();
  private seq = 0;

  constructor(private readonly tree: WebsiteTree) {}

  /** Number of live entries */
  get size(): number {
    return this.live.size;
  }

  isEmpty(): boolean {
    return this.live.size === 0;
  }

  has(nodeId: NodeId): boolean {
    return this.live.has(nodeId);
  }

  insert(node: WebsiteNode): void {
    if (node.state !== 'Unexplored') {
      throw new Error(`Cannot schedule node ${node.id} in state ${node.state}`);
    }
    if (this.live.has(node.id)) return;

    this.live.add(node.id);
    this.heap.push({
      key: averageAncestralScore(this.tree, node),
      seq: this.seq++,
      nodeId: node.id,
    });
    this.siftUp(this.heap.length - 1);
  }

  /**
   * Remove and return the highest-priority live node, or null when none remain
   */
  popMax(): WebsiteNode | null {
    while (this.heap.length > 0) {
      const top = this.removeTop();
      if (!this.live.has(top.nodeId)) continue;
      this.live.delete(top.nodeId);

      const node = this.tree.get(top.nodeId);
      if (node.state === 'CompletelyExplored') continue;
      return node;
    }
    return null;
  }

  invalidate(nodeId: NodeId): void {
    this.live.delete(nodeId);
  }

  // --------------------------------------------------------------------------
  // Heap internals
  // --------------------------------------------------------------------------

  private removeTop(): HeapEntry {
    const top = this.entryAt(0);
    const last = this.heap.pop();
    if (last && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  /** a outranks b: higher key first, then earlier insertion */
  private outranks(a: HeapEntry, b: HeapEntry): boolean {
    if (a.key !== b.key) return a.key > b.key;
    return a.seq < b.seq;
  }

  private entryAt(index: number): HeapEntry {
    const entry = this.heap[index];
    if (!entry) {
      throw new Error(`Heap index ${index} out of range`);
    }
    return entry;
  }

  private swap(i: number, j: number): void {
    const a = this.entryAt(i);
    this.heap[i] = this.entryAt(j);
    this.heap[j] = a;
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.outranks(this.entryAt(i), this.entryAt(parent))) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(index: number): void {
    let i = index;
    const n = this.heap.length;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let best = i;
      if (left < n && this.outranks(this.entryAt(left), this.entryAt(best))) best = left;
      if (right < n && this.outranks(this.entryAt(right), this.entryAt(best))) best = right;
      if (best === i) return;
      this.swap(i, best);
      i = best;
    }
  }
}
