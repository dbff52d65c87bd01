type Entry<T> = {
  item: T;
  priority: number;
  seq: number;
};

/** a ranks before b: higher priority first, then earlier insertion. */
function before<T>(a: Entry<T>, b: Entry<T>): boolean {
  return a.priority > b.priority || (a.priority === b.priority && a.seq < b.seq);
}

/**
 * Max-priority queue keyed by (priority, -insertion order). Equal priorities
 * pop first-in first-out, so runs are reproducible regardless of heap shape.
 */
export class Frontier<T> {
  private heap: Entry<T>[] = [];
  private counter = 0;

  get size(): number {
    return this.heap.length;
  }

  push(item: T, priority: number): void {
    this.heap.push({ item, priority, seq: this.counter++ });
    this.siftUp(this.heap.length - 1);
  }

  pop(): { item: T; priority: number } | undefined {
    const top = this.heap[0];
    if (top === undefined) return undefined;
    const last = this.heap.pop();
    if (last !== undefined && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return { item: top.item, priority: top.priority };
  }

  /** Keeps the best `limit` entries and returns how many were dropped. */
  prune(limit: number): number {
    if (this.heap.length <= limit) return 0;
    const ranked = [...this.heap].sort((a, b) => (before(a, b) ? -1 : before(b, a) ? 1 : 0));
    const dropped = ranked.length - limit;
    // A best-first sorted array already satisfies the heap property.
    this.heap = ranked.slice(0, limit);
    return dropped;
  }

  /** Items in pop order, without removing them. */
  peekAll(): T[] {
    return [...this.heap].sort((a, b) => (before(a, b) ? -1 : 1)).map((e) => e.item);
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!before(this.heap[i], this.heap[parent])) break;
      [this.heap[i], this.heap[parent]] = [this.heap[parent], this.heap[i]];
      i = parent;
    }
  }

  private siftDown(index: number): void {
    const n = this.heap.length;
    let i = index;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let best = i;
      if (left < n && before(this.heap[left], this.heap[best])) best = left;
      if (right < n && before(this.heap[right], this.heap[best])) best = right;
      if (best === i) return;
      [this.heap[i], this.heap[best]] = [this.heap[best], this.heap[i]];
      i = best;
    }
  }
}
