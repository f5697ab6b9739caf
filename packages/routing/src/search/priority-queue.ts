/**
 * Binary min-heap keyed by a numeric priority.
 *
 * Entries are never updated in place: callers push a fresh entry when a
 * priority improves and skip stale ones when they come off the heap.
 */

interface HeapEntry<T> {
  item: T;
  priority: number;
}

export class PriorityQueue<T> {
  private heap: HeapEntry<T>[] = [];

  get size(): number {
    return this.heap.length;
  }

  isEmpty(): boolean {
    return this.heap.length === 0;
  }

  enqueue(item: T, priority: number): void {
    this.heap.push({ item, priority });
    this.siftUp(this.heap.length - 1);
  }

  /** Remove and return the entry with the lowest priority */
  dequeue(): HeapEntry<T> | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (top === undefined || last === undefined) return undefined;
    if (this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  private siftUp(index: number): void {
    const heap = this.heap;
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      const child = heap[i]!;
      const above = heap[parent]!;
      if (above.priority <= child.priority) break;
      heap[i] = above;
      heap[parent] = child;
      i = parent;
    }
  }

  private siftDown(index: number): void {
    const heap = this.heap;
    const n = heap.length;
    let i = index;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < n && heap[left]!.priority < heap[smallest]!.priority) smallest = left;
      if (right < n && heap[right]!.priority < heap[smallest]!.priority) smallest = right;
      if (smallest === i) break;
      const tmp = heap[i]!;
      heap[i] = heap[smallest]!;
      heap[smallest] = tmp;
      i = smallest;
    }
  }
}
