// ============================================
// RIDESIM - Ordered Queue
// ============================================

import { EmptyQueueError } from '../errors.js';

interface QueueEntry<T> {
  item: T;
  key: number;
  /** Insertion order, breaks ties between equal keys */
  seq: number;
}

/**
 * Binary min-heap ordered by a caller-supplied numeric key. Items with equal
 * keys come out in the order they went in.
 *
 * The key is read once, when the item is pushed.
 */
export class OrderedQueue<T> {
  private heap: QueueEntry<T>[] = [];
  private seqCounter = 0;

  constructor(private readonly keyOf: (item: T) => number) {}

  get size(): number {
    return this.heap.length;
  }

  isEmpty(): boolean {
    return this.heap.length === 0;
  }

  push(item: T): void {
    this.heap.push({ item, key: this.keyOf(item), seq: this.seqCounter++ });
    this.bubbleUp(this.heap.length - 1);
  }

  /** Remove and return the highest-priority item */
  pop(): T {
    const top = this.takeAt(0);
    if (top === undefined) {
      throw new EmptyQueueError();
    }
    return top;
  }

  peek(): T | undefined {
    return this.heap[0]?.item;
  }

  /**
   * Remove the first item, in pop order, matching the predicate.
   */
  remove(predicate: (item: T) => boolean): T | undefined {
    let index = -1;
    for (let i = 0; i < this.heap.length; i++) {
      const entry = this.heap[i];
      if (!predicate(entry.item)) continue;
      if (index === -1 || this.compare(entry, this.heap[index]) < 0) {
        index = i;
      }
    }
    return index === -1 ? undefined : this.takeAt(index);
  }

  has(predicate: (item: T) => boolean): boolean {
    return this.heap.some((entry) => predicate(entry.item));
  }

  /** Items in pop order; the queue is left untouched */
  toArray(): T[] {
    return [...this.heap].sort((a, b) => this.compare(a, b)).map((entry) => entry.item);
  }

  clear(): void {
    this.heap = [];
  }

  private takeAt(index: number): T | undefined {
    const target = this.heap[index];
    const last = this.heap.pop();
    if (target === undefined || last === undefined) return undefined;

    if (index < this.heap.length) {
      this.heap[index] = last;
      this.sinkDown(index);
      this.bubbleUp(index);
    }
    return target.item;
  }

  private bubbleUp(i: number): void {
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (this.compare(this.heap[i], this.heap[parent]) < 0) {
        this.swap(i, parent);
        i = parent;
      } else {
        break;
      }
    }
  }

  private sinkDown(i: number): void {
    const n = this.heap.length;
    while (true) {
      let smallest = i;
      const left = 2 * i + 1;
      const right = 2 * i + 2;
      if (left < n && this.compare(this.heap[left], this.heap[smallest]) < 0) {
        smallest = left;
      }
      if (right < n && this.compare(this.heap[right], this.heap[smallest]) < 0) {
        smallest = right;
      }
      if (smallest !== i) {
        this.swap(i, smallest);
        i = smallest;
      } else {
        break;
      }
    }
  }

  private compare(a: QueueEntry<T>, b: QueueEntry<T>): number {
    const d = a.key - b.key;
    return d !== 0 ? d : a.seq - b.seq;
  }

  private swap(i: number, j: number): void {
    [this.heap[i], this.heap[j]] = [this.heap[j], this.heap[i]];
  }
}
