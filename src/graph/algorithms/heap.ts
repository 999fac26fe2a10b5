interface QueueEntry<T> {
  item: T;
  priority: number;
  /** Caller-supplied secondary key compared before insertion order. */
  rank: number;
  /** Insertion counter breaking priority ties in first-in first-out order. */
  sequence: number;
}

/**
 * Binary min-heap ordered by `(priority, rank, insertion sequence)`. Among
 * entries with equal priority and rank the one pushed first is popped first.
 */
export class MinHeap<T> {
  private readonly data: QueueEntry<T>[] = [];
  private counter = 0;

  get size(): number {
    return this.data.length;
  }

  enqueue(item: T, priority: number, rank = 0): void {
    this.data.push({ item, priority, rank, sequence: this.counter });
    this.counter += 1;
    this.bubbleUp(this.data.length - 1);
  }

  dequeue(): { item: T; priority: number } | undefined {
    const min = this.data[0];
    const last = this.data.pop();
    if (min === undefined || last === undefined) {
      return undefined;
    }
    if (this.data.length > 0) {
      this.data[0] = last;
      this.bubbleDown(0);
    }
    return { item: min.item, priority: min.priority };
  }

  isEmpty(): boolean {
    return this.data.length === 0;
  }

  private before(a: QueueEntry<T>, b: QueueEntry<T>): boolean {
    if (a.priority !== b.priority) {
      return a.priority < b.priority;
    }
    if (a.rank !== b.rank) {
      return a.rank < b.rank;
    }
    return a.sequence < b.sequence;
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parent = Math.floor((index - 1) / 2);
      if (!this.before(this.data[index], this.data[parent])) {
        break;
      }
      [this.data[parent], this.data[index]] = [this.data[index], this.data[parent]];
      index = parent;
    }
  }

  private bubbleDown(index: number): void {
    const length = this.data.length;
    while (true) {
      let smallest = index;
      const left = 2 * index + 1;
      const right = 2 * index + 2;
      if (left < length && this.before(this.data[left], this.data[smallest])) {
        smallest = left;
      }
      if (right < length && this.before(this.data[right], this.data[smallest])) {
        smallest = right;
      }
      if (smallest === index) {
        break;
      }
      [this.data[index], this.data[smallest]] = [this.data[smallest], this.data[index]];
      index = smallest;
    }
  }
}
