interface HeapEntry<T> {
  readonly value: T;
  readonly priority: number;
  /** Insertion counter breaking priority ties first-in first-out. */
  readonly sequence: number;
}

/** Binary min-heap ordered by (priority, insertion sequence). */
export class MinHeap<T> {
  private readonly data: HeapEntry<T>[] = [];
  private counter = 0;

  get size(): number {
    return this.data.length;
  }

  isEmpty(): boolean {
    return this.data.length === 0;
  }

  push(value: T, priority: number): void {
    this.data.push({ value, priority, sequence: this.counter });
    this.counter += 1;
    this.bubbleUp(this.data.length - 1);
  }

  /** Removes the smallest entry; `undefined` when empty. */
  pop(): { value: T; priority: number } | undefined {
    const min = this.data[0];
    const last = this.data.pop();
    if (!min || !last) {
      return undefined;
    }
    if (this.data.length > 0) {
      this.data[0] = last;
      this.bubbleDown(0);
    }
    return { value: min.value, priority: min.priority };
  }

  private before(left: number, right: number): boolean {
    const a = this.data[left];
    const b = this.data[right];
    return a.priority < b.priority || (a.priority === b.priority && a.sequence < b.sequence);
  }

  private swap(left: number, right: number): void {
    [this.data[left], this.data[right]] = [this.data[right], this.data[left]];
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parent = Math.floor((index - 1) / 2);
      if (!this.before(index, parent)) {
        break;
      }
      this.swap(parent, index);
      index = parent;
    }
  }

  private bubbleDown(index: number): void {
    const length = this.data.length;
    while (true) {
      let smallest = index;
      const left = 2 * index + 1;
      const right = 2 * index + 2;
      if (left < length && this.before(left, smallest)) {
        smallest = left;
      }
      if (right < length && this.before(right, smallest)) {
        smallest = right;
      }
      if (smallest === index) {
        break;
      }
      this.swap(index, smallest);
      index = smallest;
    }
  }
}
