/**
 * 环形缓冲区 - O(1) 时间复杂度的 push 操作
 *
 * 固定容量，写满后覆盖最旧的元素；迭代顺序即插入顺序
 */
export class RingBuffer<T> {
  private buffer: (T | undefined)[];
  private head = 0;
  private tail = 0;
  private _size = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Array(capacity);
  }

  /**
   * 从数组构建，超出容量时只保留最后 capacity 个
   */
  static from<T>(items: Iterable<T>, capacity: number): RingBuffer<T> {
    const ring = new RingBuffer<T>(capacity);
    for (const item of items) {
      ring.push(item);
    }
    return ring;
  }

  get size(): number {
    return this._size;
  }

  get maxSize(): number {
    return this.capacity;
  }

  /**
   * 追加元素，返回被淘汰的最旧元素（若有）
   */
  push(item: T): T | undefined {
    const evicted = this._size === this.capacity ? this.buffer[this.head] : undefined;
    this.buffer[this.tail] = item;
    this.tail = (this.tail + 1) % this.capacity;

    if (this._size < this.capacity) {
      this._size++;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
    return evicted;
  }

  /** 获取最后一个元素（不移除） */
  last(): T | undefined {
    if (this._size === 0) return undefined;
    const lastIdx = (this.tail - 1 + this.capacity) % this.capacity;
    return this.buffer[lastIdx];
  }

  /** 获取指定索引的元素（0 为最旧） */
  get(index: number): T | undefined {
    if (index < 0 || index >= this._size) return undefined;
    return this.buffer[(this.head + index) % this.capacity];
  }

  /** 最近 n 个元素，按插入顺序 */
  latest(n: number): T[] {
    return n <= 0 ? [] : this.toArray().slice(-n);
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this._size; i++) {
      const item = this.buffer[(this.head + i) % this.capacity];
      if (item !== undefined) {
        yield item;
      }
    }
  }

  toArray(): T[] {
    return [...this];
  }
}
