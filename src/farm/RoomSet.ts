/**
 * @fileoverview Fixed-capacity set of room ids, one bit per room.
 *
 * Used for blocked rooms during route selection and for visited marks
 * during breadth-first search. Copying is a single typed-array copy.
 *
 * @module farm/RoomSet
 */

export class RoomSet {
  private readonly words: Uint32Array;

  constructor(
    /** Number of room ids this set can hold (ids 0..capacity-1) */
    public readonly capacity: number,
    words?: Uint32Array
  ) {
    this.words = words ?? new Uint32Array(Math.ceil(capacity / 32));
  }

  static of(capacity: number, ids: Iterable<number>): RoomSet {
    const set = new RoomSet(capacity);
    set.addAll(ids);
    return set;
  }

  has(id: number): boolean {
    if (id < 0 || id >= this.capacity) return false;
    return (this.words[id >>> 5] & (1 << (id & 31))) !== 0;
  }

  add(id: number): this {
    if (id < 0 || id >= this.capacity) {
      throw new RangeError(`Room id ${id} outside set capacity ${this.capacity}`);
    }
    this.words[id >>> 5] |= 1 << (id & 31);
    return this;
  }

  addAll(ids: Iterable<number>): this {
    for (const id of ids) this.add(id);
    return this;
  }

  delete(id: number): void {
    if (id < 0 || id >= this.capacity) return;
    this.words[id >>> 5] &= ~(1 << (id & 31));
  }

  clone(): RoomSet {
    return new RoomSet(this.capacity, this.words.slice());
  }

  get size(): number {
    let count = 0;
    for (const word of this.words) {
      let w = word;
      while (w !== 0) {
        w &= w - 1;
        count++;
      }
    }
    return count;
  }

  /**
   * Ids in ascending order.
   */
  toArray(): number[] {
    const ids: number[] = [];
    for (let id = 0; id < this.capacity; id++) {
      if (this.has(id)) ids.push(id);
    }
    return ids;
  }
}
