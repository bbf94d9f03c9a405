import { IndexOutOfRangeError, InvalidCapacityError, precondition } from "@coatcheck/errors";

const WORD_BITS = 32;

/**
 * Fixed-size set of bit flags packed into 32-bit words
 */
export class BitSet {
  readonly size: number;
  private readonly words: Uint32Array;

  constructor(size: number) {
    precondition(
      Number.isInteger(size) && size > 0,
      () => new InvalidCapacityError(`Size has to be more than zero, got ${size}`, "size", size),
    );
    this.size = size;
    this.words = new Uint32Array(Math.ceil(size / WORD_BITS));
  }

  /**
   * Number of set bits
   */
  get cardinality(): number {
    let count = 0;
    for (const word of this.words) {
      // clear the lowest set bit until none are left
      let x = word;
      while (x !== 0) {
        x &= x - 1;
        count++;
      }
    }
    return count;
  }

  set(index: number): void {
    const [word, mask] = this.locate(index);
    this.words[word] |= mask;
  }

  clear(index: number): void {
    const [word, mask] = this.locate(index);
    this.words[word] &= ~mask;
  }

  isSet(index: number): boolean {
    const [word, mask] = this.locate(index);
    return (this.words[word] & mask) !== 0;
  }

  assign(index: number, value: boolean): void {
    if (value) {
      this.set(index);
    } else {
      this.clear(index);
    }
  }

  clone(): BitSet {
    const copy = new BitSet(this.size);
    copy.words.set(this.words);
    return copy;
  }

  private locate(index: number): [word: number, mask: number] {
    precondition(
      Number.isInteger(index) && index >= 0 && index < this.size,
      () => new IndexOutOfRangeError(index, this.size),
    );
    const word = Math.floor(index / WORD_BITS);
    return [word, 1 << (index - word * WORD_BITS)];
  }
}
