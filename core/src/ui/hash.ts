/**
 * Incremental 64-bit FNV-1a hasher used to fingerprint rendered rows.
 *
 * Only used to decide whether a row must be rewritten; not a security boundary.
 */

const FNV_OFFSET_BASIS = 0xcbf29ce484222325n;
const FNV_PRIME = 0x100000001b3n;
const MASK_64 = 0xffffffffffffffffn;

const encoder = new TextEncoder();

export class RowHasher {
  private state = FNV_OFFSET_BASIS;

  update(text: string): this {
    for (const byte of encoder.encode(text)) {
      this.state = ((this.state ^ BigInt(byte)) * FNV_PRIME) & MASK_64;
    }
    // separator so that "ab"+"c" and "a"+"bc" differ
    this.state = ((this.state ^ 0xffn) * FNV_PRIME) & MASK_64;
    return this;
  }

  digest(): bigint {
    return this.state;
  }
}
