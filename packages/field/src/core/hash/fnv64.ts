/**
 * FNV-1a 64-bit hash, used for field checksums.
 */

const FNV64_OFFSET_BASIS = 14695981039346656037n;
const FNV64_PRIME = 1099511628211n;
const MASK_64 = (1n << 64n) - 1n;

export class FNV64Hasher {
  private hash: bigint = FNV64_OFFSET_BASIS;

  updateByte(byte: number): this {
    this.hash ^= BigInt(byte & 0xff);
    this.hash = (this.hash * FNV64_PRIME) & MASK_64;
    return this;
  }

  updateBytes(data: Uint8Array): this {
    for (const byte of data) {
      this.updateByte(byte);
    }
    return this;
  }

  /**
   * UTF-8 bytes of the string
   */
  updateString(str: string): this {
    return this.updateBytes(new TextEncoder().encode(str));
  }

  /**
   * 16-character hex digest
   */
  digest(): string {
    return this.hash.toString(16).padStart(16, "0");
  }
}

export function fnv64HashString(str: string): string {
  return new FNV64Hasher().updateString(str).digest();
}
