/**
 * FNV-1a 64-bit hash implementation
 */

const FNV64_OFFSET_BASIS = 14695981039346656037n;
const FNV64_PRIME = 1099511628211n;
const MASK_64 = (1n << 64n) - 1n;

/**
 * FNV-1a 64-bit hasher for incremental hashing
 */
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
   * Add a 32-bit integer (little-endian)
   */
  updateInt32(value: number): this {
    const v = value >>> 0;
    return this.updateByte(v & 0xff)
      .updateByte((v >>> 8) & 0xff)
      .updateByte((v >>> 16) & 0xff)
      .updateByte((v >>> 24) & 0xff);
  }

  updateString(value: string): this {
    return this.updateBytes(new TextEncoder().encode(value));
  }

  /**
   * 16-character lowercase hex digest
   */
  digest(): string {
    return this.hash.toString(16).padStart(16, "0");
  }
}

export function fnv64(value: string): string {
  return new FNV64Hasher().updateString(value).digest();
}
