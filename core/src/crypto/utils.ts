import { createHash } from 'crypto';

export class CryptoUtils {
  /**
   * Generate SHA-256 hash of content
   */
  static hashContent(content: Buffer): string {
    return createHash('sha256').update(content).digest('hex');
  }

  /**
   * Generate SHA-256 hash of string
   */
  static hashString(data: string): string {
    return createHash('sha256').update(data).digest('hex');
  }

  /**
   * Prefixed digest stored in media metadata
   */
  static fileHash(content: Buffer): string {
    return `sha256:${this.hashContent(content)}`;
  }
}

/**
 * Deterministic number stream: SHA-256 over `seed:counter`.
 * Two instances built from the same seed yield the same sequence.
 */
export class SeededRandom {
  private counter = 0;

  constructor(private readonly seed: string) {}

  /** Uniform in [0, 1) */
  next(): number {
    const digest = createHash('sha256').update(`${this.seed}:${this.counter++}`).digest();
    return digest.readUInt32BE(0) / 0x100000000;
  }

  uniform(min: number, max: number): number {
    return min + (max - min) * this.next();
  }

  /** Integer in [min, max], both inclusive */
  int(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }

  chance(probability: number): boolean {
    return this.next() < probability;
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError('Cannot pick from an empty list');
    }
    return items[this.int(0, items.length - 1)];
  }
}
