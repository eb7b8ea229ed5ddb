const UINT32 = 0x1_0000_0000;

/** FNV-1a over the UTF-16 code units of `s` */
function fnv1a(s: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    hash ^= s.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * xorshift32 generator keyed by a string, so a puzzle can be
 * reproduced from the seed the player sees.
 */
export class SeededRng {
  private state: number;

  constructor(readonly seed: string) {
    // A zero state would only ever yield zeros
    this.state = fnv1a(seed) || 0x9e3779b9;
  }

  /** Next unsigned 32-bit value */
  next(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  nextFloat(): number {
    return this.next() / UINT32;
  }

  /** Integer in [0, max) */
  nextInt(max: number): number {
    return Math.floor(this.nextFloat() * max);
  }

  /** A shuffled copy of `items` (Fisher-Yates); the input is left alone */
  shuffle<T>(items: readonly T[]): T[] {
    const out = items.slice();
    for (let i = out.length - 1; i > 0; i--) {
      const j = this.nextInt(i + 1);
      const tmp = out[i];
      out[i] = out[j];
      out[j] = tmp;
    }
    return out;
  }
}
