export const KEY_SEPARATOR = "+";

const LETTER = /^[A-Z]$/u;

export class InvalidKeyTokenError extends Error {
  readonly token: string;

  constructor(token: string) {
    super(`Invalid key token "${token}": every chord key must be a single character.`);
    this.name = "InvalidKeyTokenError";
    this.token = token;
  }
}

/**
 * A set of distinct keys kept in ascending code-point order. The canonical
 * form joins the keys with `+`, e.g. `A+E+T`.
 */
export class Chord {
  private readonly keyList: string[];

  private constructor(keys: string[]) {
    this.keyList = keys;
  }

  static empty(): Chord {
    return new Chord([]);
  }

  /**
   * Parses a chord expression such as `" t + a+e "`. Duplicate keys merge;
   * any segment that is not exactly one character after trimming throws
   * {@link InvalidKeyTokenError}. Blank input is the empty chord.
   */
  static parse(text: string): Chord {
    if (text.trim().length === 0) {
      return Chord.empty();
    }

    const keys = new Set<string>();
    for (const segment of text.split(KEY_SEPARATOR)) {
      const token = segment.trim();
      if (Array.from(token).length !== 1) {
        throw new InvalidKeyTokenError(token);
      }
      keys.add(foldKey(token));
    }

    return new Chord(Array.from(keys).sort(compareCodePoints));
  }

  static compare(left: Chord, right: Chord): number {
    return compareCodePoints(left.toString(), right.toString());
  }

  get size(): number {
    return this.keyList.length;
  }

  /**
   * Adds a letter key in sorted position. Returns false, leaving the chord
   * untouched, for anything but a single letter or for a key already held.
   */
  insert(key: string): boolean {
    if (Array.from(key).length !== 1) {
      return false;
    }

    const folded = foldKey(key);
    if (!LETTER.test(folded) || this.keyList.includes(folded)) {
      return false;
    }

    const position = this.keyList.findIndex(
      (existing) => compareCodePoints(existing, folded) > 0,
    );
    if (position === -1) {
      this.keyList.push(folded);
    } else {
      this.keyList.splice(position, 0, folded);
    }
    return true;
  }

  has(key: string): boolean {
    return this.keyList.includes(foldKey(key));
  }

  keys(): string[] {
    return [...this.keyList];
  }

  isEmpty(): boolean {
    return this.keyList.length === 0;
  }

  clear(): void {
    this.keyList.length = 0;
  }

  clone(): Chord {
    return new Chord([...this.keyList]);
  }

  equals(other: Chord): boolean {
    return this.toString() === other.toString();
  }

  compareTo(other: Chord): number {
    return Chord.compare(this, other);
  }

  toString(): string {
    return this.keyList.join(KEY_SEPARATOR);
  }
}

// Only ASCII letters fold; other characters pass through unchanged.
function foldKey(key: string): string {
  return key.replace(/[a-z]/gu, (letter) => letter.toUpperCase());
}

/**
 * Orders strings by Unicode code point, so keys outside the BMP sort the
 * same way their UTF-8 bytes would.
 */
export function compareCodePoints(left: string, right: string): number {
  const leftPoints = Array.from(left);
  const rightPoints = Array.from(right);
  const length = Math.min(leftPoints.length, rightPoints.length);

  for (let index = 0; index < length; index += 1) {
    const difference =
      (leftPoints[index]?.codePointAt(0) ?? 0) -
      (rightPoints[index]?.codePointAt(0) ?? 0);
    if (difference !== 0) {
      return difference;
    }
  }

  return leftPoints.length - rightPoints.length;
}
