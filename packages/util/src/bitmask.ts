/**
 * Bitmask<E>: bitwise operations over flags of a numeric enum.
 *
 * ```typescript
 * enum Access { Read = 1, Write = 2, Exec = 4 }
 *
 * const rw = bitmask(Access.Read, Access.Write);
 * rw.has(Access.Write);          // true
 * rw.xor(Access.Write).value;    // 1
 * rw.describe(Access);           // ["Read", "Write"]
 * ```
 *
 * Values are kept as unsigned 32-bit integers, the width JS bitwise operators
 * work in.
 */

export type Flag<E extends number> = E | Bitmask<E>;

function bits<E extends number>(flag: Flag<E>): number {
  return (typeof flag === "number" ? flag : flag.value) >>> 0;
}

export class Bitmask<E extends number> {
  readonly value: number;

  constructor(value: number = 0) {
    this.value = value >>> 0;
  }

  static of<E extends number>(...flags: E[]): Bitmask<E> {
    let value = 0;
    for (const flag of flags) value |= flag;
    return new Bitmask<E>(value);
  }

  or(flag: Flag<E>): Bitmask<E> {
    return new Bitmask(this.value | bits(flag));
  }

  and(flag: Flag<E>): Bitmask<E> {
    return new Bitmask(this.value & bits(flag));
  }

  xor(flag: Flag<E>): Bitmask<E> {
    return new Bitmask(this.value ^ bits(flag));
  }

  /** Flips all 32 bits, not only the declared flags. */
  complement(): Bitmask<E> {
    return new Bitmask(~this.value);
  }

  /** Every bit of `flag` is set. */
  has(flag: Flag<E>): boolean {
    const b = bits(flag);
    return ((this.value & b) >>> 0) === b;
  }

  /** At least one bit of `flag` is set. */
  intersects(flag: Flag<E>): boolean {
    return (this.value & bits(flag)) !== 0;
  }

  isEmpty(): boolean {
    return this.value === 0;
  }

  equals(other: Flag<E>): boolean {
    return this.value === bits(other);
  }

  /**
   * Names of the non-zero enum members whose bits are all set, in declaration
   * order. Reverse-mapping keys of numeric enums are skipped.
   */
  describe(enumObject: Record<string, string | number>): string[] {
    const names: string[] = [];
    for (const [name, member] of Object.entries(enumObject)) {
      if (typeof member !== "number" || member === 0) continue;
      const b = member >>> 0;
      if (((this.value & b) >>> 0) === b) names.push(name);
    }
    return names;
  }

  valueOf(): number {
    return this.value;
  }

  toString(): string {
    return `0x${this.value.toString(16).toUpperCase()}`;
  }
}

export function bitmask<E extends number>(...flags: E[]): Bitmask<E> {
  return Bitmask.of(...flags);
}
