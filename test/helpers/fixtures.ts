/**
 * Value types used across the contract tests.
 */

import type { Comparable, Equatable } from '../../src/verification/types.js';

export class Money implements Equatable {
  constructor(readonly amount: number, readonly currency: string) {}

  equals(other: unknown): boolean {
    return other instanceof Money
      && other.amount === this.amount
      && other.currency === this.currency;
  }

  hashCode(): number {
    return this.amount * 31 + this.currency.length;
  }

  toString(): string {
    return `${this.amount} ${this.currency}`;
  }
}

export class Version implements Comparable<Version> {
  constructor(readonly major: number, readonly minor: number) {}

  compareTo(other: Version | null): number {
    if (other === null) throw new TypeError('Cannot compare a version to null');
    return this.major !== other.major ? this.major - other.major : this.minor - other.minor;
  }

  toString(): string {
    return `${this.major}.${this.minor}`;
  }
}

/**
 * Fixed-point decimal. `1.0` and `1.00` compare as equal but are not equal:
 * the scale is part of the value.
 */
export class Decimal implements Comparable<Decimal>, Equatable {
  constructor(readonly unscaled: bigint, readonly scale: number) {}

  compareTo(other: Decimal | null): number {
    if (other === null) throw new TypeError('Cannot compare a decimal to null');
    const scale = Math.max(this.scale, other.scale);
    const a = this.unscaled * 10n ** BigInt(scale - this.scale);
    const b = other.unscaled * 10n ** BigInt(scale - other.scale);
    return a === b ? 0 : a < b ? -1 : 1;
  }

  equals(other: unknown): boolean {
    return other instanceof Decimal
      && other.unscaled === this.unscaled
      && other.scale === this.scale;
  }

  hashCode(): number {
    return Number(this.unscaled % 1_000_003n) * 31 + this.scale;
  }

  toString(): string {
    if (this.scale === 0) return this.unscaled.toString();
    const digits = this.unscaled.toString().padStart(this.scale + 1, '0');
    return `${digits.slice(0, -this.scale)}.${digits.slice(-this.scale)}`;
  }
}

/** Entity: equal exactly when the ids are equal. */
export class Account {
  constructor(readonly id: string | null, readonly owner: string) {}

  equals(other: unknown): boolean {
    return other instanceof Account && this.id !== null && this.id === other.id;
  }

  toString(): string {
    return `Account(${this.id})`;
  }
}

/** Value object whose label is not part of its equality. */
export class Point {
  constructor(readonly x: number, readonly y: number, readonly label: string) {}

  equals(other: unknown): boolean {
    return other instanceof Point && other.x === this.x && other.y === this.y;
  }

  toString(): string {
    return `(${this.x}, ${this.y})`;
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
