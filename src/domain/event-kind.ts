import { InvalidFlagValueError } from './errors.js';

/**
 * Bit positions of every event kind.
 *
 * Positions are permanent: a retired kind keeps its bit reserved, and a new
 * kind always takes the next unused position.
 */
export const EVENT_KIND_BITS = {
  daily_reset: 0,
  weekly_reset: 1,
  fashion_report: 2,
  ocean_fishing: 3,
  jumbo_cactpot_na: 4,
  jumbo_cactpot_eu: 5,
  jumbo_cactpot_jp: 6,
  jumbo_cactpot_oce: 7,
  gate: 8,
  open_tournament: 9,
} as const;

export type EventKind = keyof typeof EVENT_KIND_BITS;

export const EVENT_KINDS: readonly EventKind[] = [
  'daily_reset',
  'weekly_reset',
  'fashion_report',
  'ocean_fishing',
  'jumbo_cactpot_na',
  'jumbo_cactpot_eu',
  'jumbo_cactpot_jp',
  'jumbo_cactpot_oce',
  'gate',
  'open_tournament',
];

/** Storage width of the bitset (`bit(64)` column). */
export const FLAG_WIDTH = 64;

export function isEventKind(value: string): value is EventKind {
  return Object.prototype.hasOwnProperty.call(EVENT_KIND_BITS, value);
}

export function bitOf(kind: EventKind): bigint {
  return 1n << BigInt(EVENT_KIND_BITS[kind]);
}

const KNOWN_MASK = EVENT_KINDS.reduce((mask, kind) => mask | bitOf(kind), 0n);
const BIT_STRING_RE = /^[01]+$/;

/**
 * Immutable bitset over {@link EventKind}.
 *
 * Construction rejects negative values, values wider than {@link FLAG_WIDTH}
 * and bits that no event kind occupies.
 */
export class SubscriptionFlags {
  private constructor(readonly value: bigint) {}

  static none(): SubscriptionFlags {
    return new SubscriptionFlags(0n);
  }

  static all(): SubscriptionFlags {
    return new SubscriptionFlags(KNOWN_MASK);
  }

  static of(...kinds: readonly EventKind[]): SubscriptionFlags {
    return new SubscriptionFlags(kinds.reduce((mask, kind) => mask | bitOf(kind), 0n));
  }

  static fromValue(raw: bigint | number): SubscriptionFlags {
    if (typeof raw === 'number' && !Number.isSafeInteger(raw)) {
      throw new InvalidFlagValueError(String(raw), 'not a safe integer');
    }
    const value = BigInt(raw);
    if (value < 0n) {
      throw new InvalidFlagValueError(value.toString(), 'negative');
    }
    if (value >> BigInt(FLAG_WIDTH) !== 0n) {
      throw new InvalidFlagValueError(value.toString(), `wider than ${FLAG_WIDTH} bits`);
    }
    const unknown = value & ~KNOWN_MASK;
    if (unknown !== 0n) {
      throw new InvalidFlagValueError(value.toString(), `unknown bits 0b${unknown.toString(2)}`);
    }
    return new SubscriptionFlags(value);
  }

  /** Parses the PostgreSQL `bit(64)` text form (most significant bit first). */
  static fromBitString(bits: string): SubscriptionFlags {
    if (bits.length !== FLAG_WIDTH || !BIT_STRING_RE.test(bits)) {
      throw new InvalidFlagValueError(bits, `expected ${FLAG_WIDTH} binary digits`);
    }
    return SubscriptionFlags.fromValue(BigInt(`0b${bits}`));
  }

  has(kind: EventKind): boolean {
    return (this.value & bitOf(kind)) !== 0n;
  }

  with(kind: EventKind): SubscriptionFlags {
    return new SubscriptionFlags(this.value | bitOf(kind));
  }

  without(kind: EventKind): SubscriptionFlags {
    return new SubscriptionFlags(this.value & ~bitOf(kind));
  }

  union(other: SubscriptionFlags): SubscriptionFlags {
    return new SubscriptionFlags(this.value | other.value);
  }

  equals(other: SubscriptionFlags): boolean {
    return this.value === other.value;
  }

  isEmpty(): boolean {
    return this.value === 0n;
  }

  kinds(): EventKind[] {
    return EVENT_KINDS.filter((kind) => this.has(kind));
  }

  toBitString(): string {
    return this.value.toString(2).padStart(FLAG_WIDTH, '0');
  }

  toJSON(): { value: string; kinds: EventKind[] } {
    return { value: this.value.toString(), kinds: this.kinds() };
  }
}
