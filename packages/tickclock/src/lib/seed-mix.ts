/**
 * Pinned seed derivation and random source for timestamp synthesis.
 *
 * Every event draws from its own source, seeded by hashing the event's
 * identity. Changing anything here changes every timestamp a clock
 * produces, so bump SEED_MIX_VERSION whenever the key format, hash or
 * generator changes.
 */

export const SEED_MIX_VERSION = 1;

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

const LCG_MULTIPLIER = 1664525;
const LCG_INCREMENT = 1013904223;

const TWO_POW_21 = 2 ** 21;
const TWO_POW_53 = 2 ** 53;

export interface SeededSource {
  /** Next raw 32-bit state */
  nextUint32(): number;
  /** Uniform float in [0, 1) built from two draws (53 bits) */
  nextFloat(): number;
}

// 32-bit FNV-1a over UTF-16 code units
export function fnv1a32(text: string): number {
  let h = FNV_OFFSET_BASIS;
  for (let i = 0; i < text.length; i++) {
    h ^= text.charCodeAt(i);
    h = Math.imul(h, FNV_PRIME);
  }
  return h >>> 0;
}

/**
 * Canonical text key for one synthesis call. The hint is length-prefixed
 * so a hint containing "|" cannot collide with another field split.
 */
export function eventSeedKey(
  seed: number,
  tick: number,
  actorId: number,
  actionHint: string,
  callIndex: number
): string {
  return `v${SEED_MIX_VERSION}|${seed}|${tick}|${actorId}|${actionHint.length}:${actionHint}|${callIndex}`;
}

export function deriveEventSeed(
  seed: number,
  tick: number,
  actorId: number,
  actionHint: string,
  callIndex: number
): number {
  return fnv1a32(eventSeedKey(seed, tick, actorId, actionHint, callIndex));
}

// Linear congruential generator, mod 2^32
export function createSeededSource(seed: number): SeededSource {
  let state = seed >>> 0;

  const nextUint32 = (): number => {
    state = (Math.imul(state, LCG_MULTIPLIER) + LCG_INCREMENT) >>> 0;
    return state;
  };

  return {
    nextUint32,
    nextFloat: () => {
      const high = nextUint32();
      const low = nextUint32() >>> 11;
      return (high * TWO_POW_21 + low) / TWO_POW_53;
    },
  };
}

/** Uniform integer in the inclusive range [min, max]. */
export function randomInt(source: SeededSource, min: number, max: number): number {
  return min + Math.floor(source.nextFloat() * (max - min + 1));
}
