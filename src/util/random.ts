import { hashString } from "../lib/hash";
import type { NumberRange } from "../types";

export type Rng = {
  next: () => number;
};

export const createRng = (seed: number): Rng => {
  let state = seed >>> 0;
  if (state === 0) {
    state = 1;
  }

  return {
    next: () => {
      state += 0x6d2b79f5;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }
  };
};

export const seededRng = (seed: string): Rng => {
  return createRng(hashString(seed));
};

export const randomSeed = (): number => {
  return Math.floor(Math.random() * 4294967296) >>> 0;
};

/** Integer in [start, end). An empty range yields `start`. */
export const randomInt = (rng: Rng, start: number, end: number): number => {
  if (end <= start) {
    return start;
  }
  return start + Math.floor(rng.next() * (end - start));
};

export const randomIntInclusive = (rng: Rng, min: number, max: number): number => {
  return randomInt(rng, min, max + 1);
};

export const randomInRange = (rng: Rng, range: NumberRange): number => {
  if (range.end <= range.start) {
    return range.start;
  }
  return range.start + rng.next() * (range.end - range.start);
};

export const randomIntInRange = (rng: Rng, range: NumberRange): number => {
  return randomInt(rng, range.start, range.end);
};

export const shuffle = <T>(items: T[], rng: Rng): T[] => {
  for (let i = items.length - 1; i > 0; i -= 1) {
    const j = Math.floor(rng.next() * (i + 1));
    const held = items[i];
    items[i] = items[j];
    items[j] = held;
  }
  return items;
};
