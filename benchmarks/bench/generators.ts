/**
 * Seeded deterministic data generators for the boundary benchmarks.
 */

// Simple seeded PRNG (mulberry32)
function createRng(seed: number) {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const rng = createRng(42);

function randInt(min: number, max: number): number {
  return Math.floor(rng() * (max - min + 1)) + min;
}

function randFloat(min: number, max: number): number {
  return rng() * (max - min) + min;
}

function randString(len: number): string {
  const chars = "abcdefghijklmnopqrstuvwxyz";
  let s = "";
  for (let i = 0; i < len; i++) s += chars[randInt(0, chars.length - 1)];
  return s;
}

// ── Amounts: plain number[] ──
export function generateAmounts(count: number): number[] {
  return Array.from({ length: count }, () => randFloat(0, 1000));
}

// ── Amounts: lazy, re-iterable ──
export function generateLazyAmounts(count: number): Iterable<number> {
  const amounts = generateAmounts(count);
  return {
    *[Symbol.iterator]() {
      yield* amounts;
    },
  };
}

// ── Order: nested object with timestamps and sets ──
export function generateOrder() {
  return {
    id: randInt(1, 100000),
    placedAt: new Date(Date.UTC(2024, randInt(0, 11), randInt(1, 28))),
    customer: { name: randString(10), email: `${randString(6)}@example.com` },
    tags: new Set([randString(4), randString(5)]),
    lines: Array.from({ length: randInt(1, 10) }, () => ({
      sku: randString(8),
      quantity: randInt(1, 5),
      price: randFloat(1, 500),
    })),
  };
}
