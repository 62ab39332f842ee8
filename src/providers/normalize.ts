// src/providers/normalize.ts
// Value coercion shared by every adapter. Upstream feeds send numbers as
// numbers, numeric strings, "12.3%" strings, "-" or nothing at all.

/** Coerce a raw field to a finite number; anything unusable is `fallback`. */
export function toNumber(value: unknown, fallback = 0): number {
  if (typeof value === "number") return Number.isFinite(value) ? value : fallback;
  if (typeof value !== "string") return fallback;
  const s = value.trim();
  if (s === "" || s === "-" || s === "--") return fallback;
  const n = Number(s);
  return Number.isFinite(n) ? n : fallback;
}

/** Same as toNumber, but strips a trailing or embedded percent sign. */
export function percentToNumber(value: unknown, fallback = 0): number {
  if (typeof value === "string" && value.includes("%")) {
    return toNumber(value.replace(/%/g, ""), fallback);
  }
  return toNumber(value, fallback);
}

/** 万 → 亿 */
const WAN_PER_YI = 10_000;

export function wanToYi(value: unknown): number {
  return toNumber(value) / WAN_PER_YI;
}

/** Round half away from zero to `dp` decimals. */
export function round(value: number, dp = 2): number {
  if (!Number.isFinite(value)) return 0;
  const f = 10 ** dp;
  const r = Math.round((Math.abs(value) + Number.EPSILON) * f) / f;
  return value < 0 ? -r : r;
}

/** Percent change versus a base; 0 when the base is 0. */
export function pctChange(current: number, base: number): number {
  if (!base) return 0;
  return ((current - base) / base) * 100;
}

export function clamp(x: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, x));
}
