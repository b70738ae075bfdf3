import type { Curve, CurveKey, CurvePayload } from "../types";

/**
 * Evaluate a curve at t. Keys are expected sorted by t; values outside the
 * first/last key hold the end values. An empty curve is the identity.
 */
export function sampleCurve(curve: Curve, t: number): number {
  const keys = curve.keys;
  if (keys.length === 0) return t;

  const first = keys[0];
  if (keys.length === 1 || t <= first.t) return first.value;

  const last = keys[keys.length - 1];
  if (t >= last.t) return last.value;

  for (let i = 0; i < keys.length - 1; i++) {
    const prev = keys[i];
    const next = keys[i + 1];
    if (prev.t <= t && next.t > t) {
      return interpolate(curve, prev, next, t);
    }
  }

  return last.value;
}

/**
 * Bake a curve set into a width x 1 RGBA lookup row.
 * Channel c of texel x holds curve c evaluated at x / (width - 1).
 */
export function bakeCurveLookup(payload: CurvePayload, width: number): Float32Array {
  const curves = payload.channels.map((curve) =>
    curve ? { interpolation: curve.interpolation, keys: sortCurveKeys(curve.keys) } : null,
  );
  const data = new Float32Array(width * 4);
  for (let x = 0; x < width; x++) {
    const t = width > 1 ? x / (width - 1) : 0;
    for (let c = 0; c < 4; c++) {
      const curve = curves[c];
      data[x * 4 + c] = curve ? sampleCurve(curve, t) : t;
    }
  }
  return data;
}

/** Keys sorted by t, copied so callers can pass unsorted input. */
export function sortCurveKeys(keys: CurveKey[]): CurveKey[] {
  return [...keys].sort((a, b) => a.t - b.t);
}

function interpolate(curve: Curve, prev: CurveKey, next: CurveKey, t: number): number {
  const range = next.t - prev.t;
  if (range <= 0) return prev.value;
  const progress = (t - prev.t) / range;

  switch (curve.interpolation) {
    case "step":
      return prev.value;
    case "smooth":
      return prev.value + (next.value - prev.value) * progress * progress * (3 - 2 * progress);
    case "linear":
      return prev.value + (next.value - prev.value) * progress;
  }
}
