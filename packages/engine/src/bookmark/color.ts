import { clamp01 } from "../math/scalar.js";
import type { Rgba } from "./types.js";

export type RandomSource = () => number;

function range(random: RandomSource, min: number, max: number): number {
  return min + (max - min) * random();
}

/**
 * HSV in [0, 1] to an opaque RGB colour.
 */
export function hsvToRgb(h: number, s: number, v: number): Rgba {
  const hue = ((h % 1) + 1) % 1;
  const sector = Math.floor(hue * 6);
  const f = hue * 6 - sector;
  const p = v * (1 - s);
  const q = v * (1 - f * s);
  const t = v * (1 - (1 - f) * s);
  switch (sector % 6) {
    case 0: return { r: v, g: t, b: p, a: 1 };
    case 1: return { r: q, g: v, b: p, a: 1 };
    case 2: return { r: p, g: v, b: t, a: 1 };
    case 3: return { r: p, g: q, b: v, a: 1 };
    case 4: return { r: t, g: p, b: v, a: 1 };
    default: return { r: v, g: p, b: q, a: 1 };
  }
}

export function saturationOf(color: Rgba): number {
  const max = Math.max(color.r, color.g, color.b);
  const min = Math.min(color.r, color.g, color.b);
  if (max <= 0.0001) return 0;
  return (max - min) / max;
}

function srgbToLinear(channel: number): number {
  return channel <= 0.04045 ? channel / 12.92 : ((channel + 0.055) / 1.055) ** 2.4;
}

export function perceivedLuminance(color: Rgba): number {
  const y = 0.2126 * srgbToLinear(color.r) + 0.7152 * srgbToLinear(color.g) + 0.0722 * srgbToLinear(color.b);
  return clamp01(y);
}

/**
 * A saturated, bright marker colour. Dark or washed-out picks are pushed up
 * once towards the floors.
 */
export function randomBrightColor(
  random: RandomSource = Math.random,
  minSaturation = 0.65,
  minValue = 0.85,
): Rgba {
  const satFloor = clamp01(minSaturation);
  const valueFloor = clamp01(minValue);

  const h = random();
  let s = range(random, satFloor, 1);
  let v = range(random, valueFloor, 1);
  let color = hsvToRgb(h, s, v);

  if (saturationOf(color) < satFloor || perceivedLuminance(color) < valueFloor) {
    s = Math.max(s, Math.min(0.9, satFloor + 0.1));
    v = Math.max(v, Math.min(0.95, valueFloor + 0.1));
    color = hsvToRgb(h, s, v);
  }

  return color;
}
