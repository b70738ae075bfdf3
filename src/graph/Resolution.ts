import type { Resolution } from "../types";

/** Largest log2 size a nibble can carry: 2^15 = 32768 pixels. */
export const MAX_RESOLUTION_LOG2 = 15;

/**
 * Decode a packed resolution byte.
 * High nibble is log2(width), low nibble is log2(height): 0xAA -> 1024x1024.
 */
export function decodeResolution(packed: number): Resolution {
  const byte = packed & 0xff;
  return {
    width: 1 << (byte >> 4),
    height: 1 << (byte & 0x0f),
  };
}

/**
 * Pack power-of-two width/height exponents into one byte.
 */
export function packResolution(widthLog2: number, heightLog2: number): number {
  if (!isLog2InRange(widthLog2) || !isLog2InRange(heightLog2)) {
    throw new RangeError(`Resolution exponents out of range: ${widthLog2}x${heightLog2}`);
  }
  return (widthLog2 << 4) | heightLog2;
}

/**
 * Pack a pixel size. Both dimensions must be powers of two between 1 and 32768.
 */
export function encodeResolution(resolution: Resolution): number {
  return packResolution(exactLog2(resolution.width), exactLog2(resolution.height));
}

export function resolutionKey(packed: number): string {
  const { width, height } = decodeResolution(packed);
  return `${width}x${height}`;
}

export function isPowerOfTwo(n: number): boolean {
  return Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0;
}

function exactLog2(size: number): number {
  if (!isPowerOfTwo(size)) {
    throw new RangeError(`Texture size must be a power of two, got ${size}`);
  }
  return Math.log2(size);
}

function isLog2InRange(n: number): boolean {
  return Number.isInteger(n) && n >= 0 && n <= MAX_RESOLUTION_LOG2;
}
