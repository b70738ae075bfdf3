import type { PrecisionMode } from "../types";
import type { RenderTarget } from "./RenderDevice";
import type { TextureSampler } from "../filters/FilterProgram";

export interface MipLevel {
  width: number;
  height: number;
  data: Float32Array;
}

/**
 * RGBA float image backing a CpuRenderDevice target.
 *
 * Standard precision emulates an 8-bit normalized format: writes are clamped to
 * [0, 1] and quantized to 1/255 steps. Extended precision stores values as-is.
 * Sampling wraps in both directions, matching tileable texture generation.
 */
export class PixelBuffer implements RenderTarget, TextureSampler {
  readonly id: number;
  readonly width: number;
  readonly height: number;
  readonly precision: PrecisionMode;
  readonly data: Float32Array;
  /** Levels 1..n after generateMips(); level 0 is `data`. */
  mips: MipLevel[] = [];

  constructor(id: number, width: number, height: number, precision: PrecisionMode, data?: Float32Array) {
    this.id = id;
    this.width = width;
    this.height = height;
    this.precision = precision;
    if (data && data.length !== width * height * 4) {
      throw new RangeError(`Pixel data has ${data.length} values, expected ${width * height * 4}`);
    }
    this.data = data ?? new Float32Array(width * height * 4);
  }

  get byteLength(): number {
    return this.data.byteLength;
  }

  write(x: number, y: number, r: number, g: number, b: number, a: number): void {
    const idx = (y * this.width + x) * 4;
    if (this.precision === "standard") {
      this.data[idx] = quantize(r);
      this.data[idx + 1] = quantize(g);
      this.data[idx + 2] = quantize(b);
      this.data[idx + 3] = quantize(a);
    } else {
      this.data[idx] = r;
      this.data[idx + 1] = g;
      this.data[idx + 2] = b;
      this.data[idx + 3] = a;
    }
  }

  fill(r: number, g: number, b: number, a: number): void {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) this.write(x, y, r, g, b, a);
    }
  }

  /** Read one texel with wrap-around addressing. */
  fetch(x: number, y: number, out: Float32Array): Float32Array {
    const wx = wrap(Math.floor(x), this.width);
    const wy = wrap(Math.floor(y), this.height);
    const idx = (wy * this.width + wx) * 4;
    out[0] = this.data[idx];
    out[1] = this.data[idx + 1];
    out[2] = this.data[idx + 2];
    out[3] = this.data[idx + 3];
    return out;
  }

  /** Bilinear sample at normalized coordinates with texel centers at (i + 0.5) / size. */
  sample(u: number, v: number, out: Float32Array): Float32Array {
    const fx = u * this.width - 0.5;
    const fy = v * this.height - 0.5;
    const x0 = Math.floor(fx);
    const y0 = Math.floor(fy);
    const tx = fx - x0;
    const ty = fy - y0;

    const i00 = this.texelIndex(x0, y0);
    const i10 = this.texelIndex(x0 + 1, y0);
    const i01 = this.texelIndex(x0, y0 + 1);
    const i11 = this.texelIndex(x0 + 1, y0 + 1);

    for (let c = 0; c < 4; c++) {
      const top = this.data[i00 + c] * (1 - tx) + this.data[i10 + c] * tx;
      const bottom = this.data[i01 + c] * (1 - tx) + this.data[i11 + c] * tx;
      out[c] = top * (1 - ty) + bottom * ty;
    }
    return out;
  }

  /**
   * Rebuild the mip chain with a 2x2 box filter down to 1x1.
   * Odd dimensions never occur: sizes are powers of two.
   */
  regenerateMips(): void {
    const levels: MipLevel[] = [];
    let src: MipLevel = { width: this.width, height: this.height, data: this.data };

    while (src.width > 1 || src.height > 1) {
      const width = Math.max(1, src.width >> 1);
      const height = Math.max(1, src.height >> 1);
      const data = new Float32Array(width * height * 4);
      const sx = src.width > 1 ? 2 : 1;
      const sy = src.height > 1 ? 2 : 1;

      for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
          for (let c = 0; c < 4; c++) {
            let sum = 0;
            for (let dy = 0; dy < sy; dy++) {
              for (let dx = 0; dx < sx; dx++) {
                sum += src.data[((y * sy + dy) * src.width + (x * sx + dx)) * 4 + c];
              }
            }
            data[(y * width + x) * 4 + c] = sum / (sx * sy);
          }
        }
      }

      const level = { width, height, data };
      levels.push(level);
      src = level;
    }

    this.mips = levels;
  }

  private texelIndex(x: number, y: number): number {
    return (wrap(y, this.height) * this.width + wrap(x, this.width)) * 4;
  }
}

function wrap(n: number, size: number): number {
  return ((n % size) + size) % size;
}

function quantize(v: number): number {
  if (!(v > 0)) return 0;
  if (v >= 1) return 1;
  return Math.round(v * 255) / 255;
}
