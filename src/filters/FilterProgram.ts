/**
 * The parameter-access surface a filter program sees during one pass.
 */

import type { FilterDescriptor } from "../types";
import type { PixelBuffer } from "../render/PixelBuffer";

/** Read-only view of a bound input or auxiliary texture. */
export interface TextureSampler {
  readonly width: number;
  readonly height: number;
  /** Texel at integer coordinates, wrapping at the edges. */
  fetch(x: number, y: number, out: Float32Array): Float32Array;
  /** Bilinear sample at normalized coordinates, wrapping at the edges. */
  sample(u: number, v: number, out: Float32Array): Float32Array;
}

export interface PassContext {
  passIndex: number;
  passCount: number;
  random: readonly [number, number, number];
  parameters: Float32Array;
  seed: number;
  /**
   * Input 0 is the node's first parent on pass 0 and the previous pass output
   * afterwards. `null` means no input: a generator must produce from scratch.
   */
  inputs: readonly [TextureSampler | null, TextureSampler | null, TextureSampler | null];
  auxiliary: TextureSampler | null;
}

export interface FilterProgram {
  run(target: PixelBuffer, pass: PassContext): void;
}

export interface FilterDefinition {
  name: string;
  descriptor: FilterDescriptor;
  program: FilterProgram;
}

export type PixelShader = (x: number, y: number, u: number, v: number, out: Float32Array) => void;

/**
 * Run a per-pixel shader over every texel of the target.
 * `u`/`v` are texel-center coordinates in [0, 1].
 */
export function shadePixels(target: PixelBuffer, shader: PixelShader): void {
  const out = new Float32Array(4);
  const { width, height } = target;
  for (let y = 0; y < height; y++) {
    const v = (y + 0.5) / height;
    for (let x = 0; x < width; x++) {
      out[0] = 0;
      out[1] = 0;
      out[2] = 0;
      out[3] = 1;
      shader(x, y, (x + 0.5) / width, v, out);
      target.write(x, y, out[0], out[1], out[2], out[3]);
    }
  }
}
