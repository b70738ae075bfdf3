/**
 * Abstract render device interface.
 *
 * The engine never touches pixels itself: it allocates targets, asks the device
 * to run one pass of a filter program into a target, and regenerates summary
 * levels. CpuRenderDevice implements this on typed arrays; a GPU binding
 * implements the same interface with framebuffers and shader programs.
 */

import type { PrecisionMode } from "../types";
import type { FilterProgram } from "../filters/FilterProgram";

/** Opaque handle to a device-resident image. */
export interface RenderTarget {
  readonly id: number;
  readonly width: number;
  readonly height: number;
  readonly precision: PrecisionMode;
}

export type InputBindings = readonly [RenderTarget | null, RenderTarget | null, RenderTarget | null];

/** Everything bound to a filter program for one pass. */
export interface PassBindings {
  passIndex: number;
  passCount: number;
  /** Three fresh values in [0, 1), drawn from the node's seeded generator. */
  random: readonly [number, number, number];
  /** Node parameters normalized to [0, 1]. */
  parameters: Float32Array;
  seed: number;
  inputs: InputBindings;
  auxiliary: RenderTarget | null;
}

export interface RenderDevice {
  readonly name: string;

  /** True once the device is gone. Every later call throws DeviceLostError. */
  isLost(): boolean;

  /**
   * Allocate an uninitialized target.
   * Throws ResourceExhaustedError when the device is out of memory.
   */
  createTarget(width: number, height: number, precision: PrecisionMode): RenderTarget;

  /** Upload RGBA float data (width * height * 4 values) as a read-only texture. */
  uploadTexture(width: number, height: number, rgba: Float32Array): RenderTarget;

  destroyTarget(target: RenderTarget): void;

  /**
   * Run one pass of a program over every pixel of `target`.
   * `target` must not appear among the bound inputs.
   */
  runPass(program: FilterProgram, target: RenderTarget, bindings: PassBindings): void;

  /** Rebuild the mip chain of a target after it was written. */
  generateMips(target: RenderTarget): void;

  /** Read back level 0 as RGBA floats. */
  readPixels(target: RenderTarget): Float32Array;
}

/** Device memory a target occupies: RGBA8 for standard, RGBA16F for extended. */
export function targetByteSize(width: number, height: number, precision: PrecisionMode): number {
  return width * height * (precision === "extended" ? 8 : 4);
}
