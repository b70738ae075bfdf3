import type { PrecisionMode } from "../types";
import type { RenderDevice, RenderTarget, PassBindings } from "./RenderDevice";
import type { FilterProgram, PassContext, TextureSampler } from "../filters/FilterProgram";
import { targetByteSize } from "./RenderDevice";
import { PixelBuffer } from "./PixelBuffer";
import { DeviceLostError, ResourceExhaustedError } from "../engine/EngineErrors";

export interface CpuRenderDeviceOptions {
  /** Simulated device memory in bytes. 0 = unlimited. */
  maxBytes?: number;
}

/**
 * Reference render device that executes filter programs on the CPU.
 * Targets are PixelBuffers tracked by id; handles from other devices are rejected.
 */
export class CpuRenderDevice implements RenderDevice {
  readonly name = "cpu";
  private targets = new Map<number, PixelBuffer>();
  private nextId = 1;
  private lost = false;
  private allocated = 0;
  private maxBytes: number;

  constructor(options: CpuRenderDeviceOptions = {}) {
    this.maxBytes = options.maxBytes ?? 0;
  }

  isLost(): boolean {
    return this.lost;
  }

  createTarget(width: number, height: number, precision: PrecisionMode): RenderTarget {
    this.assertAlive();
    assertSize(width, height);

    const bytes = targetByteSize(width, height, precision);
    if (this.maxBytes > 0 && this.allocated + bytes > this.maxBytes) {
      throw new ResourceExhaustedError(
        `CpuRenderDevice: cannot allocate ${width}x${height} ${precision} target ` +
        `(${this.allocated} of ${this.maxBytes} bytes in use)`,
        bytes,
      );
    }

    const buffer = new PixelBuffer(this.nextId++, width, height, precision);
    this.targets.set(buffer.id, buffer);
    this.allocated += bytes;
    return buffer;
  }

  uploadTexture(width: number, height: number, rgba: Float32Array): RenderTarget {
    this.assertAlive();
    assertSize(width, height);

    const buffer = new PixelBuffer(this.nextId++, width, height, "extended", rgba.slice());
    this.targets.set(buffer.id, buffer);
    this.allocated += targetByteSize(width, height, "extended");
    return buffer;
  }

  destroyTarget(target: RenderTarget): void {
    const buffer = this.targets.get(target.id);
    if (!buffer) return;
    this.targets.delete(target.id);
    this.allocated -= targetByteSize(buffer.width, buffer.height, buffer.precision);
  }

  runPass(program: FilterProgram, target: RenderTarget, bindings: PassBindings): void {
    this.assertAlive();
    const output = this.resolve(target);

    const inputs: [TextureSampler | null, TextureSampler | null, TextureSampler | null] = [null, null, null];
    for (let i = 0; i < 3; i++) {
      const bound = bindings.inputs[i];
      if (!bound) continue;
      if (bound.id === output.id) {
        throw new Error(`CpuRenderDevice: target ${output.id} is bound as input ${i} of its own pass`);
      }
      inputs[i] = this.resolve(bound);
    }

    const pass: PassContext = {
      passIndex: bindings.passIndex,
      passCount: bindings.passCount,
      random: bindings.random,
      parameters: bindings.parameters,
      seed: bindings.seed,
      inputs,
      auxiliary: bindings.auxiliary ? this.resolve(bindings.auxiliary) : null,
    };

    program.run(output, pass);
  }

  generateMips(target: RenderTarget): void {
    this.assertAlive();
    this.resolve(target).regenerateMips();
  }

  readPixels(target: RenderTarget): Float32Array {
    this.assertAlive();
    return this.resolve(target).data.slice();
  }

  /** Direct access to the backing buffer, for inspection. */
  getPixelBuffer(target: RenderTarget): PixelBuffer {
    return this.resolve(target);
  }

  /** Simulate losing the device. */
  loseContext(): void {
    if (this.lost) return;
    this.lost = true;
    console.warn("[CpuRenderDevice] context lost");
  }

  get allocatedBytes(): number { return this.allocated; }
  get targetCount(): number { return this.targets.size; }

  private resolve(target: RenderTarget): PixelBuffer {
    const buffer = this.targets.get(target.id);
    if (!buffer || buffer !== target) {
      throw new Error(`CpuRenderDevice: unknown or destroyed target ${target.id}`);
    }
    return buffer;
  }

  private assertAlive(): void {
    if (this.lost) throw new DeviceLostError("CpuRenderDevice: device lost");
  }
}

function assertSize(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new RangeError(`Invalid target size ${width}x${height}`);
  }
}
