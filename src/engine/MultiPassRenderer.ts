import type { OperatorNode } from "../types";
import type { FilterDefinition } from "../filters/FilterProgram";
import type { PooledBuffer } from "../pool/ResourcePool";
import type { InputBindings, RenderTarget } from "../render/RenderDevice";
import type { AuxiliaryTexture } from "../auxiliary/AuxiliaryDataProvider";
import type { TextureContext } from "./TextureContext";
import { PARAMETER_BYTES } from "../types";
import { createSeededRandom, mixSeed } from "./SeededRandom";

export type ParentBuffers = readonly [PooledBuffer | null, PooledBuffer | null, PooledBuffer | null];

/**
 * Render every pass of a filter, alternating between two buffers.
 *
 * Pass 0 writes `primary`, later passes swap write and read roles. Input 0 is
 * the node's first parent on pass 0 and the previous pass output afterwards;
 * inputs 1 and 2 stay bound to their parents. Returns the buffer written last
 * and releases the other one. Both buffers are released if a pass throws.
 */
export function renderPasses(
  context: TextureContext,
  filter: FilterDefinition,
  node: OperatorNode,
  primary: PooledBuffer,
  pingpong: PooledBuffer,
  parents: ParentBuffers,
): PooledBuffer {
  const { device, pool, auxiliary, settings } = context;
  const { passCount, auxiliaryKind, needsRandomSeed } = filter.descriptor;
  const random = createSeededRandom(needsRandomSeed ? mixSeed(node.seed) : 0);
  const parameters = normalizeParameters(node.parameters);

  let write = primary;
  let read = pingpong;

  try {
    for (let pass = 0; pass < passCount; pass++) {
      const input0: RenderTarget | null = pass === 0 ? parents[0]?.target ?? null : read.target;
      const inputs: InputBindings = [input0, parents[1]?.target ?? null, parents[2]?.target ?? null];

      let aux: AuxiliaryTexture | null = null;
      if (auxiliaryKind !== "none") {
        aux = auxiliary.getAuxiliary(auxiliaryKind, {
          width: write.width,
          height: write.height,
          seed: node.seed,
          payload: node.auxiliary,
        });
      }

      try {
        device.runPass(filter.program, write.target, {
          passIndex: pass,
          passCount,
          random: [random(), random(), random()],
          parameters,
          seed: node.seed,
          inputs,
          auxiliary: aux ? aux.target : null,
        });
      } finally {
        if (aux) auxiliary.releaseAuxiliary(aux);
      }

      if (settings.generateMips) device.generateMips(write.target);

      if (pass < passCount - 1) {
        const written = write;
        write = read;
        read = written;
      }
    }
  } catch (e) {
    pool.release(primary);
    pool.release(pingpong);
    throw e;
  }

  // `write` holds the last pass output
  pool.release(write === primary ? pingpong : primary);
  return write;
}

/** Parameter bytes as floats in [0, 1]. */
export function normalizeParameters(bytes: Uint8Array): Float32Array {
  const normalized = new Float32Array(PARAMETER_BYTES);
  const count = Math.min(bytes.length, PARAMETER_BYTES);
  for (let i = 0; i < count; i++) normalized[i] = bytes[i] / 255;
  return normalized;
}
