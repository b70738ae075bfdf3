import type { Subroutine } from "../types";
import type { PooledBuffer } from "../pool/ResourcePool";
import type { ParentBuffers } from "./MultiPassRenderer";
import type { TextureGenerator } from "./TextureGenerator";
import { cloneOperatorNode } from "../graph/OperatorNode";

/**
 * Runs a subroutine body as if it were a single filter.
 *
 * Every call works on fresh copies of the embedded nodes, so resolution and
 * parameter patches never leak between invocations. Declared inputs are
 * pre-seeded with the caller's parent buffers; an input whose parent slot is
 * empty renders its own embedded node instead.
 *
 * The returned output buffer belongs to the caller. Pre-seeded buffers stay
 * with the caller's consumer accounting and are released there, once.
 */
export class SubroutineInvoker {
  invoke(
    subroutine: Subroutine,
    caller: TextureGenerator,
    externalParents: ParentBuffers,
    overrideBytes: Uint8Array,
    resolution: number,
  ): PooledBuffer {
    const nodes = subroutine.nodes.map((node) => {
      const copy = cloneOperatorNode(node);
      copy.resolution = resolution;
      return copy;
    });

    // Override i takes caller parameter byte i
    subroutine.overrides.forEach((override, i) => {
      nodes[override.node].parameters[override.slot] = overrideBytes[i] ?? 0;
    });

    const nested = caller.createNested({
      nodes,
      outputs: [subroutine.outputIndex],
      subroutines: caller.scope.subroutines,
    });

    subroutine.inputIndices.forEach((input, i) => {
      const parent = externalParents[i];
      if (parent) nested.preseed(input, parent);
    });

    let output: PooledBuffer;
    try {
      output = nested.evaluate(subroutine.outputIndex);
    } catch (e) {
      nested.releaseAllExcept(null);
      nested.clearPreseeded();
      throw e;
    }

    nested.releaseAllExcept(subroutine.outputIndex);
    nested.clearPreseeded();
    return output;
  }
}
