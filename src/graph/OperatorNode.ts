import type {
  NodeIndex,
  OperatorNode,
  ParentSlot,
  ParentSlots,
  TexturePackage,
  Subroutine,
} from "../types";
import { PARAMETER_BYTES, MAX_PARENTS } from "../types";

/** 256x256 */
export const DEFAULT_RESOLUTION = 0x88;

export interface OperatorNodeInit {
  resolution?: number;
  kind?: OperatorNode["kind"];
  filterId: number;
  hdr?: boolean;
  seed?: number;
  parents?: ParentSlot[];
  parameters?: ArrayLike<number>;
  persist?: boolean;
  auxiliary?: OperatorNode["auxiliary"];
}

/**
 * Build a node with defaults for every omitted field.
 * Parameters shorter than PARAMETER_BYTES are zero-padded.
 */
export function createOperatorNode(init: OperatorNodeInit): OperatorNode {
  const parameters = new Uint8Array(PARAMETER_BYTES);
  if (init.parameters) {
    const count = Math.min(init.parameters.length, PARAMETER_BYTES);
    for (let i = 0; i < count; i++) parameters[i] = init.parameters[i] & 0xff;
  }

  return {
    resolution: init.resolution ?? DEFAULT_RESOLUTION,
    kind: init.kind ?? "filter",
    filterId: init.filterId,
    hdr: init.hdr ?? false,
    seed: (init.seed ?? 0) & 0xff,
    parents: toParentSlots(init.parents ?? []),
    parameters,
    persist: init.persist ?? false,
    auxiliary: init.auxiliary ?? null,
  };
}

/**
 * Copy a node so that its resolution and parameters can be patched without
 * touching the original. Auxiliary payloads are shared (read-only data).
 */
export function cloneOperatorNode(node: OperatorNode): OperatorNode {
  return {
    ...node,
    parents: [node.parents[0], node.parents[1], node.parents[2]],
    parameters: node.parameters.slice(),
  };
}

/** Indices of the present parents, in slot order. */
export function presentParents(node: OperatorNode): NodeIndex[] {
  const result: NodeIndex[] = [];
  for (const parent of node.parents) {
    if (parent !== null) result.push(parent);
  }
  return result;
}

export function createTexturePackage(
  nodes: OperatorNode[],
  outputs: NodeIndex[] = [],
  subroutines: Subroutine[] = [],
): TexturePackage {
  return { nodes, outputs, subroutines };
}

function toParentSlots(parents: ParentSlot[]): ParentSlots {
  if (parents.length > MAX_PARENTS) {
    throw new RangeError(`A node takes at most ${MAX_PARENTS} parents, got ${parents.length}`);
  }
  return [parents[0] ?? null, parents[1] ?? null, parents[2] ?? null];
}
