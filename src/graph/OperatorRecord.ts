import type { OperatorNode, ParentSlot } from "../types";
import { PARAMETER_BYTES } from "../types";
import { GraphConfigError } from "../engine/EngineErrors";

/**
 * Fixed-size binary operator record (little-endian):
 *
 *   0      resolution
 *   1      filter id, bit 7 = extended-range output
 *   2      seed
 *   3..8   parents, 3 x uint16, 0xFFFF = absent
 *   9..24  parameters
 *   25     flags, bit 0 = persist, bit 1 = subroutine call
 *
 * Auxiliary payloads do not fit a fixed record and travel in the package's
 * auxiliary section instead.
 */
export const OPERATOR_RECORD_BYTES = 26;

export const ABSENT_PARENT = 0xffff;
export const HDR_FILTER_BIT = 0x80;
export const FILTER_ID_MASK = 0x7f;

const FLAG_PERSIST = 0x01;
const FLAG_SUBROUTINE = 0x02;
const KNOWN_FLAGS = FLAG_PERSIST | FLAG_SUBROUTINE;

const PARENTS_OFFSET = 3;
const PARAMETERS_OFFSET = 9;
const FLAGS_OFFSET = 25;

export function writeOperatorRecord(view: DataView, offset: number, node: OperatorNode): void {
  if (node.filterId < 0 || node.filterId > FILTER_ID_MASK || !Number.isInteger(node.filterId)) {
    throw new GraphConfigError("filter-range", `Filter id ${node.filterId} does not fit in 7 bits`);
  }

  view.setUint8(offset, node.resolution & 0xff);
  view.setUint8(offset + 1, node.filterId | (node.hdr ? HDR_FILTER_BIT : 0));
  view.setUint8(offset + 2, node.seed & 0xff);

  for (let i = 0; i < 3; i++) {
    view.setUint16(offset + PARENTS_OFFSET + i * 2, encodeParent(node.parents[i]), true);
  }

  for (let i = 0; i < PARAMETER_BYTES; i++) {
    view.setUint8(offset + PARAMETERS_OFFSET + i, node.parameters[i] ?? 0);
  }

  let flags = 0;
  if (node.persist) flags |= FLAG_PERSIST;
  if (node.kind === "subroutine") flags |= FLAG_SUBROUTINE;
  view.setUint8(offset + FLAGS_OFFSET, flags);
}

export function readOperatorRecord(view: DataView, offset: number): OperatorNode {
  if (offset + OPERATOR_RECORD_BYTES > view.byteLength) {
    throw new GraphConfigError("malformed", `Truncated operator record at byte ${offset}`);
  }

  const filterByte = view.getUint8(offset + 1);
  const flags = view.getUint8(offset + FLAGS_OFFSET);
  if ((flags & ~KNOWN_FLAGS) !== 0) {
    throw new GraphConfigError("malformed", `Unknown operator flags 0x${flags.toString(16)} at byte ${offset}`);
  }

  const parameters = new Uint8Array(PARAMETER_BYTES);
  for (let i = 0; i < PARAMETER_BYTES; i++) {
    parameters[i] = view.getUint8(offset + PARAMETERS_OFFSET + i);
  }

  return {
    resolution: view.getUint8(offset),
    kind: flags & FLAG_SUBROUTINE ? "subroutine" : "filter",
    filterId: filterByte & FILTER_ID_MASK,
    hdr: (filterByte & HDR_FILTER_BIT) !== 0,
    seed: view.getUint8(offset + 2),
    parents: [
      decodeParent(view.getUint16(offset + PARENTS_OFFSET, true)),
      decodeParent(view.getUint16(offset + PARENTS_OFFSET + 2, true)),
      decodeParent(view.getUint16(offset + PARENTS_OFFSET + 4, true)),
    ],
    parameters,
    persist: (flags & FLAG_PERSIST) !== 0,
    auxiliary: null,
  };
}

function encodeParent(parent: ParentSlot): number {
  if (parent === null) return ABSENT_PARENT;
  if (!Number.isInteger(parent) || parent < 0 || parent >= ABSENT_PARENT) {
    throw new GraphConfigError("parent-range", `Parent index ${parent} cannot be encoded`);
  }
  return parent;
}

function decodeParent(raw: number): ParentSlot {
  return raw === ABSENT_PARENT ? null : raw;
}
