/**
 * Core type definitions for the texture graph engine
 */

// --- Graph ---

/** Index of a node within its own node array. */
export type NodeIndex = number;

/** One parent slot. `null` means "no input"; never a magic index. */
export type ParentSlot = NodeIndex | null;

export type ParentSlots = [ParentSlot, ParentSlot, ParentSlot];

export const MAX_PARENTS = 3;
export const PARAMETER_BYTES = 16;

/** How a node produces its texture. */
export type OperatorKind = "filter" | "subroutine";

export interface OperatorNode {
  resolution: number; // Packed byte: high nibble log2(width), low nibble log2(height)
  kind: OperatorKind;
  filterId: number; // 0-127. Registry index, or subroutine table index for kind "subroutine"
  hdr: boolean; // Extended-range output precision
  seed: number; // 0-255
  parents: ParentSlots;
  parameters: Uint8Array; // PARAMETER_BYTES raw bytes, normalized to 0-1 before use
  persist: boolean; // Result stays resident after its consumers finish
  auxiliary: AuxiliaryPayload | null;
}

export interface ParameterOverride {
  node: NodeIndex;
  slot: number; // 0-15
}

/** A self-contained node array invocable like a single filter. */
export interface Subroutine {
  name?: string;
  nodes: OperatorNode[];
  outputIndex: NodeIndex;
  inputIndices: NodeIndex[]; // At most MAX_PARENTS
  overrides: ParameterOverride[]; // Consume caller parameter bytes in order
}

/** A loadable unit: the top-level graph plus the subroutines its nodes call. */
export interface TexturePackage {
  nodes: OperatorNode[];
  outputs: NodeIndex[];
  subroutines: Subroutine[];
}

// --- Resolution ---

export interface Resolution {
  width: number;
  height: number;
}

export type PrecisionMode = "standard" | "extended";

// --- Filters ---

export type AuxiliaryKind = "none" | "image" | "text" | "curve" | "random-hash";

export interface FilterDescriptor {
  inputCount: number; // 0-3
  parameterCount: number; // 0-31
  passCount: number; // 1-15
  auxiliaryKind: AuxiliaryKind;
  needsRandomSeed: boolean;
}

// --- Auxiliary payloads ---

export interface ImagePayload {
  type: "image";
  width: number;
  height: number;
  rgba: Uint8Array; // width * height * 4 bytes, unpremultiplied
}

export interface TextPayload {
  type: "text";
  text: string;
  font: string;
  size: number; // Fraction of the texture height, 0-1
  x: number; // 0-1
  y: number; // 0-1
}

export interface CurveKey {
  t: number; // 0-1
  value: number; // 0-1
}

export type CurveInterpolation = "linear" | "smooth" | "step";

export interface Curve {
  interpolation: CurveInterpolation;
  keys: CurveKey[];
}

/** One curve per RGBA channel; missing channels map identity. */
export interface CurvePayload {
  type: "curve";
  channels: [Curve | null, Curve | null, Curve | null, Curve | null];
}

export type AuxiliaryPayload = ImagePayload | TextPayload | CurvePayload;
