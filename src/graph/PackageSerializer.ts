import type {
  AuxiliaryPayload,
  Curve,
  CurveInterpolation,
  CurveKey,
  CurvePayload,
  ImagePayload,
  OperatorNode,
  ParameterOverride,
  Subroutine,
  TextPayload,
  TexturePackage,
} from "../types";
import { strFromU8, strToU8 } from "fflate";
import type { GraphConfigErrorCode } from "../engine/EngineErrors";
import { GraphConfigError } from "../engine/EngineErrors";
import { OPERATOR_RECORD_BYTES, readOperatorRecord, writeOperatorRecord } from "./OperatorRecord";
import { compressBytes, decompressBytes } from "./Compression";

/**
 * Binary package layout (little-endian):
 *
 *   "TXGR" version:u8
 *   nodeCount:u16 records[nodeCount]
 *   outputCount:u8 outputs:u16[]
 *   subroutineCount:u8, then per subroutine:
 *     nodeCount:u16 records[] outputIndex:u16
 *     inputCount:u8 inputs:u16[] overrideCount:u8 (node:u16 slot:u8)[]
 *   auxCount:u16, then per entry:
 *     scope:u8 (0 = top level, n = subroutine n-1) node:u16 kind:u8 length:u32 data
 *
 * Image data is width:u16 height:u16 rgba. Text and curve data is UTF-8 JSON.
 */
const MAGIC = [0x54, 0x58, 0x47, 0x52];
export const CURRENT_PACKAGE_VERSION = 1;

const AUX_IMAGE = 1;
const AUX_TEXT = 2;
const AUX_CURVE = 3;

const INTERPOLATIONS: readonly CurveInterpolation[] = ["linear", "smooth", "step"];

// ─── Encode ────────────────────────────────────────────────────

export function encodePackage(pkg: TexturePackage): Uint8Array {
  const writer = new ByteWriter();
  for (const b of MAGIC) writer.u8(b);
  writer.u8(CURRENT_PACKAGE_VERSION);

  writeNodes(writer, pkg.nodes);
  writer.u8(checkCount(pkg.outputs.length, 0xff, "outputs"));
  for (const output of pkg.outputs) writer.u16(output, "output", "parent-range");

  writer.u8(checkCount(pkg.subroutines.length, 0xff, "subroutines"));
  for (const sub of pkg.subroutines) writeSubroutine(writer, sub);

  const auxEntries: { scope: number; node: number; payload: AuxiliaryPayload }[] = [];
  collectAuxiliary(pkg.nodes, 0, auxEntries);
  pkg.subroutines.forEach((sub, i) => collectAuxiliary(sub.nodes, i + 1, auxEntries));

  writer.u16(checkCount(auxEntries.length, 0xffff, "auxiliary entries"));
  for (const entry of auxEntries) {
    const data = encodeAuxiliary(entry.payload);
    writer.u8(entry.scope);
    writer.u16(entry.node);
    writer.u8(auxKindCode(entry.payload));
    writer.u32(data.length);
    writer.bytes(data);
  }

  return writer.finish();
}

/**
 * Encode and deflate a package into a Base64 string.
 */
export function serializePackage(pkg: TexturePackage): string {
  return compressBytes(encodePackage(pkg));
}

function writeNodes(writer: ByteWriter, nodes: OperatorNode[]): void {
  writer.u16(checkCount(nodes.length, 0xfffe, "nodes"));
  for (const node of nodes) writer.record(node);
}

function writeSubroutine(writer: ByteWriter, sub: Subroutine): void {
  writeNodes(writer, sub.nodes);
  writer.u16(sub.outputIndex, "subroutine output", "parent-range");
  writer.u8(checkCount(sub.inputIndices.length, 3, "subroutine inputs"));
  for (const input of sub.inputIndices) writer.u16(input, "subroutine input", "parent-range");
  writer.u8(checkCount(sub.overrides.length, 0xff, "subroutine overrides"));
  for (const override of sub.overrides) {
    writer.u16(override.node, "override node", "parent-range");
    writer.u8(override.slot, "override slot");
  }
}

function collectAuxiliary(
  nodes: OperatorNode[],
  scope: number,
  out: { scope: number; node: number; payload: AuxiliaryPayload }[],
): void {
  nodes.forEach((node, index) => {
    if (node.auxiliary) out.push({ scope, node: index, payload: node.auxiliary });
  });
}

function auxKindCode(payload: AuxiliaryPayload): number {
  switch (payload.type) {
    case "image": return AUX_IMAGE;
    case "text": return AUX_TEXT;
    case "curve": return AUX_CURVE;
  }
}

function encodeAuxiliary(payload: AuxiliaryPayload): Uint8Array {
  if (payload.type === "image") {
    const writer = new ByteWriter();
    writer.u16(payload.width, "image width");
    writer.u16(payload.height, "image height");
    writer.bytes(payload.rgba);
    return writer.finish();
  }
  return strToU8(JSON.stringify(payload));
}

// ─── Decode ────────────────────────────────────────────────────

/**
 * Decode the binary layout. Structural problems raise GraphConfigError("malformed");
 * graph semantics (cycles, ranges) are checked separately by validatePackage.
 */
export function decodePackage(bytes: Uint8Array): TexturePackage {
  const reader = new ByteReader(bytes);
  for (const b of MAGIC) {
    if (reader.u8() !== b) throw new GraphConfigError("malformed", "Not a texture package (bad magic)");
  }
  const version = reader.u8();
  if (version !== CURRENT_PACKAGE_VERSION) {
    throw new GraphConfigError("malformed", `Unsupported package version ${version}`);
  }

  const nodes = readNodes(reader);
  const outputCount = reader.u8();
  const outputs: number[] = [];
  for (let i = 0; i < outputCount; i++) outputs.push(reader.u16());

  const subroutineCount = reader.u8();
  const subroutines: Subroutine[] = [];
  for (let i = 0; i < subroutineCount; i++) subroutines.push(readSubroutine(reader));

  const auxCount = reader.u16();
  for (let i = 0; i < auxCount; i++) {
    const scope = reader.u8();
    const nodeIndex = reader.u16();
    const kind = reader.u8();
    const data = reader.bytes(reader.u32());

    const target = scope === 0 ? nodes : subroutines[scope - 1]?.nodes;
    const node = target?.[nodeIndex];
    if (!node) {
      throw new GraphConfigError("malformed", `Auxiliary entry refers to missing node ${scope}:${nodeIndex}`);
    }
    node.auxiliary = decodeAuxiliary(kind, data);
  }

  if (!reader.atEnd) {
    throw new GraphConfigError("malformed", `Trailing bytes after package (${reader.remaining})`);
  }

  return { nodes, outputs, subroutines };
}

/**
 * Inverse of serializePackage.
 */
export function deserializePackage(data: string): TexturePackage {
  let bytes: Uint8Array;
  try {
    bytes = decompressBytes(data);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new GraphConfigError("malformed", `Package data is not valid compressed Base64: ${reason}`);
  }
  return decodePackage(bytes);
}

function readNodes(reader: ByteReader): OperatorNode[] {
  const count = reader.u16();
  const nodes: OperatorNode[] = [];
  for (let i = 0; i < count; i++) nodes.push(reader.record());
  return nodes;
}

function readSubroutine(reader: ByteReader): Subroutine {
  const nodes = readNodes(reader);
  const outputIndex = reader.u16();
  const inputCount = reader.u8();
  const inputIndices: number[] = [];
  for (let i = 0; i < inputCount; i++) inputIndices.push(reader.u16());
  const overrideCount = reader.u8();
  const overrides: ParameterOverride[] = [];
  for (let i = 0; i < overrideCount; i++) {
    overrides.push({ node: reader.u16(), slot: reader.u8() });
  }
  return { nodes, outputIndex, inputIndices, overrides };
}

function decodeAuxiliary(kind: number, data: Uint8Array): AuxiliaryPayload {
  if (kind === AUX_IMAGE) {
    if (data.length < 4) throw new GraphConfigError("malformed", "Image payload too short");
    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    const payload: ImagePayload = {
      type: "image",
      width: view.getUint16(0, true),
      height: view.getUint16(2, true),
      rgba: data.slice(4),
    };
    return payload;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(strFromU8(data));
  } catch {
    throw new GraphConfigError("malformed", "Auxiliary payload is not valid JSON");
  }

  if (kind === AUX_TEXT) {
    const text = parseTextPayload(parsed);
    if (text) return text;
  } else if (kind === AUX_CURVE) {
    const curve = parseCurvePayload(parsed);
    if (curve) return curve;
  }
  throw new GraphConfigError("malformed", `Invalid auxiliary payload of kind ${kind}`);
}

function parseTextPayload(value: unknown): TextPayload | null {
  if (!isRecord(value) || value.type !== "text") return null;
  const { text, font, size, x, y } = value;
  if (typeof text !== "string" || typeof font !== "string") return null;
  if (typeof size !== "number" || typeof x !== "number" || typeof y !== "number") return null;
  return { type: "text", text, font, size, x, y };
}

function parseCurvePayload(value: unknown): CurvePayload | null {
  if (!isRecord(value) || value.type !== "curve" || !Array.isArray(value.channels)) return null;
  if (value.channels.length !== 4) return null;

  const channels: (Curve | null)[] = [];
  for (const channel of value.channels) {
    if (channel === null) {
      channels.push(null);
      continue;
    }
    const curve = parseCurve(channel);
    if (!curve) return null;
    channels.push(curve);
  }
  return { type: "curve", channels: [channels[0], channels[1], channels[2], channels[3]] };
}

function parseCurve(value: unknown): Curve | null {
  if (!isRecord(value) || !Array.isArray(value.keys)) return null;
  const raw = value.interpolation;
  const interpolation = INTERPOLATIONS.find((i) => i === raw);
  if (!interpolation) return null;

  const keys: CurveKey[] = [];
  for (const key of value.keys) {
    if (!isRecord(key) || typeof key.t !== "number" || typeof key.value !== "number") return null;
    keys.push({ t: key.t, value: key.value });
  }
  return { interpolation, keys };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function checkCount(count: number, max: number, what: string): number {
  if (count > max) {
    throw new GraphConfigError("capacity", `Too many ${what}: ${count} (max ${max})`);
  }
  return count;
}

function checkRange(value: number, max: number, field: string, code: GraphConfigErrorCode): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new GraphConfigError(code, `${field} ${value} does not fit in 0-${max}`);
  }
}

// ─── Byte streams ──────────────────────────────────────────────

class ByteWriter {
  private buffer = new Uint8Array(256);
  private view = new DataView(this.buffer.buffer);
  private length = 0;

  // Values that do not fit the field are refused instead of wrapping
  u8(value: number, field = "byte", code: GraphConfigErrorCode = "malformed"): void {
    checkRange(value, 0xff, field, code);
    this.ensure(1);
    this.view.setUint8(this.length, value);
    this.length += 1;
  }

  u16(value: number, field = "value", code: GraphConfigErrorCode = "malformed"): void {
    checkRange(value, 0xffff, field, code);
    this.ensure(2);
    this.view.setUint16(this.length, value, true);
    this.length += 2;
  }

  u32(value: number, field = "length", code: GraphConfigErrorCode = "malformed"): void {
    checkRange(value, 0xffffffff, field, code);
    this.ensure(4);
    this.view.setUint32(this.length, value, true);
    this.length += 4;
  }

  bytes(data: Uint8Array): void {
    this.ensure(data.length);
    this.buffer.set(data, this.length);
    this.length += data.length;
  }

  record(node: OperatorNode): void {
    this.ensure(OPERATOR_RECORD_BYTES);
    writeOperatorRecord(this.view, this.length, node);
    this.length += OPERATOR_RECORD_BYTES;
  }

  finish(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }

  private ensure(extra: number): void {
    if (this.length + extra <= this.buffer.length) return;
    let capacity = this.buffer.length * 2;
    while (capacity < this.length + extra) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(this.buffer.subarray(0, this.length));
    this.buffer = next;
    this.view = new DataView(next.buffer);
  }
}

class ByteReader {
  private view: DataView;
  private offset = 0;

  constructor(private data: Uint8Array) {
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  }

  get atEnd(): boolean { return this.offset === this.data.length; }
  get remaining(): number { return this.data.length - this.offset; }

  u8(): number {
    this.require(1);
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  u16(): number {
    this.require(2);
    const value = this.view.getUint16(this.offset, true);
    this.offset += 2;
    return value;
  }

  u32(): number {
    this.require(4);
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  bytes(count: number): Uint8Array {
    this.require(count);
    const slice = this.data.slice(this.offset, this.offset + count);
    this.offset += count;
    return slice;
  }

  record(): OperatorNode {
    this.require(OPERATOR_RECORD_BYTES);
    const node = readOperatorRecord(this.view, this.offset);
    this.offset += OPERATOR_RECORD_BYTES;
    return node;
  }

  private require(count: number): void {
    if (this.offset + count > this.data.length) {
      throw new GraphConfigError("malformed", `Unexpected end of package at byte ${this.offset}`);
    }
  }
}
