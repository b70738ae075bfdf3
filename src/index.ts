export type {
  AuxiliaryKind,
  AuxiliaryPayload,
  Curve,
  CurveInterpolation,
  CurveKey,
  CurvePayload,
  FilterDescriptor,
  ImagePayload,
  NodeIndex,
  OperatorKind,
  OperatorNode,
  ParameterOverride,
  ParentSlot,
  ParentSlots,
  PrecisionMode,
  Resolution,
  Subroutine,
  TextPayload,
  TexturePackage,
} from "./types";
export { MAX_PARENTS, PARAMETER_BYTES } from "./types";

export { decodeResolution, encodeResolution, packResolution, resolutionKey, MAX_RESOLUTION_LOG2 } from "./graph/Resolution";
export { createOperatorNode, cloneOperatorNode, createTexturePackage, presentParents, DEFAULT_RESOLUTION } from "./graph/OperatorNode";
export type { OperatorNodeInit } from "./graph/OperatorNode";
export { OPERATOR_RECORD_BYTES, readOperatorRecord, writeOperatorRecord } from "./graph/OperatorRecord";
export {
  encodePackage,
  decodePackage,
  serializePackage,
  deserializePackage,
  CURRENT_PACKAGE_VERSION,
} from "./graph/PackageSerializer";
export { validatePackage } from "./graph/GraphValidator";
export type { ValidationLimits } from "./graph/GraphValidator";

export { GraphConfigError, ResourceExhaustedError, DeviceLostError, EvaluationAbortedError } from "./engine/EngineErrors";
export type { GraphConfigErrorCode } from "./engine/EngineErrors";
export { createTextureContext, disposeTextureContext, loadPackage } from "./engine/TextureContext";
export type { TextureContext, TextureContextOptions } from "./engine/TextureContext";
export { TextureGenerator } from "./engine/TextureGenerator";
export type { EvaluateOptions } from "./engine/TextureGenerator";
export { SubroutineInvoker } from "./engine/SubroutineInvoker";
export { renderPasses, normalizeParameters } from "./engine/MultiPassRenderer";
export { createSeededRandom, mixSeed } from "./engine/SeededRandom";

export { ResourcePool } from "./pool/ResourcePool";
export type { PooledBuffer, PoolStats } from "./pool/ResourcePool";

export type { RenderDevice, RenderTarget, PassBindings, InputBindings } from "./render/RenderDevice";
export { CpuRenderDevice } from "./render/CpuRenderDevice";
export type { CpuRenderDeviceOptions } from "./render/CpuRenderDevice";
export { PixelBuffer } from "./render/PixelBuffer";

export { FilterRegistry, MAX_FILTERS } from "./filters/FilterRegistry";
export { shadePixels } from "./filters/FilterProgram";
export type { FilterDefinition, FilterProgram, PassContext, TextureSampler } from "./filters/FilterProgram";
export { BUILTIN_FILTER_IDS, BUILTIN_FILTERS, registerBuiltinFilters } from "./filters/builtin";
export type { BuiltinFilterName } from "./filters/builtin";

export { DefaultAuxiliaryProvider } from "./auxiliary/AuxiliaryDataProvider";
export type {
  AuxiliaryDataProvider,
  AuxiliaryRequest,
  AuxiliaryTexture,
  TextRasterizer,
} from "./auxiliary/AuxiliaryDataProvider";
export { sampleCurve, bakeCurveLookup } from "./auxiliary/CurveSampler";

export { DEFAULT_ENGINE_SETTINGS, mergeEngineSettings, parseEngineSettings } from "./settings/EngineSettings";
export type { EngineSettings } from "./settings/EngineSettings";
