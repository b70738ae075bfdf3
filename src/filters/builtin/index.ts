import type { FilterRegistry } from "../FilterRegistry";
import type { FilterDefinition } from "../FilterProgram";
import { solidFilter } from "./SolidFilter";
import { noiseFilter } from "./NoiseFilter";
import { invertFilter } from "./InvertFilter";
import { blendFilter } from "./BlendFilter";
import { blurFilter } from "./BlurFilter";
import { grainFilter } from "./GrainFilter";
import { imageFilter } from "./ImageFilter";
import { curvesFilter } from "./CurvesFilter";
import { textFilter } from "./TextFilter";

/** Stable ids of the built-in filters. Ids from 16 upward are free for callers. */
export const BUILTIN_FILTER_IDS = {
  solid: 0,
  noise: 1,
  invert: 2,
  blend: 3,
  blur: 4,
  grain: 5,
  image: 6,
  curves: 7,
  text: 8,
} as const;

export type BuiltinFilterName = keyof typeof BUILTIN_FILTER_IDS;

export const BUILTIN_FILTERS: Record<BuiltinFilterName, FilterDefinition> = {
  solid: solidFilter,
  noise: noiseFilter,
  invert: invertFilter,
  blend: blendFilter,
  blur: blurFilter,
  grain: grainFilter,
  image: imageFilter,
  curves: curvesFilter,
  text: textFilter,
};

export function registerBuiltinFilters(registry: FilterRegistry): void {
  for (const definition of Object.values(BUILTIN_FILTERS)) {
    const name = definition.name;
    if (!isBuiltinName(name)) continue;
    registry.register(BUILTIN_FILTER_IDS[name], definition);
  }
}

function isBuiltinName(name: string): name is BuiltinFilterName {
  return name in BUILTIN_FILTER_IDS;
}

export { blendModeFromParameter, BLEND_MODES } from "./BlendFilter";
export type { BlendMode } from "./BlendFilter";
