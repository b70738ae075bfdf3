import type { AuxiliaryKind, FilterDescriptor } from "../types";
import type { FilterDefinition } from "./FilterProgram";
import { GraphConfigError } from "../engine/EngineErrors";

/** Filter ids are 7 bits wide; bit 7 of the record byte carries the HDR flag. */
export const MAX_FILTERS = 128;

const AUXILIARY_KINDS: readonly AuxiliaryKind[] = ["none", "image", "text", "curve", "random-hash"];

/**
 * Static table of filter programs indexed by filter id.
 */
export class FilterRegistry {
  private filters: (FilterDefinition | undefined)[] = [];

  /** Register a filter at a fixed id. */
  register(id: number, definition: FilterDefinition): void {
    if (!Number.isInteger(id) || id < 0 || id >= MAX_FILTERS) {
      throw new GraphConfigError("filter-range", `Filter id ${id} is outside 0-${MAX_FILTERS - 1}`);
    }
    if (this.filters[id]) {
      throw new GraphConfigError("descriptor", `Filter id ${id} is already registered as "${this.filters[id]?.name}"`);
    }
    validateDescriptor(definition.name, definition.descriptor);
    this.filters[id] = definition;
  }

  /** Register at the lowest free id and return it. */
  add(definition: FilterDefinition): number {
    for (let id = 0; id < MAX_FILTERS; id++) {
      if (!this.filters[id]) {
        this.register(id, definition);
        return id;
      }
    }
    throw new GraphConfigError("capacity", `Filter registry is full (${MAX_FILTERS} filters)`);
  }

  has(id: number): boolean {
    return this.filters[id] !== undefined;
  }

  getFilter(id: number): FilterDefinition {
    const definition = this.filters[id];
    if (!definition) {
      throw new GraphConfigError("filter-range", `No filter registered with id ${id}`);
    }
    return definition;
  }

  getDescriptor(id: number): FilterDescriptor {
    return this.getFilter(id).descriptor;
  }

  /** Look up a filter id by name. Returns -1 when absent. */
  idOf(name: string): number {
    return this.filters.findIndex((definition) => definition?.name === name);
  }

  get size(): number {
    return this.filters.filter((definition) => definition !== undefined).length;
  }
}

/**
 * Reject descriptors outside the ranges a record and a pass loop can express.
 */
export function validateDescriptor(name: string, descriptor: FilterDescriptor): void {
  const { inputCount, parameterCount, passCount, auxiliaryKind } = descriptor;
  if (!isIntInRange(inputCount, 0, 3)) {
    throw new GraphConfigError("descriptor", `Filter "${name}": inputCount ${inputCount} outside 0-3`);
  }
  if (!isIntInRange(parameterCount, 0, 31)) {
    throw new GraphConfigError("descriptor", `Filter "${name}": parameterCount ${parameterCount} outside 0-31`);
  }
  if (!isIntInRange(passCount, 1, 15)) {
    throw new GraphConfigError("descriptor", `Filter "${name}": passCount ${passCount} outside 1-15`);
  }
  if (!AUXILIARY_KINDS.includes(auxiliaryKind)) {
    throw new GraphConfigError("descriptor", `Filter "${name}": unknown auxiliary kind "${auxiliaryKind}"`);
  }
}

function isIntInRange(n: number, min: number, max: number): boolean {
  return Number.isInteger(n) && n >= min && n <= max;
}
