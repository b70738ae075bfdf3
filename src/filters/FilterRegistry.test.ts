import type { FilterDescriptor } from "../types";
import type { FilterDefinition } from "./FilterProgram";
import { FilterRegistry, MAX_FILTERS, validateDescriptor } from "./FilterRegistry";
import { GraphConfigError } from "../engine/EngineErrors";

function definition(name: string, descriptor: Partial<FilterDescriptor> = {}): FilterDefinition {
  return {
    name,
    descriptor: {
      inputCount: 1,
      parameterCount: 2,
      passCount: 1,
      auxiliaryKind: "none",
      needsRandomSeed: false,
      ...descriptor,
    },
    program: { run: () => {} },
  };
}

describe("FilterRegistry", () => {
  it("returns registered filters by id", () => {
    const registry = new FilterRegistry();
    const blur = definition("blur");
    registry.register(4, blur);

    expect(registry.has(4)).toBe(true);
    expect(registry.has(3)).toBe(false);
    expect(registry.getFilter(4)).toBe(blur);
    expect(registry.getDescriptor(4)).toBe(blur.descriptor);
    expect(registry.idOf("blur")).toBe(4);
    expect(registry.idOf("sharpen")).toBe(-1);
    expect(registry.size).toBe(1);
  });

  it("add() takes the lowest free id", () => {
    const registry = new FilterRegistry();
    registry.register(0, definition("a"));
    registry.register(2, definition("c"));

    expect(registry.add(definition("b"))).toBe(1);
    expect(registry.add(definition("d"))).toBe(3);
  });

  it("should reject ids outside the 7-bit range", () => {
    const registry = new FilterRegistry();
    expect(() => registry.register(MAX_FILTERS, definition("x"))).toThrow(
      expect.objectContaining({ code: "filter-range" }),
    );
    expect(() => registry.register(-1, definition("x"))).toThrow(GraphConfigError);
  });

  it("rejects registering an id twice", () => {
    const registry = new FilterRegistry();
    registry.register(1, definition("first"));
    expect(() => registry.register(1, definition("second"))).toThrow(
      'Filter id 1 is already registered as "first"',
    );
  });

  it("should throw for unknown ids", () => {
    expect(() => new FilterRegistry().getFilter(9)).toThrow("No filter registered with id 9");
  });

  it("reports a full table", () => {
    const registry = new FilterRegistry();
    for (let i = 0; i < MAX_FILTERS; i++) registry.add(definition(`f${i}`));
    expect(() => registry.add(definition("overflow"))).toThrow(
      expect.objectContaining({ code: "capacity" }),
    );
  });

  describe("validateDescriptor", () => {
    it.each([
      [{ inputCount: 4 }, 'Filter "bad": inputCount 4 outside 0-3'],
      [{ parameterCount: 32 }, 'Filter "bad": parameterCount 32 outside 0-31'],
      [{ passCount: 0 }, 'Filter "bad": passCount 0 outside 1-15'],
      [{ passCount: 16 }, 'Filter "bad": passCount 16 outside 1-15'],
      [{ inputCount: 1.5 }, 'Filter "bad": inputCount 1.5 outside 0-3'],
    ])("rejects %o", (patch, message) => {
      expect(() => validateDescriptor("bad", definition("bad", patch).descriptor)).toThrow(message);
    });

    it("should accept the extremes", () => {
      expect(() => validateDescriptor("ok", definition("ok", {
        inputCount: 3,
        parameterCount: 31,
        passCount: 15,
        auxiliaryKind: "random-hash",
      }).descriptor)).not.toThrow();
    });
  });
});
