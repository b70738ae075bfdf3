import type { PassContext } from "../FilterProgram";
import { PixelBuffer } from "../../render/PixelBuffer";
import { FilterRegistry } from "../FilterRegistry";
import { BUILTIN_FILTER_IDS, BUILTIN_FILTERS, registerBuiltinFilters, blendModeFromParameter } from "./index";

let nextId = 1;

function buffer(width: number, height: number, rgba?: number[]): PixelBuffer {
  return new PixelBuffer(nextId++, width, height, "extended", rgba ? new Float32Array(rgba) : undefined);
}

function params(...values: number[]): Float32Array {
  const p = new Float32Array(16);
  p.set(values);
  return p;
}

function pass(overrides: Partial<PassContext> = {}): PassContext {
  return {
    passIndex: 0,
    passCount: 1,
    random: [0, 0, 0],
    parameters: params(),
    seed: 0,
    inputs: [null, null, null],
    auxiliary: null,
    ...overrides,
  };
}

function pixels(target: PixelBuffer): number[] {
  return Array.from(target.data);
}

describe("built-in filters", () => {
  it("registers every built-in at its fixed id", () => {
    const registry = new FilterRegistry();
    registerBuiltinFilters(registry);

    expect(registry.size).toBe(Object.keys(BUILTIN_FILTERS).length);
    expect(registry.idOf("blur")).toBe(BUILTIN_FILTER_IDS.blur);
    expect(registry.getFilter(BUILTIN_FILTER_IDS.text)).toBe(BUILTIN_FILTERS.text);
  });

  describe("solid", () => {
    it("should fill every texel with the parameter color", () => {
      const target = buffer(2, 2);
      BUILTIN_FILTERS.solid.program.run(target, pass({ parameters: params(1, 0.5, 0, 1) }));
      expect(pixels(target)).toEqual([1, 0.5, 0, 1, 1, 0.5, 0, 1, 1, 0.5, 0, 1, 1, 0.5, 0, 1]);
    });
  });

  describe("invert", () => {
    it("inverts color and keeps alpha", () => {
      const target = buffer(1, 1);
      const source = buffer(1, 1, [0.25, 0.5, 0.75, 0.5]);
      BUILTIN_FILTERS.invert.program.run(target, pass({ inputs: [source, null, null] }));
      expect(pixels(target)).toEqual([0.75, 0.5, 0.25, 0.5]);
    });

    it("should render white without input", () => {
      const target = buffer(1, 1);
      BUILTIN_FILTERS.invert.program.run(target, pass());
      expect(pixels(target)).toEqual([1, 1, 1, 1]);
    });
  });

  describe("blend", () => {
    it("maps parameter bands to modes", () => {
      expect(blendModeFromParameter(0)).toBe("mix");
      expect(blendModeFromParameter(60 / 255)).toBe("add");
      expect(blendModeFromParameter(110 / 255)).toBe("multiply");
      expect(blendModeFromParameter(160 / 255)).toBe("screen");
      expect(blendModeFromParameter(210 / 255)).toBe("difference");
      expect(blendModeFromParameter(1)).toBe("difference");
    });

    const base = () => buffer(1, 1, [0.5, 0.5, 0.5, 1]);
    const layer = () => buffer(1, 1, [0.25, 0.25, 0.25, 1]);

    it("should multiply at full opacity", () => {
      const target = buffer(1, 1);
      BUILTIN_FILTERS.blend.program.run(target, pass({
        inputs: [base(), layer(), null],
        parameters: params(0.5, 1),
      }));
      expect(pixels(target)).toEqual([0.125, 0.125, 0.125, 1]);
    });

    it("mixes by opacity", () => {
      const target = buffer(1, 1);
      BUILTIN_FILTERS.blend.program.run(target, pass({
        inputs: [base(), layer(), null],
        parameters: params(0, 0.5),
      }));
      expect(pixels(target)).toEqual([0.375, 0.375, 0.375, 1]);
    });

    it("should keep the base where the mask is black", () => {
      const target = buffer(1, 1);
      BUILTIN_FILTERS.blend.program.run(target, pass({
        inputs: [base(), layer(), buffer(1, 1, [0, 0, 0, 1])],
        parameters: params(0, 1),
      }));
      expect(pixels(target)).toEqual([0.5, 0.5, 0.5, 1]);
    });
  });

  describe("blur", () => {
    it("averages horizontal neighbours on even passes, wrapping at the edges", () => {
      const target = buffer(4, 1);
      const source = buffer(4, 1, [1, 0, 0, 1, 0, 0, 0, 1, 0, 0, 0, 1, 0, 0, 0, 1]);
      BUILTIN_FILTERS.blur.program.run(target, pass({
        inputs: [source, null, null],
        parameters: params(0.125),
        passCount: 4,
      }));

      const red = [0, 1, 2, 3].map((x) => target.data[x * 4]);
      expect(red[0]).toBeCloseTo(1 / 3, 6);
      expect(red[1]).toBeCloseTo(1 / 3, 6);
      expect(red[2]).toBe(0);
      expect(red[3]).toBeCloseTo(1 / 3, 6);
      expect(target.data[3]).toBe(1);
    });

    it("should clear the target without input", () => {
      const target = buffer(1, 1, [1, 1, 1, 1]);
      BUILTIN_FILTERS.blur.program.run(target, pass());
      expect(pixels(target)).toEqual([0, 0, 0, 0]);
    });
  });

  describe("grain", () => {
    const hash = () => buffer(1, 1, [0.75, 0.25, 0.5, 1]);

    it("adds monochrome grain over mid-gray", () => {
      const target = buffer(1, 1);
      BUILTIN_FILTERS.grain.program.run(target, pass({ auxiliary: hash(), parameters: params(1, 1) }));
      expect(pixels(target)).toEqual([0.75, 0.75, 0.75, 1]);
    });

    it("should add per-channel grain", () => {
      const target = buffer(1, 1);
      BUILTIN_FILTERS.grain.program.run(target, pass({ auxiliary: hash(), parameters: params(1, 0) }));
      expect(pixels(target)).toEqual([0.75, 0.25, 0.5, 1]);
    });
  });

  describe("curves", () => {
    it("looks each channel up in its own row channel", () => {
      const target = buffer(1, 1);
      const lookup = buffer(2, 1, [0.125, 0.25, 0.375, 0.5, 0.875, 0.75, 0.625, 0.5]);
      const source = buffer(1, 1, [0, 1, 0.25, 0.75]);
      BUILTIN_FILTERS.curves.program.run(target, pass({ inputs: [source, null, null], auxiliary: lookup }));
      expect(pixels(target)).toEqual([0.125, 0.75, 0.375, 0.5]);
    });
  });

  describe("image", () => {
    it("should copy the auxiliary image", () => {
      const target = buffer(2, 1);
      const image = buffer(2, 1, [1, 0, 0, 1, 0, 0, 1, 0.5]);
      BUILTIN_FILTERS.image.program.run(target, pass({ auxiliary: image }));
      expect(pixels(target)).toEqual([1, 0, 0, 1, 0, 0, 1, 0.5]);
    });

    it("renders transparent black without an image", () => {
      const target = buffer(1, 1, [1, 1, 1, 1]);
      BUILTIN_FILTERS.image.program.run(target, pass());
      expect(pixels(target)).toEqual([0, 0, 0, 0]);
    });
  });

  describe("text", () => {
    it("should paint the text color where the mask covers", () => {
      const target = buffer(2, 1);
      const mask = buffer(2, 1, [1, 1, 1, 1, 1, 1, 1, 0]);
      BUILTIN_FILTERS.text.program.run(target, pass({ auxiliary: mask, parameters: params(1, 0, 0) }));
      expect(pixels(target)).toEqual([1, 0, 0, 1, 0, 0, 0, 0]);
    });
  });

  describe("noise", () => {
    function render(seed: number): PixelBuffer {
      const target = buffer(8, 8);
      BUILTIN_FILTERS.noise.program.run(target, pass({ seed, parameters: params(0.25, 0.5, 0.5, 0) }));
      return target;
    }

    it("is deterministic per seed", () => {
      expect(pixels(render(3))).toEqual(pixels(render(3)));
      expect(pixels(render(3))).not.toEqual(pixels(render(4)));
    });

    it("should stay gray and opaque in range", () => {
      const data = render(9).data;
      for (let i = 0; i < data.length; i += 4) {
        expect(data[i]).toBeGreaterThanOrEqual(0);
        expect(data[i]).toBeLessThanOrEqual(1);
        expect(data[i + 1]).toBe(data[i]);
        expect(data[i + 3]).toBe(1);
      }
    });
  });
});
