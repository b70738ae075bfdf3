import type { FilterDefinition } from "../FilterProgram";
import { shadePixels } from "../FilterProgram";

export const BLEND_MODES = ["mix", "add", "multiply", "screen", "difference"] as const;
export type BlendMode = (typeof BLEND_MODES)[number];

/** The parameter range is split into equal bands, one per mode. */
export function blendModeFromParameter(p: number): BlendMode {
  const index = Math.min(BLEND_MODES.length - 1, Math.floor(p * BLEND_MODES.length));
  return BLEND_MODES[index];
}

function blendChannel(mode: BlendMode, a: number, b: number): number {
  switch (mode) {
    case "mix": return b;
    case "add": return a + b;
    case "multiply": return a * b;
    case "screen": return 1 - (1 - a) * (1 - b);
    case "difference": return Math.abs(a - b);
  }
}

/**
 * Combine input 0 (base) with input 1 (layer), optionally weighted by input 2's
 * red channel as a mask.
 *
 * Parameters:
 *   0  mode, see BLEND_MODES
 *   1  opacity of the layer
 *
 * A missing base reads as black, a missing layer leaves the base untouched.
 */
export const blendFilter: FilterDefinition = {
  name: "blend",
  descriptor: {
    inputCount: 3,
    parameterCount: 2,
    passCount: 1,
    auxiliaryKind: "none",
    needsRandomSeed: false,
  },
  program: {
    run(target, pass) {
      const [base, layer, mask] = pass.inputs;
      const mode = blendModeFromParameter(pass.parameters[0]);
      const opacity = pass.parameters[1];
      const a = new Float32Array(4);
      const b = new Float32Array(4);
      const m = new Float32Array(4);

      shadePixels(target, (_x, _y, u, v, out) => {
        if (base) base.sample(u, v, a);
        else a.set([0, 0, 0, 1]);

        if (!layer) {
          out.set(a);
          return;
        }
        layer.sample(u, v, b);
        const weight = opacity * b[3] * (mask ? mask.sample(u, v, m)[0] : 1);

        for (let c = 0; c < 3; c++) {
          out[c] = a[c] + (blendChannel(mode, a[c], b[c]) - a[c]) * weight;
        }
        out[3] = a[3];
      });
    },
  },
};
