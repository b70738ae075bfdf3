import type { FilterDefinition } from "../FilterProgram";
import { shadePixels } from "../FilterProgram";

/**
 * Draws the node's text payload over input 0 in a solid color.
 *
 * Parameters:
 *   0-2  text color R, G, B
 */
export const textFilter: FilterDefinition = {
  name: "text",
  descriptor: {
    inputCount: 1,
    parameterCount: 3,
    passCount: 1,
    auxiliaryKind: "text",
    needsRandomSeed: false,
  },
  program: {
    run(target, pass) {
      const source = pass.inputs[0];
      const glyphs = pass.auxiliary;
      const [r, g, b] = pass.parameters;
      const base = new Float32Array(4);
      const coverage = new Float32Array(4);

      shadePixels(target, (x, y, u, v, out) => {
        if (source) source.sample(u, v, base);
        else base.set([0, 0, 0, 0]);
        const alpha = glyphs ? glyphs.fetch(x, y, coverage)[3] : 0;

        out[0] = base[0] + (r - base[0]) * alpha;
        out[1] = base[1] + (g - base[1]) * alpha;
        out[2] = base[2] + (b - base[2]) * alpha;
        out[3] = base[3] + (1 - base[3]) * alpha;
      });
    },
  },
};
