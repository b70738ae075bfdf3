import type { FilterDefinition } from "../FilterProgram";
import { shadePixels } from "../FilterProgram";

/**
 * Separable box blur iterated over four passes: even passes blur horizontally,
 * odd passes vertically. Two box passes per axis approximate a tent filter.
 *
 * Parameters:
 *   0  radius in texels (round(p * 8))
 */
export const blurFilter: FilterDefinition = {
  name: "blur",
  descriptor: {
    inputCount: 1,
    parameterCount: 1,
    passCount: 4,
    auxiliaryKind: "none",
    needsRandomSeed: false,
  },
  program: {
    run(target, pass) {
      const source = pass.inputs[0];
      if (!source) {
        target.fill(0, 0, 0, 0);
        return;
      }

      const radius = Math.round(pass.parameters[0] * 8);
      const horizontal = pass.passIndex % 2 === 0;
      const texel = new Float32Array(4);
      const taps = radius * 2 + 1;
      // Input and target share a size except on pass 0, where the parent may differ
      const sx = source.width / target.width;
      const sy = source.height / target.height;

      shadePixels(target, (x, y, _u, _v, out) => {
        out[0] = 0;
        out[1] = 0;
        out[2] = 0;
        out[3] = 0;
        for (let k = -radius; k <= radius; k++) {
          const fx = horizontal ? x + k : x;
          const fy = horizontal ? y : y + k;
          source.fetch(Math.floor(fx * sx), Math.floor(fy * sy), texel);
          out[0] += texel[0];
          out[1] += texel[1];
          out[2] += texel[2];
          out[3] += texel[3];
        }
        out[0] /= taps;
        out[1] /= taps;
        out[2] /= taps;
        out[3] /= taps;
      });
    },
  },
};
