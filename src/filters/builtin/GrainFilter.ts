import type { FilterDefinition } from "../FilterProgram";
import { shadePixels } from "../FilterProgram";

/**
 * Adds per-texel random grain from the random-hash auxiliary buffer.
 *
 * Parameters:
 *   0  strength
 *   1  monochrome when >= 0.5, per-channel otherwise
 *
 * Without input 0 the grain is drawn over mid-gray.
 */
export const grainFilter: FilterDefinition = {
  name: "grain",
  descriptor: {
    inputCount: 1,
    parameterCount: 2,
    passCount: 1,
    auxiliaryKind: "random-hash",
    needsRandomSeed: true,
  },
  program: {
    run(target, pass) {
      const source = pass.inputs[0];
      const hash = pass.auxiliary;
      const strength = pass.parameters[0];
      const monochrome = pass.parameters[1] >= 0.5;
      const base = new Float32Array(4);
      const noise = new Float32Array(4);

      shadePixels(target, (x, y, u, v, out) => {
        if (source) source.sample(u, v, base);
        else base.set([0.5, 0.5, 0.5, 1]);
        if (hash) hash.fetch(x, y, noise);
        else noise.fill(0.5);

        for (let c = 0; c < 3; c++) {
          const n = monochrome ? noise[0] : noise[c];
          out[c] = base[c] + (n - 0.5) * strength;
        }
        out[3] = base[3];
      });
    },
  },
};
