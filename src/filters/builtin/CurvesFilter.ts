import type { FilterDefinition } from "../FilterProgram";
import { shadePixels } from "../FilterProgram";

/**
 * Remaps each channel of input 0 through the node's curve set. The auxiliary
 * buffer is a one-row lookup table; channel c of the table is curve c.
 */
export const curvesFilter: FilterDefinition = {
  name: "curves",
  descriptor: {
    inputCount: 1,
    parameterCount: 0,
    passCount: 1,
    auxiliaryKind: "curve",
    needsRandomSeed: false,
  },
  program: {
    run(target, pass) {
      const source = pass.inputs[0];
      const lookup = pass.auxiliary;
      const texel = new Float32Array(4);
      const mapped = new Float32Array(4);

      shadePixels(target, (_x, _y, u, v, out) => {
        if (source) source.sample(u, v, texel);
        else texel.set([0, 0, 0, 1]);
        if (!lookup) {
          out.set(texel);
          return;
        }

        const last = lookup.width - 1;
        for (let c = 0; c < 4; c++) {
          const t = Math.max(0, Math.min(1, texel[c]));
          lookup.fetch(Math.round(t * last), 0, mapped);
          out[c] = mapped[c];
        }
      });
    },
  },
};
