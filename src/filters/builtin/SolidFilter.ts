import type { FilterDefinition } from "../FilterProgram";
import { shadePixels } from "../FilterProgram";

/**
 * Flat color generator. Parameters 0-3 are R, G, B, A.
 */
export const solidFilter: FilterDefinition = {
  name: "solid",
  descriptor: {
    inputCount: 0,
    parameterCount: 4,
    passCount: 1,
    auxiliaryKind: "none",
    needsRandomSeed: false,
  },
  program: {
    run(target, pass) {
      const [r, g, b, a] = pass.parameters;
      shadePixels(target, (_x, _y, _u, _v, out) => {
        out[0] = r;
        out[1] = g;
        out[2] = b;
        out[3] = a;
      });
    },
  },
};
