import type { FilterDefinition } from "../FilterProgram";
import { shadePixels } from "../FilterProgram";

/** Inverts RGB of input 0; alpha passes through. Without input, renders white. */
export const invertFilter: FilterDefinition = {
  name: "invert",
  descriptor: {
    inputCount: 1,
    parameterCount: 0,
    passCount: 1,
    auxiliaryKind: "none",
    needsRandomSeed: false,
  },
  program: {
    run(target, pass) {
      const source = pass.inputs[0];
      const texel = new Float32Array(4);
      shadePixels(target, (_x, _y, u, v, out) => {
        if (!source) {
          out[0] = 1;
          out[1] = 1;
          out[2] = 1;
          out[3] = 1;
          return;
        }
        source.sample(u, v, texel);
        out[0] = 1 - texel[0];
        out[1] = 1 - texel[1];
        out[2] = 1 - texel[2];
        out[3] = texel[3];
      });
    },
  },
};
