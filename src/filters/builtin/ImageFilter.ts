import type { FilterDefinition } from "../FilterProgram";
import { shadePixels } from "../FilterProgram";

/** Generator that outputs the node's image payload, resampled to the node size. */
export const imageFilter: FilterDefinition = {
  name: "image",
  descriptor: {
    inputCount: 0,
    parameterCount: 0,
    passCount: 1,
    auxiliaryKind: "image",
    needsRandomSeed: false,
  },
  program: {
    run(target, pass) {
      const image = pass.auxiliary;
      if (!image) {
        target.fill(0, 0, 0, 0);
        return;
      }
      shadePixels(target, (x, y, _u, _v, out) => {
        image.fetch(x, y, out);
      });
    },
  },
};
