import { createNoise4D } from "simplex-noise";
import type { NoiseFunction4D } from "simplex-noise";
import type { FilterDefinition } from "../FilterProgram";
import { shadePixels } from "../FilterProgram";
import { createSeededRandom, mixSeed } from "../../engine/SeededRandom";

const TWO_PI = Math.PI * 2;

/** Noise functions are pure in their seed, so they are built once per seed. */
const noiseBySeed = new Map<number, NoiseFunction4D>();

function noiseForSeed(seed: number): NoiseFunction4D {
  let noise = noiseBySeed.get(seed);
  if (!noise) {
    noise = createNoise4D(createSeededRandom(mixSeed(seed)));
    noiseBySeed.set(seed, noise);
  }
  return noise;
}

/**
 * Tileable fractal simplex noise.
 *
 * Maps (u, v) onto two circles of a torus in 4D space so the result wraps
 * seamlessly in both directions.
 *
 * Parameters:
 *   0  base frequency (1 + p * 15)
 *   1  octaves (1 + round(p * 7))
 *   2  persistence (amplitude falloff per octave)
 *   3  contrast (1 + p * 3)
 */
export const noiseFilter: FilterDefinition = {
  name: "noise",
  descriptor: {
    inputCount: 0,
    parameterCount: 4,
    passCount: 1,
    auxiliaryKind: "none",
    needsRandomSeed: true,
  },
  program: {
    run(target, pass) {
      const noise4D = noiseForSeed(pass.seed);
      const [pFrequency, pOctaves, pPersistence, pContrast] = pass.parameters;
      const scale = 1 + pFrequency * 15;
      const octaves = 1 + Math.round(pOctaves * 7);
      const persistence = pPersistence;
      const contrast = 1 + pContrast * 3;

      shadePixels(target, (_x, _y, u, v, out) => {
        const angleX = u * TWO_PI;
        const angleY = v * TWO_PI;

        let value = 0;
        let amplitude = 1;
        let frequency = scale / TWO_PI;
        let totalAmplitude = 0;

        for (let o = 0; o < octaves; o++) {
          const nx = Math.cos(angleX) * frequency;
          const ny = Math.sin(angleX) * frequency;
          const nz = Math.cos(angleY) * frequency;
          const nw = Math.sin(angleY) * frequency;

          value += noise4D(nx, ny, nz, nw) * amplitude;
          totalAmplitude += amplitude;
          amplitude *= persistence;
          frequency *= 2;
        }

        // -1..1 -> 0..1 around mid-gray, then contrast
        const n = totalAmplitude > 0 ? value / totalAmplitude : 0;
        const shaded = Math.max(0, Math.min(1, 0.5 + n * 0.5 * contrast));
        out[0] = shaded;
        out[1] = shaded;
        out[2] = shaded;
        out[3] = 1;
      });
    },
  },
};
