/**
 * Supplementary inputs a filter needs beyond its graph parents.
 *
 * Random-hash and text buffers are ephemeral: generated for one pass and
 * destroyed by releaseAuxiliary(). Image and curve buffers depend only on their
 * payload and size, so they are cached per payload object, least recently
 * used first out once more than maxCachedTargets are held.
 *
 * Failures never abort evaluation. A missing or undecodable payload, or an
 * unavailable text rasterizer, yields a solid gray fallback and a warning.
 * The text fallback has zero coverage, so the text filter leaves its input
 * unchanged.
 */

import type {
  AuxiliaryKind,
  AuxiliaryPayload,
  CurvePayload,
  ImagePayload,
  TextPayload,
} from "../types";
import type { RenderDevice, RenderTarget } from "../render/RenderDevice";
import { createSeededRandom, mixSeed } from "../engine/SeededRandom";
import { bakeCurveLookup } from "./CurveSampler";

/** Entries in a baked curve lookup row, independent of the output size. */
export const CURVE_LOOKUP_SIZE = 256;

const DEFAULT_MAX_CACHED_TARGETS = 64;

export interface AuxiliaryRequest {
  width: number;
  height: number;
  seed: number;
  payload: AuxiliaryPayload | null;
}

export interface AuxiliaryTexture {
  target: RenderTarget;
  /** Destroyed on release instead of being kept for later passes. */
  ephemeral: boolean;
  fallback: boolean;
}

export interface AuxiliaryDataProvider {
  getAuxiliary(kind: Exclude<AuxiliaryKind, "none">, request: AuxiliaryRequest): AuxiliaryTexture;
  releaseAuxiliary(texture: AuxiliaryTexture): void;
  dispose(): void;
}

/**
 * Renders text into a coverage mask (width * height values in [0, 1]).
 * Returns null when the font is unavailable.
 */
export interface TextRasterizer {
  rasterize(payload: TextPayload, width: number, height: number): Float32Array | null;
}

export interface AuxiliaryProviderOptions {
  fallbackGray?: number;
  textRasterizer?: TextRasterizer | null;
  /** Image and curve buffers kept between passes. Default 64. */
  maxCachedTargets?: number;
}

interface CachedTarget {
  bySize: Map<string, RenderTarget>;
  key: string;
}

export class DefaultAuxiliaryProvider implements AuxiliaryDataProvider {
  private device: RenderDevice;
  private fallbackGray: number;
  private textRasterizer: TextRasterizer | null;
  private payloadCache = new WeakMap<ImagePayload | CurvePayload, Map<string, RenderTarget>>();
  private maxCachedTargets: number;
  /** Insertion order is recency order. */
  private cachedTargets = new Map<RenderTarget, CachedTarget>();

  constructor(device: RenderDevice, options: AuxiliaryProviderOptions = {}) {
    this.device = device;
    this.fallbackGray = options.fallbackGray ?? 0.5;
    this.textRasterizer = options.textRasterizer ?? null;
    this.maxCachedTargets = Math.max(1, Math.floor(options.maxCachedTargets ?? DEFAULT_MAX_CACHED_TARGETS));
  }

  getAuxiliary(kind: Exclude<AuxiliaryKind, "none">, request: AuxiliaryRequest): AuxiliaryTexture {
    try {
      switch (kind) {
        case "random-hash":
          return this.ephemeral(request.width, request.height, randomHashPixels(request));
        case "image":
          return this.image(request);
        case "curve":
          return this.curve(request);
        case "text":
          return this.text(request);
      }
    } catch (e) {
      // Device loss is not a data failure
      if (this.device.isLost()) throw e;
      return this.fallback(kind, request, e instanceof Error ? e.message : String(e));
    }
  }

  releaseAuxiliary(texture: AuxiliaryTexture): void {
    if (texture.ephemeral) this.device.destroyTarget(texture.target);
  }

  /** Destroy every cached image and curve buffer. */
  dispose(): void {
    for (const target of this.cachedTargets.keys()) this.device.destroyTarget(target);
    this.cachedTargets.clear();
    this.payloadCache = new WeakMap();
  }

  private image(request: AuxiliaryRequest): AuxiliaryTexture {
    const payload = request.payload;
    if (!payload || payload.type !== "image") {
      return this.fallback("image", request, "node has no image payload");
    }
    const { width, height, rgba } = payload;
    if (width < 1 || height < 1 || rgba.length !== width * height * 4) {
      return this.fallback("image", request, `image data is ${rgba.length} bytes, expected ${width}x${height} RGBA`);
    }

    return this.cached(payload, request.width, request.height, () =>
      resampleImage(payload, request.width, request.height),
    );
  }

  private curve(request: AuxiliaryRequest): AuxiliaryTexture {
    const payload = request.payload;
    if (!payload || payload.type !== "curve") {
      return this.fallback("curve", request, "node has no curve payload");
    }
    return this.cached(payload, CURVE_LOOKUP_SIZE, 1, () => bakeCurveLookup(payload, CURVE_LOOKUP_SIZE));
  }

  private text(request: AuxiliaryRequest): AuxiliaryTexture {
    const payload = request.payload;
    if (!payload || payload.type !== "text") {
      return this.fallback("text", request, "node has no text payload");
    }
    if (!this.textRasterizer) {
      return this.fallback("text", request, "no text rasterizer available");
    }

    const coverage = this.textRasterizer.rasterize(payload, request.width, request.height);
    if (!coverage) {
      return this.fallback("text", request, `font "${payload.font}" unavailable`);
    }
    if (coverage.length !== request.width * request.height) {
      return this.fallback("text", request, "rasterizer returned a mask of the wrong size");
    }

    const rgba = new Float32Array(coverage.length * 4);
    for (let i = 0; i < coverage.length; i++) {
      rgba[i * 4] = 1;
      rgba[i * 4 + 1] = 1;
      rgba[i * 4 + 2] = 1;
      rgba[i * 4 + 3] = coverage[i];
    }
    return this.ephemeral(request.width, request.height, rgba);
  }

  private cached(
    payload: ImagePayload | CurvePayload,
    width: number,
    height: number,
    build: () => Float32Array,
  ): AuxiliaryTexture {
    let bySize = this.payloadCache.get(payload);
    if (!bySize) {
      bySize = new Map();
      this.payloadCache.set(payload, bySize);
    }

    const key = `${width}x${height}`;
    let target = bySize.get(key);
    if (target) {
      const entry = this.cachedTargets.get(target);
      if (entry) {
        this.cachedTargets.delete(target);
        this.cachedTargets.set(target, entry);
      }
    } else {
      target = this.device.uploadTexture(width, height, build());
      bySize.set(key, target);
      this.cachedTargets.set(target, { bySize, key });
      this.evictIfNeeded();
    }
    return { target, ephemeral: false, fallback: false };
  }

  /** Number of image and curve buffers currently held. */
  get cachedTargetCount(): number {
    return this.cachedTargets.size;
  }

  private evictIfNeeded(): void {
    for (const [target, entry] of this.cachedTargets) {
      if (this.cachedTargets.size <= this.maxCachedTargets) break;
      this.cachedTargets.delete(target);
      entry.bySize.delete(entry.key);
      this.device.destroyTarget(target);
    }
  }

  private ephemeral(width: number, height: number, rgba: Float32Array): AuxiliaryTexture {
    return { target: this.device.uploadTexture(width, height, rgba), ephemeral: true, fallback: false };
  }

  private fallback(kind: AuxiliaryKind, request: AuxiliaryRequest, reason: string): AuxiliaryTexture {
    console.warn(`[AuxiliaryDataProvider] ${kind} data unavailable (${reason}); using gray fallback`);
    // Alpha is glyph coverage for text
    const alpha = kind === "text" ? 0 : 1;
    const rgba = new Float32Array(request.width * request.height * 4);
    for (let i = 0; i < rgba.length; i += 4) {
      rgba[i] = this.fallbackGray;
      rgba[i + 1] = this.fallbackGray;
      rgba[i + 2] = this.fallbackGray;
      rgba[i + 3] = alpha;
    }
    return { target: this.device.uploadTexture(request.width, request.height, rgba), ephemeral: true, fallback: true };
  }
}

/**
 * Per-texel random values in [0, 1) for all four channels. Same seed and size
 * give the same buffer.
 */
export function randomHashPixels(request: AuxiliaryRequest): Float32Array {
  const random = createSeededRandom(mixSeed(request.seed, request.width * 65536 + request.height));
  const data = new Float32Array(request.width * request.height * 4);
  for (let i = 0; i < data.length; i++) data[i] = random();
  return data;
}

/** Nearest-neighbour resample of 8-bit RGBA into float RGBA at the target size. */
export function resampleImage(image: ImagePayload, width: number, height: number): Float32Array {
  const data = new Float32Array(width * height * 4);
  for (let y = 0; y < height; y++) {
    const sy = Math.min(image.height - 1, Math.floor(((y + 0.5) * image.height) / height));
    for (let x = 0; x < width; x++) {
      const sx = Math.min(image.width - 1, Math.floor(((x + 0.5) * image.width) / width));
      const src = (sy * image.width + sx) * 4;
      const dst = (y * width + x) * 4;
      for (let c = 0; c < 4; c++) data[dst + c] = image.rgba[src + c] / 255;
    }
  }
  return data;
}
