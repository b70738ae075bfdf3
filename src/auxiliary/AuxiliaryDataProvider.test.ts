import type { AuxiliaryRequest, TextRasterizer } from "./AuxiliaryDataProvider";
import type { CurvePayload, ImagePayload, TextPayload } from "../types";
import { CURVE_LOOKUP_SIZE, DefaultAuxiliaryProvider, randomHashPixels, resampleImage } from "./AuxiliaryDataProvider";
import { CpuRenderDevice } from "../render/CpuRenderDevice";
import { DeviceLostError } from "../engine/EngineErrors";

const image: ImagePayload = {
  type: "image",
  width: 2,
  height: 1,
  rgba: new Uint8Array([255, 0, 0, 255, 0, 0, 255, 51]),
};

const text: TextPayload = { type: "text", text: "A", font: "test-font", size: 0.5, x: 0.5, y: 0.5 };

function request(overrides: Partial<AuxiliaryRequest> = {}): AuxiliaryRequest {
  return { width: 4, height: 1, seed: 9, payload: null, ...overrides };
}

describe("DefaultAuxiliaryProvider", () => {
  let device: CpuRenderDevice;
  let warn: jest.SpyInstance;

  beforeEach(() => {
    device = new CpuRenderDevice();
    warn = jest.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    warn.mockRestore();
  });

  describe("random-hash", () => {
    it("should produce the seeded hash and destroy it on release", () => {
      const provider = new DefaultAuxiliaryProvider(device);
      const texture = provider.getAuxiliary("random-hash", request());

      expect(texture.ephemeral).toBe(true);
      expect(Array.from(device.readPixels(texture.target))).toEqual(Array.from(randomHashPixels(request())));

      provider.releaseAuxiliary(texture);
      expect(device.targetCount).toBe(0);
    });

    it("depends on the seed", () => {
      expect(Array.from(randomHashPixels(request({ seed: 1 })))).not.toEqual(
        Array.from(randomHashPixels(request({ seed: 2 }))),
      );
    });
  });

  describe("image", () => {
    it("should resample to the requested size with nearest texels", () => {
      expect(Array.from(resampleImage(image, 4, 1))).toEqual([
        1, 0, 0, 1,
        1, 0, 0, 1,
        0, 0, 1, 0.2,
        0, 0, 1, 0.2,
      ].map((v) => Math.fround(v)));
    });

    it("caches one texture per payload and size", () => {
      const provider = new DefaultAuxiliaryProvider(device);
      const first = provider.getAuxiliary("image", request({ payload: image }));
      provider.releaseAuxiliary(first);
      const second = provider.getAuxiliary("image", request({ payload: image }));
      const resized = provider.getAuxiliary("image", request({ payload: image, width: 2 }));

      expect(first.ephemeral).toBe(false);
      expect(second.target).toBe(first.target);
      expect(resized.target).not.toBe(first.target);
      expect(device.targetCount).toBe(2);

      provider.dispose();
      expect(device.targetCount).toBe(0);
    });

    it("should fall back to gray for a malformed image", () => {
      const provider = new DefaultAuxiliaryProvider(device, { fallbackGray: 0.25 });
      const broken: ImagePayload = { type: "image", width: 1, height: 1, rgba: new Uint8Array(3) };
      const texture = provider.getAuxiliary("image", request({ payload: broken, width: 1 }));

      expect(texture.fallback).toBe(true);
      expect(texture.ephemeral).toBe(true);
      expect(Array.from(device.readPixels(texture.target))).toEqual([0.25, 0.25, 0.25, 1]);
      expect(warn).toHaveBeenCalledWith(
        "[AuxiliaryDataProvider] image data unavailable (image data is 3 bytes, expected 1x1 RGBA); using gray fallback",
      );
    });

    it("falls back when the node has no payload", () => {
      const provider = new DefaultAuxiliaryProvider(device);
      const texture = provider.getAuxiliary("image", request({ width: 1 }));

      expect(texture.fallback).toBe(true);
      expect(Array.from(device.readPixels(texture.target))).toEqual([0.5, 0.5, 0.5, 1]);
      expect(warn).toHaveBeenCalledWith(
        "[AuxiliaryDataProvider] image data unavailable (node has no image payload); using gray fallback",
      );
    });
  });

  describe("curve", () => {
    it("should bake a fixed-size lookup row whatever the output size", () => {
      const provider = new DefaultAuxiliaryProvider(device);
      const payload: CurvePayload = { type: "curve", channels: [null, null, null, null] };
      const texture = provider.getAuxiliary("curve", request({ payload, width: 1, height: 1 }));
      const row = device.readPixels(texture.target);

      expect(texture.target.width).toBe(CURVE_LOOKUP_SIZE);
      expect(texture.target.height).toBe(1);
      expect(Array.from(row.slice(0, 4))).toEqual([0, 0, 0, 0]);
      expect(row[204 * 4]).toBe(Math.fround(204 / 255));
      expect(Array.from(row.slice(255 * 4))).toEqual([1, 1, 1, 1]);
    });

    it("should share one row between outputs of different sizes", () => {
      const provider = new DefaultAuxiliaryProvider(device);
      const payload: CurvePayload = { type: "curve", channels: [null, null, null, null] };
      const small = provider.getAuxiliary("curve", request({ payload, width: 2, height: 2 }));
      const large = provider.getAuxiliary("curve", request({ payload, width: 64, height: 8 }));

      expect(large.target).toBe(small.target);
      expect(provider.cachedTargetCount).toBe(1);
    });
  });

  describe("cache bound", () => {
    function payload(red: number): ImagePayload {
      return { type: "image", width: 1, height: 1, rgba: new Uint8Array([red, 0, 0, 255]) };
    }

    it("should destroy the least recently used buffer beyond maxCachedTargets", () => {
      const provider = new DefaultAuxiliaryProvider(device, { maxCachedTargets: 2 });
      const a = payload(10);
      const b = payload(20);
      const c = payload(30);

      const first = provider.getAuxiliary("image", request({ payload: a }));
      provider.getAuxiliary("image", request({ payload: b }));
      // Touch a so that b is the oldest
      expect(provider.getAuxiliary("image", request({ payload: a })).target).toBe(first.target);
      provider.getAuxiliary("image", request({ payload: c }));

      expect(provider.cachedTargetCount).toBe(2);
      expect(device.targetCount).toBe(2);
      expect(provider.getAuxiliary("image", request({ payload: a })).target).toBe(first.target);
    });

    it("rebuilds an evicted buffer on the next request", () => {
      const provider = new DefaultAuxiliaryProvider(device, { maxCachedTargets: 1 });
      const a = payload(10);
      const first = provider.getAuxiliary("image", request({ payload: a }));
      provider.getAuxiliary("image", request({ payload: payload(20) }));

      const again = provider.getAuxiliary("image", request({ payload: a }));

      expect(again.target).not.toBe(first.target);
      expect(device.targetCount).toBe(1);
    });
  });

  describe("text", () => {
    it("should fall back without a rasterizer", () => {
      const provider = new DefaultAuxiliaryProvider(device);
      const texture = provider.getAuxiliary("text", request({ payload: text }));

      expect(texture.fallback).toBe(true);
      expect(warn).toHaveBeenCalledWith(
        "[AuxiliaryDataProvider] text data unavailable (no text rasterizer available); using gray fallback",
      );
    });

    it("should give the fallback zero coverage", () => {
      const provider = new DefaultAuxiliaryProvider(device);
      const texture = provider.getAuxiliary("text", request({ payload: text, width: 1 }));

      expect(Array.from(device.readPixels(texture.target))).toEqual([0.5, 0.5, 0.5, 0]);
    });

    it("turns rasterizer coverage into an ephemeral white mask", () => {
      const rasterizer: TextRasterizer = { rasterize: jest.fn(() => new Float32Array([0, 0.5, 1, 0])) };
      const provider = new DefaultAuxiliaryProvider(device, { textRasterizer: rasterizer });
      const texture = provider.getAuxiliary("text", request({ payload: text }));

      expect(rasterizer.rasterize).toHaveBeenCalledWith(text, 4, 1);
      expect(texture.ephemeral).toBe(true);
      expect(Array.from(device.readPixels(texture.target))).toEqual([
        1, 1, 1, 0,
        1, 1, 1, 0.5,
        1, 1, 1, 1,
        1, 1, 1, 0,
      ]);
    });

    it("should fall back when the font is unavailable", () => {
      const provider = new DefaultAuxiliaryProvider(device, { textRasterizer: { rasterize: () => null } });
      provider.getAuxiliary("text", request({ payload: text }));

      expect(warn).toHaveBeenCalledWith(
        '[AuxiliaryDataProvider] text data unavailable (font "test-font" unavailable); using gray fallback',
      );
    });

    it("falls back when the rasterizer throws", () => {
      const provider = new DefaultAuxiliaryProvider(device, {
        textRasterizer: { rasterize: () => { throw new Error("glyph cache full"); } },
      });
      const texture = provider.getAuxiliary("text", request({ payload: text }));

      expect(texture.fallback).toBe(true);
      expect(warn).toHaveBeenCalledWith(
        "[AuxiliaryDataProvider] text data unavailable (glyph cache full); using gray fallback",
      );
    });
  });

  it("should propagate device loss instead of falling back", () => {
    const provider = new DefaultAuxiliaryProvider(device);
    device.loseContext();
    expect(() => provider.getAuxiliary("random-hash", request())).toThrow(DeviceLostError);
  });
});
