import {
  decodeResolution,
  encodeResolution,
  packResolution,
  resolutionKey,
  isPowerOfTwo,
} from "./Resolution";

describe("Resolution", () => {
  describe("decodeResolution", () => {
    it("should decode 0xAA to 1024x1024", () => {
      expect(decodeResolution(0xaa)).toEqual({ width: 1024, height: 1024 });
    });

    it("decodes 0x88 to 256x256", () => {
      expect(decodeResolution(0x88)).toEqual({ width: 256, height: 256 });
    });

    it("should decode 0x00 to 1x1", () => {
      expect(decodeResolution(0x00)).toEqual({ width: 1, height: 1 });
    });

    it("decodes non-square sizes with width in the high nibble", () => {
      expect(decodeResolution(0x93)).toEqual({ width: 512, height: 8 });
    });

    it("should decode 0xFF to 32768x32768", () => {
      expect(decodeResolution(0xff)).toEqual({ width: 32768, height: 32768 });
    });

    it("round-trips every byte value", () => {
      for (let byte = 0; byte < 256; byte++) {
        expect(encodeResolution(decodeResolution(byte))).toBe(byte);
      }
    });
  });

  describe("packResolution", () => {
    it("packs exponents", () => {
      expect(packResolution(10, 10)).toBe(0xaa);
      expect(packResolution(4, 2)).toBe(0x42);
    });

    it("should reject exponents above 15", () => {
      expect(() => packResolution(16, 0)).toThrow(RangeError);
    });

    it("rejects negative or fractional exponents", () => {
      expect(() => packResolution(-1, 0)).toThrow(RangeError);
      expect(() => packResolution(1.5, 0)).toThrow(RangeError);
    });
  });

  describe("encodeResolution", () => {
    it("should reject sizes that are not powers of two", () => {
      expect(() => encodeResolution({ width: 300, height: 256 })).toThrow(RangeError);
    });
  });

  it("formats a readable key", () => {
    expect(resolutionKey(0x98)).toBe("512x256");
  });

  it("should detect powers of two", () => {
    expect(isPowerOfTwo(1)).toBe(true);
    expect(isPowerOfTwo(64)).toBe(true);
    expect(isPowerOfTwo(0)).toBe(false);
    expect(isPowerOfTwo(96)).toBe(false);
  });
});
