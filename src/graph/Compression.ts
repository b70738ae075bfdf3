import { deflateSync, inflateSync, strFromU8, strToU8 } from "fflate";

/**
 * Deflate binary package data and return it Base64-encoded for text transport.
 */
export function compressBytes(input: Uint8Array): string {
  // latin1 mode maps each byte to one char, which is what btoa expects
  return btoa(strFromU8(deflateSync(input, { level: 9 }), true));
}

/**
 * Inverse of compressBytes.
 */
export function decompressBytes(base64: string): Uint8Array {
  return inflateSync(strToU8(atob(base64), true));
}
