// Base64url and checksum helpers for shareable seed codes

export function toBase64Url(text: string): string {
  return btoa(text).replace(/\+/g, "-").replace(/\//g, "_").replace(/=+$/g, "");
}

/**
 * @throws Error when the input is not valid base64
 */
export function fromBase64Url(input: string): string {
  let base64 = input.replace(/-/g, "+").replace(/_/g, "/");
  while (base64.length % 4 !== 0) base64 += "=";
  return atob(base64);
}

/**
 * CRC32 (IEEE polynomial), makes seed codes tamper-evident.
 */
export function crc32(input: string | Uint8Array): number {
  const bytes =
    typeof input === "string" ? new TextEncoder().encode(input) : input;
  let crc = 0xffffffff;

  for (const byte of bytes) {
    crc ^= byte;
    for (let bit = 0; bit < 8; bit++) {
      const mask = -(crc & 1);
      crc = (crc >>> 1) ^ (0xedb88320 & mask);
    }
  }

  return (crc ^ 0xffffffff) >>> 0;
}
