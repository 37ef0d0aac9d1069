import { describe, expect, it } from "vitest";
import { FNV64Hasher, fnv64HashString } from "../src/core/hash/fnv64";

describe("FNV64Hasher", () => {
  it("matches the reference vectors", () => {
    expect(fnv64HashString("")).toBe("cbf29ce484222325");
    expect(fnv64HashString("a")).toBe("af63dc4c8601ec8c");
    expect(fnv64HashString("foobar")).toBe("85944171f73967e8");
  });

  it("masks bytes to 0-255", () => {
    const a = new FNV64Hasher().updateByte(256).digest();
    const b = new FNV64Hasher().updateByte(0).digest();
    expect(a).toBe(b);
  });

  it("hashes strings as UTF-8 bytes", () => {
    const bytes = new FNV64Hasher().updateBytes(new Uint8Array([0x68, 0x69])).digest();
    expect(fnv64HashString("hi")).toBe(bytes);
  });

  it("always yields 16 hex characters", () => {
    expect(fnv64HashString("lawn")).toMatch(/^[0-9a-f]{16}$/);
  });
});
