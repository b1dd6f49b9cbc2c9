import { describe, it, expect } from "vitest";
import {
  calcHash,
  tryCalcHash,
  parseIntegrity,
  verifyIntegrity,
  isSupportedAlgorithm,
} from "../src/integrity.js";
import { IntegrityError } from "../src/errors.js";

const EMPTY = new Uint8Array(0);
const EMPTY_SHA1_HEX = "da39a3ee5e6b4b0d3255bfef95601890afd80709";
const EMPTY_SHA512_HEX =
  "cf83e1357eefb8bdf1542850d66d8007d620e4050b5715dc83f4a921d36ce9ce" +
  "47d0d13c5d85f2b0ff8318d2877eec2f63b931bd47417a81a538327af927da3e";
const ABC_SHA1_HEX = "a9993e364706816aba3e25717850c26c9cd0d89d";

describe("calcHash", () => {
  it("double-encodes the sha1 digest of an empty buffer", () => {
    expect(calcHash(EMPTY, "sha1")).toBe(
      `sha1-${Buffer.from(EMPTY_SHA1_HEX).toString("base64")}`
    );
  });

  it("base64-encodes the hex text, not the raw digest", () => {
    const raw = Buffer.from(EMPTY_SHA1_HEX, "hex").toString("base64");
    expect(calcHash(EMPTY, "sha1")).not.toBe(`sha1-${raw}`);
    expect(calcHash(EMPTY, "sha1")).toHaveLength("sha1-".length + 56);
  });

  it("hashes non-empty content with sha1", () => {
    const data = Buffer.from("abc");
    expect(calcHash(data, "sha1")).toBe(
      `sha1-${Buffer.from(ABC_SHA1_HEX).toString("base64")}`
    );
  });

  it("hex-encodes the sha512 digest of an empty buffer", () => {
    const result = calcHash(EMPTY, "sha512");
    expect(result).toBe(`sha512-${EMPTY_SHA512_HEX}`);
    expect(result.slice("sha512-".length)).toHaveLength(128);
  });

  it("returns an empty string for unsupported algorithms", () => {
    expect(calcHash(EMPTY, "sha256")).toBe("");
    expect(calcHash(EMPTY, "md5")).toBe("");
    expect(calcHash(EMPTY, "")).toBe("");
  });

  it("is deterministic for the same input", () => {
    const data = Buffer.from("package contents");
    expect(calcHash(data, "sha512")).toBe(calcHash(Buffer.from("package contents"), "sha512"));
  });

  it("reports a hash-copy error when the bytes cannot be digested", () => {
    const notBytes: unknown = 42;
    let thrown: unknown;
    try {
      // Deliberately bypass the parameter type to feed the hasher a number
      Reflect.apply(calcHash, undefined, [notBytes, "sha1"]);
    } catch (err: unknown) {
      thrown = err;
    }
    expect(thrown).toBeInstanceOf(IntegrityError);
    expect(thrown).toMatchObject({ kind: "hash-copy" });
  });
});

describe("tryCalcHash", () => {
  it("returns the integrity for supported algorithms", () => {
    expect(tryCalcHash(EMPTY, "sha512")).toEqual({
      ok: true,
      integrity: `sha512-${EMPTY_SHA512_HEX}`,
    });
  });

  it("tags unsupported algorithms instead of returning an empty string", () => {
    expect(tryCalcHash(EMPTY, "sha384")).toEqual({
      ok: false,
      reason: "unsupported-algorithm",
      algorithm: "sha384",
    });
  });
});

describe("parseIntegrity", () => {
  it("splits algorithm and digest", () => {
    expect(parseIntegrity(`sha512-${EMPTY_SHA512_HEX}`)).toEqual({
      algorithm: "sha512",
      digest: EMPTY_SHA512_HEX,
    });
  });

  it("accepts padded base64 digests", () => {
    expect(parseIntegrity("sha1-YWJj==").digest).toBe("YWJj==");
  });

  it("rejects unknown algorithms", () => {
    expect(() => parseIntegrity("md5-abcdef")).toThrow(
      "Invalid integrity string 'md5-abcdef'"
    );
  });

  it("rejects strings without a digest", () => {
    expect(() => parseIntegrity("sha1-")).toThrow(IntegrityError);
    expect(() => parseIntegrity("sha1")).toThrow(IntegrityError);
  });

  it("rejects digests outside the base64 alphabet", () => {
    expect(() => parseIntegrity("sha512-not valid")).toThrow(IntegrityError);
  });

  it("reports the hash-parse kind", () => {
    try {
      parseIntegrity("garbage");
      expect.unreachable();
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(IntegrityError);
      expect(err).toMatchObject({ kind: "hash-parse" });
    }
  });
});

describe("verifyIntegrity", () => {
  const data = Buffer.from("tarball bytes");

  it("accepts matching sha512 and sha1 digests", () => {
    expect(verifyIntegrity(data, calcHash(data, "sha512"))).toBe(true);
    expect(verifyIntegrity(data, calcHash(data, "sha1"))).toBe(true);
  });

  it("rejects content that does not match", () => {
    expect(verifyIntegrity(Buffer.from("other bytes"), calcHash(data, "sha512"))).toBe(false);
  });

  it("never verifies algorithms it cannot compute", () => {
    expect(verifyIntegrity(data, "sha256-abcdef")).toBe(false);
  });

  it("returns false for unknown tags and empty strings", () => {
    expect(verifyIntegrity(data, "md5-abcdef")).toBe(false);
    expect(verifyIntegrity(data, "")).toBe(false);
    expect(verifyIntegrity(data, "sha512-")).toBe(false);
  });
});

describe("isSupportedAlgorithm", () => {
  it("knows sha1 and sha512 only", () => {
    expect(isSupportedAlgorithm("sha1")).toBe(true);
    expect(isSupportedAlgorithm("sha512")).toBe(true);
    expect(isSupportedAlgorithm("sha256")).toBe(false);
  });
});
