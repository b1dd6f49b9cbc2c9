import { createHash, type Hash } from "node:crypto";
import { IntegrityError } from "./errors.js";

export type HashAlgorithm = "sha1" | "sha256" | "sha384" | "sha512";

/** Algorithms {@link calcHash} can produce. */
export const SUPPORTED_ALGORITHMS = ["sha1", "sha512"] as const;

export type SupportedAlgorithm = (typeof SUPPORTED_ALGORITHMS)[number];

export interface ParsedIntegrity {
  algorithm: HashAlgorithm;
  digest: string;
}

export type HashResult =
  | { ok: true; integrity: string }
  | { ok: false; reason: "unsupported-algorithm"; algorithm: string };

const HASH_ALGORITHMS: readonly string[] = ["sha1", "sha256", "sha384", "sha512"];

const INTEGRITY_PATTERN = /^([a-z0-9]+)-([A-Za-z0-9+/]+={0,2})$/;

function isHashAlgorithm(algorithm: string): algorithm is HashAlgorithm {
  return HASH_ALGORITHMS.includes(algorithm);
}

export function isSupportedAlgorithm(algorithm: string): algorithm is SupportedAlgorithm {
  return algorithm === "sha1" || algorithm === "sha512";
}

/**
 * Parse an `algorithm-digest` integrity string.
 * Throws an IntegrityError of kind "hash-parse" on anything else.
 */
export function parseIntegrity(value: string): ParsedIntegrity {
  const parsed = matchIntegrity(value);
  if (!parsed) {
    throw new IntegrityError("hash-parse", `Invalid integrity string '${value}'`);
  }
  return parsed;
}

function matchIntegrity(value: string): ParsedIntegrity | null {
  const [, algorithm = "", digest = ""] = INTEGRITY_PATTERN.exec(value) ?? [];
  return isHashAlgorithm(algorithm) ? { algorithm, digest } : null;
}

function digestHex(algorithm: SupportedAlgorithm, data: Uint8Array): string {
  let hash: Hash;
  try {
    hash = createHash(algorithm).update(data);
  } catch (err: unknown) {
    throw new IntegrityError("hash-copy", `Unable to digest data with ${algorithm}`, {
      cause: err,
    });
  }
  return hash.digest("hex");
}

/**
 * Compute the integrity string of a downloaded archive.
 *
 * - "sha1": `sha1-` followed by the base64 encoding of the lowercase hex
 *   digest *text*. Existing lock files carry this double encoding, so it
 *   has to be reproduced exactly.
 * - "sha512": `sha512-` followed by the lowercase hex digest.
 *
 * Any other algorithm yields an empty string; callers check for "" to
 * detect an unsupported algorithm. See {@link tryCalcHash} for a tagged result.
 */
export function calcHash(data: Uint8Array, algorithm: string): string {
  switch (algorithm) {
    case "sha1": {
      const hex = digestHex("sha1", data);
      const integrity = `sha1-${Buffer.from(hex, "utf-8").toString("base64")}`;
      parseIntegrity(integrity);
      return integrity;
    }
    case "sha512":
      return `sha512-${digestHex("sha512", data)}`;
    default:
      return "";
  }
}

/**
 * Like {@link calcHash}, but reports an unsupported algorithm explicitly.
 */
export function tryCalcHash(data: Uint8Array, algorithm: string): HashResult {
  if (!isSupportedAlgorithm(algorithm)) {
    return { ok: false, reason: "unsupported-algorithm", algorithm };
  }
  return { ok: true, integrity: calcHash(data, algorithm) };
}

/**
 * Check archive bytes against a recorded integrity string.
 * Malformed strings, empty ones, and algorithms calcHash cannot produce never verify.
 */
export function verifyIntegrity(data: Uint8Array, expected: string): boolean {
  const parsed = matchIntegrity(expected);
  if (!parsed || !isSupportedAlgorithm(parsed.algorithm)) return false;
  return calcHash(data, parsed.algorithm) === expected;
}
