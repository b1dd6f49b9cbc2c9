import { calcHash } from "./integrity.js";
import type { DependencyLock, ResolvedDist } from "./types.js";

const CONCRETE_VERSION = /^\d+\.\d+\.\d+(?:-[0-9A-Za-z.-]+)?(?:\+[0-9A-Za-z.-]+)?$/;

/**
 * True for an exact version ("1.2.3", "2.0.0-rc.1"), false for ranges and tags.
 */
export function isConcreteVersion(version: string): boolean {
  return CONCRETE_VERSION.test(version);
}

/**
 * Build a frozen lock record from a resolved version and its archive bytes.
 */
export function createDependencyLock(
  dist: ResolvedDist,
  data: Uint8Array,
  algorithm: string = "sha512"
): Readonly<DependencyLock> {
  if (!isConcreteVersion(dist.version)) {
    throw new Error(
      `Cannot lock '${dist.name}' at '${dist.version}' (must be a concrete version)`
    );
  }

  const sha1 = calcHash(data, algorithm);
  if (sha1 === "") {
    throw new Error(`Unsupported integrity algorithm '${algorithm}'`);
  }

  return Object.freeze({
    name: dist.name,
    version: dist.version,
    tarball: dist.tarball,
    sha1,
  });
}

function stringField(data: object, field: keyof DependencyLock, key: string): string {
  const value: unknown = Reflect.get(data, field);
  if (typeof value !== "string") {
    throw new Error(`Dependency '${key}' missing or invalid field '${field}'`);
  }
  return value;
}

/**
 * Validate that a value is a lock record.
 * Throws on invalid input; `key` names the entry in error messages.
 */
export function validateDependencyLock(
  data: unknown,
  key: string
): asserts data is DependencyLock {
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new Error(`Dependency '${key}' must be an object`);
  }

  stringField(data, "name", key);
  const version = stringField(data, "version", key);
  stringField(data, "tarball", key);
  stringField(data, "sha1", key);

  if (!isConcreteVersion(version)) {
    throw new Error(
      `Dependency '${key}' has invalid version '${version}' (must be a concrete version)`
    );
  }
}
