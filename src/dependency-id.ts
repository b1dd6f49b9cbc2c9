import { DependencyIdError } from "./errors.js";

export const KEY_DELIMITER = "@";

/**
 * A dependency reference as requested by a project: a package name and the
 * version spec it was asked for (e.g. "react" + "^18.2.0").
 *
 * Identity is the canonical string `name@versionSpec`. Equality, map keys,
 * ordering and the lock file encoding all go through {@link DependencyId.toString}.
 */
export class DependencyId {
  readonly name: string;
  readonly versionSpec: string;

  constructor(name: string, versionSpec: string) {
    if (name.length === 0) {
      throw new DependencyIdError("Dependency name must not be empty");
    }
    this.name = name;
    this.versionSpec = versionSpec;
  }

  /**
   * Decode a canonical key.
   *
   * The split happens at the first "@" after the first character, so a
   * scoped name keeps its leading "@" ("@types/node@^20" is "@types/node"
   * + "^20"). Anything after the split point belongs to the version spec.
   */
  static parse(key: string): DependencyId {
    const at = key.indexOf(KEY_DELIMITER, 1);
    if (at === -1) {
      throw new DependencyIdError(
        key.length === 0
          ? "missing dependency name"
          : `missing dependency version in '${key}'`
      );
    }
    return new DependencyId(key.slice(0, at), key.slice(at + 1));
  }

  /**
   * Accept either an id or a `[name, versionSpec]` pair.
   */
  static from(value: DependencyIdLike): DependencyId {
    if (value instanceof DependencyId) return value;
    const [name, versionSpec] = value;
    return new DependencyId(name, versionSpec);
  }

  toString(): string {
    return `${this.name}${KEY_DELIMITER}${this.versionSpec}`;
  }

  toJSON(): string {
    return this.toString();
  }

  equals(other: DependencyId): boolean {
    return this.toString() === other.toString();
  }
}

export type DependencyIdLike = DependencyId | readonly [name: string, versionSpec: string];

/**
 * Raw byte order of two canonical key strings.
 */
export function compareKeys(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, "utf-8"), Buffer.from(b, "utf-8"));
}

export function compareDependencyIds(a: DependencyId, b: DependencyId): number {
  return compareKeys(a.toString(), b.toString());
}
