import { readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { DependencyId, type DependencyIdLike } from "./dependency-id.js";
import { DependencyMap } from "./dependency-map.js";
import { LockFileError, errorMessage } from "./errors.js";
import type { DependencyLock, LockFileDiff } from "./types.js";

export const LOCKFILE_NAME = "tarlock.lock";

/**
 * Path of the lock file for a project root.
 */
export function lockFilePath(projectRoot: string): string {
  return join(projectRoot, LOCKFILE_NAME);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Pins dependency versions for a project: for each requested `name@versionSpec`
 * it stores the resolved version, the archive URL and the archive's integrity.
 *
 * All file access is blocking. Changes stay in memory until {@link save}.
 *
 * @example
 * const lockFile = LockFile.loadOrCreate(lockFilePath(process.cwd()));
 * lockFile.add(["react", "^18.0.0"], createDependencyLock(dist, archiveBytes));
 * lockFile.save();
 */
export class LockFile {
  readonly path: string;
  readonly dependencies: DependencyMap;

  /**
   * An empty lock file bound to `path`. Nothing is read or written.
   */
  constructor(path: string, dependencies: DependencyMap = new DependencyMap()) {
    this.path = path;
    this.dependencies = dependencies;
  }

  static create(path: string): LockFile {
    return new LockFile(path);
  }

  /**
   * Read and parse the lock file at `path`.
   * Throws a LockFileError of kind "io" if the file cannot be read (including
   * when it does not exist) and of kind "decode" if its content is invalid.
   */
  static load(path: string): LockFile {
    let raw: string;
    try {
      raw = readFileSync(path, "utf-8");
    } catch (err: unknown) {
      throw new LockFileError("io", `${path}: ${errorMessage(err)}`, { cause: err });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err: unknown) {
      throw new LockFileError("decode", `${path}: ${errorMessage(err)}`, { cause: err });
    }

    return new LockFile(path, DependencyMap.fromJSON(parsed));
  }

  /**
   * Load the lock file, or start an empty one if none exists yet.
   * Other read failures still throw.
   */
  static loadOrCreate(path: string): LockFile {
    try {
      return LockFile.load(path);
    } catch (err: unknown) {
      if (err instanceof LockFileError && err.kind === "io" && isNotFound(err.cause)) {
        return new LockFile(path);
      }
      throw err;
    }
  }

  /** Insert a record, replacing any previous one for the same id. */
  add(id: DependencyIdLike, lock: DependencyLock): void {
    this.dependencies.set(id, lock);
  }

  remove(id: DependencyIdLike): boolean {
    return this.dependencies.delete(id);
  }

  get(id: DependencyIdLike): DependencyLock | undefined {
    return this.dependencies.get(id);
  }

  has(id: DependencyIdLike): boolean {
    return this.dependencies.has(id);
  }

  /**
   * The exact text {@link save} writes: key-sorted, 2-space indented JSON
   * with a trailing newline.
   */
  serialize(): string {
    try {
      return JSON.stringify(this.dependencies, null, 2) + "\n";
    } catch (err: unknown) {
      throw new LockFileError("encode", errorMessage(err), { cause: err });
    }
  }

  /**
   * Overwrite the file at `path` with the current contents.
   *
   * The file is truncated and rewritten in place. A crash mid-write can leave
   * a partial file; concurrent saves to one path are last-writer-wins.
   */
  save(): void {
    const contents = this.serialize();
    try {
      writeFileSync(this.path, contents, "utf-8");
    } catch (err: unknown) {
      throw new LockFileError("io", `${this.path}: ${errorMessage(err)}`, { cause: err });
    }
  }
}

/**
 * Compute the diff between two lock file states.
 * A key is "changed" when its resolved version, tarball or integrity differ.
 */
export function diffLockFiles(oldLock: LockFile, newLock: LockFile): LockFileDiff {
  const oldKeys = oldLock.dependencies.keys();
  const newKeys = newLock.dependencies.keys();
  const oldSet = new Set(oldKeys);
  const newSet = new Set(newKeys);

  const added = newKeys.filter((k) => !oldSet.has(k));
  const removed = oldKeys.filter((k) => !newSet.has(k));
  const changed = newKeys.filter((k) => {
    if (!oldSet.has(k)) return false;
    const id = DependencyId.parse(k);
    const before = oldLock.get(id);
    const after = newLock.get(id);
    return (
      before?.version !== after?.version ||
      before?.tarball !== after?.tarball ||
      before?.sha1 !== after?.sha1
    );
  });

  return { added, removed, changed };
}
