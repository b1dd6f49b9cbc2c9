import { DependencyId, compareKeys, type DependencyIdLike } from "./dependency-id.js";
import { LockFileError, errorMessage } from "./errors.js";
import { validateDependencyLock } from "./record.js";
import type { DependencyLock, LockFileContents } from "./types.js";

interface Entry {
  id: DependencyId;
  lock: DependencyLock;
}

/**
 * Dependency id to lock record store.
 *
 * Lookups go through a Map keyed by the canonical `name@versionSpec` string.
 * Serialization always emits entries sorted by that key, so two maps with the
 * same content produce identical output whatever order they were filled in.
 */
export class DependencyMap {
  private readonly entriesByKey = new Map<string, Entry>();

  get size(): number {
    return this.entriesByKey.size;
  }

  /**
   * Insert or replace the record for `id`. The record is validated the same
   * way decoding validates it, and a frozen copy is stored.
   */
  set(id: DependencyIdLike, lock: DependencyLock): this {
    const dependencyId = DependencyId.from(id);
    const key = dependencyId.toString();
    validateDependencyLock(lock, key);
    this.entriesByKey.set(key, {
      id: dependencyId,
      lock: Object.freeze({
        name: lock.name,
        version: lock.version,
        tarball: lock.tarball,
        sha1: lock.sha1,
      }),
    });
    return this;
  }

  get(id: DependencyIdLike): DependencyLock | undefined {
    return this.entriesByKey.get(DependencyId.from(id).toString())?.lock;
  }

  has(id: DependencyIdLike): boolean {
    return this.entriesByKey.has(DependencyId.from(id).toString());
  }

  delete(id: DependencyIdLike): boolean {
    return this.entriesByKey.delete(DependencyId.from(id).toString());
  }

  /** Canonical keys in persisted order. */
  keys(): string[] {
    return [...this.entriesByKey.keys()].sort(compareKeys);
  }

  /** Entries in persisted order. */
  entries(): [DependencyId, DependencyLock][] {
    return this.keys().map((key) => {
      const { id, lock } = this.requireEntry(key);
      return [id, lock];
    });
  }

  /**
   * Key-sorted plain object for JSON output. Keys always contain "@", so
   * none of them is an integer-like property that JS would reorder.
   */
  toJSON(): LockFileContents {
    const sorted: LockFileContents = {};
    for (const key of this.keys()) {
      const { lock } = this.requireEntry(key);
      sorted[key] = {
        name: lock.name,
        version: lock.version,
        tarball: lock.tarball,
        sha1: lock.sha1,
      };
    }
    return sorted;
  }

  /**
   * Rebuild a map from parsed lock file JSON. Entries may come in any order.
   * Throws a LockFileError of kind "decode" on malformed content.
   */
  static fromJSON(data: unknown): DependencyMap {
    if (typeof data !== "object" || data === null || Array.isArray(data)) {
      throw new LockFileError("decode", "lock file must be a JSON object");
    }

    const map = new DependencyMap();
    for (const key of Object.keys(data)) {
      const value: unknown = Reflect.get(data, key);
      try {
        const id = DependencyId.parse(key);
        validateDependencyLock(value, key);
        map.set(id, value);
      } catch (err: unknown) {
        throw new LockFileError("decode", errorMessage(err), { cause: err });
      }
    }
    return map;
  }

  private requireEntry(key: string): Entry {
    const entry = this.entriesByKey.get(key);
    if (!entry) {
      throw new Error(`No dependency for '${key}'`);
    }
    return entry;
  }
}
