/**
 * A resolved and downloaded dependency, as pinned in the lock file.
 */
export interface DependencyLock {
  /** Package name as published (e.g. "react" or "@types/node") */
  readonly name: string;
  /** Concrete version the spec resolved to (e.g. "18.2.0"), never a range */
  readonly version: string;
  /** URL the archive was downloaded from */
  readonly tarball: string;
  /**
   * Tagged integrity string of the archive (e.g. "sha512-cf83...").
   * The field keeps its historical name whatever algorithm produced it.
   */
  readonly sha1: string;
}

/**
 * The on-disk shape: canonical `name@versionSpec` keys to lock records.
 */
export type LockFileContents = Record<string, DependencyLock>;

/**
 * The subset of registry dist metadata a resolver hands over for one version.
 */
export interface ResolvedDist {
  name: string;
  version: string;
  tarball: string;
}

/**
 * Diff between two lock file states, as canonical keys.
 */
export interface LockFileDiff {
  added: string[];
  removed: string[];
  changed: string[];
}
