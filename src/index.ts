export type {
  DependencyLock,
  LockFileContents,
  ResolvedDist,
  LockFileDiff,
} from "./types.js";

export { DependencyId, compareKeys, compareDependencyIds, KEY_DELIMITER } from "./dependency-id.js";
export type { DependencyIdLike } from "./dependency-id.js";
export { DependencyMap } from "./dependency-map.js";
export { LockFile, LOCKFILE_NAME, lockFilePath, diffLockFiles } from "./lockfile.js";
export { createDependencyLock, validateDependencyLock, isConcreteVersion } from "./record.js";
export {
  calcHash,
  tryCalcHash,
  parseIntegrity,
  verifyIntegrity,
  isSupportedAlgorithm,
  SUPPORTED_ALGORITHMS,
} from "./integrity.js";
export type { HashAlgorithm, SupportedAlgorithm, ParsedIntegrity, HashResult } from "./integrity.js";
export { LockFileError, IntegrityError, DependencyIdError } from "./errors.js";
export type { LockFileErrorKind, IntegrityErrorKind } from "./errors.js";
