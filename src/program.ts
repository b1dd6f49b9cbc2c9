import { readFileSync } from "node:fs";
import { createRequire } from "node:module";
import { Command } from "commander";
import { DependencyId } from "./dependency-id.js";
import { LockFileError, errorMessage } from "./errors.js";
import { SUPPORTED_ALGORITHMS, tryCalcHash, verifyIntegrity } from "./integrity.js";
import { LOCKFILE_NAME, LockFile, diffLockFiles } from "./lockfile.js";
import { createDependencyLock } from "./record.js";

const require = createRequire(import.meta.url);
const pkg: { version?: unknown } = require("../package.json");
const version = typeof pkg.version === "string" ? pkg.version : "0.0.0";

function die(message: string): never {
  console.error(message);
  process.exit(1);
}

/**
 * Wrap an action handler with error handling.
 * Catches errors and prints a clean message instead of a raw stack trace.
 */
function action<T extends unknown[]>(
  fn: (...args: T) => void | Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err: unknown) {
      die(`Error: ${errorMessage(err)}`);
    }
  };
}

/**
 * Load the lock file, exiting with a hint when it does not exist yet.
 */
function readLockFile(path: string): LockFile {
  try {
    return LockFile.load(path);
  } catch (err: unknown) {
    if (err instanceof LockFileError && err.kind === "io") {
      die(`No lock file found at ${path}. Run 'tarlock add' to start.`);
    }
    throw err;
  }
}

function short(integrity: string): string {
  return integrity.length > 24 ? `${integrity.slice(0, 24)}…` : integrity;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("tarlock")
    .description("Lock file and archive integrity for package installs")
    .version(version)
    .option("-l, --lockfile <path>", "Path to the lock file", LOCKFILE_NAME);

  const lockPath = (): string => program.opts<{ lockfile: string }>().lockfile;

  program
    .command("list")
    .description("List locked dependencies in key order")
    .action(action(() => {
      const lockFile = readLockFile(lockPath());
      const entries = lockFile.dependencies.entries();

      if (entries.length === 0) {
        console.log("No dependencies in lock file.");
        return;
      }

      for (const [id, lock] of entries) {
        console.log(`  ${id.toString()} → ${lock.version}`);
      }
    }));

  program
    .command("add <name> <spec>")
    .description("Digest a downloaded archive and pin it in the lock file")
    .requiredOption("--resolved <version>", "Concrete version the spec resolved to")
    .requiredOption("--tarball <url>", "URL the archive was downloaded from")
    .requiredOption("--file <path>", "Local copy of the archive")
    .option("--algorithm <name>", `Integrity algorithm (${SUPPORTED_ALGORITHMS.join(", ")})`, "sha512")
    .option("--force", "Re-pin even if the dependency is already locked")
    .action(action((
      name: string,
      spec: string,
      opts: { resolved: string; tarball: string; file: string; algorithm: string; force?: boolean }
    ) => {
      const id = new DependencyId(name, spec);
      const lockFile = LockFile.loadOrCreate(lockPath());

      const existing = lockFile.get(id);
      if (existing && !opts.force) {
        console.log(`${id.toString()} is already locked (version: ${existing.version}). Use --force to re-pin.`);
        return;
      }

      const data = readFileSync(opts.file);
      const lock = createDependencyLock(
        { name, version: opts.resolved, tarball: opts.tarball },
        data,
        opts.algorithm
      );

      lockFile.add(id, lock);
      lockFile.save();
      console.log(`Added ${id.toString()} (version: ${lock.version}, integrity: ${short(lock.sha1)})`);
    }));

  program
    .command("remove <key>")
    .description("Remove a dependency (name@spec) from the lock file")
    .action(action((key: string) => {
      const id = DependencyId.parse(key);
      const lockFile = readLockFile(lockPath());

      if (!lockFile.remove(id)) {
        die(`'${id.toString()}' not found in lock file`);
      }

      lockFile.save();
      console.log(`Removed ${id.toString()}`);
    }));

  program
    .command("hash <file>")
    .description("Print the integrity string of an archive")
    .option("--algorithm <name>", `Integrity algorithm (${SUPPORTED_ALGORITHMS.join(", ")})`, "sha512")
    .action(action((file: string, opts: { algorithm: string }) => {
      const result = tryCalcHash(readFileSync(file), opts.algorithm);
      if (!result.ok) {
        die(`Unsupported algorithm '${result.algorithm}'. Supported: ${SUPPORTED_ALGORITHMS.join(", ")}`);
      }
      console.log(result.integrity);
    }));

  program
    .command("verify <key> <file>")
    .description("Check an archive against the integrity recorded for name@spec")
    .action(action((key: string, file: string) => {
      const id = DependencyId.parse(key);
      const lock = readLockFile(lockPath()).get(id);
      if (!lock) die(`'${id.toString()}' not found in lock file`);

      if (!verifyIntegrity(readFileSync(file), lock.sha1)) {
        die(
          `Integrity check failed for '${id.toString()}': archive does not match the lock file.\n` +
          `Run 'tarlock add ${id.name} ${id.versionSpec} --force ...' to re-pin.`
        );
      }
      console.log(`Verified ${id.toString()} (${short(lock.sha1)})`);
    }));

  program
    .command("diff <old> <new>")
    .description("Compare two lock files")
    .action(action((oldPath: string, newPath: string) => {
      const oldLock = readLockFile(oldPath);
      const newLock = readLockFile(newPath);
      const { added, removed, changed } = diffLockFiles(oldLock, newLock);

      if (added.length === 0 && removed.length === 0 && changed.length === 0) {
        console.log("No differences.");
        return;
      }

      if (added.length > 0) {
        console.log("Added:");
        for (const key of added) console.log(`  + ${key}`);
      }

      if (removed.length > 0) {
        console.log("Removed:");
        for (const key of removed) console.log(`  - ${key}`);
      }

      if (changed.length > 0) {
        console.log("Changed:");
        for (const key of changed) {
          const id = DependencyId.parse(key);
          console.log(`  ~ ${key}: ${oldLock.get(id)?.version} → ${newLock.get(id)?.version}`);
        }
      }
    }));

  return program;
}
