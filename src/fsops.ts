import { PathValue, type PathLike } from "./paths.js";
import { BackendIOError, type StorageBackend } from "./storage/index.js";

/** Filesystem error with a POSIX-style error code. */
export class FsError extends Error {
  constructor(
    public readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = "FsError";
  }
}

/** An operation that needs an absolute path was given a relative one. */
export class RelativePathError extends FsError {
  constructor(public readonly path: string) {
    super("EINVAL", `Operation requires an absolute path, got relative path: ${path}`);
    this.name = "RelativePathError";
  }
}

export class SourceNotFoundError extends FsError {
  constructor(public readonly path: string) {
    super("ENOENT", `Copy source does not exist: ${path}`);
    this.name = "SourceNotFoundError";
  }
}

export class NotFoundError extends FsError {
  constructor(public readonly path: string) {
    super("ENOENT", `No such file or directory: ${path}`);
    this.name = "NotFoundError";
  }
}

export enum DeleteMode {
  /** Propagate in-use conflicts. */
  Normal = "normal",
  /** Swallow in-use conflicts during recursive directory removal. */
  Soft = "soft",
}

/** Source of distinct integers for temp-directory names. */
export type RandomSource = () => number;

export type PathFilter = (p: PathValue) => boolean;

export interface FileOpsOptions {
  random?: RandomSource;
  /** Overrides the backend's temp root. */
  tempRoot?: string;
}

const IO_CONFLICT_CODES = new Set(["EBUSY", "EPERM", "ENOTEMPTY", "EACCES"]);

function defaultRandom(): number {
  return Math.floor(Math.random() * 0x7fffffff);
}

function isIoConflict(e: unknown): boolean {
  if (e instanceof BackendIOError) return true;
  return (
    e instanceof Error &&
    "code" in e &&
    typeof e.code === "string" &&
    IO_CONFLICT_CODES.has(e.code)
  );
}

/**
 * Recursive filesystem operations over PathValues.
 * Path arithmetic is done by PathValue; side effects go through the backend.
 */
export class FileOps {
  private random: RandomSource;
  private tempRoot: PathValue;

  constructor(
    private backend: StorageBackend,
    opts: FileOpsOptions = {},
  ) {
    this.random = opts.random ?? defaultRandom;
    this.tempRoot = PathValue.parse(opts.tempRoot ?? backend.tempDir());
  }

  private requireAbsolute(p: PathValue): string {
    if (p.isRelative) throw new RelativePathError(p.toString());
    return p.toString();
  }

  /**
   * Create `dir` and any missing ancestors. Walks up until an existing
   * directory is found, then creates the missing ones top-down.
   * Throws EmptyPathError if no ancestor exists at all.
   */
  private async ensureDirectoryExists(dir: PathValue): Promise<void> {
    const missing: PathValue[] = [];
    let current = dir;
    while (!(await this.backend.isDir(current.toString()))) {
      missing.push(current);
      current = current.up();
    }
    for (const d of missing.reverse()) {
      await this.backend.createDir(d.toString());
    }
  }

  // ── Inspection ─────────────────────────────────────────────

  async exists(path: PathLike): Promise<boolean> {
    const p = PathValue.from(path);
    return this.backend.exists(this.requireAbsolute(p));
  }

  async fileExists(path: PathLike): Promise<boolean> {
    const p = PathValue.from(path);
    return this.backend.isFile(this.requireAbsolute(p));
  }

  async directoryExists(path: PathLike): Promise<boolean> {
    const p = PathValue.from(path);
    return this.backend.isDir(this.requireAbsolute(p));
  }

  // ── Creation ───────────────────────────────────────────────

  /** Create an empty file, creating parent directories as needed. */
  async createFile(path: PathLike): Promise<PathValue> {
    const p = PathValue.from(path);
    const target = this.requireAbsolute(p);
    await this.ensureDirectoryExists(p.up());
    await this.backend.writeBytes(target, new Uint8Array(0));
    return p;
  }

  async createDirectory(path: PathLike): Promise<PathValue> {
    const p = PathValue.from(path);
    await this.backend.createDir(this.requireAbsolute(p));
    return p;
  }

  /**
   * Allocate a fresh directory `<tempRoot>/<prefix>_<n>`. Retries with new
   * random suffixes until an unused name is found.
   */
  async createTempDirectory(prefix: string): Promise<PathValue> {
    for (;;) {
      const candidate = this.tempRoot.combine(`${prefix}_${this.random()}`);
      if (!(await this.exists(candidate))) {
        await this.ensureDirectoryExists(candidate);
        return candidate;
      }
    }
  }

  // ── Copy / delete ──────────────────────────────────────────

  /**
   * Copy a file or directory tree. `filter` sees each destination; rejecting
   * a directory destination skips its whole subtree.
   */
  async copy(
    source: PathLike,
    destination: PathLike,
    filter: PathFilter = () => true,
  ): Promise<void> {
    const src = PathValue.from(source);
    const dst = PathValue.from(destination);
    const srcStr = this.requireAbsolute(src);
    const dstStr = this.requireAbsolute(dst);

    if (!filter(dst)) return;

    if (await this.backend.isFile(srcStr)) {
      await this.ensureDirectoryExists(dst.up());
      await this.backend.copyFile(srcStr, dstStr, true);
    } else if (await this.backend.isDir(srcStr)) {
      await this.ensureDirectoryExists(dst);
      for (const child of await this.contents(src)) {
        await this.copy(child, dst.combine(child.relativeTo(src)), filter);
      }
    } else {
      throw new SourceNotFoundError(srcStr);
    }
  }

  async delete(path: PathLike, mode: DeleteMode = DeleteMode.Normal): Promise<void> {
    const p = PathValue.from(path);
    const target = this.requireAbsolute(p);

    if (await this.backend.isFile(target)) {
      await this.backend.removeFile(target);
    } else if (await this.backend.isDir(target)) {
      try {
        await this.backend.removeDirRecursive(target);
      } catch (e) {
        if (mode === DeleteMode.Normal || !isIoConflict(e)) throw e;
      }
    } else {
      throw new NotFoundError(target);
    }
  }

  // ── Enumeration ────────────────────────────────────────────

  files(path: PathLike, recursive?: boolean): Promise<PathValue[]>;
  files(path: PathLike, filter: PathFilter): Promise<PathValue[]>;
  async files(
    path: PathLike,
    recursiveOrFilter: boolean | PathFilter = false,
  ): Promise<PathValue[]> {
    const p = PathValue.from(path);
    if (typeof recursiveOrFilter === "function") {
      return (await this.files(p, false)).filter(recursiveOrFilter);
    }
    const listed = await this.backend.listFiles(this.requireAbsolute(p), recursiveOrFilter);
    return listed.map((s) => PathValue.parse(s));
  }

  async directories(path: PathLike, recursive = false): Promise<PathValue[]> {
    const p = PathValue.from(path);
    const listed = await this.backend.listDirs(this.requireAbsolute(p), recursive);
    return listed.map((s) => PathValue.parse(s));
  }

  async contents(path: PathLike, recursive = false): Promise<PathValue[]> {
    return [
      ...(await this.files(path, recursive)),
      ...(await this.directories(path, recursive)),
    ];
  }
}
