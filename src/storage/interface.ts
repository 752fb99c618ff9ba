/** Backend failure with a POSIX-style error code. */
export class BackendError extends Error {
  constructor(
    public readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = "BackendError";
  }
}

/**
 * Thrown by a backend when a removal conflicts with a file that is in use.
 * `FileOps.delete` in soft mode suppresses it.
 */
export class BackendIOError extends BackendError {
  constructor(message: string) {
    super("EBUSY", message);
    this.name = "BackendIOError";
  }
}

/**
 * Filesystem capability that `FileOps` is built on.
 *
 * FileOps depends only on this interface — never on a concrete backend.
 * Paths are passed as rendered absolute path strings.
 */
export interface StorageBackend {
  // ── Lifecycle ──────────────────────────────────────────────

  /** Gracefully close connections. */
  close(): Promise<void>;

  /** Directory under which temp directories are allocated. */
  tempDir(): string;

  // ── Predicates ─────────────────────────────────────────────

  exists(path: string): Promise<boolean>;
  isFile(path: string): Promise<boolean>;
  isDir(path: string): Promise<boolean>;

  // ── Mutation ───────────────────────────────────────────────

  /** Create a directory. Parents are assumed to exist; idempotent. */
  createDir(path: string): Promise<void>;

  removeFile(path: string): Promise<void>;

  /** Remove a directory and everything below it. */
  removeDirRecursive(path: string): Promise<void>;

  /** Byte-for-byte copy. Fails if `dst` exists and `overwrite` is false. */
  copyFile(src: string, dst: string, overwrite: boolean): Promise<void>;

  /** Create or overwrite a file. */
  writeBytes(path: string, bytes: Uint8Array): Promise<void>;

  readBytes(path: string): Promise<Uint8Array>;

  // ── Listing ────────────────────────────────────────────────

  /** Full paths of files directly in (or, if recursive, anywhere below) `path`. */
  listFiles(path: string, recursive: boolean): Promise<string[]>;

  /** Full paths of directories directly in (or, if recursive, anywhere below) `path`. */
  listDirs(path: string, recursive: boolean): Promise<string[]>;
}
