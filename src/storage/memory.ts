import { PathValue } from "../paths.js";
import { BackendError, BackendIOError, type StorageBackend } from "./interface.js";

type MemoryNode =
  | { nodeType: "file"; content: Uint8Array }
  | { nodeType: "directory" };

export interface MemoryBackendOptions {
  /** Temp root returned by `tempDir()`. Default `/tmp`. */
  tempRoot?: string;
}

/**
 * In-process filesystem keyed by canonical path strings.
 * Roots (`/`, `C:/`) always exist as directories.
 */
export class MemoryBackend implements StorageBackend {
  private nodes = new Map<string, MemoryNode>();
  private locked = new Set<string>();
  private tempRoot: string;

  constructor(opts: MemoryBackendOptions = {}) {
    this.tempRoot = opts.tempRoot ?? "/tmp";
  }

  // ── Lifecycle ──────────────────────────────────────────────

  async close(): Promise<void> {
    this.nodes.clear();
    this.locked.clear();
  }

  tempDir(): string {
    return this.tempRoot;
  }

  /** Mark a file as in use; removing a directory that contains it fails. */
  lock(path: string): void {
    this.locked.add(canonical(path));
  }

  unlock(path: string): void {
    this.locked.delete(canonical(path));
  }

  // ── Predicates ─────────────────────────────────────────────

  async exists(path: string): Promise<boolean> {
    return this.get(path) !== undefined;
  }

  async isFile(path: string): Promise<boolean> {
    return this.get(path)?.nodeType === "file";
  }

  async isDir(path: string): Promise<boolean> {
    return this.get(path)?.nodeType === "directory";
  }

  // ── Mutation ───────────────────────────────────────────────

  async createDir(path: string): Promise<void> {
    const p = canonical(path);
    const existing = this.get(p);
    if (existing?.nodeType === "directory") return;
    if (existing) {
      throw new BackendError("EEXIST", `File exists at path: ${p}`);
    }
    this.requireParent(p);
    this.nodes.set(p, { nodeType: "directory" });
  }

  async removeFile(path: string): Promise<void> {
    const p = canonical(path);
    if (this.get(p)?.nodeType !== "file") {
      throw new BackendError("ENOENT", `No such file: ${p}`);
    }
    if (this.locked.has(p)) {
      throw new BackendIOError(`File is in use: ${p}`);
    }
    this.nodes.delete(p);
  }

  async removeDirRecursive(path: string): Promise<void> {
    const dir = PathValue.parse(path);
    const p = dir.toString();
    if (this.get(p)?.nodeType !== "directory") {
      throw new BackendError("ENOENT", `No such directory: ${p}`);
    }
    const doomed = [...this.nodes.keys()].filter((k) =>
      isUnder(PathValue.parse(k), dir),
    );
    const busy = doomed.find((k) => this.locked.has(k));
    if (busy !== undefined) {
      throw new BackendIOError(`File is in use: ${busy}`);
    }
    for (const k of doomed) this.nodes.delete(k);
  }

  async copyFile(src: string, dst: string, overwrite: boolean): Promise<void> {
    const from = this.get(src);
    if (from?.nodeType !== "file") {
      throw new BackendError("ENOENT", `No such file: ${canonical(src)}`);
    }
    const target = this.get(dst);
    if (target && (!overwrite || target.nodeType === "directory")) {
      throw new BackendError("EEXIST", `Destination already exists: ${canonical(dst)}`);
    }
    await this.writeBytes(dst, from.content);
  }

  async writeBytes(path: string, bytes: Uint8Array): Promise<void> {
    const p = canonical(path);
    if (this.get(p)?.nodeType === "directory") {
      throw new BackendError("EISDIR", `Is a directory: ${p}`);
    }
    this.requireParent(p);
    this.nodes.set(p, { nodeType: "file", content: Uint8Array.from(bytes) });
  }

  async readBytes(path: string): Promise<Uint8Array> {
    const node = this.get(path);
    if (!node) {
      throw new BackendError("ENOENT", `No such file: ${canonical(path)}`);
    }
    if (node.nodeType === "directory") {
      throw new BackendError("EISDIR", `Is a directory: ${canonical(path)}`);
    }
    return Uint8Array.from(node.content);
  }

  // ── Listing ────────────────────────────────────────────────

  async listFiles(path: string, recursive: boolean): Promise<string[]> {
    return this.list(path, recursive, "file");
  }

  async listDirs(path: string, recursive: boolean): Promise<string[]> {
    return this.list(path, recursive, "directory");
  }

  private list(
    path: string,
    recursive: boolean,
    nodeType: MemoryNode["nodeType"],
  ): string[] {
    const dir = PathValue.parse(path);
    if (this.get(dir.toString())?.nodeType !== "directory") {
      throw new BackendError("ENOENT", `No such directory: ${dir}`);
    }
    const result: string[] = [];
    for (const [k, node] of this.nodes) {
      if (node.nodeType !== nodeType) continue;
      const candidate = PathValue.parse(k);
      if (candidate.equals(dir) || !isUnder(candidate, dir)) continue;
      if (!recursive && candidate.segments.length !== dir.segments.length + 1) {
        continue;
      }
      result.push(k);
    }
    return result.sort();
  }

  // ── Internal ───────────────────────────────────────────────

  private get(path: string): MemoryNode | undefined {
    const p = PathValue.parse(path);
    if (!p.isRelative && p.isEmpty()) return { nodeType: "directory" };
    return this.nodes.get(p.toString());
  }

  private requireParent(p: string): void {
    const parent = PathValue.parse(p).up().toString();
    if (this.get(parent)?.nodeType !== "directory") {
      throw new BackendError("ENOENT", `No such directory: ${parent}`);
    }
  }
}

function canonical(path: string): string {
  return PathValue.parse(path).toString();
}

/** Prefix test that, unlike `isBelowOrEqual`, treats a root as an ancestor. */
function isUnder(candidate: PathValue, dir: PathValue): boolean {
  if (dir.isEmpty()) {
    return (
      candidate.isRelative === dir.isRelative &&
      candidate.driveLetter === dir.driveLetter
    );
  }
  return candidate.isBelowOrEqual(dir);
}
