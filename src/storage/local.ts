import os from "node:os";
import { constants } from "node:fs";
import { copyFile, mkdir, readdir, readFile, rm, stat, unlink, writeFile } from "node:fs/promises";
import type { StorageBackend } from "./interface.js";

export interface LocalBackendOptions {
  /** Temp root returned by `tempDir()`. Default `os.tmpdir()`. */
  tempRoot?: string;
}

/** The host filesystem, through `node:fs/promises`. */
export class LocalBackend implements StorageBackend {
  private tempRoot: string;

  constructor(opts: LocalBackendOptions = {}) {
    this.tempRoot = opts.tempRoot ?? os.tmpdir();
  }

  async close(): Promise<void> {}

  tempDir(): string {
    return this.tempRoot;
  }

  // ── Predicates ─────────────────────────────────────────────

  async exists(path: string): Promise<boolean> {
    return (await this.kind(path)) !== null;
  }

  async isFile(path: string): Promise<boolean> {
    return (await this.kind(path)) === "file";
  }

  async isDir(path: string): Promise<boolean> {
    return (await this.kind(path)) === "directory";
  }

  // ── Mutation ───────────────────────────────────────────────

  async createDir(path: string): Promise<void> {
    if ((await this.kind(path)) === "directory") return;
    await mkdir(path);
  }

  async removeFile(path: string): Promise<void> {
    await unlink(path);
  }

  async removeDirRecursive(path: string): Promise<void> {
    await rm(path, { recursive: true });
  }

  async copyFile(src: string, dst: string, overwrite: boolean): Promise<void> {
    await copyFile(src, dst, overwrite ? 0 : constants.COPYFILE_EXCL);
  }

  async writeBytes(path: string, bytes: Uint8Array): Promise<void> {
    await writeFile(path, bytes);
  }

  async readBytes(path: string): Promise<Uint8Array> {
    return new Uint8Array(await readFile(path));
  }

  // ── Listing ────────────────────────────────────────────────

  async listFiles(path: string, recursive: boolean): Promise<string[]> {
    return this.list(path, recursive, "file");
  }

  async listDirs(path: string, recursive: boolean): Promise<string[]> {
    return this.list(path, recursive, "directory");
  }

  private async list(
    dir: string,
    recursive: boolean,
    want: "file" | "directory",
  ): Promise<string[]> {
    const result: string[] = [];
    const entries = await readdir(dir, { withFileTypes: true });
    // plain concatenation keeps `.`/`..` segments of `dir` as given
    const base = dir.replace(/[\\/]+$/, "");
    for (const entry of entries) {
      const full = `${base}/${entry.name}`;
      if (entry.isDirectory()) {
        if (want === "directory") result.push(full);
        if (recursive) result.push(...(await this.list(full, true, want)));
      } else if (want === "file" && entry.isFile()) {
        result.push(full);
      }
    }
    return result.sort();
  }

  private async kind(path: string): Promise<"file" | "directory" | null> {
    try {
      const s = await stat(path);
      if (s.isDirectory()) return "directory";
      return s.isFile() ? "file" : null;
    } catch (e) {
      if (isErrnoException(e) && (e.code === "ENOENT" || e.code === "ENOTDIR")) {
        return null;
      }
      throw e;
    }
  }
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}
