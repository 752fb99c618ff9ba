import pg from "pg";
import { z } from "zod";
import { PathValue } from "../paths.js";
import { BackendError, type StorageBackend } from "./interface.js";
import { SCHEMA_SQL } from "./schema.js";

const { Pool } = pg;

/** The part of `pg.Pool` this backend uses. */
export interface Queryable {
  query(
    text: string,
    values?: unknown[],
  ): Promise<{ rows: unknown[]; rowCount: number | null }>;
  end(): Promise<void>;
}

export interface PostgresBackendOptions {
  /** Ignored when `pool` is given. */
  connectionString?: string;
  /** Existing pool (or pg-compatible client) to use instead of opening one. */
  pool?: Queryable;
  /** Tree within the table this backend reads and writes. */
  namespace: string;
  /** Temp root returned by `tempDir()`. Default `/tmp`. */
  tempRoot?: string;
}

/** Statements issued by PostgresBackend. `$1` is always the namespace. */
export const NODE_SQL = {
  selectKind: `SELECT node_type FROM pathkit_nodes WHERE namespace = $1 AND path = $2`,
  insertDir: `INSERT INTO pathkit_nodes (namespace, path, node_type)
       VALUES ($1, $2, 'directory')
       ON CONFLICT (namespace, path) DO NOTHING`,
  deleteFile: `DELETE FROM pathkit_nodes
       WHERE namespace = $1 AND path = $2 AND node_type = 'file'`,
  deleteTree: `DELETE FROM pathkit_nodes
       WHERE namespace = $1 AND (path = $2 OR path LIKE $3)`,
  copyFile: `INSERT INTO pathkit_nodes (namespace, path, node_type, content)
       SELECT namespace, $3, 'file', content FROM pathkit_nodes
       WHERE namespace = $1 AND path = $2 AND node_type = 'file'
       ON CONFLICT (namespace, path)
       DO UPDATE SET content = EXCLUDED.content, updated_at = now()
       WHERE pathkit_nodes.node_type = 'file'`,
  upsertFile: `INSERT INTO pathkit_nodes (namespace, path, node_type, content)
       VALUES ($1, $2, 'file', $3)
       ON CONFLICT (namespace, path)
       DO UPDATE SET content = EXCLUDED.content, updated_at = now()`,
  selectNode: `SELECT node_type, content FROM pathkit_nodes WHERE namespace = $1 AND path = $2`,
  listChildren: `SELECT path FROM pathkit_nodes
       WHERE namespace = $1
         AND node_type = $2
         AND path LIKE $3 || '%'
         AND ($4 OR path NOT LIKE $3 || '%/%')
       ORDER BY path`,
} as const;

const nodeType = z.enum(["file", "directory"]);
type NodeType = z.infer<typeof nodeType>;

const kindRow = z.object({ node_type: nodeType });
const nodeRow = z.object({
  node_type: nodeType,
  content: z.instanceof(Uint8Array).nullable(),
});
const pathRow = z.object({ path: z.string() });

/**
 * A filesystem stored as rows of `pathkit_nodes`, one namespace per backend.
 * Roots (`/`, `C:/`) are implicit directories and have no row.
 */
export class PostgresBackend implements StorageBackend {
  private pool: Queryable;
  private namespace: string;
  private tempRoot: string;

  constructor(opts: PostgresBackendOptions) {
    this.pool = opts.pool ?? openPool(opts.connectionString);
    this.namespace = opts.namespace;
    this.tempRoot = opts.tempRoot ?? "/tmp";
  }

  // ── Lifecycle ──────────────────────────────────────────────

  /** Auto-initialize database schema. Runs CREATE IF NOT EXISTS — safe to call repeatedly. */
  async initSchema(): Promise<void> {
    await this.pool.query(SCHEMA_SQL);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  tempDir(): string {
    return this.tempRoot;
  }

  // ── Internal: namespace-aware query helper ─────────────────

  private query(text: string, params: unknown[] = []) {
    return this.pool.query(text, [this.namespace, ...params]);
  }

  private async kind(path: string): Promise<NodeType | null> {
    const p = PathValue.parse(path);
    if (!p.isRelative && p.isEmpty()) return "directory";
    const { rows } = await this.query(NODE_SQL.selectKind, [p.toString()]);
    return rows.length === 0 ? null : kindRow.parse(rows[0]).node_type;
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
    const p = canonical(path);
    const existing = await this.kind(p);
    if (existing === "directory") return;
    if (existing === "file") {
      throw new BackendError("EEXIST", `File exists at path: ${p}`);
    }
    await this.query(NODE_SQL.insertDir, [p]);
  }

  async removeFile(path: string): Promise<void> {
    const p = canonical(path);
    const { rowCount } = await this.query(NODE_SQL.deleteFile, [p]);
    if (!rowCount) {
      throw new BackendError("ENOENT", `No such file: ${p}`);
    }
  }

  async removeDirRecursive(path: string): Promise<void> {
    const p = canonical(path);
    if ((await this.kind(p)) !== "directory") {
      throw new BackendError("ENOENT", `No such directory: ${p}`);
    }
    await this.query(NODE_SQL.deleteTree, [p, likePrefix(p) + "%"]);
  }

  async copyFile(src: string, dst: string, overwrite: boolean): Promise<void> {
    const from = canonical(src);
    const to = canonical(dst);
    if (!overwrite && (await this.kind(to)) !== null) {
      throw new BackendError("EEXIST", `Destination already exists: ${to}`);
    }
    const { rowCount } = await this.query(NODE_SQL.copyFile, [from, to]);
    if (!rowCount) {
      throw new BackendError("ENOENT", `No such file: ${from}`);
    }
  }

  async writeBytes(path: string, bytes: Uint8Array): Promise<void> {
    const p = canonical(path);
    if ((await this.kind(p)) === "directory") {
      throw new BackendError("EISDIR", `Is a directory: ${p}`);
    }
    await this.query(NODE_SQL.upsertFile, [p, Buffer.from(bytes)]);
  }

  async readBytes(path: string): Promise<Uint8Array> {
    const p = canonical(path);
    if ((await this.kind(p)) === "directory") {
      throw new BackendError("EISDIR", `Is a directory: ${p}`);
    }
    const { rows } = await this.query(NODE_SQL.selectNode, [p]);
    if (rows.length === 0) {
      throw new BackendError("ENOENT", `No such file: ${p}`);
    }
    const row = nodeRow.parse(rows[0]);
    return Uint8Array.from(row.content ?? []);
  }

  // ── Listing ────────────────────────────────────────────────

  async listFiles(path: string, recursive: boolean): Promise<string[]> {
    return this.list(path, recursive, "file");
  }

  async listDirs(path: string, recursive: boolean): Promise<string[]> {
    return this.list(path, recursive, "directory");
  }

  private async list(
    path: string,
    recursive: boolean,
    type: NodeType,
  ): Promise<string[]> {
    const p = canonical(path);
    if ((await this.kind(p)) !== "directory") {
      throw new BackendError("ENOENT", `No such directory: ${p}`);
    }
    const { rows } = await this.query(NODE_SQL.listChildren, [type, likePrefix(p), recursive]);
    return rows.map((r) => pathRow.parse(r).path);
  }
}

function openPool(connectionString: string | undefined): Queryable {
  const pool = new Pool({ connectionString });
  return {
    query: (text, values) => pool.query(text, values),
    end: () => pool.end(),
  };
}

function canonical(path: string): string {
  return PathValue.parse(path).toString();
}

/** `/a/b` → `/a/b/`, `/` → `/`, with LIKE metacharacters escaped. */
export function likePrefix(p: string): string {
  const dir = p.endsWith("/") ? p : p + "/";
  return dir.replace(/[\\%_]/g, (c) => "\\" + c);
}
