import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { FileOps, FsError, DeleteMode } from "./fsops.js";
import { PathError, PathValue } from "./paths.js";
import { BackendError } from "./storage/index.js";

function ok(data: unknown) {
  return { content: [{ type: "text" as const, text: JSON.stringify(data) }] };
}

function err(text: string) {
  return { content: [{ type: "text" as const, text }], isError: true as const };
}

/** FsError, BackendError and Node's errno errors all carry a string `code`. */
function errorCode(e: unknown): string | undefined {
  if (e instanceof FsError || e instanceof BackendError) return e.code;
  if (e instanceof Error && "code" in e && typeof e.code === "string") return e.code;
  return undefined;
}

/** Run a tool body, turning path and filesystem errors into tool errors. */
async function run(body: () => Promise<unknown>) {
  try {
    return ok(await body());
  } catch (e) {
    if (e instanceof PathError) return err(`EPATH: ${e.message}`);
    const code = errorCode(e);
    if (code !== undefined && e instanceof Error) return err(`${code}: ${e.message}`);
    throw e;
  }
}

const pathParam = (what: string) =>
  z.string().describe(`Absolute path to ${what} (e.g. /work/notes.txt)`);

/** Register all path and filesystem tools on the MCP server. */
export function registerTools(server: McpServer, ops: FileOps): void {
  // ── path_info ───────────────────────────────────────────────

  server.tool(
    "path_info",
    "Parse a path and describe it: canonical form, whether it is relative, " +
      "drive letter, segments, file name and extension. Both / and \\ are separators; " +
      "redundant separators collapse. No filesystem access.",
    {
      path: z.string().describe("Any path string, relative or absolute"),
    },
    { readOnlyHint: true },
    async ({ path }) =>
      run(async () => {
        const p = PathValue.parse(path);
        return {
          path: p.toString(),
          is_relative: p.isRelative,
          drive_letter: p.driveLetter,
          segments: p.segments,
          file_name: p.isEmpty() ? null : p.fileName,
          extension: p.isEmpty() ? null : p.extensionWithDot,
        };
      }),
  );

  // ── path_combine ────────────────────────────────────────────

  server.tool(
    "path_combine",
    "Append relative paths to a base path. The base keeps its anchor. " +
      "Errors: EPATH if any appended part is absolute or drive-rooted.",
    {
      base: z.string().describe("Base path, relative or absolute"),
      parts: z.array(z.string()).describe("Relative paths to append, in order"),
    },
    { readOnlyHint: true },
    async ({ base, parts }) =>
      run(async () => ({ path: PathValue.parse(base).combine(...parts).toString() })),
  );

  // ── path_relative ───────────────────────────────────────────

  server.tool(
    "path_relative",
    "Express a path relative to one of its ancestors (or itself). " +
      "Errors: EPATH if base is not an ancestor-or-equal of path.",
    {
      path: z.string().describe("Path to relativize"),
      base: z.string().describe("Ancestor path"),
    },
    { readOnlyHint: true },
    async ({ path, base }) =>
      run(async () => ({ path: PathValue.parse(path).relativeTo(base).toString() })),
  );

  // ── exists ──────────────────────────────────────────────────

  server.tool(
    "exists",
    "Check whether a path exists and whether it is a file or directory. " +
      "Errors: EINVAL for relative paths.",
    {
      path: pathParam("check"),
    },
    { readOnlyHint: true },
    async ({ path }) =>
      run(async () => {
        if (await ops.fileExists(path)) return { exists: true, type: "file" };
        if (await ops.directoryExists(path)) return { exists: true, type: "directory" };
        return { exists: false };
      }),
  );

  // ── create_file ─────────────────────────────────────────────

  server.tool(
    "create_file",
    "Create an empty file, creating missing parent directories. " +
      "Truncates an existing file. Errors: EINVAL for relative paths.",
    {
      path: pathParam("the file to create"),
    },
    { idempotentHint: true },
    async ({ path }) =>
      run(async () => ({ path: (await ops.createFile(path)).toString() })),
  );

  // ── mkdir ───────────────────────────────────────────────────

  server.tool(
    "mkdir",
    "Create a directory whose parent already exists. Idempotent. " +
      "Errors: EINVAL for relative paths, ENOENT if the parent is missing.",
    {
      path: pathParam("the directory to create"),
    },
    { idempotentHint: true },
    async ({ path }) =>
      run(async () => ({ path: (await ops.createDirectory(path)).toString() })),
  );

  // ── copy ────────────────────────────────────────────────────

  server.tool(
    "copy",
    "Copy a file or a directory tree. Existing destination files are overwritten; " +
      "missing destination directories are created. " +
      "Errors: EINVAL for relative paths, ENOENT if the source does not exist.",
    {
      source: pathParam("the file or directory to copy"),
      destination: pathParam("the destination"),
    },
    async ({ source, destination }) =>
      run(async () => {
        await ops.copy(source, destination);
        return { source, destination };
      }),
  );

  // ── delete ──────────────────────────────────────────────────

  server.tool(
    "delete",
    "Delete a file, or a directory recursively. With soft=true, a directory removal " +
      "that fails because a file is in use is ignored. " +
      "Errors: EINVAL for relative paths, ENOENT if nothing exists at the path.",
    {
      path: pathParam("the file or directory to delete"),
      soft: z.boolean().optional().describe("Ignore in-use conflicts when removing a directory"),
    },
    { destructiveHint: true },
    async ({ path, soft }) =>
      run(async () => {
        await ops.delete(path, soft ? DeleteMode.Soft : DeleteMode.Normal);
        return { path, deleted: true };
      }),
  );

  // ── list ────────────────────────────────────────────────────

  server.tool(
    "list",
    "List files, directories, or both under a directory, as absolute paths. " +
      "Errors: EINVAL for relative paths, ENOENT if the directory does not exist.",
    {
      path: pathParam("the directory to list"),
      kind: z
        .enum(["files", "directories", "contents"])
        .optional()
        .describe("What to list (default: contents = files then directories)"),
      recursive: z.boolean().optional().describe("Descend into subdirectories"),
    },
    { readOnlyHint: true },
    async ({ path, kind, recursive }) =>
      run(async () => {
        const deep = recursive ?? false;
        const entries =
          kind === "files"
            ? await ops.files(path, deep)
            : kind === "directories"
              ? await ops.directories(path, deep)
              : await ops.contents(path, deep);
        return { entries: entries.map((p) => p.toString()) };
      }),
  );

  // ── mktemp ──────────────────────────────────────────────────

  server.tool(
    "mktemp",
    "Create a fresh, uniquely named directory under the temp root " +
      "named <prefix>_<random number>.",
    {
      prefix: z.string().min(1).describe("Name prefix, e.g. build"),
    },
    async ({ prefix }) =>
      run(async () => ({ path: (await ops.createTempDirectory(prefix)).toString() })),
  );
}
