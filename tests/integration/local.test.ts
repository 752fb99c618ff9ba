import { describe, it, expect, beforeEach, afterEach } from "vitest";
import os from "node:os";
import { join } from "node:path";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { FileOps, NotFoundError, RelativePathError } from "../../src/fsops.js";
import { registerTools } from "../../src/tools.js";
import { PathValue, path } from "../../src/paths.js";
import { LocalBackend } from "../../src/storage/index.js";

let root: PathValue;
let ops: FileOps;
let backend: LocalBackend;

beforeEach(async () => {
  const dir = await mkdtemp(join(os.tmpdir(), "pathkit-test-"));
  root = path(dir);
  backend = new LocalBackend({ tempRoot: dir });
  ops = new FileOps(backend, { random: () => 1234 });
});

afterEach(async () => {
  await rm(root.toString(), { recursive: true, force: true });
  await backend.close();
});

describe("FileOps on the local filesystem", () => {
  it("creates a file in a directory that does not exist yet", async () => {
    const file = await ops.createFile(root.combine("not_yet_existing_dir/myotherdir/myfile"));
    expect(await ops.fileExists(file)).toBe(true);
    expect((await readFile(file.toString())).length).toBe(0);
  });

  it("refuses relative paths", async () => {
    await expect(ops.createFile("mydir/myfile.txt")).rejects.toThrow(RelativePathError);
  });

  it("copies a tree with an empty subdirectory", async () => {
    const src = root.combine("src");
    await ops.createFile(src.combine("a.txt"));
    await writeFile(src.combine("a.txt").toString(), "alpha");
    await ops.createDirectory(src.combine("empty"));

    const dst = root.combine("dst");
    await ops.copy(src, dst);

    expect(await readFile(dst.combine("a.txt").toString(), "utf8")).toBe("alpha");
    expect(await ops.directoryExists(dst.combine("empty"))).toBe(true);
    expect((await ops.contents(dst)).map((p) => p.relativeTo(dst).toString())).toEqual([
      "a.txt",
      "empty",
    ]);
  });

  it("copies from a source path with a literal .. segment", async () => {
    await ops.createFile(root.combine("a/f.txt"));
    await writeFile(root.combine("a/f.txt").toString(), "via-dotdot");
    await ops.createDirectory(root.combine("b"));

    const src = root.combine("b/../a");
    expect((await ops.files(src)).map(String)).toEqual([src.combine("f.txt").toString()]);

    await ops.copy(src, root.combine("dst"));
    expect(await readFile(root.combine("dst/f.txt").toString(), "utf8")).toBe("via-dotdot");
  });

  it("lists files recursively", async () => {
    await ops.createFile(root.combine("x/1.txt"));
    await ops.createFile(root.combine("x/y/2.txt"));
    const found = await ops.files(root.combine("x"), true);
    expect(found.map((p) => p.relativeTo(root).toString())).toEqual(["x/1.txt", "x/y/2.txt"]);
  });

  it("deletes a directory tree", async () => {
    await ops.createFile(root.combine("gone/deep/f.txt"));
    await ops.delete(root.combine("gone"));
    expect(await ops.exists(root.combine("gone"))).toBe(false);
    await expect(ops.delete(root.combine("gone"))).rejects.toThrow(NotFoundError);
  });

  it("creates a temp directory under the temp root", async () => {
    const dir = await ops.createTempDirectory("job");
    expect(dir.equals(root.combine("job_1234"))).toBe(true);
    expect(await ops.directoryExists(dir)).toBe(true);
  });
});

describe("MCP tools on the local filesystem", () => {
  it("reports a missing parent from mkdir as ENOENT", async () => {
    const server = new McpServer({ name: "test-pathkit", version: "0.0.1" });
    registerTools(server, ops);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    const client = new Client({ name: "test-client", version: "0.0.1" });
    await server.connect(serverTransport);
    await client.connect(clientTransport);

    const target = root.combine("no/parent").toString();
    const result = await client.callTool({ name: "mkdir", arguments: { path: target } });
    const content = result.content as Array<{ type: string; text: string }>;
    expect(result.isError).toBe(true);
    expect(content[0].text).toBe(
      `ENOENT: ENOENT: no such file or directory, mkdir '${target}'`,
    );

    await client.close();
    await server.close();
  });
});
