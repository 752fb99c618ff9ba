import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { FileOps } from "../../src/fsops.js";
import { MemoryBackend } from "../../src/storage/index.js";
import { registerTools } from "../../src/tools.js";

let backend: MemoryBackend;
let client: Client;
let mcpServer: McpServer;

beforeAll(async () => {
  backend = new MemoryBackend({ tempRoot: "/tmp" });
  const ops = new FileOps(backend, { random: () => 5 });

  mcpServer = new McpServer({ name: "test-pathkit", version: "0.0.1" });
  registerTools(mcpServer, ops);

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  client = new Client({ name: "test-client", version: "0.0.1" });

  await mcpServer.connect(serverTransport);
  await client.connect(clientTransport);
});

afterAll(async () => {
  await client.close();
  await mcpServer.close();
  await backend.close();
});

/** Helper to call a tool and parse the JSON response. */
async function callTool(name: string, args: Record<string, unknown> = {}): Promise<{ data: unknown; isError?: boolean }> {
  const result = await client.callTool({ name, arguments: args });
  const content = result.content as Array<{ type: string; text: string }>;
  const text = content[0].text;

  // Error responses are plain text, not JSON
  if (result.isError) {
    return { data: text, isError: true };
  }

  return { data: JSON.parse(text), isError: false };
}

describe("MCP tool e2e via in-memory transport", () => {
  it("lists all 10 tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      "copy",
      "create_file",
      "delete",
      "exists",
      "list",
      "mkdir",
      "mktemp",
      "path_combine",
      "path_info",
      "path_relative",
    ]);
  });

  it("path_info describes a drive-rooted path", async () => {
    const { data } = await callTool("path_info", { path: "C:\\docs\\\\report.tar.gz" });
    expect(data).toEqual({
      path: "C:/docs/report.tar.gz",
      is_relative: false,
      drive_letter: "C",
      segments: ["docs", "report.tar.gz"],
      file_name: "report.tar.gz",
      extension: ".gz",
    });
  });

  it("path_info handles an empty path", async () => {
    const { data } = await callTool("path_info", { path: "" });
    expect(data).toEqual({
      path: "",
      is_relative: true,
      drive_letter: null,
      segments: [],
      file_name: null,
      extension: null,
    });
  });

  it("path_combine and path_relative", async () => {
    expect((await callTool("path_combine", { base: "/a", parts: ["b", "c/d"] })).data).toEqual({
      path: "/a/b/c/d",
    });
    expect((await callTool("path_relative", { path: "/a/b/c", base: "/a" })).data).toEqual({
      path: "b/c",
    });
  });

  it("path errors come back as EPATH", async () => {
    const result = await callTool("path_combine", { base: "/a", parts: ["/b"] });
    expect(result.isError).toBe(true);
    expect(result.data).toBe("EPATH: Cannot combine with a non-relative path: /b");
  });

  it("create_file + exists + list", async () => {
    expect((await callTool("create_file", { path: "/proj/src/main.ts" })).data).toEqual({
      path: "/proj/src/main.ts",
    });
    expect((await callTool("exists", { path: "/proj/src" })).data).toEqual({
      exists: true,
      type: "directory",
    });
    expect((await callTool("list", { path: "/proj", recursive: true })).data).toEqual({
      entries: ["/proj/src/main.ts", "/proj/src"],
    });
    expect((await callTool("list", { path: "/proj", kind: "directories" })).data).toEqual({
      entries: ["/proj/src"],
    });
  });

  it("relative paths are rejected with EINVAL", async () => {
    const result = await callTool("create_file", { path: "mydir/myfile.txt" });
    expect(result.isError).toBe(true);
    expect(result.data).toBe(
      "EINVAL: Operation requires an absolute path, got relative path: mydir/myfile.txt",
    );
  });

  it("mkdir reports a missing parent as ENOENT", async () => {
    const result = await callTool("mkdir", { path: "/no/parent" });
    expect(result.isError).toBe(true);
    expect(result.data).toBe("ENOENT: No such directory: /no");
  });

  it("copy + delete", async () => {
    await callTool("create_file", { path: "/c/src/a.txt" });
    expect((await callTool("copy", { source: "/c/src", destination: "/c/dst" })).data).toEqual({
      source: "/c/src",
      destination: "/c/dst",
    });
    expect((await callTool("exists", { path: "/c/dst/a.txt" })).data).toEqual({
      exists: true,
      type: "file",
    });
    expect((await callTool("delete", { path: "/c" })).data).toEqual({ path: "/c", deleted: true });
    expect((await callTool("exists", { path: "/c" })).data).toEqual({ exists: false });
  });

  it("copy of a missing source is ENOENT", async () => {
    const result = await callTool("copy", { source: "/missing", destination: "/x" });
    expect(result.data).toBe("ENOENT: Copy source does not exist: /missing");
  });

  it("soft delete ignores a locked file", async () => {
    await callTool("create_file", { path: "/locked/f" });
    backend.lock("/locked/f");
    const hard = await callTool("delete", { path: "/locked" });
    expect(hard.isError).toBe(true);
    expect(hard.data).toBe("EBUSY: File is in use: /locked/f");
    expect((await callTool("delete", { path: "/locked", soft: true })).data).toEqual({
      path: "/locked",
      deleted: true,
    });
  });

  it("mktemp", async () => {
    expect((await callTool("mktemp", { prefix: "build" })).data).toEqual({ path: "/tmp/build_5" });
  });
});
