import { z } from "zod";
import type { StorageBackend } from "./interface.js";
import { LocalBackend } from "./local.js";
import { MemoryBackend } from "./memory.js";
import { PostgresBackend } from "./postgres.js";

export { BackendError, BackendIOError } from "./interface.js";
export type { StorageBackend } from "./interface.js";
export { LocalBackend } from "./local.js";
export { MemoryBackend } from "./memory.js";
export { PostgresBackend } from "./postgres.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const configSchema = z
  .object({
    PATHKIT_BACKEND: z.enum(["memory", "local", "postgres"]).default("local"),
    DATABASE_URL: z.string().min(1).optional(),
    PATHKIT_NAMESPACE: z.string().min(1).default("default"),
    PATHKIT_AUTO_INIT: z.enum(["true", "false"]).default("false"),
    PATHKIT_TEMP_ROOT: z.string().min(1).optional(),
  })
  .refine((env) => env.PATHKIT_BACKEND !== "postgres" || env.DATABASE_URL, {
    message: "DATABASE_URL environment variable is required",
    path: ["DATABASE_URL"],
  });

export interface Config {
  backend: "memory" | "local" | "postgres";
  databaseUrl?: string;
  namespace: string;
  autoInit: boolean;
  tempRoot?: string;
}

/** Read configuration from environment variables. Throws ConfigError on bad values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (i) => `${i.path.join(".")}: ${i.message}`,
    );
    throw new ConfigError(`Invalid configuration — ${problems.join("; ")}`);
  }
  const e = parsed.data;
  return {
    backend: e.PATHKIT_BACKEND,
    databaseUrl: e.DATABASE_URL,
    namespace: e.PATHKIT_NAMESPACE,
    autoInit: e.PATHKIT_AUTO_INIT === "true",
    tempRoot: e.PATHKIT_TEMP_ROOT,
  };
}

/** Create a storage backend from configuration. */
export async function createBackend(config: Config): Promise<StorageBackend> {
  switch (config.backend) {
    case "memory":
      return new MemoryBackend({ tempRoot: config.tempRoot });
    case "local":
      return new LocalBackend({ tempRoot: config.tempRoot });
    case "postgres": {
      if (!config.databaseUrl) {
        throw new ConfigError("DATABASE_URL environment variable is required");
      }
      const backend = new PostgresBackend({
        connectionString: config.databaseUrl,
        namespace: config.namespace,
        tempRoot: config.tempRoot,
      });
      if (config.autoInit) {
        await backend.initSchema();
      }
      return backend;
    }
  }
}
