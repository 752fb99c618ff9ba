export {
  PathValue,
  PathError,
  InvalidCombinationError,
  EmptyPathError,
  UnrelatedPathsError,
  path,
  pathsEqual,
  splitDriveLetter,
} from "./paths.js";
export type { PathLike } from "./paths.js";
export {
  FileOps,
  FsError,
  RelativePathError,
  SourceNotFoundError,
  NotFoundError,
  DeleteMode,
} from "./fsops.js";
export type { FileOpsOptions, PathFilter, RandomSource } from "./fsops.js";
export {
  BackendError,
  BackendIOError,
  ConfigError,
  LocalBackend,
  MemoryBackend,
  PostgresBackend,
  createBackend,
  loadConfig,
} from "./storage/index.js";
export type { Config, StorageBackend } from "./storage/index.js";
export { registerTools } from "./tools.js";
