export const CLI_VERSION = "0.1.0";

export { runViewmarkCli } from "./viewmarkCli.js";
export type { CliIo } from "./viewmarkCli.js";
export { parseCliConfig, renderHelpText, defaultCliConfig, DEFAULT_SNAPSHOT_FILE } from "./config.js";
export type { ViewmarkCliConfig, ParsedCliConfig } from "./config.js";
export { CliError, isCliError, asCliError, exitCodeFor } from "./runtime/errors.js";
export type { CliErrorCode } from "./runtime/errors.js";
export {
  BUNDLE_MANIFEST_FILE,
  BUNDLE_SNAPSHOT_FILE,
  buildBundleManifest,
  createBundle,
  readBundle,
  sha256HexFromString,
} from "./pipeline/bundle.js";
export type { BundleManifest, BundleContents } from "./pipeline/bundle.js";
export { loadStoreFile, saveStoreFile } from "./snapshotFile.js";
export type { LoadedStore } from "./snapshotFile.js";
export { createMemoryViewport, DEFAULT_VIEW_POSE } from "./memoryViewport.js";
export type { MemoryViewport, AppliedFrame } from "./memoryViewport.js";
