import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import {
  createBookmarkStore,
  restoreStoreFromText,
  serializeSnapshot,
  type BookmarkStore,
  type Logger,
} from "@viewmark/engine";
import { CliError } from "./runtime/errors.js";

export interface LoadedStore {
  store: BookmarkStore;
  /** False when the file did not exist yet. */
  existed: boolean;
}

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

/**
 * Reads the snapshot at `path` into a fresh store. A missing file gives an
 * empty store; a malformed one is logged and also gives an empty store.
 */
export async function loadStoreFile(path: string, logger: Logger): Promise<LoadedStore> {
  const store = createBookmarkStore({ logger });
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      logger.debug(`No snapshot at ${path}; starting empty`);
      return { store, existed: false };
    }
    throw new CliError("IO", `Failed to read ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  restoreStoreFromText(store, text, logger);
  return { store, existed: true };
}

export async function saveStoreFile(path: string, store: BookmarkStore, logger: Logger): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, serializeSnapshot(store.toSnapshot()), "utf8");
  } catch (error) {
    throw new CliError("IO", `Failed to write ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  logger.debug(`Saved snapshot to ${path}`);
}
