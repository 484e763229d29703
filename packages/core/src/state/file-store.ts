// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { errorMessage } from "../utils/error-message.js";
import { isNotFound } from "../utils/not-found.js";
import { StateStoreError } from "./errors.js";
import { assertValidKey, type StateStore } from "./store.js";

/** Default directory for state files, relative to the working directory. */
export const DEFAULT_STATE_DIR = "data";

/**
 * {@link StateStore} keeping one `<key>.json` file per key.
 *
 * Writes go to a temporary sibling that is renamed over the target, so a
 * crash leaves either the old or the new record, never a torn one.
 * Files are created with mode `0600`.
 */
export class FileStateStore implements StateStore {
  private sequence = 0;

  constructor(readonly dir: string = DEFAULT_STATE_DIR) {}

  pathFor(key: string): string {
    assertValidKey(key);
    return join(this.dir, `${key}.json`);
  }

  async save(key: string, data: Uint8Array): Promise<void> {
    const target = this.pathFor(key);
    const temp = `${target}.${String(process.pid)}.${String(this.sequence++)}.tmp`;
    let tempCreated = false;
    try {
      await mkdir(this.dir, { recursive: true, mode: 0o700 });
      tempCreated = true;
      await writeFile(temp, data, { mode: 0o600 });
      await rename(temp, target);
    } catch (error) {
      const leftover = tempCreated ? await removeTemp(temp) : undefined;
      const note = leftover === undefined ? "" : ` (temporary file ${temp} left behind: ${errorMessage(leftover)})`;
      throw new StateStoreError(key, `write failed: ${errorMessage(error)}${note}`, { cause: error });
    }
  }

  async load(key: string): Promise<Uint8Array | null> {
    const target = this.pathFor(key);
    try {
      return new Uint8Array(await readFile(target));
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new StateStoreError(key, `read failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async delete(key: string): Promise<void> {
    const target = this.pathFor(key);
    try {
      await rm(target, { force: true });
    } catch (error) {
      throw new StateStoreError(key, `delete failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}

/** Remove a temporary file, returning the failure instead of throwing it. */
async function removeTemp(path: string): Promise<unknown> {
  try {
    await rm(path, { force: true });
    return undefined;
  } catch (error) {
    return error;
  }
}
