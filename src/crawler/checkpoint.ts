import { existsSync } from "fs";
import { mkdir, readFile, rename, writeFile } from "fs/promises";
import path from "path";

import { errorMessage, PersistenceError } from "../errors";
import { log } from "../logger";
import { parseEdges } from "../query/response";
import type { TransactionEdge } from "../types";

export const checkpointStore = {
  /**
   * Load a prior run. Returns null when nothing was saved yet; a file that
   * exists but cannot be read as a record array raises PersistenceError.
   */
  load: async (file: string): Promise<TransactionEdge[] | null> => {
    if (!existsSync(file)) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(file, "utf8"));
    } catch (error) {
      throw new PersistenceError(`Failed to read checkpoint ${file}: ${errorMessage(error)}`, file);
    }

    try {
      return parseEdges(parsed, "checkpoint");
    } catch (error) {
      throw new PersistenceError(
        `Checkpoint ${file} is malformed: ${errorMessage(error)}`,
        file,
        error
      );
    }
  },

  /**
   * Replace the checkpoint with the full record list. The list is written to
   * a sibling temp file and renamed over the target. Errors are logged and
   * reported through the return value only.
   */
  save: async (file: string, records: TransactionEdge[]): Promise<boolean> => {
    const tmp = `${file}.tmp`;
    try {
      await mkdir(path.dirname(file), { recursive: true });
      await writeFile(tmp, JSON.stringify(records), "utf8");
      await rename(tmp, file);
      log.debug(`Checkpoint saved to ${file} (${records.length} records)`);
      return true;
    } catch (error) {
      log.error(`Failed to save checkpoint ${file}: ${errorMessage(error)}`);
      return false;
    }
  },

  /** Cursor to resume from: the last saved record's. */
  resumeCursor: (records: TransactionEdge[]): string => records[records.length - 1]?.cursor ?? "",
};
