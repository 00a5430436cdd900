/**
 * Session log: appends one JSON line per completed request.
 */

import { appendFile } from "node:fs/promises";
import { dirname } from "node:path";
import { logger } from "../utils/logger.js";
import { ensureDirectory } from "../utils/pathResolver.js";
import { LoggingError } from "../types/errors.js";
import type { ISessionSink } from "../core/types.js";
import type { SessionRecord } from "../types/session.js";

export class JsonlSessionLog implements ISessionSink {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  get path(): string {
    return this.filePath;
  }

  async append(record: SessionRecord): Promise<void> {
    try {
      ensureDirectory(dirname(this.filePath));
      await appendFile(this.filePath, `${JSON.stringify(record)}\n`, "utf-8");
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new LoggingError(this.filePath, message);
    }
    logger.debug({ path: this.filePath }, "Session record appended");
  }
}
