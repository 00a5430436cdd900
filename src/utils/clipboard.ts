/**
 * System clipboard access through clipboardy.
 */

import clipboard from "clipboardy";
import { ClipboardError } from "../types/errors.js";
import type { IClipboardSink } from "../core/types.js";

export class SystemClipboard implements IClipboardSink {
  async copy(text: string): Promise<void> {
    try {
      await clipboard.write(text);
    } catch (error: unknown) {
      throw new ClipboardError(error instanceof Error ? error.message : String(error));
    }
  }
}
