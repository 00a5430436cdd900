/**
 * Piped standard input.
 */

import { logger } from "./logger.js";

/**
 * Everything written to stdin, trimmed. Undefined when stdin is a terminal
 * or the input is blank.
 */
export async function readPipedInput(
  input: NodeJS.ReadableStream & { readonly isTTY?: boolean | undefined } = process.stdin,
): Promise<string | undefined> {
  if (input.isTTY === true) {
    logger.debug("Pipe requested but stdin is a terminal");
    return undefined;
  }

  const chunks: Buffer[] = [];
  for await (const chunk of input) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
  }

  const text = Buffer.concat(chunks).toString("utf8").trim();
  return text === "" ? undefined : text;
}
