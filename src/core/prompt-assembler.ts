/**
 * Prompt assembly. Pure functions of their inputs: labeled goal, format and
 * warning lines, optional context, project material, then hints.
 */

import type { IPromptTemplate } from "../types/config.js";
import type { IProjectContent, IProjectFileContent } from "../types/project.js";
import type { ConversationEntry } from "../types/session.js";

export const MAX_FILE_BYTES = 10_000;

export interface IPromptInput {
  readonly goals: string;
  readonly returnFormat: string;
  readonly warnings: string;
  readonly context?: string | undefined;
  readonly project?: IProjectContent | undefined;
  readonly hints?: string | undefined;
}

export interface ITruncatedText {
  readonly text: string;
  readonly truncated: boolean;
  readonly totalBytes: number;
}

/** Cut `text` to at most `maxBytes` of UTF-8 without splitting a character. */
export function truncateUtf8(text: string, maxBytes: number): ITruncatedText {
  const bytes = Buffer.from(text, "utf8");
  if (bytes.length <= maxBytes) {
    return { text, truncated: false, totalBytes: bytes.length };
  }

  let end = maxBytes;
  for (; end > 0; end--) {
    const byte = bytes[end];
    // stop on anything that is not a continuation byte (10xxxxxx)
    if (byte === undefined || (byte & 0xc0) !== 0x80) {
      break;
    }
  }

  return {
    text: bytes.subarray(0, end).toString("utf8"),
    truncated: true,
    totalBytes: bytes.length,
  };
}

function formatFile(file: IProjectFileContent): string {
  const { text, truncated, totalBytes } = truncateUtf8(file.content, MAX_FILE_BYTES);
  const block = `File: ${file.filename}\n\`\`\`\n${text}\n\`\`\``;
  if (!truncated) {
    return block;
  }
  return `${block}\n[Truncated: showing the first ${MAX_FILE_BYTES} of ${totalBytes} bytes]`;
}

export function formatProjectSection(project: IProjectContent): string {
  const sections: string[] = [];

  if (project.goals.length > 0) {
    const goals = project.goals.map((goal, index) => `${index + 1}. ${goal}`);
    sections.push(["PROJECT GOALS:", ...goals].join("\n"));
  }

  if (project.contexts.length > 0) {
    const contexts = project.contexts.map((context) => `- ${context}`);
    sections.push(["PROJECT CONTEXT:", ...contexts].join("\n"));
  }

  if (project.files.length > 0) {
    sections.push(["PROJECT FILES:", ...project.files.map(formatFile)].join("\n\n"));
  }

  return sections.map((section) => `\n\n${section}`).join("");
}

export function appendHints(prompt: string, hints: string | undefined): string {
  if (hints === undefined || hints === "") {
    return prompt;
  }
  return `${prompt}\nHINTS: ${hints}`;
}

export function assemblePrompt(input: IPromptInput, template: IPromptTemplate): string {
  let prompt =
    `${template.goalsPrefix}${input.goals}\n` +
    `${template.returnFormatPrefix}${input.returnFormat}\n` +
    `${template.warningsPrefix}${input.warnings}`;

  if (input.context !== undefined && input.context !== "") {
    prompt += `\nContext: ${input.context}`;
  }
  if (input.project !== undefined) {
    prompt += formatProjectSection(input.project);
  }

  return appendHints(prompt, input.hints);
}

/** Prompt for `non-think`: the raw text, optional context, then hints. */
export function assembleRawPrompt(
  prompt: string,
  context?: string,
  hints?: string,
): string {
  const withContext =
    context !== undefined && context !== "" ? `${prompt}\nContext: ${context}` : prompt;
  return appendHints(withContext, hints);
}

/**
 * Extend a round's base prompt with every earlier response and the
 * feedback given on it, oldest first.
 */
export function assembleIterationPrompt(
  base: string,
  history: readonly ConversationEntry[],
): string {
  if (history.length === 0) {
    return base;
  }

  const lines: string[] = ["", "", "PREVIOUS ITERATIONS:"];
  for (const entry of history) {
    if (entry.kind === "response") {
      lines.push(`--- Iteration ${entry.iteration} response ---`, entry.response);
    } else {
      lines.push(`FEEDBACK: ${entry.feedback}`);
    }
  }
  lines.push("", "Improve on the previous response, addressing all feedback above.");

  return base + lines.join("\n");
}
