/**
 * Feedback sources for the iterative loop. After every round but the last,
 * a source decides how the next round's prompt should change.
 */

import inquirer from "inquirer";
import type { ConversationEntry } from "../types/session.js";

export const AUTO_FEEDBACK =
  "Please improve the previous response. Make it more complete, more accurate, and better aligned with the goals.";

export type FeedbackDecision =
  | { readonly kind: "auto" }
  | { readonly kind: "feedback"; readonly text: string }
  | { readonly kind: "change-goals"; readonly goals: string }
  | { readonly kind: "add-context"; readonly context: string }
  | { readonly kind: "finish" };

export interface IFeedbackRequest {
  readonly iteration: number;
  readonly maxIterations: number;
  readonly goals: string;
  readonly history: readonly ConversationEntry[];
}

export interface IFeedbackSource {
  next(request: IFeedbackRequest): Promise<FeedbackDecision>;
}

/** Always asks for a generic improvement. Used without a terminal. */
export class AutomaticFeedbackSource implements IFeedbackSource {
  async next(): Promise<FeedbackDecision> {
    return { kind: "auto" };
  }
}

type FeedbackAction = FeedbackDecision["kind"];

export class InteractiveFeedbackSource implements IFeedbackSource {
  async next(request: IFeedbackRequest): Promise<FeedbackDecision> {
    const { action } = await inquirer.prompt<{ action: FeedbackAction }>([
      {
        type: "list",
        name: "action",
        message: `Iteration ${request.iteration}/${request.maxIterations} complete. What next?`,
        choices: [
          { name: "Continue with automatic improvement", value: "auto" },
          { name: "Give feedback", value: "feedback" },
          { name: "Change goals", value: "change-goals" },
          { name: "Add context", value: "add-context" },
          { name: "Finish", value: "finish" },
        ],
        default: "auto",
      },
    ]);

    switch (action) {
      case "auto":
      case "finish":
        return { kind: action };
      case "feedback": {
        const { text } = await inquirer.prompt<{ text: string }>([
          { type: "input", name: "text", message: "Feedback:" },
        ]);
        return { kind: "feedback", text };
      }
      case "change-goals": {
        const { goals } = await inquirer.prompt<{ goals: string }>([
          { type: "input", name: "goals", message: "New goals:", default: request.goals },
        ]);
        return { kind: "change-goals", goals };
      }
      case "add-context": {
        const { context } = await inquirer.prompt<{ context: string }>([
          { type: "input", name: "context", message: "Additional context:" },
        ]);
        return { kind: "add-context", context };
      }
    }
  }
}
