/**
 * Runs one provider call and presents its output: live text to stdout,
 * thinking placeholder to stderr, full text back to the caller.
 */

import { stripThinkingBlocks, ThinkingFilter } from "./thinking-filter.js";
import { ThinkingRenderer } from "./thinking-renderer.js";
import type { ITextSink } from "./thinking-renderer.js";
import type { IPromptSender } from "./types.js";
import type { IThinkingAnimation } from "../types/config.js";
import type { IAccumulatedResponse } from "../types/model.js";

export interface IResponseOptions {
  readonly streaming: boolean;
  /** Hide `<think>` blocks from live output behind a placeholder. */
  readonly hideThinking: boolean;
  /** Remove `<think>` blocks from the returned text as well. */
  readonly stripThinking: boolean;
}

export interface IResponseSinks {
  readonly out: ITextSink;
  readonly side: ITextSink;
  readonly animation: IThinkingAnimation;
}

export class ResponseStreamer {
  private readonly client: IPromptSender;
  private readonly sinks: IResponseSinks;

  constructor(client: IPromptSender, sinks: IResponseSinks) {
    this.client = client;
    this.sinks = sinks;
  }

  async run(prompt: string, model: string, options: IResponseOptions): Promise<IAccumulatedResponse> {
    const text = options.streaming
      ? await this.runStreaming(prompt, model, options.hideThinking)
      : await this.runComplete(prompt, model, options.hideThinking);

    return {
      text: options.stripThinking ? stripThinkingBlocks(text) : text,
      model,
    };
  }

  private async runComplete(prompt: string, model: string, hideThinking: boolean): Promise<string> {
    const text = await this.client.send(prompt, model);
    this.sinks.out.write(hideThinking ? stripThinkingBlocks(text) : text);
    this.sinks.out.write("\n");
    return text;
  }

  private async runStreaming(prompt: string, model: string, hideThinking: boolean): Promise<string> {
    if (!hideThinking) {
      const text = await this.client.sendStreaming(prompt, model, (chunk) => {
        this.sinks.out.write(chunk);
      });
      this.sinks.out.write("\n");
      return text;
    }

    const filter = new ThinkingFilter();
    const renderer = new ThinkingRenderer(this.sinks.out, this.sinks.side, this.sinks.animation);
    try {
      const text = await this.client.sendStreaming(prompt, model, (chunk) => {
        renderer.render(filter.push(chunk));
      });
      renderer.render(filter.flush());
      this.sinks.out.write("\n");
      return text;
    } finally {
      renderer.finish();
    }
  }
}
