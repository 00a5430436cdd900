/**
 * Presentation for the thinking filter: visible text goes to the primary
 * sink; while inside a thinking block a rotating placeholder is redrawn on
 * the side channel.
 */

import type { IThinkingAnimation } from "../types/config.js";
import type { ThinkingEvent } from "./thinking-filter.js";

export interface ITextSink {
  write(text: string): unknown;
}

const CLEAR_LINE = "\r\x1B[K";

export class ThinkingRenderer {
  private readonly out: ITextSink;
  private readonly side: ITextSink;
  private readonly animation: IThinkingAnimation;
  private frame = 0;
  private placeholderVisible = false;

  constructor(out: ITextSink, side: ITextSink, animation: IThinkingAnimation) {
    this.out = out;
    this.side = side;
    this.animation = animation;
  }

  render(events: readonly ThinkingEvent[]): void {
    for (const event of events) {
      switch (event.type) {
        case "text":
          this.out.write(event.text);
          break;
        case "enter":
        case "thinking":
          this.drawFrame();
          break;
        case "exit":
          this.clear();
          break;
      }
    }
  }

  /** Clear a placeholder left by an unterminated block. */
  finish(): void {
    this.clear();
  }

  private drawFrame(): void {
    const { emojis, text } = this.animation;
    const emoji = emojis.length > 0 ? emojis[this.frame % emojis.length] ?? "" : "";
    this.side.write(`${CLEAR_LINE}${emoji}  ${text}`);
    this.frame++;
    this.placeholderVisible = true;
  }

  private clear(): void {
    if (!this.placeholderVisible) {
      return;
    }
    this.side.write(CLEAR_LINE);
    this.placeholderVisible = false;
  }
}
