/**
 * Thinking filter: classifies streamed text inside and outside
 * `<think>` / `</think>` blocks.
 *
 * The filter is a pure two-state machine. Tags may be split across
 * fragments, so the longest fragment suffix that could begin the awaited
 * tag is held back until the next fragment decides it. Tag text itself is
 * never emitted.
 */

export const OPEN_TAG = "<think>";
export const CLOSE_TAG = "</think>";

export type ThinkingState = "normal" | "thinking";

export type ThinkingEvent =
  | { readonly type: "text"; readonly text: string }
  | { readonly type: "thinking"; readonly text: string }
  | { readonly type: "enter" }
  | { readonly type: "exit" };

/** Length of the longest proper prefix of `tag` that `buffer` ends with. */
function heldSuffixLength(buffer: string, tag: string): number {
  const longest = Math.min(buffer.length, tag.length - 1);
  for (let length = longest; length > 0; length--) {
    if (tag.startsWith(buffer.slice(buffer.length - length))) {
      return length;
    }
  }
  return 0;
}

export class ThinkingFilter {
  private current: ThinkingState = "normal";
  private pending = "";

  get state(): ThinkingState {
    return this.current;
  }

  push(fragment: string): ThinkingEvent[] {
    const events: ThinkingEvent[] = [];
    this.pending += fragment;

    for (;;) {
      const tag = this.awaitedTag();
      const index = this.pending.indexOf(tag);
      if (index === -1) {
        break;
      }
      this.emitText(events, this.pending.slice(0, index));
      this.pending = this.pending.slice(index + tag.length);
      this.current = this.current === "normal" ? "thinking" : "normal";
      events.push({ type: this.current === "thinking" ? "enter" : "exit" });
    }

    const held = heldSuffixLength(this.pending, this.awaitedTag());
    this.emitText(events, this.pending.slice(0, this.pending.length - held));
    this.pending = this.pending.slice(this.pending.length - held);
    return events;
  }

  /** Release text held back for tag detection. Call once at end of stream. */
  flush(): ThinkingEvent[] {
    const events: ThinkingEvent[] = [];
    this.emitText(events, this.pending);
    this.pending = "";
    return events;
  }

  private awaitedTag(): string {
    return this.current === "normal" ? OPEN_TAG : CLOSE_TAG;
  }

  private emitText(events: ThinkingEvent[], text: string): void {
    if (text === "") {
      return;
    }
    events.push({ type: this.current === "normal" ? "text" : "thinking", text });
  }
}

const THINK_BLOCK = /<think>[\s\S]*?<\/think>/g;

/**
 * Remove every `<think>...</think>` span from complete text. Matching is
 * non-greedy and repeated until nothing changes, so the result is stable
 * under a second pass. An opening tag with no close is left as is.
 */
export function stripThinkingBlocks(text: string): string {
  let current = text;
  for (;;) {
    const next = current.replace(THINK_BLOCK, "");
    if (next === current) {
      return next;
    }
    current = next;
  }
}
