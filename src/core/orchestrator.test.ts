import { describe, it, expect, vi } from "vitest";
import { Orchestrator } from "./orchestrator.js";
import type { IOrchestratorDeps, IPromptJob } from "./orchestrator.js";
import { AUTO_FEEDBACK, AutomaticFeedbackSource } from "./feedback.js";
import type { FeedbackDecision, IFeedbackSource } from "./feedback.js";
import type { IWaveLauncher } from "./recursion.js";
import type { IClipboardSink, IPromptSender, IReporter, ISessionSink } from "./types.js";
import { ClipboardError, LoggingError } from "../types/errors.js";
import type { SessionRecord } from "../types/session.js";

// ── Fakes ────────────────────────────────────────────────────────────────

class CountingSender implements IPromptSender {
  readonly prompts: string[] = [];

  async send(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return `response ${this.prompts.length}`;
  }

  async sendStreaming(prompt: string, _model: string, onChunk: (chunk: string) => void): Promise<string> {
    const text = await this.send(prompt);
    onChunk(text);
    return text;
  }
}

class MemorySessionLog implements ISessionSink {
  readonly records: SessionRecord[] = [];

  async append(record: SessionRecord): Promise<void> {
    this.records.push(record);
  }
}

class MemoryClipboard implements IClipboardSink {
  readonly copies: string[] = [];

  async copy(text: string): Promise<void> {
    this.copies.push(text);
  }
}

class MemoryReporter implements IReporter {
  readonly lines: string[] = [];

  info(message: string): void {
    this.lines.push(`info: ${message}`);
  }

  success(message: string): void {
    this.lines.push(`success: ${message}`);
  }

  warn(message: string): void {
    this.lines.push(`warn: ${message}`);
  }
}

class ScriptedFeedback implements IFeedbackSource {
  private readonly decisions: FeedbackDecision[];

  constructor(decisions: FeedbackDecision[]) {
    this.decisions = decisions;
  }

  async next(): Promise<FeedbackDecision> {
    return this.decisions.shift() ?? { kind: "finish" };
  }
}

const template = { goalsPrefix: "G: ", returnFormatPrefix: "F: ", warningsPrefix: "W: " };
const fixedNow = (): Date => new Date("2024-05-01T12:00:00.000Z");

interface IHarness {
  readonly sender: CountingSender;
  readonly log: MemorySessionLog;
  readonly clipboard: MemoryClipboard;
  readonly reporter: MemoryReporter;
  readonly out: string[];
  readonly deps: IOrchestratorDeps;
}

function harness(overrides: Partial<IOrchestratorDeps> = {}): IHarness {
  const sender = new CountingSender();
  const log = new MemorySessionLog();
  const clipboard = new MemoryClipboard();
  const reporter = new MemoryReporter();
  const out: string[] = [];
  const deps: IOrchestratorDeps = {
    client: sender,
    sinks: {
      out: { write: (text: string) => out.push(text) },
      side: { write: () => true },
      animation: { emojis: [], text: "" },
    },
    template,
    reporter,
    sessionLog: log,
    clipboard,
    now: fixedNow,
    ...overrides,
  };
  return { sender, log, clipboard, reporter, out, deps };
}

const baseJob: IPromptJob = {
  input: { goals: "Write a haiku", returnFormat: "text", warnings: "" },
  model: "gpt-test",
  output: { streaming: true, hideThinking: false, stripThinking: false },
  clipboard: true,
};

// ── Single Shot ──────────────────────────────────────────────────────────

describe("Orchestrator single shot", () => {
  it("sends one prompt, logs it and copies the response", async () => {
    const h = harness();

    const outcome = await new Orchestrator(h.deps).run(baseJob);

    expect(h.sender.prompts).toEqual(["G: Write a haiku\nF: text\nW: "]);
    expect(h.out.join("")).toBe("response 1\n");
    expect(outcome).toEqual({ response: { text: "response 1", model: "gpt-test" }, history: [], exitCode: 0 });
    expect(h.log.records).toEqual([
      {
        timestamp: "2024-05-01T12:00:00.000Z",
        goals: "Write a haiku",
        return_format: "text",
        warnings: "",
        model: "gpt-test",
        output_length: 10,
      },
    ]);
    expect(h.clipboard.copies).toEqual(["response 1"]);
    expect(h.reporter.lines).toEqual(["success: Response copied to clipboard"]);
  });

  it("skips the log when no session sink is configured", async () => {
    const h = harness({ sessionLog: undefined });

    await new Orchestrator(h.deps).run({ ...baseJob, clipboard: false });

    expect(h.log.records).toEqual([]);
    expect(h.clipboard.copies).toEqual([]);
  });

  it("reports sink failures as warnings", async () => {
    const failingLog: ISessionSink = {
      append: () => Promise.reject(new LoggingError("/tmp/s.jsonl", "disk full")),
    };
    const failingClipboard: IClipboardSink = {
      copy: () => Promise.reject(new ClipboardError("no display")),
    };
    const h = harness({ sessionLog: failingLog, clipboard: failingClipboard });

    const outcome = await new Orchestrator(h.deps).run(baseJob);

    expect(outcome.response.text).toBe("response 1");
    expect(h.reporter.lines).toEqual([
      "warn: Could not write session log /tmp/s.jsonl: disk full",
      "warn: Could not copy to clipboard: no display",
    ]);
  });

  it("propagates provider failures", async () => {
    const failing: IPromptSender = {
      send: () => Promise.reject(new Error("boom")),
      sendStreaming: () => Promise.reject(new Error("boom")),
    };
    const h = harness({ client: failing });

    await expect(new Orchestrator(h.deps).run(baseJob)).rejects.toThrow("boom");
    expect(h.log.records).toEqual([]);
    expect(h.clipboard.copies).toEqual([]);
  });
});

// ── Iterations ───────────────────────────────────────────────────────────

describe("Orchestrator iterations", () => {
  it("feeds automatic feedback between rounds", async () => {
    const h = harness({ feedback: new AutomaticFeedbackSource() });

    const outcome = await new Orchestrator(h.deps).run({ ...baseJob, iterations: 2 });

    expect(outcome.history).toEqual([
      { kind: "response", iteration: 1, goals: "Write a haiku", response: "response 1" },
      { kind: "feedback", iteration: 1, feedback: AUTO_FEEDBACK, automatic: true },
      { kind: "response", iteration: 2, goals: "Write a haiku", response: "response 2" },
    ]);
    expect(outcome.response.text).toBe("response 2");
    expect(h.sender.prompts[1]).toBe(
      [
        "G: Write a haiku\nF: text\nW: ",
        "",
        "PREVIOUS ITERATIONS:",
        "--- Iteration 1 response ---",
        "response 1",
        `FEEDBACK: ${AUTO_FEEDBACK}`,
        "",
        "Improve on the previous response, addressing all feedback above.",
      ].join("\n"),
    );
    expect(h.log.records.map((record) => ("iteration" in record ? record.iteration : undefined))).toEqual([1, 2]);
    expect(h.clipboard.copies).toEqual(["response 2"]);
  });

  it("does not ask for feedback after the last round", async () => {
    const source = new AutomaticFeedbackSource();
    const next = vi.spyOn(source, "next");
    const h = harness({ feedback: source });

    await new Orchestrator(h.deps).run({ ...baseJob, iterations: 3 });

    expect(next).toHaveBeenCalledTimes(2);
    expect(h.sender.prompts).toHaveLength(3);
  });

  it("applies changed goals and added context to the next round", async () => {
    const h = harness({
      feedback: new ScriptedFeedback([
        { kind: "change-goals", goals: "Write a limerick" },
        { kind: "add-context", context: "about cats" },
      ]),
    });

    const outcome = await new Orchestrator(h.deps).run({ ...baseJob, iterations: 3 });

    expect(h.sender.prompts[1]?.startsWith("G: Write a limerick\nF: text\nW: \n\nPREVIOUS")).toBe(true);
    expect(h.sender.prompts[2]?.startsWith("G: Write a limerick\nF: text\nW: \nContext: about cats\n\n")).toBe(true);
    expect(outcome.history[1]).toEqual({
      kind: "feedback",
      iteration: 1,
      feedback: "Goals changed to: Write a limerick",
      automatic: false,
    });
  });

  it("treats empty feedback as automatic and stops on finish", async () => {
    const h = harness({
      feedback: new ScriptedFeedback([{ kind: "feedback", text: "  " }, { kind: "finish" }]),
    });

    const outcome = await new Orchestrator(h.deps).run({ ...baseJob, iterations: 5 });

    expect(h.sender.prompts).toHaveLength(2);
    expect(outcome.history[1]).toEqual({ kind: "feedback", iteration: 1, feedback: AUTO_FEEDBACK, automatic: true });
    expect(h.reporter.lines).toContain("info: Finished after 2 of 5 iterations");
    expect(h.clipboard.copies).toEqual(["response 2"]);
  });
});

// ── Recursion ────────────────────────────────────────────────────────────

describe("Orchestrator recursion", () => {
  it("runs exactly maxWaves invocations and copies only from the last", async () => {
    const h = harness();
    const waves: number[] = [];

    // each wave runs in this process against the same fakes
    const launcher: IWaveLauncher = {
      launch: async (wave) => {
        waves.push(wave);
        const outcome = await orchestrator.run({ ...recursiveJob, recursion: { wave, maxWaves: 3 } });
        return outcome.exitCode;
      },
    };
    const orchestrator = new Orchestrator({ ...h.deps, launcher });
    const recursiveJob: IPromptJob = { ...baseJob, recursion: { wave: 0, maxWaves: 3 }, nextWaveArgs: ["-g", "x"] };

    const outcome = await orchestrator.run(recursiveJob);

    expect(outcome.exitCode).toBe(0);
    expect(waves).toEqual([1, 2]);
    expect(h.sender.prompts).toHaveLength(3);
    expect(h.log.records.map((record) => ("recursion_wave" in record ? record.recursion_wave : undefined))).toEqual([
      0, 1, 2,
    ]);
    expect(h.clipboard.copies).toEqual(["response 3"]);
    expect(h.reporter.lines).toEqual([
      "info: Launching recursion wave 1...",
      "info: Launching recursion wave 2...",
      "success: Response copied to clipboard",
      "info: Reached maximum recursion depth (3 waves)",
    ]);
  });

  it("passes the next wave number and arguments to the launcher", async () => {
    const launch = vi.fn<IWaveLauncher["launch"]>().mockResolvedValue(0);
    const h = harness({ launcher: { launch } });

    await new Orchestrator(h.deps).run({
      ...baseJob,
      recursion: { wave: 0, maxWaves: 2 },
      nextWaveArgs: ["-g", "Write a haiku"],
    });

    expect(launch).toHaveBeenCalledWith(1, ["-g", "Write a haiku"]);
    expect(h.clipboard.copies).toEqual([]);
  });

  it("adopts a failing child's exit code", async () => {
    const h = harness({ launcher: { launch: async () => 2 } });

    const outcome = await new Orchestrator(h.deps).run({
      ...baseJob,
      recursion: { wave: 0, maxWaves: 2 },
      nextWaveArgs: [],
    });

    expect(outcome.exitCode).toBe(2);
    expect(h.reporter.lines).toContain("warn: Recursion wave 1 failed with status: 2");
  });
});

// ── Raw Prompts ──────────────────────────────────────────────────────────

describe("Orchestrator raw prompt", () => {
  it("sends the prompt as typed and logs it", async () => {
    const h = harness();

    const response = await new Orchestrator(h.deps).runRaw({
      prompt: "What is 2+2?",
      context: "arithmetic",
      model: "llama3",
      output: { streaming: false, hideThinking: false, stripThinking: false },
      clipboard: false,
    });

    expect(response).toEqual({ text: "response 1", model: "llama3" });
    expect(h.sender.prompts).toEqual(["What is 2+2?\nContext: arithmetic"]);
    expect(h.log.records).toEqual([
      { timestamp: "2024-05-01T12:00:00.000Z", prompt: "What is 2+2?", model: "llama3", output_length: 10 },
    ]);
  });
});
