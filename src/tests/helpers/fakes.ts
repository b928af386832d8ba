import { TextGenerator } from "../../ai/llm.client";
import { RetryPolicy } from "../../ai/retry-policy";
import { Logger } from "../../config/logger";

export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export interface LoggedEntry {
  level: "debug" | "info" | "warn" | "error";
  message: string;
  meta?: Record<string, unknown>;
}

export function createRecordingLogger(): { logger: Logger; entries: LoggedEntry[] } {
  const entries: LoggedEntry[] = [];
  return {
    entries,
    logger: {
      debug(message, meta) {
        entries.push({ level: "debug", message, meta });
      },
      info(message, meta) {
        entries.push({ level: "info", message, meta });
      },
      warn(message, meta) {
        entries.push({ level: "warn", message, meta });
      },
      error(message, meta) {
        entries.push({ level: "error", message, meta });
      },
    },
  };
}

export interface GeneratorCall {
  prompt: string;
  context: ReadonlyArray<string>;
}

type Reply = string | Error | ((call: GeneratorCall) => string | Promise<string>);

/**
 * Replays queued replies in order; an Error entry is thrown instead of returned.
 */
export class ScriptedGenerator implements TextGenerator {
  readonly calls: GeneratorCall[] = [];

  constructor(private readonly replies: Reply[] = []) {}

  push(...replies: Reply[]): void {
    this.replies.push(...replies);
  }

  async generate(prompt: string, context: ReadonlyArray<string>): Promise<string> {
    const call = { prompt, context: [...context] };
    this.calls.push(call);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error("ScriptedGenerator has no reply queued");
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return typeof reply === "function" ? reply(call) : reply;
  }
}

export function immediatePolicy(maxAttempts = 3): RetryPolicy {
  return new RetryPolicy({ maxAttempts, backoffMs: 0, timeoutMs: 1_000 }, noopLogger, async () => {});
}

export function fixedClock(iso = "2026-03-01T10:00:00.000Z"): () => Date {
  return () => new Date(iso);
}
