import { Logger } from "../config/logger";
import { INTERVIEWER_SYSTEM_PROMPT } from "./system/interviewer.system";
import { buildJsonRepairV1Prompt } from "./prompts/utils/json-repair.v1.prompt";
import { TextGenerator } from "./llm.client";
import { RetryFailureCode, RetryPolicy } from "./retry-policy";

export interface JsonSafeCallArgs<T> {
  generator: TextGenerator;
  policy: RetryPolicy;
  prompt: string;
  context?: ReadonlyArray<string>;
  promptName: string;
  schemaHint: string;
  logger?: Logger;
  validate: (value: Record<string, unknown>) => T | null;
}

export interface TextSafeCallArgs {
  generator: TextGenerator;
  policy: RetryPolicy;
  buildPrompt: (attempt: number) => string;
  context?: ReadonlyArray<string>;
  promptName: string;
  normalize?: (text: string) => string;
  accept?: (text: string) => boolean;
}

export type SafeJsonResult<T> =
  | {
      ok: true;
      data: T;
    }
  | {
      ok: false;
      error_code: "missing_system_prompt" | RetryFailureCode | "json_parse_failed" | "schema_invalid";
      raw?: string;
    };

export type SafeTextResult =
  | { ok: true; text: string; attempts: number; rejected: string[] }
  | {
      ok: false;
      error_code: "missing_system_prompt" | RetryFailureCode;
      attempts: number;
      rejected: string[];
    };

export async function callJsonPromptSafe<T>(args: JsonSafeCallArgs<T>): Promise<SafeJsonResult<T>> {
  if (!INTERVIEWER_SYSTEM_PROMPT.trim()) {
    return { ok: false, error_code: "missing_system_prompt" };
  }
  const context = args.context ?? [];

  const initial = await args.policy.run(() => args.generator.generate(args.prompt, context), {
    label: args.promptName,
  });
  if (!initial.ok) {
    return { ok: false, error_code: initial.error_code };
  }

  const parsed = tryParseJsonObject(initial.value);
  if (parsed.ok) {
    const data = args.validate(parsed.data);
    if (data === null) {
      return { ok: false, error_code: "schema_invalid", raw: initial.value };
    }
    return { ok: true, data };
  }

  args.logger?.warn("llm.safe.json_repair", { promptName: args.promptName });
  const repairPrompt = buildJsonRepairV1Prompt({
    schemaHint: args.schemaHint,
    raw: initial.value,
  });
  const repaired = await args.policy.run(() => args.generator.generate(repairPrompt, []), {
    label: `${args.promptName}_json_repair`,
  });
  if (!repaired.ok) {
    return { ok: false, error_code: repaired.error_code };
  }
  const repairedParsed = tryParseJsonObject(repaired.value);
  if (!repairedParsed.ok) {
    return { ok: false, error_code: "json_parse_failed", raw: repaired.value };
  }
  const repairedData = args.validate(repairedParsed.data);
  if (repairedData === null) {
    return { ok: false, error_code: "schema_invalid", raw: repaired.value };
  }
  return { ok: true, data: repairedData };
}

export async function callTextPromptSafe(args: TextSafeCallArgs): Promise<SafeTextResult> {
  if (!INTERVIEWER_SYSTEM_PROMPT.trim()) {
    return { ok: false, error_code: "missing_system_prompt", attempts: 0, rejected: [] };
  }
  const context = args.context ?? [];
  const normalize = args.normalize ?? ((text: string) => text.trim());
  const result = await args.policy.run(
    async (attempt) => normalize(await args.generator.generate(args.buildPrompt(attempt), context)),
    {
      label: args.promptName,
      accept: args.accept,
    },
  );
  if (result.ok) {
    return { ok: true, text: result.value, attempts: result.attempts, rejected: result.rejected };
  }
  return {
    ok: false,
    error_code: result.error_code,
    attempts: result.attempts,
    rejected: result.rejected,
  };
}

export function tryParseJsonObject(
  raw: string,
): { ok: true; data: Record<string, unknown> } | { ok: false } {
  const text = raw.trim();
  const firstBrace = text.indexOf("{");
  const lastBrace = text.lastIndexOf("}");
  if (firstBrace < 0 || lastBrace < 0 || lastBrace <= firstBrace) {
    return { ok: false };
  }
  try {
    const parsed: unknown = JSON.parse(text.slice(firstBrace, lastBrace + 1));
    if (!isRecord(parsed)) {
      return { ok: false };
    }
    return { ok: true, data: parsed };
  } catch {
    return { ok: false };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
