import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { callJsonPromptSafe, callTextPromptSafe, tryParseJsonObject } from "../../ai/llm.safe";
import { buildJsonRepairV1Prompt } from "../../ai/prompts/utils/json-repair.v1.prompt";
import { GenerationError } from "../../shared/errors";
import { ScriptedGenerator, immediatePolicy } from "../helpers/fakes";

function readScore(value: Record<string, unknown>): { score: number } | null {
  return typeof value.score === "number" ? { score: value.score } : null;
}

describe("callJsonPromptSafe", () => {
  it("parses an object embedded in surrounding text", async () => {
    const generator = new ScriptedGenerator(['Here you go: {"score": 0.5}']);
    const result = await callJsonPromptSafe({
      generator,
      policy: immediatePolicy(),
      prompt: "score it",
      context: ["earlier"],
      promptName: "test_prompt",
      schemaHint: "score",
      validate: readScore,
    });
    assert.deepEqual(result, { ok: true, data: { score: 0.5 } });
    assert.deepEqual(generator.calls, [{ prompt: "score it", context: ["earlier"] }]);
  });

  it("makes one repair call for unparsable output", async () => {
    const generator = new ScriptedGenerator(["score: high", '{"score": 1}']);
    const result = await callJsonPromptSafe({
      generator,
      policy: immediatePolicy(),
      prompt: "score it",
      promptName: "test_prompt",
      schemaHint: "object with numeric score",
      validate: readScore,
    });
    assert.deepEqual(result, { ok: true, data: { score: 1 } });
    assert.equal(generator.calls.length, 2);
    assert.equal(
      generator.calls[1]?.prompt,
      buildJsonRepairV1Prompt({ schemaHint: "object with numeric score", raw: "score: high" }),
    );
    assert.deepEqual(generator.calls[1]?.context, []);
  });

  it("reports json_parse_failed when the repair is unparsable too", async () => {
    const generator = new ScriptedGenerator(["nope", "still nope"]);
    const result = await callJsonPromptSafe({
      generator,
      policy: immediatePolicy(),
      prompt: "score it",
      promptName: "test_prompt",
      schemaHint: "score",
      validate: readScore,
    });
    assert.deepEqual(result, { ok: false, error_code: "json_parse_failed", raw: "still nope" });
  });

  it("reports schema_invalid when validation refuses the object", async () => {
    const generator = new ScriptedGenerator(['{"score": "high"}']);
    const result = await callJsonPromptSafe({
      generator,
      policy: immediatePolicy(),
      prompt: "score it",
      promptName: "test_prompt",
      schemaHint: "score",
      validate: readScore,
    });
    assert.deepEqual(result, { ok: false, error_code: "schema_invalid", raw: '{"score": "high"}' });
  });

  it("surfaces collaborator failures as an error code", async () => {
    const generator = new ScriptedGenerator([new GenerationError("LLM API key is not configured", "not_configured")]);
    const result = await callJsonPromptSafe({
      generator,
      policy: immediatePolicy(),
      prompt: "score it",
      promptName: "test_prompt",
      schemaHint: "score",
      validate: readScore,
    });
    assert.deepEqual(result, { ok: false, error_code: "llm_failure" });
  });
});

describe("callTextPromptSafe", () => {
  it("normalizes drafts and retries refused ones with the attempt number", async () => {
    const generator = new ScriptedGenerator(["  dup  ", "fresh question\n"]);
    const result = await callTextPromptSafe({
      generator,
      policy: immediatePolicy(),
      buildPrompt: (attempt) => `prompt-${attempt}`,
      promptName: "test_prompt",
      accept: (text) => text !== "dup",
    });
    assert.deepEqual(result, { ok: true, text: "fresh question", attempts: 2, rejected: ["dup"] });
    assert.deepEqual(
      generator.calls.map((call) => call.prompt),
      ["prompt-1", "prompt-2"],
    );
  });

  it("applies a custom normalizer", async () => {
    const generator = new ScriptedGenerator(["ABC"]);
    const result = await callTextPromptSafe({
      generator,
      policy: immediatePolicy(),
      buildPrompt: () => "prompt",
      promptName: "test_prompt",
      normalize: (text) => text.toLowerCase(),
    });
    assert.deepEqual(result, { ok: true, text: "abc", attempts: 1, rejected: [] });
  });
});

describe("tryParseJsonObject", () => {
  it("accepts only objects", () => {
    assert.deepEqual(tryParseJsonObject('```json\n{"a": 1}\n```'), { ok: true, data: { a: 1 } });
    assert.deepEqual(tryParseJsonObject("[1, 2]"), { ok: false });
    assert.deepEqual(tryParseJsonObject("{broken"), { ok: false });
  });
});
