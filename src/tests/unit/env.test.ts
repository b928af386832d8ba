import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { DEFAULT_EXIT_KEYWORDS, buildAssessmentConfig, loadEnv } from "../../config/env";

describe("loadEnv", () => {
  it("applies defaults", () => {
    assert.deepEqual(loadEnv({}), {
      nodeEnv: "development",
      port: 3000,
      logLevel: "info",
      openaiApiKey: undefined,
      openaiBaseUrl: "https://api.openai.com/v1",
      openaiChatModel: "gpt-4o-mini",
      openaiFallbackModels: [],
      llmTimeoutMs: 10000,
      llmMaxAttempts: 3,
      llmBackoffMs: 250,
      assessmentMaxQuestions: 15,
      assessmentSkipThreshold: 3,
      assessmentSimilarityCutoff: 0.7,
      assessmentExitKeywords: DEFAULT_EXIT_KEYWORDS,
    });
  });

  it("reads overrides", () => {
    const env = loadEnv({
      OPENAI_API_KEY: " test-secret ",
      OPENAI_BASE_URL: "https://llm.test/v1///",
      OPENAI_FALLBACK_MODELS: "model-b, model-c, model-b",
      LOG_LEVEL: "DEBUG",
      ASSESSMENT_EXIT_KEYWORDS: "Quit, Stop Now, quit",
    });

    assert.equal(env.openaiApiKey, "test-secret");
    assert.equal(env.openaiBaseUrl, "https://llm.test/v1");
    assert.deepEqual(env.openaiFallbackModels, ["model-b", "model-c"]);
    assert.equal(env.logLevel, "debug");
    assert.deepEqual(env.assessmentExitKeywords, ["quit", "stop now"]);
  });

  it("rejects invalid values", () => {
    assert.throws(() => loadEnv({ PORT: "abc" }), /Invalid PORT value: abc/);
    assert.throws(() => loadEnv({ LLM_MAX_ATTEMPTS: "11" }), /Invalid LLM_MAX_ATTEMPTS value: 11/);
    assert.throws(() => loadEnv({ ASSESSMENT_SIMILARITY_CUTOFF: "1.5" }), /Invalid ASSESSMENT_SIMILARITY_CUTOFF value: 1.5/);
    assert.throws(() => loadEnv({ LOG_LEVEL: "verbose" }), /Invalid LOG_LEVEL value: verbose/);
  });
});

describe("buildAssessmentConfig", () => {
  it("overlays env values on the engine defaults", () => {
    const config = buildAssessmentConfig(loadEnv({ ASSESSMENT_MAX_QUESTIONS: "5", ASSESSMENT_SKIP_THRESHOLD: "1" }));

    assert.equal(config.maxQuestions, 5);
    assert.equal(config.skipThreshold, 1);
    assert.equal(config.similarityCutoff, 0.7);
    assert.equal(config.difficultyWindow, 3);
    assert.deepEqual(config.exitKeywords, DEFAULT_EXIT_KEYWORDS);
    assert.ok(Object.isFrozen(config));
  });
});
