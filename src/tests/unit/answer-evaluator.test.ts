import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
  AnswerEvaluatorService,
  keywordFallbackScore,
  normalizeCollaboratorScore,
  scoreBucket,
} from "../../assessment/answer-evaluator.service";
import { GenerationError } from "../../shared/errors";
import { ScriptedGenerator, createRecordingLogger, immediatePolicy, noopLogger } from "../helpers/fakes";

describe("AnswerEvaluatorService.evaluate", () => {
  it("weights the collaborator's criteria and appends communication feedback", async () => {
    const generator = new ScriptedGenerator([
      JSON.stringify({
        technical_accuracy: 0.8,
        completeness: 0.6,
        clarity: 1,
        practical_understanding: 0.5,
        feedback: ["Good", "Missing edge cases"],
      }),
    ]);
    const evaluator = new AnswerEvaluatorService(generator, immediatePolicy(), noopLogger);

    const outcome = await evaluator.evaluate({
      questionId: 3,
      question: "What are generics for?",
      answer: "Generics let a function keep type information across calls.",
      techStack: ["TypeScript"],
    });

    assert.deepEqual(outcome.evaluation, {
      questionId: 3,
      score: 0.75,
      feedback: [
        "Good",
        "Missing edge cases",
        "Your response shows moderate confidence.",
        "Consider using more technical terms to demonstrate depth.",
        "Try to provide more detailed explanations.",
      ],
      sentiment: "moderate",
      confidenceScore: 50,
      scoringPath: "llm",
    });
    assert.equal(outcome.annotation, null);
  });

  it("scores with keywords when the collaborator fails", async () => {
    const generator = new ScriptedGenerator([new GenerationError("bad request", "http_error", 400)]);
    const { logger, entries } = createRecordingLogger();
    const evaluator = new AnswerEvaluatorService(generator, immediatePolicy(), logger);

    const outcome = await evaluator.evaluate({
      questionId: 1,
      question: "How would you speed up a slow endpoint?",
      answer: "I would cache the API response in Redis and add database indexes for performance.",
      techStack: ["Redis", "PostgreSQL"],
    });

    assert.deepEqual(outcome.evaluation, {
      questionId: 1,
      score: 0.8,
      feedback: [
        "The answer covers the expected concepts well and uses relevant terminology.",
        "Your response shows moderate confidence.",
        "Good use of technical terminology.",
      ],
      sentiment: "moderate",
      confidenceScore: 50,
      scoringPath: "keyword_fallback",
    });
    assert.equal(
      outcome.annotation,
      "Question 1: answer scored with the keyword heuristic (Answer evaluation failed: llm_failure).",
    );
    assert.equal(generator.calls.length, 1);
    assert.ok(entries.some((entry) => entry.level === "warn" && entry.message === "answer.evaluator.fallback"));
  });

  it("falls back when the output stays unparsable after repair", async () => {
    const generator = new ScriptedGenerator(["great answer", "still not json"]);
    const evaluator = new AnswerEvaluatorService(generator, immediatePolicy(), noopLogger);

    const outcome = await evaluator.evaluate({ questionId: 2, question: "Q?", answer: "no idea", techStack: [] });

    assert.equal(outcome.evaluation.scoringPath, "keyword_fallback");
    assert.equal(outcome.evaluation.score, 0.3);
    assert.equal(
      outcome.annotation,
      "Question 2: answer scored with the keyword heuristic (Answer evaluation failed: json_parse_failed).",
    );
  });
});

describe("normalizeCollaboratorScore", () => {
  it("uses the overall score when criteria are missing", () => {
    assert.deepEqual(normalizeCollaboratorScore({ score: 1.4, feedback: "Solid" }), { score: 1, feedback: ["Solid"] });
  });

  it("accepts numeric strings", () => {
    assert.deepEqual(
      normalizeCollaboratorScore({
        technical_accuracy: "0.5",
        completeness: "0.5",
        clarity: "0.5",
        practical_understanding: "0.5",
      }),
      { score: 0.5, feedback: [] },
    );
  });

  it("keeps at most four feedback points", () => {
    assert.deepEqual(normalizeCollaboratorScore({ score: 0.2, feedback: ["a", "b", 3, "c", "d", "e"] }), {
      score: 0.2,
      feedback: ["a", "b", "c", "d"],
    });
  });

  it("rejects objects without any score", () => {
    assert.equal(normalizeCollaboratorScore({ feedback: [] }), null);
  });

  it("treats blank criteria as missing instead of zero", () => {
    assert.deepEqual(
      normalizeCollaboratorScore({
        technical_accuracy: "",
        completeness: "0.5",
        clarity: "0.5",
        practical_understanding: "0.5",
        score: "0.9",
      }),
      { score: 0.9, feedback: [] },
    );
    assert.equal(normalizeCollaboratorScore({ score: "   " }), null);
  });
});

describe("keywordFallbackScore", () => {
  it("starts at 0.3 and adds 0.1 per distinct keyword", () => {
    assert.equal(keywordFallbackScore("", []), 0.3);
    assert.equal(keywordFallbackScore("api api api", ["API"]), 0.4);
  });

  it("caps at 1", () => {
    assert.equal(
      keywordFallbackScore("algorithm api architecture cache database design function performance", ["Go"]),
      1,
    );
  });
});

describe("scoreBucket", () => {
  it("splits at 0.4 and 0.7", () => {
    assert.equal(scoreBucket(0.39), "low");
    assert.equal(scoreBucket(0.4), "medium");
    assert.equal(scoreBucket(0.7), "medium");
    assert.equal(scoreBucket(0.71), "high");
  });
});
