import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { analyzeSentiment, buildSentimentFeedback, labelForConfidence } from "../../assessment/sentiment-analyzer";

describe("analyzeSentiment", () => {
  it("labels a hedged filler-heavy answer uncertain", () => {
    const analysis = analyzeSentiment("um, maybe, I think it's like a hashmap or something");

    assert.equal(analysis.confidenceScore, 32);
    assert.equal(analysis.label, "uncertain");
    assert.equal(analysis.hedgeMarkers, 1);
    assert.equal(analysis.fillerMarkers, 2);
    assert.equal(analysis.confidenceMarkers, 0);
    assert.equal(analysis.wordCount, 10);
    assert.equal(analysis.sentenceCount, 1);
    assert.equal(analysis.technicalDepth, 0);
  });

  it("rewards confidence markers", () => {
    const analysis = analyzeSentiment(
      "I am confident and definitely have experience with database performance and api security.",
    );

    assert.equal(analysis.confidenceMarkers, 3);
    assert.equal(analysis.confidenceScore, 80);
    assert.equal(analysis.label, "confident");
    assert.equal(analysis.technicalDepth, 4);
    assert.equal(analysis.wordCount, 13);
  });

  it("counts multi-word hedges", () => {
    const analysis = analyzeSentiment("I am not sure");
    assert.equal(analysis.hedgeMarkers, 1);
    assert.equal(analysis.confidenceScore, 42);
  });

  it("matches markers as whole words only", () => {
    const analysis = analyzeSentiment("It is likely unlikely");
    assert.equal(analysis.fillerMarkers, 0);
    assert.equal(analysis.confidenceScore, 50);
    assert.equal(analysis.label, "moderate");
  });

  it("clamps the score at zero", () => {
    assert.equal(analyzeSentiment("maybe maybe maybe maybe maybe maybe maybe").confidenceScore, 0);
  });
});

describe("labelForConfidence", () => {
  it("uses 70 and 50 as boundaries", () => {
    assert.equal(labelForConfidence(70), "confident");
    assert.equal(labelForConfidence(69), "moderate");
    assert.equal(labelForConfidence(50), "moderate");
    assert.equal(labelForConfidence(49), "uncertain");
  });
});

describe("buildSentimentFeedback", () => {
  it("builds feedback for an uncertain answer", () => {
    assert.deepEqual(buildSentimentFeedback(analyzeSentiment("um, maybe, I think it's like a hashmap or something")), [
      "Your response could benefit from more confident language.",
      "Consider using more technical terms to demonstrate depth.",
    ]);
  });

  it("builds feedback for an empty answer", () => {
    assert.deepEqual(buildSentimentFeedback(analyzeSentiment("")), [
      "Your response shows moderate confidence.",
      "Consider using more technical terms to demonstrate depth.",
      "Try to provide more detailed explanations.",
    ]);
  });

  it("praises technical vocabulary", () => {
    const feedback = buildSentimentFeedback(
      analyzeSentiment("I am confident and definitely have experience with database performance and api security."),
    );
    assert.deepEqual(feedback, [
      "Your response shows strong confidence and clarity.",
      "Good use of technical terminology.",
    ]);
  });
});
