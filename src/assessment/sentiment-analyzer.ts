import { SentimentAnalysis, SentimentLabel } from "../shared/types/assessment.types";
import { clamp, containsTerm, countTermOccurrences } from "../shared/utils/text-match";

export const CONFIDENCE_MARKERS = ["confident", "definitely", "experience"] as const;
export const HEDGE_MARKERS = ["maybe", "perhaps", "might", "not sure"] as const;
export const FILLER_MARKERS = ["um", "uh", "like", "you know"] as const;

export const TECHNICAL_DEPTH_TERMS = [
  "algorithm",
  "complexity",
  "optimization",
  "architecture",
  "design pattern",
  "framework",
  "library",
  "api",
  "database",
  "performance",
  "scalability",
  "security",
] as const;

const BASE_CONFIDENCE = 50;
const CONFIDENCE_WEIGHT = 10;
const HEDGE_WEIGHT = 8;
const FILLER_WEIGHT = 5;

function countMarkers(text: string, markers: ReadonlyArray<string>): number {
  return markers.reduce((total, marker) => total + countTermOccurrences(text, marker), 0);
}

export function labelForConfidence(confidenceScore: number): SentimentLabel {
  if (confidenceScore >= 70) {
    return "confident";
  }
  if (confidenceScore >= 50) {
    return "moderate";
  }
  return "uncertain";
}

export function analyzeSentiment(text: string): SentimentAnalysis {
  const confidenceMarkers = countMarkers(text, CONFIDENCE_MARKERS);
  const hedgeMarkers = countMarkers(text, HEDGE_MARKERS);
  const fillerMarkers = countMarkers(text, FILLER_MARKERS);

  const confidenceScore = clamp(
    BASE_CONFIDENCE +
      CONFIDENCE_WEIGHT * confidenceMarkers -
      HEDGE_WEIGHT * hedgeMarkers -
      FILLER_WEIGHT * fillerMarkers,
    0,
    100,
  );

  const trimmed = text.trim();
  return {
    label: labelForConfidence(confidenceScore),
    confidenceScore,
    confidenceMarkers,
    hedgeMarkers,
    fillerMarkers,
    wordCount: trimmed ? trimmed.split(/\s+/).length : 0,
    sentenceCount: trimmed.split(/[.!?]+/).filter((part) => part.trim().length > 0).length,
    technicalDepth: TECHNICAL_DEPTH_TERMS.filter((term) => containsTerm(text, term)).length,
  };
}

export function buildSentimentFeedback(analysis: SentimentAnalysis): string[] {
  const feedback: string[] = [];

  switch (analysis.label) {
    case "confident":
      feedback.push("Your response shows strong confidence and clarity.");
      break;
    case "moderate":
      feedback.push("Your response shows moderate confidence.");
      break;
    case "uncertain":
      feedback.push("Your response could benefit from more confident language.");
      break;
  }

  if (analysis.technicalDepth >= 3) {
    feedback.push("Good use of technical terminology.");
  } else if (analysis.technicalDepth === 0) {
    feedback.push("Consider using more technical terms to demonstrate depth.");
  }

  if (analysis.wordCount < 10) {
    feedback.push("Try to provide more detailed explanations.");
  } else if (analysis.wordCount > 200) {
    feedback.push("Consider being more concise in your responses.");
  }

  if (analysis.fillerMarkers > 3) {
    feedback.push("Reduce filler words for clearer communication.");
  }

  return feedback;
}
