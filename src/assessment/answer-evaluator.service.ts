import { TextGenerator } from "../ai/llm.client";
import { callJsonPromptSafe } from "../ai/llm.safe";
import { buildAnswerEvaluatorV1Prompt } from "../ai/prompts/interview/answer-evaluator.v1.prompt";
import { RetryPolicy } from "../ai/retry-policy";
import { Logger } from "../config/logger";
import { EvaluationError, errorMessage } from "../shared/errors";
import { Evaluation, ScoringPath } from "../shared/types/assessment.types";
import { clamp, containsTerm, roundTo } from "../shared/utils/text-match";
import { analyzeSentiment, buildSentimentFeedback } from "./sentiment-analyzer";

export interface EvaluateAnswerInput {
  questionId: number;
  question: string;
  answer: string;
  techStack: ReadonlyArray<string>;
}

export interface EvaluationOutcome {
  readonly evaluation: Evaluation;
  readonly annotation: string | null;
}

export interface AnswerScorer {
  evaluate(input: EvaluateAnswerInput): Promise<EvaluationOutcome>;
}

export const CRITERIA_WEIGHTS = {
  technical_accuracy: 0.4,
  completeness: 0.3,
  clarity: 0.2,
  practical_understanding: 0.1,
} as const;

type Criterion = keyof typeof CRITERIA_WEIGHTS;

const CRITERIA: ReadonlyArray<Criterion> = [
  "technical_accuracy",
  "completeness",
  "clarity",
  "practical_understanding",
];

export const DOMAIN_KEYWORDS = [
  "algorithm",
  "api",
  "architecture",
  "cache",
  "database",
  "design",
  "function",
  "performance",
  "scalability",
  "security",
  "testing",
] as const;

const MAX_FEEDBACK_POINTS = 4;

const BUCKET_FEEDBACK: Record<"low" | "medium" | "high", string> = {
  low: "The answer touches few of the expected concepts. Walk through the core idea and support it with a concrete example.",
  medium: "The answer covers some relevant concepts. Add more depth on trade-offs and how you applied this in practice.",
  high: "The answer covers the expected concepts well and uses relevant terminology.",
};

interface CollaboratorScore {
  score: number;
  feedback: string[];
}

export class AnswerEvaluatorService implements AnswerScorer {
  constructor(
    private readonly generator: TextGenerator,
    private readonly policy: RetryPolicy,
    private readonly logger: Logger,
  ) {}

  /**
   * Scores one answer. Collaborator failures of any kind fall through to the keyword
   * heuristic, so this never rejects.
   */
  async evaluate(input: EvaluateAnswerInput): Promise<EvaluationOutcome> {
    const sentiment = analyzeSentiment(input.answer);
    let primary: CollaboratorScore | null = null;
    let failure: EvaluationError | null = null;

    try {
      primary = await this.scoreWithCollaborator(input);
    } catch (error) {
      failure = error instanceof EvaluationError ? error : new EvaluationError(errorMessage(error));
    }

    let scoringPath: ScoringPath = "llm";
    let score: number;
    let feedback: string[];
    if (primary) {
      score = primary.score;
      feedback = primary.feedback;
    } else {
      scoringPath = "keyword_fallback";
      score = keywordFallbackScore(input.answer, input.techStack);
      feedback = [BUCKET_FEEDBACK[scoreBucket(score)]];
      this.logger.warn("answer.evaluator.fallback", {
        questionId: input.questionId,
        error: failure ? failure.message : null,
        score,
      });
    }

    const evaluation: Evaluation = Object.freeze({
      questionId: input.questionId,
      score,
      feedback: Object.freeze([...feedback, ...buildSentimentFeedback(sentiment)]),
      sentiment: sentiment.label,
      confidenceScore: sentiment.confidenceScore,
      scoringPath,
    });

    return {
      evaluation,
      annotation:
        scoringPath === "keyword_fallback"
          ? `Question ${input.questionId}: answer scored with the keyword heuristic (${failure ? failure.message : "no collaborator score"}).`
          : null,
    };
  }

  private async scoreWithCollaborator(input: EvaluateAnswerInput): Promise<CollaboratorScore> {
    const safe = await callJsonPromptSafe<CollaboratorScore>({
      generator: this.generator,
      policy: this.policy,
      logger: this.logger,
      prompt: buildAnswerEvaluatorV1Prompt({
        question: input.question,
        answer: input.answer,
        techStack: input.techStack,
      }),
      promptName: "answer_evaluator_v1",
      schemaHint:
        "Answer evaluation JSON with technical_accuracy, completeness, clarity, practical_understanding, score and feedback.",
      validate: normalizeCollaboratorScore,
    });
    if (!safe.ok) {
      throw new EvaluationError(`Answer evaluation failed: ${safe.error_code}`);
    }
    return safe.data;
  }
}

export function normalizeCollaboratorScore(raw: Record<string, unknown>): CollaboratorScore | null {
  let score: number | null = 0;
  for (const criterion of CRITERIA) {
    const value = toUnitNumber(raw[criterion]);
    if (value === null) {
      score = null;
      break;
    }
    score += CRITERIA_WEIGHTS[criterion] * value;
  }
  if (score === null) {
    score = toUnitNumber(raw.score);
  }
  if (score === null) {
    return null;
  }

  return {
    score: roundTo(clamp(score, 0, 1), 2),
    feedback: toFeedbackList(raw.feedback),
  };
}

export function keywordFallbackScore(answer: string, techStack: ReadonlyArray<string>): number {
  const keywords = new Set<string>();
  for (const term of [...techStack, ...DOMAIN_KEYWORDS]) {
    const normalized = term.trim().toLowerCase();
    if (normalized) {
      keywords.add(normalized);
    }
  }
  let present = 0;
  for (const keyword of keywords) {
    if (containsTerm(answer, keyword)) {
      present += 1;
    }
  }
  return roundTo(Math.min(1, 0.3 + 0.1 * present), 2);
}

export function scoreBucket(score: number): "low" | "medium" | "high" {
  if (score < 0.4) {
    return "low";
  }
  if (score > 0.7) {
    return "high";
  }
  return "medium";
}

function toUnitNumber(value: unknown): number | null {
  if (typeof value === "string" && !value.trim()) {
    return null;
  }
  const numeric = typeof value === "number" ? value : typeof value === "string" ? Number(value) : Number.NaN;
  if (!Number.isFinite(numeric)) {
    return null;
  }
  return clamp(numeric, 0, 1);
}

function toFeedbackList(value: unknown): string[] {
  if (typeof value === "string") {
    return value.trim() ? [value.trim()] : [];
  }
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .filter((item): item is string => typeof item === "string")
    .map((item) => item.trim())
    .filter(Boolean)
    .slice(0, MAX_FEEDBACK_POINTS);
}
