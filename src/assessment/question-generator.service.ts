import { TextGenerator } from "../ai/llm.client";
import { callTextPromptSafe } from "../ai/llm.safe";
import {
  buildQuestionGeneratorV1Prompt,
  describeFocusArea,
} from "../ai/prompts/interview/question-generator.v1.prompt";
import { RetryPolicy } from "../ai/retry-policy";
import { Logger } from "../config/logger";
import { GenerationUnavailable, SessionInvariantViolation } from "../shared/errors";
import {
  CandidateProfile,
  DifficultyTier,
  FocusArea,
  Persona,
  Question,
} from "../shared/types/assessment.types";
import { AssessmentConfig } from "../shared/types/state.types";
import { fallbackTiers, nextDifficultyTier } from "./difficulty.policy";
import { fallbackFocusAreas, nextFocusArea } from "./focus-area.policy";
import { QuestionBank } from "./question-bank";
import { isTooSimilar, maxSimilarity } from "./similarity";

/**
 * Frozen view of the session history the generator works from. Built by the engine
 * before the collaborator call, so the session itself is never touched mid-flight.
 */
export interface GenerationSnapshot {
  readonly nextQuestionId: number;
  readonly questions: ReadonlyArray<Pick<Question, "text" | "focusArea" | "tier">>;
  readonly scores: ReadonlyArray<number>;
}

export interface QuestionPlan {
  readonly tier: DifficultyTier;
  readonly focusArea: FocusArea;
}

export interface GeneratedQuestion {
  readonly question: Question;
  readonly annotations: ReadonlyArray<string>;
}

export interface QuestionProducer {
  nextQuestion(
    snapshot: GenerationSnapshot,
    profile: CandidateProfile,
    persona: Persona,
  ): Promise<GeneratedQuestion>;
}

const MIN_QUESTION_WORDS = 3;
const MAX_QUESTION_CHARS = 600;

export class QuestionGeneratorService implements QuestionProducer {
  constructor(
    private readonly generator: TextGenerator,
    private readonly policy: RetryPolicy,
    private readonly bank: QuestionBank,
    private readonly config: AssessmentConfig,
    private readonly logger: Logger,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  planNext(snapshot: GenerationSnapshot, profile: CandidateProfile, persona: Persona): QuestionPlan {
    const previous = snapshot.questions[snapshot.questions.length - 1];
    return {
      tier: nextDifficultyTier(previous ? previous.tier : null, snapshot.scores, this.config),
      focusArea: nextFocusArea(
        profile.techStack,
        snapshot.questions.map((item) => item.focusArea),
        persona,
      ),
    };
  }

  async nextQuestion(
    snapshot: GenerationSnapshot,
    profile: CandidateProfile,
    persona: Persona,
  ): Promise<GeneratedQuestion> {
    if (snapshot.questions.length >= this.config.maxQuestions) {
      throw new SessionInvariantViolation(
        `Question requested after ${snapshot.questions.length} of ${this.config.maxQuestions} were issued`,
      );
    }

    const plan = this.planNext(snapshot, profile, persona);
    const previousTexts = snapshot.questions.map((item) => item.text);
    const cutoff = this.config.similarityCutoff;

    const generated = await callTextPromptSafe({
      generator: this.generator,
      policy: this.policy,
      promptName: "question_generator_v1",
      context: previousTexts,
      buildPrompt: (attempt) =>
        buildQuestionGeneratorV1Prompt({
          tier: plan.tier,
          focusArea: plan.focusArea,
          persona,
          techStack: profile.techStack,
          desiredPosition: profile.desiredPosition,
          attempt,
        }),
      normalize: normalizeGeneratedQuestion,
      accept: (text) => isUsableQuestion(text) && !isTooSimilar(text, previousTexts, cutoff),
    });

    if (generated.ok) {
      return {
        question: this.buildQuestion(snapshot.nextQuestionId, generated.text, plan, "llm"),
        annotations: [],
      };
    }

    const previous = snapshot.questions[snapshot.questions.length - 1];
    const banked = this.pickFromBank(plan, previous ? previous.tier : null, profile, persona, previousTexts);
    const leastSimilar = pickLeastSimilar(generated.rejected, previousTexts);
    this.logger.warn("question.generator.fallback", {
      questionId: snapshot.nextQuestionId,
      tier: plan.tier,
      focusArea: describeFocusArea(plan.focusArea),
      errorCode: generated.error_code,
      attempts: generated.attempts,
      rejectedDrafts: generated.rejected.length,
      leastSimilarity: leastSimilar ? leastSimilar.similarity : null,
      servedTier: banked ? banked.plan.tier : null,
      servedFocusArea: banked ? describeFocusArea(banked.plan.focusArea) : null,
    });

    if (!banked) {
      throw new GenerationUnavailable(
        `No usable question for ${describeFocusArea(plan.focusArea)} at tier ${plan.tier}`,
      );
    }

    const reason =
      generated.error_code === "rejected"
        ? "generated drafts repeated earlier questions"
        : `generation failed (${generated.error_code})`;
    return {
      question: this.buildQuestion(snapshot.nextQuestionId, banked.text, banked.plan, "question_bank"),
      annotations: [`Question ${snapshot.nextQuestionId}: ${reason}; served from the static question bank.`],
    };
  }

  /**
   * Every focus area at the planned tier is tried before a neighbouring tier. The
   * returned plan is the one actually served.
   */
  private pickFromBank(
    plan: QuestionPlan,
    previousTier: DifficultyTier | null,
    profile: CandidateProfile,
    persona: Persona,
    previousTexts: ReadonlyArray<string>,
  ): { text: string; plan: QuestionPlan } | null {
    for (const tier of fallbackTiers(plan.tier, previousTier)) {
      for (const focusArea of fallbackFocusAreas(plan.focusArea, profile.techStack, persona)) {
        const text = this.bank.pick(focusArea, tier, previousTexts, this.config.similarityCutoff);
        if (text) {
          return { text, plan: { tier, focusArea } };
        }
      }
    }
    return null;
  }

  private buildQuestion(
    id: number,
    text: string,
    plan: QuestionPlan,
    source: Question["source"],
  ): Question {
    return Object.freeze({
      id,
      text,
      focusArea: Object.freeze({ ...plan.focusArea }),
      tier: plan.tier,
      source,
      createdAt: this.clock().toISOString(),
    });
  }
}

export function normalizeGeneratedQuestion(raw: string): string {
  const firstLine =
    raw
      .split(/\r?\n/)
      .map((line) => line.trim())
      .find((line) => line.length > 0) ?? "";
  return firstLine
    .replace(/^(?:question\s*\d*\s*[:.)-]\s*|\d+\s*[.)]\s*)/i, "")
    .replace(/^["'`]+|["'`]+$/g, "")
    .trim();
}

export function isUsableQuestion(text: string): boolean {
  if (!text || text.length > MAX_QUESTION_CHARS) {
    return false;
  }
  return text.split(/\s+/).length >= MIN_QUESTION_WORDS;
}

function pickLeastSimilar(
  drafts: ReadonlyArray<string>,
  previous: ReadonlyArray<string>,
): { text: string; similarity: number } | null {
  let best: { text: string; similarity: number } | null = null;
  for (const draft of drafts) {
    const similarity = maxSimilarity(draft, previous);
    if (!best || similarity < best.similarity) {
      best = { text: draft, similarity };
    }
  }
  return best;
}
