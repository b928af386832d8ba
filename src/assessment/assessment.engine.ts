import { Logger, logContext } from "../config/logger";
import { validateCandidateProfile } from "../profiles/profile.validator";
import { buildReportPayload } from "../reporting/report.service";
import {
  AssessmentCommandError,
  GenerationUnavailable,
  SessionInvariantViolation,
} from "../shared/errors";
import {
  Answer,
  CandidateProfile,
  Evaluation,
  Persona,
  Question,
  ResumeExtraction,
} from "../shared/types/assessment.types";
import { ReportPayload } from "../shared/types/report.types";
import {
  AssessmentConfig,
  AssessmentSession,
  AssessmentState,
  AssessmentTurn,
  ExitReason,
} from "../shared/types/state.types";
import { roundTo } from "../shared/utils/text-match";
import { assertTransition } from "../state/state-machine";
import { isTerminalState } from "../state/transition-rules";
import { AnswerScorer } from "./answer-evaluator.service";
import { selectPersona } from "./persona-selector";
import { GenerationSnapshot, QuestionProducer } from "./question-generator.service";
import { checkResumeConsistency } from "./resume-consistency.service";

export type SchedulingDecision =
  | { kind: "question"; question: Question }
  | { kind: "terminated"; state: AssessmentState; exitReason: ExitReason };

export type AnswerOutcome =
  | { kind: "evaluated"; evaluation: Evaluation; decision: SchedulingDecision | null }
  | { kind: "exited"; decision: SchedulingDecision };

export interface SkipOutcome {
  skipCount: number;
  decision: SchedulingDecision | null;
}

export interface AssessmentEngineDeps {
  sessionId: string;
  config: AssessmentConfig;
  questions: QuestionProducer;
  scorer: AnswerScorer;
  logger: Logger;
  clock?: () => Date;
}

export type SessionSnapshot = Readonly<AssessmentSession>;

export function createSession(sessionId: string): AssessmentSession {
  return {
    sessionId,
    state: "collecting",
    profile: null,
    persona: null,
    resumeConsistency: null,
    turns: [],
    aggregate: { meanScore: 0, confidenceTrend: [], averageConfidence: 0 },
    skipCount: 0,
    exitReason: null,
    annotations: [],
    nextQuestionId: 1,
    startedAt: null,
    completedAt: null,
  };
}

/**
 * Owns one assessment session. Every command runs to completion before the next is
 * accepted; collaborator calls work from a frozen snapshot and their results are
 * applied in one synchronous step.
 */
export class AssessmentEngine {
  private session: AssessmentSession;
  private busy = false;
  private readonly config: AssessmentConfig;
  private readonly questions: QuestionProducer;
  private readonly scorer: AnswerScorer;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly exitKeywords: ReadonlySet<string>;

  constructor(deps: AssessmentEngineDeps) {
    this.session = createSession(deps.sessionId);
    this.config = deps.config;
    this.questions = deps.questions;
    this.scorer = deps.scorer;
    this.logger = deps.logger;
    this.clock = deps.clock ?? (() => new Date());
    this.exitKeywords = new Set(deps.config.exitKeywords.map(normalizeCommandText));
  }

  get sessionId(): string {
    return this.session.sessionId;
  }

  get state(): AssessmentState {
    return this.session.state;
  }

  isBusy(): boolean {
    return this.busy;
  }

  start(rawProfile: unknown, resume?: ResumeExtraction): SessionSnapshot {
    this.ensureIdle("start");
    this.ensureState("start", "collecting");

    const profile = validateCandidateProfile(rawProfile);
    const persona = selectPersona(profile);
    this.session.profile = profile;
    this.session.persona = persona;

    if (resume && resume.ok && resume.text.trim()) {
      this.session.resumeConsistency = checkResumeConsistency(profile, resume.text, this.clock());
    } else if (resume) {
      this.session.annotations.push("Resume text could not be extracted; consistency check skipped.");
    }

    this.session.startedAt = this.clock().toISOString();
    this.transition("assessing", null);
    logContext(this.logger, "info", "assessment.started", this.logFields(), {
      persona,
      techStackSize: profile.techStack.length,
      consistencyRatio: this.session.resumeConsistency?.consistencyRatio ?? null,
    });
    return this.getSnapshot();
  }

  async nextQuestion(): Promise<SchedulingDecision> {
    this.ensureIdle("nextQuestion");
    const terminal = this.terminalDecision();
    if (terminal) {
      return terminal;
    }
    this.ensureState("nextQuestion", "assessing");

    const pending = this.pendingTurn();
    if (pending) {
      return { kind: "question", question: pending.question };
    }
    const scheduled = this.schedule();
    if (scheduled) {
      return scheduled;
    }

    const { profile, persona } = this.requireProfile();
    const snapshot = this.buildGenerationSnapshot();
    this.busy = true;
    try {
      const generated = await this.questions.nextQuestion(snapshot, profile, persona);
      if (generated.question.id !== this.session.nextQuestionId) {
        throw new SessionInvariantViolation(
          `Generated question id ${generated.question.id} does not match expected ${this.session.nextQuestionId}`,
        );
      }
      this.session.turns.push({ question: generated.question, answer: null, evaluation: null });
      this.session.nextQuestionId += 1;
      this.session.annotations.push(...generated.annotations);
      this.assertInvariants();
      logContext(
        this.logger,
        "info",
        "assessment.question.issued",
        {
          ...this.logFields(),
          question_id: generated.question.id,
          tier: generated.question.tier,
          focus_area: generated.question.focusArea.name,
        },
        { source: generated.question.source },
      );
      return { kind: "question", question: generated.question };
    } catch (error) {
      if (!(error instanceof GenerationUnavailable)) {
        throw error;
      }
      this.session.annotations.push(`Assessment ended early: ${error.message}.`);
      this.transition("completed", "question_pool_exhausted");
      return this.requireTerminalDecision();
    } finally {
      this.busy = false;
    }
  }

  async submitAnswer(text: string): Promise<AnswerOutcome> {
    this.ensureIdle("submitAnswer");
    this.ensureState("submitAnswer", "assessing");
    const turn = this.requirePendingTurn("submitAnswer");

    const trimmed = text.trim();
    if (!trimmed) {
      throw new AssessmentCommandError("Answer text must not be empty; skip the question instead");
    }

    if (this.exitKeywords.has(normalizeCommandText(trimmed))) {
      this.session.annotations.push(`Candidate ended the assessment at question ${turn.question.id}.`);
      this.transition("completed", "explicit_exit");
      return { kind: "exited", decision: this.requireTerminalDecision() };
    }

    const { profile } = this.requireProfile();
    const answer: Answer = Object.freeze({
      questionId: turn.question.id,
      text: trimmed,
      skipped: false,
      submittedAt: this.clock().toISOString(),
    });

    this.busy = true;
    try {
      const outcome = await this.scorer.evaluate({
        questionId: turn.question.id,
        question: turn.question.text,
        answer: trimmed,
        techStack: profile.techStack,
      });
      turn.answer = answer;
      turn.evaluation = outcome.evaluation;
      if (outcome.annotation) {
        this.session.annotations.push(outcome.annotation);
      }
      this.recomputeAggregate();
      this.assertInvariants();
      logContext(
        this.logger,
        "info",
        "assessment.answer.evaluated",
        { ...this.logFields(), question_id: turn.question.id },
        {
          score: outcome.evaluation.score,
          scoringPath: outcome.evaluation.scoringPath,
          sentiment: outcome.evaluation.sentiment,
        },
      );
      return { kind: "evaluated", evaluation: outcome.evaluation, decision: this.schedule() };
    } finally {
      this.busy = false;
    }
  }

  skipQuestion(): SkipOutcome {
    this.ensureIdle("skipQuestion");
    this.ensureState("skipQuestion", "assessing");
    const turn = this.requirePendingTurn("skipQuestion");

    turn.answer = Object.freeze({
      questionId: turn.question.id,
      text: "",
      skipped: true,
      submittedAt: this.clock().toISOString(),
    });
    this.session.skipCount += 1;
    this.assertInvariants();
    logContext(
      this.logger,
      "info",
      "assessment.question.skipped",
      { ...this.logFields(), question_id: turn.question.id },
      { skipCount: this.session.skipCount },
    );
    return { skipCount: this.session.skipCount, decision: this.schedule() };
  }

  completeEarly(): SchedulingDecision {
    this.ensureIdle("completeEarly");
    this.ensureState("completeEarly", "assessing");
    const answered = this.session.turns.filter((turn) => turn.answer && !turn.answer.skipped).length;
    if (answered < 1) {
      throw new AssessmentCommandError("Early completion requires at least one answered question");
    }
    this.transition("completed", "early_completion");
    return this.requireTerminalDecision();
  }

  reset(): SessionSnapshot {
    this.ensureIdle("reset");
    const previous = this.session.state;
    this.session = createSession(this.session.sessionId);
    logContext(this.logger, "info", "assessment.reset", this.logFields(), { previousState: previous });
    return this.getSnapshot();
  }

  getSnapshot(): SessionSnapshot {
    return deepFreeze(structuredClone(this.session));
  }

  /**
   * Read-only export. Built entirely from stored session values, so repeated calls
   * serialize identically.
   */
  exportReport(): ReportPayload {
    if (!isTerminalState(this.session.state)) {
      throw new AssessmentCommandError(
        `Report is available once the assessment has ended (state: ${this.session.state})`,
      );
    }
    return deepFreeze(buildReportPayload(structuredClone(this.session)));
  }

  /**
   * Terminal check run after every recorded answer or skip and before a new question
   * is generated. Never fires while a question is awaiting an answer.
   */
  private schedule(): SchedulingDecision | null {
    if (this.session.state !== "assessing" || this.pendingTurn()) {
      return null;
    }
    if (this.session.skipCount > this.config.skipThreshold) {
      this.transition("aborted", "skip_threshold");
      return this.requireTerminalDecision();
    }
    if (this.session.turns.length >= this.config.maxQuestions) {
      this.transition("completed", "max_questions");
      return this.requireTerminalDecision();
    }
    return null;
  }

  private transition(to: AssessmentState, exitReason: ExitReason | null): void {
    const from = this.session.state;
    assertTransition(from, to);
    this.session.state = to;
    if (isTerminalState(to)) {
      if (!exitReason) {
        throw new SessionInvariantViolation(`Terminal state ${to} requires an exit reason`);
      }
      this.session.exitReason = exitReason;
      this.session.completedAt = this.clock().toISOString();
    }
    logContext(this.logger, "info", "assessment.transition", this.logFields(), {
      from,
      to,
      exitReason,
    });
  }

  private terminalDecision(): SchedulingDecision | null {
    const { state, exitReason } = this.session;
    if (!isTerminalState(state)) {
      return null;
    }
    if (!exitReason) {
      throw new SessionInvariantViolation(`Session in ${state} has no exit reason`);
    }
    return { kind: "terminated", state, exitReason };
  }

  private requireTerminalDecision(): SchedulingDecision {
    const decision = this.terminalDecision();
    if (!decision) {
      throw new SessionInvariantViolation("Expected a terminal session");
    }
    return decision;
  }

  private pendingTurn(): AssessmentTurn | null {
    const last = this.session.turns[this.session.turns.length - 1];
    return last && last.answer === null ? last : null;
  }

  private requirePendingTurn(command: string): AssessmentTurn {
    const turn = this.pendingTurn();
    if (!turn) {
      throw new AssessmentCommandError(`${command} requires a question awaiting an answer`);
    }
    return turn;
  }

  private requireProfile(): { profile: CandidateProfile; persona: Persona } {
    const { profile, persona } = this.session;
    if (!profile || !persona) {
      throw new SessionInvariantViolation("Assessing session has no profile");
    }
    return { profile, persona };
  }

  private buildGenerationSnapshot(): GenerationSnapshot {
    return deepFreeze({
      nextQuestionId: this.session.nextQuestionId,
      questions: this.session.turns.map((turn) => ({
        text: turn.question.text,
        focusArea: { ...turn.question.focusArea },
        tier: turn.question.tier,
      })),
      scores: this.session.turns.flatMap((turn) => (turn.evaluation ? [turn.evaluation.score] : [])),
    });
  }

  private recomputeAggregate(): void {
    const evaluations = this.session.turns.flatMap((turn) => (turn.evaluation ? [turn.evaluation] : []));
    const confidenceTrend = evaluations.map((evaluation) => evaluation.confidenceScore);
    this.session.aggregate = {
      meanScore: mean(evaluations.map((evaluation) => evaluation.score)),
      confidenceTrend,
      averageConfidence: mean(confidenceTrend),
    };
  }

  private assertInvariants(): void {
    const { turns, skipCount } = this.session;
    if (turns.length > this.config.maxQuestions) {
      throw new SessionInvariantViolation(`${turns.length} questions issued, limit is ${this.config.maxQuestions}`);
    }
    let previousId = 0;
    let skipped = 0;
    for (const turn of turns) {
      if (turn.question.id <= previousId) {
        throw new SessionInvariantViolation(`Question id ${turn.question.id} is not increasing`);
      }
      previousId = turn.question.id;
      const answered = turn.answer !== null && !turn.answer.skipped;
      if (answered !== (turn.evaluation !== null)) {
        throw new SessionInvariantViolation(`Question ${turn.question.id} evaluation does not match its answer`);
      }
      if (turn.evaluation && turn.evaluation.questionId !== turn.question.id) {
        throw new SessionInvariantViolation(`Evaluation attached to the wrong question ${turn.question.id}`);
      }
      if (turn.answer?.skipped) {
        skipped += 1;
      }
    }
    if (skipped !== skipCount) {
      throw new SessionInvariantViolation(`Skip counter ${skipCount} does not match ${skipped} skipped answers`);
    }
  }

  private ensureIdle(command: string): void {
    if (this.busy) {
      throw new AssessmentCommandError(`${command} rejected: another command is still in progress`);
    }
  }

  private ensureState(command: string, expected: AssessmentState): void {
    if (this.session.state !== expected) {
      throw new AssessmentCommandError(
        `${command} is not allowed in state ${this.session.state}`,
      );
    }
  }

  private logFields(): { session_id: string; state: string } {
    return { session_id: this.session.sessionId, state: this.session.state };
  }
}

export function normalizeCommandText(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, "")
    .replace(/\s+/g, " ");
}

function mean(values: ReadonlyArray<number>): number {
  if (!values.length) {
    return 0;
  }
  return roundTo(values.reduce((sum, value) => sum + value, 0) / values.length, 2);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
