import {
  Answer,
  CandidateProfile,
  Evaluation,
  Persona,
  Question,
  ResumeConsistencySummary,
} from "./assessment.types";

export type AssessmentState = "collecting" | "assessing" | "completed" | "aborted";

export type ExitReason =
  | "max_questions"
  | "explicit_exit"
  | "early_completion"
  | "skip_threshold"
  | "question_pool_exhausted";

export interface AssessmentTurn {
  readonly question: Question;
  answer: Answer | null;
  evaluation: Evaluation | null;
}

export interface AssessmentAggregate {
  meanScore: number;
  confidenceTrend: number[];
  averageConfidence: number;
}

export interface AssessmentSession {
  readonly sessionId: string;
  state: AssessmentState;
  profile: CandidateProfile | null;
  persona: Persona | null;
  resumeConsistency: ResumeConsistencySummary | null;
  turns: AssessmentTurn[];
  aggregate: AssessmentAggregate;
  skipCount: number;
  exitReason: ExitReason | null;
  annotations: string[];
  nextQuestionId: number;
  startedAt: string | null;
  completedAt: string | null;
}

export interface AssessmentConfig {
  readonly maxQuestions: number;
  readonly skipThreshold: number;
  readonly similarityCutoff: number;
  readonly exitKeywords: ReadonlyArray<string>;
  readonly difficultyWindow: number;
  readonly promoteThreshold: number;
  readonly demoteThreshold: number;
}
