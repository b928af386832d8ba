export const DIFFICULTY_TIERS = ["basic", "intermediate", "practical", "advanced", "expert"] as const;

export type DifficultyTier = (typeof DIFFICULTY_TIERS)[number];

export type Persona = "expert" | "analytical" | "creative" | "default";

export const GENERAL_FOCUS_AREAS = [
  "architecture",
  "debugging",
  "best-practices",
  "algorithms",
  "data-modeling",
] as const;

export type GeneralFocusArea = (typeof GENERAL_FOCUS_AREAS)[number];

export type FocusArea =
  | {
      kind: "tech_stack";
      name: string;
    }
  | {
      kind: "general";
      name: GeneralFocusArea;
    };

export interface CandidateProfile {
  readonly fullName: string;
  readonly email: string;
  readonly phone: string;
  readonly location: string;
  readonly yearsOfExperience: number;
  readonly desiredPosition: string;
  readonly techStack: ReadonlyArray<string>;
}

export type ResumeFieldStatus = "matched" | "unmatched" | "unverifiable";

export type ResumeCheckedField = "years_of_experience" | "desired_position" | "tech_stack";

export interface ResumeFieldCheck {
  readonly field: ResumeCheckedField;
  readonly declaredValue: string;
  readonly status: ResumeFieldStatus;
}

export interface ResumeConsistencySummary {
  readonly fields: ReadonlyArray<ResumeFieldCheck>;
  readonly consistencyRatio: number;
  readonly findings: ReadonlyArray<string>;
}

export interface ResumeExtraction {
  readonly ok: boolean;
  readonly text: string;
}

export type QuestionSource = "llm" | "question_bank";

export interface Question {
  readonly id: number;
  readonly text: string;
  readonly focusArea: FocusArea;
  readonly tier: DifficultyTier;
  readonly source: QuestionSource;
  readonly createdAt: string;
}

export interface Answer {
  readonly questionId: number;
  readonly text: string;
  readonly skipped: boolean;
  readonly submittedAt: string;
}

export type SentimentLabel = "confident" | "moderate" | "uncertain";

export interface SentimentAnalysis {
  readonly label: SentimentLabel;
  readonly confidenceScore: number;
  readonly confidenceMarkers: number;
  readonly hedgeMarkers: number;
  readonly fillerMarkers: number;
  readonly wordCount: number;
  readonly sentenceCount: number;
  readonly technicalDepth: number;
}

export type ScoringPath = "llm" | "keyword_fallback";

export interface Evaluation {
  readonly questionId: number;
  readonly score: number;
  readonly feedback: ReadonlyArray<string>;
  readonly sentiment: SentimentLabel;
  readonly confidenceScore: number;
  readonly scoringPath: ScoringPath;
}
