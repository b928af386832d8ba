import {
  CandidateProfile,
  DifficultyTier,
  FocusArea,
  Persona,
  QuestionSource,
  ResumeConsistencySummary,
  ScoringPath,
  SentimentLabel,
} from "./assessment.types";
import { AssessmentState, ExitReason } from "./state.types";

export type RecommendationLabel =
  | "strong_candidate"
  | "qualified_candidate"
  | "needs_further_assessment";

export interface ReportQuestionDetail {
  questionId: number;
  questionText: string;
  focusArea: FocusArea;
  tier: DifficultyTier;
  source: QuestionSource;
  answerText: string | null;
  skipped: boolean;
  score: number | null;
  feedback: string[];
  sentiment: SentimentLabel | null;
  confidenceScore: number | null;
  scoringPath: ScoringPath | null;
}

export interface ReportSentimentPoint {
  questionId: number;
  sentiment: SentimentLabel;
  confidenceScore: number;
}

export interface ReportPayload {
  sessionId: string;
  state: AssessmentState;
  exitReason: ExitReason;
  partial: boolean;
  candidate: CandidateProfile;
  persona: Persona;
  aggregate: {
    meanScore: number;
    highestScore: number;
    averageConfidence: number;
    questionsIssued: number;
    questionsAnswered: number;
    questionsSkipped: number;
  };
  recommendation: {
    label: RecommendationLabel;
    summary: string;
  };
  questions: ReportQuestionDetail[];
  resumeConsistency: ResumeConsistencySummary | null;
  sentimentTrend: ReportSentimentPoint[];
  annotations: string[];
  startedAt: string;
  completedAt: string;
}
