import { SessionInvariantViolation } from "../shared/errors";
import {
  RecommendationLabel,
  ReportPayload,
  ReportQuestionDetail,
  ReportSentimentPoint,
} from "../shared/types/report.types";
import { AssessmentSession } from "../shared/types/state.types";

export const STRONG_CANDIDATE_SCORE = 0.8;
export const QUALIFIED_CANDIDATE_SCORE = 0.6;

export function recommendationFor(meanScore: number): RecommendationLabel {
  if (meanScore >= STRONG_CANDIDATE_SCORE) {
    return "strong_candidate";
  }
  if (meanScore >= QUALIFIED_CANDIDATE_SCORE) {
    return "qualified_candidate";
  }
  return "needs_further_assessment";
}

function recommendationSummary(label: RecommendationLabel, answered: number): string {
  switch (label) {
    case "strong_candidate":
      return `Strong technical performance across ${answered} answered question(s). Recommended for the next round.`;
    case "qualified_candidate":
      return `Solid performance across ${answered} answered question(s) with some gaps worth probing.`;
    case "needs_further_assessment":
      return answered
        ? `Performance across ${answered} answered question(s) was below the qualifying bar. Further assessment needed.`
        : "No questions were answered, so there is not enough evidence for a recommendation.";
  }
}

/**
 * Builds the export payload from a terminal session. Reads only stored values, so the
 * same session always yields the same payload.
 */
export function buildReportPayload(session: AssessmentSession): ReportPayload {
  const { profile, persona, exitReason, startedAt, completedAt } = session;
  if (!profile || !persona || !exitReason || !startedAt || !completedAt) {
    throw new SessionInvariantViolation(`Session ${session.sessionId} is not ready for export`);
  }

  const questions: ReportQuestionDetail[] = session.turns.map((turn) => ({
    questionId: turn.question.id,
    questionText: turn.question.text,
    focusArea: { ...turn.question.focusArea },
    tier: turn.question.tier,
    source: turn.question.source,
    answerText: turn.answer && !turn.answer.skipped ? turn.answer.text : null,
    skipped: turn.answer?.skipped ?? false,
    score: turn.evaluation ? turn.evaluation.score : null,
    feedback: turn.evaluation ? [...turn.evaluation.feedback] : [],
    sentiment: turn.evaluation ? turn.evaluation.sentiment : null,
    confidenceScore: turn.evaluation ? turn.evaluation.confidenceScore : null,
    scoringPath: turn.evaluation ? turn.evaluation.scoringPath : null,
  }));

  const sentimentTrend: ReportSentimentPoint[] = session.turns.flatMap((turn) =>
    turn.evaluation
      ? [
          {
            questionId: turn.question.id,
            sentiment: turn.evaluation.sentiment,
            confidenceScore: turn.evaluation.confidenceScore,
          },
        ]
      : [],
  );

  const scores = questions.flatMap((item) => (item.score === null ? [] : [item.score]));
  const answered = scores.length;
  const label = recommendationFor(session.aggregate.meanScore);

  return {
    sessionId: session.sessionId,
    state: session.state,
    exitReason,
    partial: session.state === "aborted",
    candidate: { ...profile, techStack: [...profile.techStack] },
    persona,
    aggregate: {
      meanScore: session.aggregate.meanScore,
      highestScore: scores.length ? Math.max(...scores) : 0,
      averageConfidence: session.aggregate.averageConfidence,
      questionsIssued: session.turns.length,
      questionsAnswered: answered,
      questionsSkipped: session.skipCount,
    },
    recommendation: {
      label,
      summary: recommendationSummary(label, answered),
    },
    questions,
    resumeConsistency: session.resumeConsistency,
    sentimentTrend,
    annotations: [...session.annotations],
    startedAt,
    completedAt,
  };
}
