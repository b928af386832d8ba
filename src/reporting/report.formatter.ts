import { getPersonaStyle } from "../ai/system/interviewer.system";
import { describeFocusArea } from "../ai/prompts/interview/question-generator.v1.prompt";
import { ReportPayload, ReportQuestionDetail } from "../shared/types/report.types";

const EXIT_REASON_LABELS: Record<ReportPayload["exitReason"], string> = {
  max_questions: "All questions answered",
  explicit_exit: "Candidate ended the assessment",
  early_completion: "Completed early",
  skip_threshold: "Too many skipped questions",
  question_pool_exhausted: "No further questions available",
};

const RECOMMENDATION_LABELS: Record<ReportPayload["recommendation"]["label"], string> = {
  strong_candidate: "Strong candidate",
  qualified_candidate: "Qualified candidate",
  needs_further_assessment: "Needs further assessment",
};

function percent(score: number): string {
  return `${Math.round(score * 100)}%`;
}

function formatQuestion(item: ReportQuestionDetail): string[] {
  const lines = [
    `Q${item.questionId} [${item.tier}, ${describeFocusArea(item.focusArea)}]: ${item.questionText}`,
  ];
  if (item.skipped) {
    lines.push("  Skipped");
    return lines;
  }
  if (item.answerText === null) {
    lines.push("  Not answered");
    return lines;
  }
  lines.push(`  Answer: ${item.answerText}`);
  if (item.score !== null) {
    lines.push(`  Score: ${percent(item.score)} (${item.scoringPath ?? "unknown"})`);
  }
  if (item.sentiment !== null && item.confidenceScore !== null) {
    lines.push(`  Confidence: ${item.sentiment} (${item.confidenceScore}/100)`);
  }
  for (const point of item.feedback) {
    lines.push(`  - ${point}`);
  }
  return lines;
}

export function formatReportText(report: ReportPayload): string {
  const { candidate, aggregate } = report;
  const lines: string[] = [
    "TECHNICAL ASSESSMENT REPORT",
    "",
    `Candidate: ${candidate.fullName} <${candidate.email}>`,
    `Position: ${candidate.desiredPosition}`,
    `Experience: ${candidate.yearsOfExperience} year(s)`,
    `Tech stack: ${candidate.techStack.join(", ")}`,
    `Interviewer: ${getPersonaStyle(report.persona).title}`,
    "",
    `Status: ${report.state}${report.partial ? " (partial)" : ""}`,
    `Exit reason: ${EXIT_REASON_LABELS[report.exitReason]}`,
    `Started: ${report.startedAt}`,
    `Completed: ${report.completedAt}`,
    "",
    `Overall score: ${percent(aggregate.meanScore)}`,
    `Highest score: ${percent(aggregate.highestScore)}`,
    `Average confidence: ${aggregate.averageConfidence}/100`,
    `Questions: ${aggregate.questionsIssued} issued, ${aggregate.questionsAnswered} answered, ${aggregate.questionsSkipped} skipped`,
    `Recommendation: ${RECOMMENDATION_LABELS[report.recommendation.label]}`,
    report.recommendation.summary,
  ];

  if (report.resumeConsistency) {
    lines.push("", `Resume consistency: ${percent(report.resumeConsistency.consistencyRatio)}`);
    for (const finding of report.resumeConsistency.findings) {
      lines.push(`- ${finding}`);
    }
  }

  if (report.questions.length) {
    lines.push("", "QUESTIONS");
    for (const item of report.questions) {
      lines.push(...formatQuestion(item));
    }
  }

  if (report.annotations.length) {
    lines.push("", "NOTES");
    for (const annotation of report.annotations) {
      lines.push(`- ${annotation}`);
    }
  }

  return `${lines.join("\n")}\n`;
}
