import { RetryPolicy } from "../src/ai/retry-policy";
import { TextGenerator } from "../src/ai/llm.client";
import { AnswerEvaluatorService } from "../src/assessment/answer-evaluator.service";
import { AssessmentEngine } from "../src/assessment/assessment.engine";
import { QuestionBank } from "../src/assessment/question-bank";
import { QuestionGeneratorService } from "../src/assessment/question-generator.service";
import { DEFAULT_ASSESSMENT_CONFIG } from "../src/config/env";
import { createLogger } from "../src/config/logger";
import { formatReportText } from "../src/reporting/report.formatter";
import { GenerationError } from "../src/shared/errors";

/**
 * Offline generator: question prompts get a topic-specific question, evaluation
 * prompts get a fixed JSON score. Every fourth question call fails so the bank
 * fallback shows up in the run.
 */
const QUESTION_TEMPLATES = [
  "Explain how {focus} handles errors at runtime.",
  "Describe one production incident you traced back to {focus}.",
  "Which testing strategy suits {focus} code best, and why?",
  "Compare two ways of structuring a growing {focus} codebase.",
];

class ScriptedGenerator implements TextGenerator {
  private questionCalls = 0;

  async generate(prompt: string, context: ReadonlyArray<string>): Promise<string> {
    if (prompt.includes("technical_accuracy")) {
      return JSON.stringify({
        technical_accuracy: 0.9,
        completeness: 0.8,
        clarity: 0.85,
        practical_understanding: 0.7,
        feedback: ["Clear explanation of the core idea."],
      });
    }
    this.questionCalls += 1;
    if (this.questionCalls % 4 === 0) {
      throw new GenerationError("simulated outage", "http_error", 400);
    }
    const focus = /"focus_area":\s*"([^"]+)"/.exec(prompt)?.[1] ?? "software design";
    const template = QUESTION_TEMPLATES[context.length % QUESTION_TEMPLATES.length] ?? "Explain {focus}.";
    return `Question ${context.length + 1}: ${template.replace("{focus}", focus)}`;
  }

  getModelName(): string {
    return "scripted";
  }
}

const ANSWERS = [
  "I definitely use it daily; the api layer validates input and the database schema enforces constraints.",
  "skip",
  "We profiled performance, found an algorithm with quadratic complexity and replaced it with a hash lookup.",
  "exit",
];

async function run(): Promise<void> {
  const logger = createLogger({ minLevel: "warn" });
  const generator = new ScriptedGenerator();
  const policy = new RetryPolicy({ maxAttempts: 2, backoffMs: 0, timeoutMs: 1_000 }, logger);
  const engine = new AssessmentEngine({
    sessionId: "simulated-session",
    config: DEFAULT_ASSESSMENT_CONFIG,
    questions: new QuestionGeneratorService(
      generator,
      policy,
      QuestionBank.loadDefault(),
      DEFAULT_ASSESSMENT_CONFIG,
      logger,
    ),
    scorer: new AnswerEvaluatorService(generator, policy, logger),
    logger,
  });

  engine.start({
    fullName: "Sam Example",
    email: "sam@example.com",
    phone: "+1 555 010 0000",
    location: "Remote",
    yearsOfExperience: 4,
    desiredPosition: "Backend Engineer",
    techStack: "TypeScript, PostgreSQL",
  });

  for (const reply of ANSWERS) {
    const decision = await engine.nextQuestion();
    if (decision.kind === "terminated") {
      break;
    }
    console.log(`Q${decision.question.id} [${decision.question.tier}/${decision.question.source}] ${decision.question.text}`);
    console.log(`A: ${reply}`);
    if (reply === "skip") {
      engine.skipQuestion();
      continue;
    }
    const outcome = await engine.submitAnswer(reply);
    if (outcome.kind === "exited") {
      break;
    }
    console.log(`   score=${outcome.evaluation.score} sentiment=${outcome.evaluation.sentiment}`);
  }

  console.log("");
  console.log(formatReportText(engine.exportReport()));
}

run().catch((error) => {
  console.error("simulate-flow failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
