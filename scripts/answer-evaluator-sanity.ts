import "dotenv/config";
import { LlmClient } from "../src/ai/llm.client";
import { RetryPolicy } from "../src/ai/retry-policy";
import { AnswerEvaluatorService } from "../src/assessment/answer-evaluator.service";
import { loadEnv } from "../src/config/env";
import { createLogger } from "../src/config/logger";

async function run(): Promise<void> {
  const env = loadEnv();
  if (!env.openaiApiKey) {
    throw new Error("OPENAI_API_KEY is required for sanity:answer-evaluator");
  }

  const logger = createLogger({ minLevel: env.logLevel });
  const llmClient = new LlmClient(
    {
      apiKey: env.openaiApiKey,
      baseUrl: env.openaiBaseUrl,
      model: env.openaiChatModel,
      fallbackModels: env.openaiFallbackModels,
    },
    logger,
  );
  const policy = new RetryPolicy(
    { maxAttempts: env.llmMaxAttempts, backoffMs: env.llmBackoffMs, timeoutMs: env.llmTimeoutMs },
    logger,
  );
  const evaluator = new AnswerEvaluatorService(llmClient, policy, logger);

  const question = "How does a database index speed up reads, and what does it cost on writes?";
  const vagueAnswer = "um, maybe it makes things faster, like a cache or something";
  const detailedAnswer =
    "A B-tree index keeps keys sorted so a lookup walks O(log n) pages instead of scanning the table. " +
    "Every insert or update must also maintain the index pages, so write latency and storage grow with each index. " +
    "I add indexes for the columns in frequent WHERE and JOIN clauses and check the query plan before and after.";

  const vague = await evaluator.evaluate({ questionId: 1, question, answer: vagueAnswer, techStack: ["PostgreSQL"] });
  const detailed = await evaluator.evaluate({
    questionId: 2,
    question,
    answer: detailedAnswer,
    techStack: ["PostgreSQL"],
  });

  console.log("Vague answer evaluation:", vague.evaluation);
  console.log("Detailed answer evaluation:", detailed.evaluation);

  if (detailed.evaluation.scoringPath !== "llm") {
    throw new Error(`Expected the collaborator to score the answer, got ${detailed.evaluation.scoringPath}`);
  }
  if (detailed.evaluation.score <= vague.evaluation.score) {
    throw new Error("Expected the detailed answer to score higher than the vague one");
  }

  console.log("answer-evaluator sanity passed");
}

run().catch((error) => {
  console.error("answer-evaluator sanity failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
