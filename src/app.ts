import express, { Express, Request, Response } from "express";
import { AnswerEvaluatorService } from "./assessment/answer-evaluator.service";
import { AssessmentEngine } from "./assessment/assessment.engine";
import { QuestionBank } from "./assessment/question-bank";
import { QuestionGeneratorService } from "./assessment/question-generator.service";
import { LlmClient, TextGenerator } from "./ai/llm.client";
import { RetryPolicy } from "./ai/retry-policy";
import { EnvConfig, buildAssessmentConfig } from "./config/env";
import { createLogger, Logger } from "./config/logger";
import { DocumentService } from "./documents/document.service";
import { buildAssessmentController } from "./http/assessment.controller";
import { SessionRegistry } from "./http/session.registry";
import { ResumeProfileExtractorService } from "./profiles/resume-profile-extractor.service";

export interface AppContext {
  app: Express;
  logger: Logger;
  registry: SessionRegistry;
  generator: TextGenerator;
}

export interface AppOverrides {
  logger?: Logger;
  generator?: TextGenerator;
  bank?: QuestionBank;
  generateId?: () => string;
}

export function createApp(env: EnvConfig, overrides: AppOverrides = {}): AppContext {
  const logger = overrides.logger ?? createLogger({ minLevel: env.logLevel });
  const app = express();

  app.use(express.json({ limit: "5mb" }));

  const generator =
    overrides.generator ??
    new LlmClient(
      {
        apiKey: env.openaiApiKey,
        baseUrl: env.openaiBaseUrl,
        model: env.openaiChatModel,
        fallbackModels: env.openaiFallbackModels,
      },
      logger,
    );
  const retryPolicy = new RetryPolicy(
    {
      maxAttempts: env.llmMaxAttempts,
      backoffMs: env.llmBackoffMs,
      timeoutMs: env.llmTimeoutMs,
    },
    logger,
  );
  const config = buildAssessmentConfig(env);
  const bank = overrides.bank ?? QuestionBank.loadDefault();
  const questionGenerator = new QuestionGeneratorService(generator, retryPolicy, bank, config, logger);
  const answerEvaluator = new AnswerEvaluatorService(generator, retryPolicy, logger);
  const documentService = new DocumentService(logger);
  const resumeProfiles = new ResumeProfileExtractorService(generator, retryPolicy, logger);

  const registry = new SessionRegistry(
    (sessionId) =>
      new AssessmentEngine({
        sessionId,
        config,
        questions: questionGenerator,
        scorer: answerEvaluator,
        logger,
      }),
    logger,
    overrides.generateId,
  );

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true, sessions: registry.size() });
  });

  app.use(
    "/sessions",
    buildAssessmentController({
      registry,
      documents: documentService,
      resumeProfiles,
      logger,
    }),
  );

  return { app, logger, registry, generator };
}
