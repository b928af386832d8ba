import { createApp } from "./app";
import { INTERVIEWER_SYSTEM_PROMPT } from "./ai/system/interviewer.system";
import { loadEnv } from "./config/env";

function bootstrap(): void {
  const env = loadEnv();
  const { app, logger, generator } = createApp(env);

  app.listen(env.port, () => {
    logger.info("Server started", { port: env.port, nodeEnv: env.nodeEnv });
    logger.info(`LLM chat model: ${generator.getModelName?.() ?? env.openaiChatModel}`);
    logger.info("LLM system prompt loaded", { length: INTERVIEWER_SYSTEM_PROMPT.length });
    if (!env.openaiApiKey) {
      logger.warn("OPENAI_API_KEY is not set, questions come from the static bank and answers are keyword-scored");
    }
  });
}

bootstrap();
