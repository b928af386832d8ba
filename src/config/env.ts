import dotenv from "dotenv";
import { AssessmentConfig } from "../shared/types/state.types";
import { LogLevel } from "./logger";

dotenv.config();

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;
  openaiApiKey?: string;
  openaiBaseUrl: string;
  openaiChatModel: string;
  openaiFallbackModels: string[];
  llmTimeoutMs: number;
  llmMaxAttempts: number;
  llmBackoffMs: number;
  assessmentMaxQuestions: number;
  assessmentSkipThreshold: number;
  assessmentSimilarityCutoff: number;
  assessmentExitKeywords: string[];
}

export const DEFAULT_EXIT_KEYWORDS = ["exit", "quit", "stop", "end assessment", "end"];

export const DEFAULT_ASSESSMENT_CONFIG: AssessmentConfig = Object.freeze({
  maxQuestions: 15,
  skipThreshold: 3,
  similarityCutoff: 0.7,
  exitKeywords: Object.freeze([...DEFAULT_EXIT_KEYWORDS]),
  difficultyWindow: 3,
  promoteThreshold: 0.75,
  demoteThreshold: 0.4,
});

function getOptionalTrimmed(source: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const portRaw = source.PORT ?? "3000";
  const port = Number(portRaw);
  const logLevel = parseLogLevel((source.LOG_LEVEL ?? "info").trim().toLowerCase());
  const timeoutRaw = source.LLM_TIMEOUT_MS ?? "10000";
  const llmTimeoutMs = Number(timeoutRaw);
  const attemptsRaw = source.LLM_MAX_ATTEMPTS ?? "3";
  const llmMaxAttempts = Number(attemptsRaw);
  const backoffRaw = source.LLM_BACKOFF_MS ?? "250";
  const llmBackoffMs = Number(backoffRaw);
  const maxQuestionsRaw = source.ASSESSMENT_MAX_QUESTIONS ?? String(DEFAULT_ASSESSMENT_CONFIG.maxQuestions);
  const assessmentMaxQuestions = Number(maxQuestionsRaw);
  const skipThresholdRaw = source.ASSESSMENT_SKIP_THRESHOLD ?? String(DEFAULT_ASSESSMENT_CONFIG.skipThreshold);
  const assessmentSkipThreshold = Number(skipThresholdRaw);
  const cutoffRaw = source.ASSESSMENT_SIMILARITY_CUTOFF ?? String(DEFAULT_ASSESSMENT_CONFIG.similarityCutoff);
  const assessmentSimilarityCutoff = Number(cutoffRaw);

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isInteger(llmTimeoutMs) || llmTimeoutMs < 100) {
    throw new Error(`Invalid LLM_TIMEOUT_MS value: ${timeoutRaw}`);
  }
  if (!Number.isInteger(llmMaxAttempts) || llmMaxAttempts < 1 || llmMaxAttempts > 10) {
    throw new Error(`Invalid LLM_MAX_ATTEMPTS value: ${attemptsRaw}`);
  }
  if (!Number.isInteger(llmBackoffMs) || llmBackoffMs < 0) {
    throw new Error(`Invalid LLM_BACKOFF_MS value: ${backoffRaw}`);
  }
  if (!Number.isInteger(assessmentMaxQuestions) || assessmentMaxQuestions < 1) {
    throw new Error(`Invalid ASSESSMENT_MAX_QUESTIONS value: ${maxQuestionsRaw}`);
  }
  if (!Number.isInteger(assessmentSkipThreshold) || assessmentSkipThreshold < 0) {
    throw new Error(`Invalid ASSESSMENT_SKIP_THRESHOLD value: ${skipThresholdRaw}`);
  }
  if (
    !Number.isFinite(assessmentSimilarityCutoff) ||
    assessmentSimilarityCutoff <= 0 ||
    assessmentSimilarityCutoff > 1
  ) {
    throw new Error(
      `Invalid ASSESSMENT_SIMILARITY_CUTOFF value: ${cutoffRaw}. Expected number in (0, 1].`,
    );
  }

  const exitKeywords = parseList(source.ASSESSMENT_EXIT_KEYWORDS?.toLowerCase());

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    port,
    logLevel,
    openaiApiKey: getOptionalTrimmed(source, "OPENAI_API_KEY"),
    openaiBaseUrl: (getOptionalTrimmed(source, "OPENAI_BASE_URL") ?? "https://api.openai.com/v1").replace(/\/+$/, ""),
    openaiChatModel: getOptionalTrimmed(source, "OPENAI_CHAT_MODEL") ?? "gpt-4o-mini",
    openaiFallbackModels: parseList(source.OPENAI_FALLBACK_MODELS),
    llmTimeoutMs,
    llmMaxAttempts,
    llmBackoffMs,
    assessmentMaxQuestions,
    assessmentSkipThreshold,
    assessmentSimilarityCutoff,
    assessmentExitKeywords: exitKeywords.length ? exitKeywords : [...DEFAULT_EXIT_KEYWORDS],
  };
}

export function buildAssessmentConfig(env: EnvConfig): AssessmentConfig {
  return Object.freeze({
    ...DEFAULT_ASSESSMENT_CONFIG,
    maxQuestions: env.assessmentMaxQuestions,
    skipThreshold: env.assessmentSkipThreshold,
    similarityCutoff: env.assessmentSimilarityCutoff,
    exitKeywords: Object.freeze([...env.assessmentExitKeywords]),
  });
}

function parseList(rawValue: string | undefined): string[] {
  const values = (rawValue || "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return Array.from(new Set(values));
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}
