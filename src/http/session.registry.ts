import { randomUUID } from "node:crypto";
import { AssessmentEngine } from "../assessment/assessment.engine";
import { Logger } from "../config/logger";

export type EngineFactory = (sessionId: string) => AssessmentEngine;

export class UnknownSessionError extends Error {
  constructor(readonly sessionId: string) {
    super(`Unknown assessment session: ${sessionId}`);
    this.name = "UnknownSessionError";
  }
}

/**
 * In-memory engines keyed by session id. A session stays until it is removed.
 */
export class SessionRegistry {
  private readonly engines = new Map<string, AssessmentEngine>();

  constructor(
    private readonly createEngine: EngineFactory,
    private readonly logger: Logger,
    private readonly generateId: () => string = randomUUID,
  ) {}

  create(): AssessmentEngine {
    const sessionId = this.generateId();
    if (this.engines.has(sessionId)) {
      throw new Error(`Session id collision: ${sessionId}`);
    }
    const engine = this.createEngine(sessionId);
    this.engines.set(sessionId, engine);
    this.logger.info("session.created", { sessionId, activeSessions: this.engines.size });
    return engine;
  }

  get(sessionId: string): AssessmentEngine {
    const engine = this.engines.get(sessionId);
    if (!engine) {
      throw new UnknownSessionError(sessionId);
    }
    return engine;
  }

  remove(sessionId: string): void {
    if (!this.engines.delete(sessionId)) {
      throw new UnknownSessionError(sessionId);
    }
    this.logger.info("session.removed", { sessionId, activeSessions: this.engines.size });
  }

  size(): number {
    return this.engines.size;
  }
}
