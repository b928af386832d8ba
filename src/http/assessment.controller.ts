import { Request, Response, Router } from "express";
import { Logger } from "../config/logger";
import { DocumentService, ResumeUpload } from "../documents/document.service";
import { ResumeProfileDraft, ResumeProfileExtractorService } from "../profiles/resume-profile-extractor.service";
import { formatReportText } from "../reporting/report.formatter";
import {
  AssessmentCommandError,
  ValidationError,
  ValidationIssue,
  errorMessage,
} from "../shared/errors";
import { ResumeExtraction } from "../shared/types/assessment.types";
import { SessionRegistry, UnknownSessionError } from "./session.registry";

interface AssessmentControllerDeps {
  registry: SessionRegistry;
  documents: DocumentService;
  resumeProfiles: ResumeProfileExtractorService;
  logger: Logger;
}

export interface HttpErrorResponse {
  status: number;
  body: {
    ok: false;
    error: string;
    issues?: ReadonlyArray<ValidationIssue>;
  };
}

export function toHttpError(error: unknown): HttpErrorResponse {
  if (error instanceof ValidationError) {
    return { status: 400, body: { ok: false, error: error.message, issues: error.issues } };
  }
  if (error instanceof UnknownSessionError) {
    return { status: 404, body: { ok: false, error: error.message } };
  }
  if (error instanceof AssessmentCommandError) {
    return { status: 409, body: { ok: false, error: error.message } };
  }
  return { status: 500, body: { ok: false, error: "Internal server error" } };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads `{ fileName?, mimeType?, contentBase64 }` from the start request.
 */
export function parseResumeUpload(value: unknown): ResumeUpload | null {
  if (!isRecord(value) || typeof value.contentBase64 !== "string" || !value.contentBase64.trim()) {
    return null;
  }
  return {
    buffer: Buffer.from(value.contentBase64, "base64"),
    fileName: typeof value.fileName === "string" ? value.fileName : undefined,
    mimeType: typeof value.mimeType === "string" ? value.mimeType : undefined,
  };
}

/**
 * Suggests profile fields from an uploaded resume. Nothing is stored; the client
 * reviews the draft and sends it back through `start`.
 */
export async function parseResumeProfile(
  body: unknown,
  documents: DocumentService,
  resumeProfiles: ResumeProfileExtractorService,
): Promise<ResumeProfileDraft | null> {
  const upload = isRecord(body) ? parseResumeUpload(body.resume) : null;
  if (!upload) {
    throw new ValidationError([{ field: "resume", message: "must include base64 content" }]);
  }
  const extraction = await documents.extractResume(upload);
  if (!extraction.ok) {
    throw new ValidationError([{ field: "resume", message: "could not be read" }]);
  }
  return resumeProfiles.extract(extraction.text);
}

function readSessionId(request: Request): string {
  const sessionId = request.params.id;
  return typeof sessionId === "string" ? sessionId : "";
}

export function buildAssessmentController(deps: AssessmentControllerDeps): Router {
  const router = Router();

  const handle =
    (handler: (request: Request, response: Response) => Promise<void> | void) =>
    async (request: Request, response: Response): Promise<void> => {
      try {
        await handler(request, response);
      } catch (error) {
        const mapped = toHttpError(error);
        if (mapped.status >= 500) {
          deps.logger.error("http.request.failed", {
            method: request.method,
            path: request.path,
            error: errorMessage(error),
          });
        } else {
          deps.logger.debug("http.request.rejected", {
            method: request.method,
            path: request.path,
            status: mapped.status,
            error: errorMessage(error),
          });
        }
        response.status(mapped.status).json(mapped.body);
      }
    };

  router.post(
    "/",
    handle((_request, response) => {
      const engine = deps.registry.create();
      response.status(201).json({ ok: true, session: engine.getSnapshot() });
    }),
  );

  router.post(
    "/:id/start",
    handle(async (request, response) => {
      const engine = deps.registry.get(readSessionId(request));
      const body: unknown = request.body;
      const profile = isRecord(body) ? body.profile : undefined;
      const upload = isRecord(body) ? parseResumeUpload(body.resume) : null;
      let resume: ResumeExtraction | undefined;
      if (upload) {
        resume = await deps.documents.extractResume(upload);
      }
      const session = engine.start(profile, resume);
      response.status(200).json({ ok: true, session });
    }),
  );

  router.post(
    "/:id/resume/parse",
    handle(async (request, response) => {
      deps.registry.get(readSessionId(request));
      const profile = await parseResumeProfile(request.body, deps.documents, deps.resumeProfiles);
      response.status(200).json({ ok: true, profile });
    }),
  );

  router.post(
    "/:id/questions/next",
    handle(async (request, response) => {
      const engine = deps.registry.get(readSessionId(request));
      const decision = await engine.nextQuestion();
      response.status(200).json({ ok: true, decision });
    }),
  );

  router.post(
    "/:id/answer",
    handle(async (request, response) => {
      const engine = deps.registry.get(readSessionId(request));
      const body: unknown = request.body;
      const text = isRecord(body) && typeof body.text === "string" ? body.text : "";
      const outcome = await engine.submitAnswer(text);
      response.status(200).json({ ok: true, outcome });
    }),
  );

  router.post(
    "/:id/skip",
    handle((request, response) => {
      const outcome = deps.registry.get(readSessionId(request)).skipQuestion();
      response.status(200).json({ ok: true, outcome });
    }),
  );

  router.post(
    "/:id/complete",
    handle((request, response) => {
      const decision = deps.registry.get(readSessionId(request)).completeEarly();
      response.status(200).json({ ok: true, decision });
    }),
  );

  router.post(
    "/:id/reset",
    handle((request, response) => {
      const session = deps.registry.get(readSessionId(request)).reset();
      response.status(200).json({ ok: true, session });
    }),
  );

  router.get(
    "/:id",
    handle((request, response) => {
      response.status(200).json({ ok: true, session: deps.registry.get(readSessionId(request)).getSnapshot() });
    }),
  );

  router.delete(
    "/:id",
    handle((request, response) => {
      const sessionId = readSessionId(request);
      deps.registry.remove(sessionId);
      response.status(200).json({ ok: true, sessionId });
    }),
  );

  router.get(
    "/:id/report",
    handle((request, response) => {
      response.status(200).json({ ok: true, report: deps.registry.get(readSessionId(request)).exportReport() });
    }),
  );

  router.get(
    "/:id/report.txt",
    handle((request, response) => {
      const report = deps.registry.get(readSessionId(request)).exportReport();
      response
        .status(200)
        .type("text/plain")
        .attachment(`assessment-${report.sessionId}.txt`)
        .send(formatReportText(report));
    }),
  );

  return router;
}
