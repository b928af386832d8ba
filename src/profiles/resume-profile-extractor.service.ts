import { TextGenerator } from "../ai/llm.client";
import { callJsonPromptSafe } from "../ai/llm.safe";
import { buildResumeProfileV1Prompt } from "../ai/prompts/candidate/resume-profile.v1.prompt";
import { RetryPolicy } from "../ai/retry-policy";
import { Logger } from "../config/logger";
import { CandidateProfile } from "../shared/types/assessment.types";
import { MAX_YEARS_OF_EXPERIENCE, isValidEmail, isValidPhone, parseTechStack } from "./profile.validator";

/**
 * Profile fields found in a resume. Only fields the resume actually states are set;
 * the caller still runs the full profile validation before starting a session.
 */
export type ResumeProfileDraft = Partial<CandidateProfile>;

export class ResumeProfileExtractorService {
  constructor(
    private readonly generator: TextGenerator,
    private readonly policy: RetryPolicy,
    private readonly logger: Logger,
  ) {}

  async extract(resumeText: string): Promise<ResumeProfileDraft | null> {
    const text = resumeText.trim();
    if (!text) {
      return null;
    }

    const safe = await callJsonPromptSafe<ResumeProfileDraft>({
      generator: this.generator,
      policy: this.policy,
      logger: this.logger,
      prompt: buildResumeProfileV1Prompt({ resumeText: text }),
      promptName: "resume_profile_v1",
      schemaHint:
        "Resume profile JSON with full_name, email, phone, location, years_of_experience, desired_position and tech_stack.",
      validate: normalizeResumeProfile,
    });
    if (!safe.ok) {
      this.logger.warn("resume.profile.extract_failed", { error_code: safe.error_code });
      return null;
    }

    const fields = Object.keys(safe.data);
    if (!fields.length) {
      this.logger.info("resume.profile.empty", { resumeChars: text.length });
      return null;
    }
    this.logger.info("resume.profile.extracted", { fields });
    return safe.data;
  }
}

export function normalizeResumeProfile(raw: Record<string, unknown>): ResumeProfileDraft {
  const fullName = nonBlank(raw.full_name);
  const email = nonBlank(raw.email);
  const phone = nonBlank(raw.phone);
  const location = nonBlank(raw.location);
  const desiredPosition = nonBlank(raw.desired_position);
  const yearsOfExperience = toYears(raw.years_of_experience);
  const techStack = parseTechStack(raw.tech_stack);

  return {
    ...(fullName ? { fullName } : {}),
    ...(email && isValidEmail(email) ? { email } : {}),
    ...(phone && isValidPhone(phone) ? { phone } : {}),
    ...(location ? { location } : {}),
    ...(yearsOfExperience !== null ? { yearsOfExperience } : {}),
    ...(desiredPosition ? { desiredPosition } : {}),
    ...(techStack.length ? { techStack } : {}),
  };
}

function nonBlank(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

function toYears(value: unknown): number | null {
  const numeric =
    typeof value === "number" ? value : typeof value === "string" && value.trim() ? Number(value.trim()) : Number.NaN;
  if (!Number.isFinite(numeric) || numeric < 0) {
    return null;
  }
  const years = Math.round(numeric);
  return years <= MAX_YEARS_OF_EXPERIENCE ? years : null;
}
