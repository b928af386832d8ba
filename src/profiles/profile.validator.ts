import { ValidationError, ValidationIssue } from "../shared/errors";
import { CandidateProfile } from "../shared/types/assessment.types";

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const MAX_TEXT = 200;
const MAX_TECH_ENTRIES = 20;
export const MAX_YEARS_OF_EXPERIENCE = 60;

export function isValidEmail(value: string): boolean {
  return EMAIL_PATTERN.test(value.trim());
}

export function isValidPhone(value: string): boolean {
  const digits = value.replace(/[\s\-()]/g, "").replace(/^\+/, "");
  return /^\d{7,15}$/.test(digits);
}

/**
 * Accepts an array of names or one comma-separated string. Blank entries are dropped
 * and duplicates removed case-insensitively, keeping the first spelling.
 */
export function parseTechStack(value: unknown): string[] {
  const rawEntries = Array.isArray(value)
    ? value.filter((item): item is string => typeof item === "string")
    : typeof value === "string"
      ? value.split(",")
      : [];
  const seen = new Set<string>();
  const result: string[] = [];
  for (const entry of rawEntries) {
    const trimmed = entry.trim().slice(0, MAX_TEXT);
    const key = trimmed.toLowerCase();
    if (!trimmed || seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push(trimmed);
  }
  return result.slice(0, MAX_TECH_ENTRIES);
}

export function validateCandidateProfile(raw: unknown): CandidateProfile {
  if (!isRecord(raw)) {
    throw new ValidationError([{ field: "profile", message: "must be an object" }]);
  }
  const input = raw;
  const issues: ValidationIssue[] = [];

  const fullName = requiredText(input.fullName, "fullName", issues);
  const email = requiredText(input.email, "email", issues);
  if (email && !isValidEmail(email)) {
    issues.push({ field: "email", message: "is not a valid email address" });
  }
  const phone = requiredText(input.phone, "phone", issues);
  if (phone && !isValidPhone(phone)) {
    issues.push({ field: "phone", message: "must contain 7 to 15 digits" });
  }
  const location = requiredText(input.location, "location", issues);
  const desiredPosition = requiredText(input.desiredPosition, "desiredPosition", issues);
  const yearsOfExperience = parseYears(input.yearsOfExperience, issues);

  const techStack = parseTechStack(input.techStack);
  if (!techStack.length) {
    issues.push({ field: "techStack", message: "must list at least one technology" });
  }

  if (issues.length) {
    throw new ValidationError(issues);
  }

  return Object.freeze({
    fullName,
    email,
    phone,
    location,
    yearsOfExperience,
    desiredPosition,
    techStack: Object.freeze(techStack),
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requiredText(value: unknown, field: string, issues: ValidationIssue[]): string {
  const text = typeof value === "string" ? value.trim() : "";
  if (!text) {
    issues.push({ field, message: "is required" });
    return "";
  }
  if (text.length > MAX_TEXT) {
    issues.push({ field, message: `must be at most ${MAX_TEXT} characters` });
  }
  return text;
}

function parseYears(value: unknown, issues: ValidationIssue[]): number {
  const numeric =
    typeof value === "number"
      ? value
      : typeof value === "string" && value.trim()
        ? Number(value.trim())
        : Number.NaN;
  if (!Number.isInteger(numeric) || numeric < 0 || numeric > MAX_YEARS_OF_EXPERIENCE) {
    issues.push({
      field: "yearsOfExperience",
      message: `must be a whole number between 0 and ${MAX_YEARS_OF_EXPERIENCE}`,
    });
    return 0;
  }
  return numeric;
}
