import {
  CandidateProfile,
  ResumeConsistencySummary,
  ResumeFieldCheck,
} from "../shared/types/assessment.types";
import { containsTerm, roundTo } from "../shared/utils/text-match";

const EXPERIENCE_TOLERANCE_YEARS = 2;
const MIN_POSITION_WORD_LENGTH = 4;

const YEARS_BEFORE_KEYWORD = /(\d{1,2})\s*\+?\s*(?:years?|yrs?)\b[^.\n]{0,40}?\b(?:experience|exp)\b/g;
const YEARS_AFTER_KEYWORD = /\b(?:experience|exp)\b[^.\n]{0,40}?(\d{1,2})\s*\+?\s*(?:years?|yrs?)\b/g;
const OPEN_DATE_RANGE = /\b((?:19|20)\d{2})\s*(?:-|–|—|to)\s*(?:present|current|now|today)\b/g;

export function extractExperienceYears(resumeText: string, now: Date): number[] {
  const text = resumeText.toLowerCase();
  const years: number[] = [];
  for (const pattern of [YEARS_BEFORE_KEYWORD, YEARS_AFTER_KEYWORD]) {
    for (const match of text.matchAll(pattern)) {
      const value = Number(match[1]);
      if (Number.isInteger(value)) {
        years.push(value);
      }
    }
  }
  for (const match of text.matchAll(OPEN_DATE_RANGE)) {
    const startYear = Number(match[1]);
    const span = now.getFullYear() - startYear;
    if (Number.isInteger(span) && span >= 0) {
      years.push(span);
    }
  }
  return years;
}

function checkExperience(
  profile: CandidateProfile,
  resumeText: string,
  now: Date,
  findings: string[],
): ResumeFieldCheck {
  const declaredValue = String(profile.yearsOfExperience);
  const found = extractExperienceYears(resumeText, now);
  if (!found.length) {
    return { field: "years_of_experience", declaredValue, status: "unverifiable" };
  }
  const maxYears = Math.max(...found);
  if (Math.abs(maxYears - profile.yearsOfExperience) > EXPERIENCE_TOLERANCE_YEARS) {
    findings.push(
      `Experience discrepancy: claimed ${profile.yearsOfExperience} years, resume suggests ${maxYears} years`,
    );
    return { field: "years_of_experience", declaredValue, status: "unmatched" };
  }
  return { field: "years_of_experience", declaredValue, status: "matched" };
}

function checkPosition(profile: CandidateProfile, resumeText: string, findings: string[]): ResumeFieldCheck {
  const declaredValue = profile.desiredPosition;
  const position = declaredValue.trim().toLowerCase();
  const significantWords = position
    .split(/[^a-z0-9+#.]+/)
    .filter((word) => word.length >= MIN_POSITION_WORD_LENGTH);

  const matched =
    containsTerm(resumeText, position) || significantWords.some((word) => containsTerm(resumeText, word));
  if (!matched) {
    findings.push("Desired position is not reflected in the resume content");
  }
  return { field: "desired_position", declaredValue, status: matched ? "matched" : "unmatched" };
}

/**
 * Compares declared profile fields with the extracted resume text. Annotates only;
 * never blocks the assessment.
 */
export function checkResumeConsistency(
  profile: CandidateProfile,
  resumeText: string,
  now: Date = new Date(),
): ResumeConsistencySummary {
  const findings: string[] = [];
  const fields: ResumeFieldCheck[] = [
    checkExperience(profile, resumeText, now, findings),
    checkPosition(profile, resumeText, findings),
  ];

  const missingSkills: string[] = [];
  for (const skill of profile.techStack) {
    const present = containsTerm(resumeText, skill);
    if (!present) {
      missingSkills.push(skill);
    }
    fields.push({ field: "tech_stack", declaredValue: skill, status: present ? "matched" : "unmatched" });
  }
  if (missingSkills.length) {
    findings.push(`Skills declared but not found in resume: ${missingSkills.join(", ")}`);
  }

  const matched = fields.filter((item) => item.status === "matched").length;
  const unmatched = fields.filter((item) => item.status === "unmatched").length;
  const denominator = matched + unmatched;

  return {
    fields,
    consistencyRatio: denominator === 0 ? 0 : roundTo(matched / denominator, 4),
    findings,
  };
}
