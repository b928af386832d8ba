import { CandidateProfile, Persona } from "../shared/types/assessment.types";

export const SENIOR_EXPERIENCE_YEARS = 8;

export function selectPersona(profile: Pick<CandidateProfile, "yearsOfExperience" | "desiredPosition">): Persona {
  const position = profile.desiredPosition.toLowerCase();

  if (profile.yearsOfExperience >= SENIOR_EXPERIENCE_YEARS || position.includes("senior")) {
    return "expert";
  }
  if (position.includes("research") || position.includes("data")) {
    return "analytical";
  }
  if (position.includes("design") || position.includes("ui")) {
    return "creative";
  }
  return "default";
}
