import { getPersonaStyle } from "../../system/interviewer.system";
import { DifficultyTier, FocusArea, Persona } from "../../../shared/types/assessment.types";

const TIER_GUIDANCE: Record<DifficultyTier, string> = {
  basic: "A basic concept or definition question, answerable in one or two sentences.",
  intermediate: "A fundamentals question about how a feature works, needing a brief explanation.",
  practical: "A practical scenario in a small real application, needing a focused solution in three or four sentences.",
  advanced: "A problem-solving question with a specific constraint or failure mode to reason about.",
  expert: "An advanced trade-off question comparing approaches under production constraints.",
};

export const QUESTION_GENERATOR_V1_PROMPT = `Generate exactly ONE technical interview question.

Rules:
- Target the given focus area and difficulty tier.
- It must be substantially different from every previously asked question listed in the context.
- Do not ask for a full code implementation.
- Return ONLY the question text. No numbering, no prefix, no commentary.`;

export function describeFocusArea(focusArea: FocusArea): string {
  if (focusArea.kind === "tech_stack") {
    return focusArea.name;
  }
  return `general ${focusArea.name.replace("-", " ")}`;
}

export function buildQuestionGeneratorV1Prompt(input: {
  tier: DifficultyTier;
  focusArea: FocusArea;
  persona: Persona;
  techStack: ReadonlyArray<string>;
  desiredPosition: string;
  attempt: number;
}): string {
  const style = getPersonaStyle(input.persona);
  const lines = [
    QUESTION_GENERATOR_V1_PROMPT,
    "",
    `Interviewer style: ${style.title}. ${style.tone}`,
    `Weigh towards: ${style.emphasis.join(", ")}.`,
    "",
    "Runtime input JSON:",
    JSON.stringify(
      {
        desired_position: input.desiredPosition,
        tech_stack: input.techStack,
        focus_area: describeFocusArea(input.focusArea),
        difficulty_tier: input.tier,
        tier_guidance: TIER_GUIDANCE[input.tier],
      },
      null,
      2,
    ),
  ];
  if (input.attempt > 1) {
    lines.push("", "IMPORTANT: earlier drafts were not usable. Ask from a different angle than any previous question.");
  }
  return lines.join("\n");
}
