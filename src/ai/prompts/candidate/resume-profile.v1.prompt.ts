export const RESUME_PROFILE_V1_PROMPT = `You extract candidate profile fields from resume text.

Input JSON:
{
  "resume_text": "string"
}

Output STRICT JSON:
{
  "full_name": "string",
  "email": "string",
  "phone": "string",
  "location": "string",
  "years_of_experience": number,
  "desired_position": "string",
  "tech_stack": ["string"]
}

Rules:
- Use an empty string for text fields the resume does not state.
- "years_of_experience" is a whole number of professional years, 0 if unknown.
- "desired_position" comes from the objective or the most recent role.
- "tech_stack" lists languages, frameworks, databases and tools named in the resume.
- Do not invent contact details.

Output constraints:
- Return JSON only.
- No markdown.
- No extra text.`;

export const RESUME_PROFILE_MAX_CHARS = 4_000;

export function buildResumeProfileV1Prompt(input: { resumeText: string }): string {
  return [
    RESUME_PROFILE_V1_PROMPT,
    "",
    "Runtime input JSON:",
    JSON.stringify(
      {
        resume_text: input.resumeText.slice(0, RESUME_PROFILE_MAX_CHARS),
      },
      null,
      2,
    ),
  ].join("\n");
}
