export const JSON_REPAIR_V1_PROMPT = `You repair malformed JSON produced by another model.

You receive:
- schema_hint, a plain text description of the expected object.
- raw, the malformed output.

Rules:
- Return one valid JSON object only.
- Keep keys and values as close to raw as possible.
- No commentary, no markdown fences.
- Unknown numeric fields become null, unknown lists become [].`;

export function buildJsonRepairV1Prompt(input: {
  schemaHint: string;
  raw: string;
}): string {
  return [
    JSON_REPAIR_V1_PROMPT,
    "",
    "Input JSON:",
    JSON.stringify(
      {
        schema_hint: input.schemaHint,
        raw: input.raw,
      },
      null,
      2,
    ),
  ].join("\n");
}
