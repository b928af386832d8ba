import {
  FocusArea,
  GENERAL_FOCUS_AREAS,
  GeneralFocusArea,
  Persona,
} from "../shared/types/assessment.types";

export const QUESTIONS_PER_STACK_ENTRY = 2;

export const PERSONA_GENERAL_ROTATION: Record<Persona, ReadonlyArray<GeneralFocusArea>> = {
  default: ["architecture", "debugging", "best-practices"],
  expert: ["architecture", "debugging", "best-practices"],
  analytical: ["algorithms", "data-modeling", "architecture", "debugging", "best-practices"],
  creative: ["best-practices", "architecture", "debugging"],
};

export function focusAreaKey(focusArea: FocusArea): string {
  return `${focusArea.kind}:${focusArea.name.trim().toLowerCase()}`;
}

/**
 * Round-robin over tech-stack entries until each has two questions, then the
 * persona's rotation of general categories.
 */
export function nextFocusArea(
  techStack: ReadonlyArray<string>,
  issued: ReadonlyArray<FocusArea>,
  persona: Persona,
): FocusArea {
  const coverage = new Map<string, number>();
  let generalIssued = 0;
  for (const focusArea of issued) {
    if (focusArea.kind === "general") {
      generalIssued += 1;
      continue;
    }
    const key = focusAreaKey(focusArea);
    coverage.set(key, (coverage.get(key) ?? 0) + 1);
  }

  let best: { name: string; count: number } | null = null;
  for (const entry of techStack) {
    const count = coverage.get(focusAreaKey({ kind: "tech_stack", name: entry })) ?? 0;
    if (count >= QUESTIONS_PER_STACK_ENTRY) {
      continue;
    }
    if (!best || count < best.count) {
      best = { name: entry, count };
    }
  }
  if (best) {
    return { kind: "tech_stack", name: best.name };
  }

  const rotation = PERSONA_GENERAL_ROTATION[persona];
  const name = rotation[generalIssued % rotation.length] ?? "architecture";
  return { kind: "general", name };
}

/**
 * Order in which the question bank is searched when the planned focus area has nothing
 * left: the planned area, every stack entry, the persona's rotation, then the remaining
 * general categories. Each area appears once.
 */
export function fallbackFocusAreas(
  planned: FocusArea,
  techStack: ReadonlyArray<string>,
  persona: Persona,
): FocusArea[] {
  const ordered: FocusArea[] = [
    planned,
    ...techStack.map((name): FocusArea => ({ kind: "tech_stack", name })),
    ...PERSONA_GENERAL_ROTATION[persona].map((name): FocusArea => ({ kind: "general", name })),
    ...GENERAL_FOCUS_AREAS.map((name): FocusArea => ({ kind: "general", name })),
  ];
  const seen = new Set<string>();
  return ordered.filter((focusArea) => {
    const key = focusAreaKey(focusArea);
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}
