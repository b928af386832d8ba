import questionBankData from "../../data/question-bank.json";
import { DIFFICULTY_TIERS, DifficultyTier, FocusArea } from "../shared/types/assessment.types";
import { isTooSimilar } from "./similarity";

type TierEntries = Readonly<Record<DifficultyTier, ReadonlyArray<string>>>;

export interface QuestionBankData {
  readonly aliases: Readonly<Record<string, string>>;
  readonly templates: TierEntries;
  readonly focusAreas: Readonly<Record<string, TierEntries>>;
}

const TECH_PLACEHOLDER = "{tech}";

/**
 * Static fallback questions keyed by focus area and tier. Immutable after load, so
 * one instance can be shared by every session.
 */
export class QuestionBank {
  private constructor(private readonly data: QuestionBankData) {}

  static fromData(raw: unknown): QuestionBank {
    return new QuestionBank(deepFreeze(parseQuestionBankData(raw)));
  }

  static loadDefault(): QuestionBank {
    return QuestionBank.fromData(questionBankData);
  }

  resolveKey(focusArea: FocusArea): string | null {
    const normalized = focusArea.name.trim().toLowerCase();
    if (focusArea.kind === "general") {
      return this.data.focusAreas[normalized] ? normalized : null;
    }
    const compact = normalized.replace(/\s+/g, " ");
    const candidates = [compact, this.data.aliases[compact], compact.replace(/[.\s-]+/g, "")];
    for (const candidate of candidates) {
      if (candidate && this.data.focusAreas[candidate]) {
        return candidate;
      }
    }
    return null;
  }

  /**
   * Every bank question for (focus area, tier) in preference order: curated entries
   * first, then the tech templates for stack entries.
   */
  candidates(focusArea: FocusArea, tier: DifficultyTier): string[] {
    const key = this.resolveKey(focusArea);
    const curated = key ? [...(this.data.focusAreas[key]?.[tier] ?? [])] : [];
    if (focusArea.kind === "general") {
      return curated;
    }
    const templated = this.data.templates[tier].map((template) =>
      template.split(TECH_PLACEHOLDER).join(focusArea.name.trim()),
    );
    return [...curated, ...templated];
  }

  pick(
    focusArea: FocusArea,
    tier: DifficultyTier,
    previous: ReadonlyArray<string>,
    similarityCutoff: number,
  ): string | null {
    const used = new Set(previous.map((item) => item.trim().toLowerCase()));
    for (const candidate of this.candidates(focusArea, tier)) {
      if (used.has(candidate.trim().toLowerCase())) {
        continue;
      }
      if (isTooSimilar(candidate, previous, similarityCutoff)) {
        continue;
      }
      return candidate;
    }
    return null;
  }
}

export function parseQuestionBankData(raw: unknown): QuestionBankData {
  if (!isRecord(raw)) {
    throw new Error("Question bank must be a JSON object");
  }
  const focusAreasRaw = raw.focusAreas;
  if (!isRecord(focusAreasRaw)) {
    throw new Error("Question bank is missing focusAreas");
  }
  const focusAreas: Record<string, TierEntries> = {};
  for (const [key, value] of Object.entries(focusAreasRaw)) {
    focusAreas[key.trim().toLowerCase()] = parseTierEntries(value, `focusAreas.${key}`);
  }

  const aliases: Record<string, string> = {};
  if (isRecord(raw.aliases)) {
    for (const [alias, target] of Object.entries(raw.aliases)) {
      if (typeof target === "string" && target.trim()) {
        aliases[alias.trim().toLowerCase()] = target.trim().toLowerCase();
      }
    }
  }

  return {
    aliases,
    templates: parseTierEntries(raw.templates, "templates"),
    focusAreas,
  };
}

function parseTierEntries(value: unknown, path: string): TierEntries {
  if (!isRecord(value)) {
    throw new Error(`Question bank entry ${path} must be an object keyed by tier`);
  }
  const entries: Record<DifficultyTier, string[]> = {
    basic: [],
    intermediate: [],
    practical: [],
    advanced: [],
    expert: [],
  };
  for (const tier of DIFFICULTY_TIERS) {
    const list = value[tier];
    if (list === undefined) {
      continue;
    }
    if (!Array.isArray(list)) {
      throw new Error(`Question bank entry ${path}.${tier} must be an array`);
    }
    entries[tier] = list
      .map((item) => (typeof item === "string" ? item.trim() : ""))
      .filter((item) => item.length > 0);
  }
  return entries;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}
