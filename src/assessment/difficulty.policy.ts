import { DIFFICULTY_TIERS, DifficultyTier } from "../shared/types/assessment.types";
import { AssessmentConfig } from "../shared/types/state.types";

export type DifficultyPolicyConfig = Pick<
  AssessmentConfig,
  "difficultyWindow" | "promoteThreshold" | "demoteThreshold"
>;

export function tierIndex(tier: DifficultyTier): number {
  return DIFFICULTY_TIERS.indexOf(tier);
}

export function stepTier(tier: DifficultyTier, delta: -1 | 0 | 1): DifficultyTier {
  const index = Math.min(DIFFICULTY_TIERS.length - 1, Math.max(0, tierIndex(tier) + delta));
  return DIFFICULTY_TIERS[index] ?? tier;
}

/**
 * Tier for the next question. The first question is always basic; after that the
 * mean of the last `difficultyWindow` scores moves the tier by at most one step.
 */
export function nextDifficultyTier(
  previousTier: DifficultyTier | null,
  scores: ReadonlyArray<number>,
  config: DifficultyPolicyConfig,
): DifficultyTier {
  if (previousTier === null) {
    return "basic";
  }
  const window = scores.slice(-Math.max(1, config.difficultyWindow));
  if (!window.length) {
    return previousTier;
  }
  const mean = window.reduce((sum, score) => sum + score, 0) / window.length;
  if (mean >= config.promoteThreshold) {
    return stepTier(previousTier, 1);
  }
  if (mean <= config.demoteThreshold) {
    return stepTier(previousTier, -1);
  }
  return previousTier;
}

/**
 * Planned tier first, then its neighbours that stay within one step of the previous
 * question's tier. The first question has no alternatives.
 */
export function fallbackTiers(planned: DifficultyTier, previousTier: DifficultyTier | null): DifficultyTier[] {
  const tiers: DifficultyTier[] = [planned];
  if (previousTier === null) {
    return tiers;
  }
  for (const delta of [-1, 1] as const) {
    const tier = stepTier(planned, delta);
    if (!tiers.includes(tier) && Math.abs(tierIndex(tier) - tierIndex(previousTier)) <= 1) {
      tiers.push(tier);
    }
  }
  return tiers;
}
