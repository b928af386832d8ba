import { AssessmentState } from "../shared/types/state.types";

const transitionRules: Record<AssessmentState, AssessmentState[]> = {
  collecting: ["assessing"],
  assessing: ["completed", "aborted"],
  completed: [],
  aborted: [],
};

export function isAllowedTransition(from: AssessmentState, to: AssessmentState): boolean {
  return transitionRules[from].includes(to);
}

export function isTerminalState(state: AssessmentState): boolean {
  return transitionRules[state].length === 0;
}
