import { SessionInvariantViolation } from "../shared/errors";
import { AssessmentState } from "../shared/types/state.types";
import { isAllowedTransition } from "./transition-rules";

export function assertTransition(from: AssessmentState, to: AssessmentState): void {
  if (!isAllowedTransition(from, to)) {
    throw new SessionInvariantViolation(`Invalid transition from ${from} to ${to}`);
  }
}
