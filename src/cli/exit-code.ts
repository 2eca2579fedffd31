import type { ResolutionOutcome } from "../core/orchestrator";

/** A skipped pass is not an error: CI runs on test branches must stay green. */
export function exitCodeFor(outcome: ResolutionOutcome): number {
  switch (outcome.status) {
    case "failed":
      return 1;
    case "skipped":
    case "resolved":
      return 0;
  }
}
