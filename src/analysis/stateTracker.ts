import type { CategoryState } from "../report/schema.js";

const ORDER: Record<CategoryState, number> = {
  PENDING: 0,
  SCORED: 1,
  SELECTED: 2,
  EVALUATED: 3,
  ASSESSED: 4,
  FAILED: 5,
};

export function isTerminal(state: CategoryState): boolean {
  return state === "ASSESSED" || state === "FAILED";
}

/**
 * Per-category lifecycle: PENDING → SCORED → SELECTED → EVALUATED → ASSESSED,
 * with FAILED reachable from any non-terminal state. Forward steps may skip
 * states (an empty selection goes straight to ASSESSED); nothing moves back.
 */
export class CategoryStateTracker {
  private current: CategoryState = "PENDING";
  private readonly history: CategoryState[] = ["PENDING"];

  get state(): CategoryState {
    return this.current;
  }

  get trace(): CategoryState[] {
    return [...this.history];
  }

  advance(next: CategoryState): void {
    if (isTerminal(this.current)) {
      throw new Error(`Illegal transition ${this.current} → ${next}: state is terminal`);
    }
    if (next !== "FAILED" && ORDER[next] <= ORDER[this.current]) {
      throw new Error(`Illegal transition ${this.current} → ${next}`);
    }
    this.current = next;
    this.history.push(next);
  }
}
