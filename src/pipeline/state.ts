export type RunStatus = "Done" | "PartialFailure" | "Failed";

export type RunState = "Idle" | "Searching" | "Analyzing" | "Formatting" | "Translating" | "Distributing" | RunStatus;

export type Transition = { from: RunState; to: RunState; at: string };

const FORWARD: RunState[] = ["Idle", "Searching", "Analyzing", "Formatting", "Translating", "Distributing"];

export function isTerminal(state: RunState): state is RunStatus {
  return state === "Done" || state === "PartialFailure" || state === "Failed";
}

/**
 * Forward only, one step at a time. Failed is reachable only from the
 * mandatory stages; Done and PartialFailure only once distribution ran.
 */
export function canTransition(from: RunState, to: RunState): boolean {
  if (isTerminal(from)) return false;
  if (to === "Failed") return from === "Searching" || from === "Analyzing";
  if (to === "Done" || to === "PartialFailure") return from === "Distributing";
  return FORWARD.indexOf(to) === FORWARD.indexOf(from) + 1;
}

export class RunStateMachine {
  private current: RunState = "Idle";
  private readonly history: Transition[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  get state(): RunState {
    return this.current;
  }

  get transitions(): Transition[] {
    return [...this.history];
  }

  transition(to: RunState): void {
    if (!canTransition(this.current, to)) {
      throw new Error(`invalid run transition ${this.current} -> ${to}`);
    }
    this.history.push({ from: this.current, to, at: this.now().toISOString() });
    this.current = to;
  }
}
