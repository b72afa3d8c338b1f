import type { RequestState } from "./download.model";

const REQUEST_TRANSITIONS: Record<RequestState, RequestState[]> = {
  received: ["retrieving"],
  retrieving: ["retrieved", "retrieval_failed"],
  retrieved: ["routing"],
  retrieval_failed: ["recorded"],
  routing: ["delivered", "delivery_failed"],
  delivered: ["recorded"],
  delivery_failed: ["recorded"],
  recorded: ["terminal"],
  terminal: [],
};

export function isValidRequestTransition(from: RequestState, to: RequestState): boolean {
  return REQUEST_TRANSITIONS[from].includes(to);
}

export class RequestStateMachine {
  private state: RequestState = "received";
  private readonly history: RequestState[] = ["received"];

  getState(): RequestState {
    return this.state;
  }

  getHistory(): RequestState[] {
    return [...this.history];
  }

  isTerminal(): boolean {
    return REQUEST_TRANSITIONS[this.state].length === 0;
  }

  transition(to: RequestState): void {
    if (!isValidRequestTransition(this.state, to)) {
      throw new Error(`Invalid transition from ${this.state} to ${to}`);
    }
    this.state = to;
    this.history.push(to);
  }
}
