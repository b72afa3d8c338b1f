import { describe, it, expect } from "vitest";
import { RequestStateMachine, isValidRequestTransition } from "../src/models/request-state";

describe("isValidRequestTransition", () => {
  it("should allow the forward transitions", () => {
    expect(isValidRequestTransition("received", "retrieving")).toBe(true);
    expect(isValidRequestTransition("retrieving", "retrieval_failed")).toBe(true);
    expect(isValidRequestTransition("retrieval_failed", "recorded")).toBe(true);
    expect(isValidRequestTransition("routing", "delivery_failed")).toBe(true);
    expect(isValidRequestTransition("recorded", "terminal")).toBe(true);
  });

  it("should reject skipped and backward transitions", () => {
    expect(isValidRequestTransition("received", "routing")).toBe(false);
    expect(isValidRequestTransition("retrieval_failed", "routing")).toBe(false);
    expect(isValidRequestTransition("delivered", "routing")).toBe(false);
    expect(isValidRequestTransition("terminal", "received")).toBe(false);
  });
});

describe("RequestStateMachine", () => {
  it("should walk the success path to terminal", () => {
    const machine = new RequestStateMachine();
    for (const state of [
      "retrieving",
      "retrieved",
      "routing",
      "delivered",
      "recorded",
      "terminal",
    ] as const) {
      machine.transition(state);
    }

    expect(machine.isTerminal()).toBe(true);
    expect(machine.getHistory()).toEqual([
      "received",
      "retrieving",
      "retrieved",
      "routing",
      "delivered",
      "recorded",
      "terminal",
    ]);
  });

  it("should throw on an invalid transition", () => {
    const machine = new RequestStateMachine();
    expect(() => machine.transition("delivered")).toThrow(
      "Invalid transition from received to delivered",
    );
    expect(machine.getState()).toBe("received");
    expect(machine.isTerminal()).toBe(false);
  });
});
