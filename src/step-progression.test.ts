// Unit tests for ProtocolGraph

import { describe, it, expect } from "vitest";
import { ProtocolGraph, isTerminalStep } from "./step-progression.js";
import { DEFAULT_PROTOCOL } from "./protocol-steps.js";
import { ConfigurationError } from "./errors.js";
import type { ProtocolStep } from "./types.js";

function general(id: string, successor: string): ProtocolStep {
  return { id, name: `Step ${id}`, successor, category: "general", requiredSlots: {} };
}

function loadError(definitions: ProtocolStep[]): ConfigurationError {
  try {
    ProtocolGraph.load(definitions);
  } catch (err) {
    if (err instanceof ConfigurationError) return err;
    throw err;
  }
  throw new Error("expected ProtocolGraph.load() to throw");
}

describe("ProtocolGraph.load()", () => {
  it("loads the default 27-step protocol", () => {
    const graph = ProtocolGraph.load(DEFAULT_PROTOCOL);
    expect(graph.size).toBe(27);
    expect(graph.initialStep).toBe("0.1");
    expect(graph.getStep("9.2").successor).toBe("complete");
  });

  it("walks the default protocol from 0.1 to complete", () => {
    const graph = ProtocolGraph.load(DEFAULT_PROTOCOL);
    const visited: string[] = [];
    let cursor = graph.initialStep;
    while (!isTerminalStep(cursor)) {
      visited.push(cursor);
      cursor = graph.nextStep(cursor, "clear", false);
    }
    expect(cursor).toBe("complete");
    expect(visited).toHaveLength(27);
    expect(visited.slice(14, 21)).toEqual(["5.1", "5.2", "6.1", "6.2", "6.3", "6.4", "6.5"]);
  });

  it("rejects a cycle", () => {
    const err = loadError([general("a", "b"), general("b", "c"), general("c", "a")]);
    expect(err.problems).toEqual(["cycle detected: a → b → c → a"]);
  });

  it("rejects a self-loop", () => {
    const err = loadError([general("a", "a")]);
    expect(err.problems).toEqual(["cycle detected: a → a"]);
  });

  it("rejects an unknown successor", () => {
    const err = loadError([general("a", "b")]);
    expect(err.problems).toEqual(['step "a" has unknown successor "b"']);
  });

  it("rejects duplicate ids", () => {
    const err = loadError([general("a", "complete"), general("a", "complete")]);
    expect(err.problems).toEqual(['duplicate step id "a"']);
  });

  it("rejects steps that shadow a terminal id", () => {
    const err = loadError([general("a", "complete"), general("complete", "a")]);
    expect(err.problems).toEqual(['step "complete" uses a reserved terminal id']);
  });

  it("rejects a cycle closed through an age branch", () => {
    const err = loadError([
      general("a", "b"),
      { ...general("b", "complete"), ageBranch: { belowAge: 40, successor: "a" } },
    ]);
    expect(err.problems).toEqual(["cycle detected: a → b → a"]);
  });

  it("rejects an unknown age-branch successor and a non-positive bound", () => {
    const err = loadError([
      { ...general("a", "complete"), ageBranch: { belowAge: 0, successor: "z" } },
    ]);
    expect(err.problems).toEqual([
      'step "a" has unknown age-branch successor "z"',
      'step "a" has an invalid age-branch bound (0)',
    ]);
  });

  it("rejects an empty protocol", () => {
    expect(() => ProtocolGraph.load([])).toThrow(ConfigurationError);
  });

  it("accepts a step whose successor is the escalation terminal", () => {
    const graph = ProtocolGraph.load([general("a", "escalate_to_professional")]);
    expect(graph.nextStep("a", "clear", false)).toBe("escalate_to_professional");
  });
});

describe("nextStep()", () => {
  const graph = ProtocolGraph.load(DEFAULT_PROTOCOL);

  it("advances on a clear verdict", () => {
    expect(graph.nextStep("6.1", "clear", false)).toBe("6.2");
  });

  it("repeats the step on any other verdict", () => {
    for (const verdict of ["ambiguous", "unclear", "invalid"] as const) {
      expect(graph.nextStep("6.1", verdict, false)).toBe("6.1");
    }
  });

  it("escalates on a red flag regardless of verdict", () => {
    expect(graph.nextStep("6.1", "clear", true)).toBe("escalate_to_professional");
    expect(graph.nextStep("2.1", "invalid", true)).toBe("escalate_to_professional");
  });

  it("skips the presbyopia addition for a patient under 40", () => {
    expect(graph.nextStep("7.1", "clear", false, 39)).toBe("8.1");
  });

  it("keeps the presbyopia addition at 40 and over, or when age is unknown", () => {
    expect(graph.nextStep("7.1", "clear", false, 40)).toBe("7.2");
    expect(graph.nextStep("7.1", "clear", false, 67)).toBe("7.2");
    expect(graph.nextStep("7.1", "clear", false)).toBe("7.2");
  });

  it("repeats a branching step on an unclear verdict whatever the age", () => {
    expect(graph.nextStep("7.1", "ambiguous", false, 25)).toBe("7.1");
  });

  it("throws for an unknown step", () => {
    expect(() => graph.nextStep("10.1", "clear", false)).toThrow("Unknown protocol step: 10.1");
  });
});
