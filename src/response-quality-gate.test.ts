// Unit tests for the response quality gate

import { describe, it, expect } from "vitest";
import { assessResponse, findMissingSlots } from "./response-quality-gate.js";
import { DEFAULT_PROTOCOL } from "./protocol-steps.js";
import { DEFAULT_ENGINE_CONFIG } from "./engine-config.js";
import type { ProtocolStep } from "./types.js";

const thresholds = DEFAULT_ENGINE_CONFIG.quality;

function step(id: string): ProtocolStep {
  const found = DEFAULT_PROTOCOL.find((s) => s.id === id);
  if (!found) throw new Error(`no step ${id}`);
  return found;
}

describe("assessResponse()", () => {
  it("is clear at high confidence with the required slot", () => {
    const verdict = assessResponse(
      0.95,
      "refraction_feedback",
      { clarity_feedback: "first_better" },
      step("6.1"),
      thresholds,
    );
    expect(verdict).toEqual({
      quality: "clear",
      confidence: 0.95,
      requiredSlotsPresent: true,
      missingSlots: [],
    });
  });

  it("maps confidence bands to unclear / ambiguous / clear", () => {
    const general = step("0.1");
    expect(assessResponse(0.29, "greeting", {}, general, thresholds).quality).toBe("unclear");
    expect(assessResponse(0.3, "greeting", {}, general, thresholds).quality).toBe("ambiguous");
    expect(assessResponse(0.59, "greeting", {}, general, thresholds).quality).toBe("ambiguous");
    expect(assessResponse(0.6, "greeting", {}, general, thresholds).quality).toBe("clear");
  });

  it("is ambiguous at 0.45 even with the required slot", () => {
    const verdict = assessResponse(
      0.45,
      "refraction_feedback",
      { clarity_feedback: "first_better" },
      step("6.1"),
      thresholds,
    );
    expect(verdict.quality).toBe("ambiguous");
  });

  it("treats invalid and unknown intents as invalid regardless of confidence", () => {
    expect(assessResponse(0.99, "invalid", {}, step("0.1"), thresholds).quality).toBe("invalid");
    expect(assessResponse(0.99, "unknown", {}, step("0.1"), thresholds).quality).toBe("invalid");
  });

  it("downgrades clear to ambiguous when a required slot is missing", () => {
    const verdict = assessResponse(0.9, "refraction_feedback", {}, step("6.3"), thresholds);
    expect(verdict).toEqual({
      quality: "ambiguous",
      confidence: 0.9,
      requiredSlotsPresent: false,
      missingSlots: ["clarity_feedback"],
    });
  });

  it("downgrades clear to ambiguous when a slot holds an unrecognized value", () => {
    const verdict = assessResponse(
      0.9,
      "near_vision",
      { color_preference: "blue" },
      step("7.1"),
      thresholds,
    );
    expect(verdict.quality).toBe("ambiguous");
    expect(verdict.missingSlots).toEqual(["color_preference"]);
  });

  it("accepts the near-vision vocabulary on 7.x steps", () => {
    for (const value of ["red", "green", "both"]) {
      const verdict = assessResponse(0.8, "near_vision", { color_preference: value }, step("7.2"), thresholds);
      expect(verdict.quality).toBe("clear");
    }
  });
});

describe("findMissingSlots()", () => {
  it("returns nothing for steps without required slots", () => {
    expect(findMissingSlots({}, step("4.2"))).toEqual([]);
  });

  it("accepts a recognized optional slot and ignores undeclared ones", () => {
    expect(
      findMissingSlots({ clarity_feedback: "both_same", jcc_part: "vertical", note: "x" }, step("6.2")),
    ).toEqual([]);
  });

  it("does not require an optional slot", () => {
    expect(findMissingSlots({ clarity_feedback: "first_better" }, step("6.4"))).toEqual([]);
  });

  it("reports an optional slot sent with an unrecognized value", () => {
    expect(
      findMissingSlots({ clarity_feedback: "first_better", jcc_part: "vertcal" }, step("6.2")),
    ).toEqual(["jcc_part"]);
  });
});

describe("assessResponse() with optional slots", () => {
  it("downgrades a misspelled JCC part to ambiguous", () => {
    const verdict = assessResponse(
      0.9,
      "refraction_feedback",
      { clarity_feedback: "first_better", jcc_part: "vertcal" },
      step("6.2"),
      thresholds,
    );
    expect(verdict).toEqual({
      quality: "ambiguous",
      confidence: 0.9,
      requiredSlotsPresent: false,
      missingSlots: ["jcc_part"],
    });
  });
});
