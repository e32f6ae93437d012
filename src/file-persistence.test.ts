// Unit tests for FilePersistence

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, readFile, readdir } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  FilePersistence,
  buildDirectoryName,
  formatAdjustmentHistory,
  formatTurnLog,
} from "./file-persistence.js";
import { RefractionEngine } from "./refraction-engine.js";
import type { ExamSession } from "./session-manager.js";
import { Eye } from "./types.js";
import type { AdjustmentRecord, TurnInput } from "./types.js";

// ─── Test Helpers ─────────────────────────────────────────────────────────────

function makeSession(overrides: Partial<ExamSession> = {}): ExamSession {
  return {
    id: "test-session-123",
    patientId: "P-042",
    patientAge: 52,
    createdAt: new Date(2026, 0, 5, 9, 7, 3),
    engine: new RefractionEngine({ startStep: "6.1" }),
    turnLog: [],
    outputsSaved: false,
    ...overrides,
  };
}

function refractionTurn(clarity: string): TurnInput {
  return {
    intent: "refraction_feedback",
    confidence: 0.9,
    slots: { clarity_feedback: clarity },
    sentiment: "confident",
    redFlag: false,
    personaOverride: false,
    elapsedSeconds: 300,
  };
}

// ─── Format helpers ─────────────────────────────────────────────────────────

describe("buildDirectoryName()", () => {
  it("uses the local creation time and session id", () => {
    expect(buildDirectoryName(makeSession())).toBe("2026-01-05_09-07-03_test-session-123");
  });
});

describe("formatAdjustmentHistory()", () => {
  it("renders one line per adjustment", () => {
    const history: AdjustmentRecord[] = [
      {
        timestamp: new Date("2026-01-05T10:00:00.000Z"),
        eye: Eye.OD,
        parameter: "sphere",
        magnitude: 0.25,
        previousValue: 0,
        newValue: 0.25,
        sourceStep: "6.1",
      },
      {
        timestamp: new Date("2026-01-05T10:01:00.000Z"),
        eye: Eye.OS,
        parameter: "axis",
        magnitude: 5,
        previousValue: 90,
        newValue: 95,
        sourceStep: null,
      },
    ];

    expect(formatAdjustmentHistory(history)).toBe(
      "2026-01-05T10:00:00.000Z [6.1] OD sphere +0.25D → +0.25D (was 0.00D)\n" +
        "2026-01-05T10:01:00.000Z [-] OS axis +5° → 95° (was 90°)",
    );
  });

  it("returns an empty string for an empty history", () => {
    expect(formatAdjustmentHistory([])).toBe("");
  });
});

describe("formatTurnLog()", () => {
  it("serializes timestamps as ISO strings", () => {
    const json = formatTurnLog([
      {
        timestamp: new Date("2026-01-05T10:00:00.000Z"),
        stepId: "6.1",
        intent: "refraction_feedback",
        sentiment: "confident",
        confidence: 0.9,
        verdict: "clear",
        command: "present_jcc",
        nextStepId: "6.2",
      },
    ]);
    expect(JSON.parse(json)).toEqual([
      {
        timestamp: "2026-01-05T10:00:00.000Z",
        stepId: "6.1",
        intent: "refraction_feedback",
        sentiment: "confident",
        confidence: 0.9,
        verdict: "clear",
        command: "present_jcc",
        nextStepId: "6.2",
      },
    ]);
  });
});

// ─── saveSession ────────────────────────────────────────────────────────────

describe("FilePersistence", () => {
  let baseDir: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    baseDir = await mkdtemp(join(tmpdir(), "refraction-persistence-"));
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it("writes prescription, adjustments and session log into a timestamped directory", async () => {
    const session = makeSession();
    session.engine.processTurn(refractionTurn("second_better"));

    const persistence = new FilePersistence(baseDir);
    const paths = await persistence.saveSession(session);

    const dir = join(baseDir, "2026-01-05_09-07-03_test-session-123");
    expect(paths).toEqual([
      join(dir, "prescription.json"),
      join(dir, "adjustments.txt"),
      join(dir, "session-log.json"),
    ]);
    expect(await readdir(baseDir)).toEqual(["2026-01-05_09-07-03_test-session-123"]);
    expect(session.outputsSaved).toBe(true);

    const report = JSON.parse(await readFile(join(dir, "prescription.json"), "utf-8"));
    expect(report.sessionId).toBe("test-session-123");
    expect(report.patientId).toBe("P-042");
    expect(report.patientAge).toBe(52);
    expect(report.currentStep).toBe("6.2");
    expect(report.controllerState).toBe("active");
    expect(report.prescription.od).toEqual({
      sphere: -0.25,
      cylinder: 0,
      axis: 0,
      notation: "-0.25 / 0.00 x 0",
    });
    expect(report.prescription.pupillaryDistance).toEqual({ distanceMm: 63, nearMm: 60 });
    expect(report.escalation).toBeNull();
    expect(report.adjustmentHistory).toHaveLength(1);
    expect(report.safety.incidents).toEqual([]);
    expect(report.safety.fatigueScore).toBeCloseTo(0.03, 10);
    expect(report.safety.quality).toMatchObject({
      responsesAnalyzed: 1,
      parseSuccessRate: 1,
      deviceActions: 2,
      deviceSuccessRate: 1,
    });

    const adjustments = await readFile(join(dir, "adjustments.txt"), "utf-8");
    expect(adjustments).toMatch(/ \[6\.1\] OD sphere -0\.25D → -0\.25D \(was 0\.00D\)$/);

    const log = JSON.parse(await readFile(join(dir, "session-log.json"), "utf-8"));
    expect(log).toEqual([]);
  });

  it("records the escalation in the prescription report", async () => {
    const session = makeSession();
    session.engine.escalate("operator_abort");

    const paths = await new FilePersistence(baseDir).saveSession(session);
    const report = JSON.parse(await readFile(paths[0], "utf-8"));

    expect(report.controllerState).toBe("halted");
    expect(report.currentStep).toBe("escalate_to_professional");
    expect(report.escalation).toMatchObject({ reason: "operator_abort", stepId: "6.1" });
  });

  it("records safety incidents with ISO timestamps", async () => {
    const session = makeSession();
    session.engine.reportIncident({ type: "device_fault", description: "Occluder jammed", severity: "MEDIUM" });

    const paths = await new FilePersistence(baseDir).saveSession(session);
    const report = JSON.parse(await readFile(paths[0], "utf-8"));

    expect(report.safety.incidents).toHaveLength(1);
    expect(report.safety.incidents[0]).toMatchObject({
      type: "device_fault",
      description: "Occluder jammed",
      severity: "MEDIUM",
      stepId: "6.1",
    });
    expect(report.safety.incidents[0].timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });
});
