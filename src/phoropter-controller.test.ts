// Unit tests for PhoropterController

import { describe, it, expect, beforeEach, vi } from "vitest";
import { PhoropterController, QUESTION_KEYS } from "./phoropter-controller.js";
import { resolveEngineConfig } from "./engine-config.js";
import { ControllerState, Eye } from "./types.js";

describe("PhoropterController", () => {
  let controller: PhoropterController;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    controller = new PhoropterController(resolveEngineConfig());
  });

  // ─── adjustParameter ────────────────────────────────────────────────────────

  describe("adjustParameter()", () => {
    it("applies an accepted change and appends a history record", () => {
      const outcome = controller.adjustParameter(Eye.OD, "sphere", -0.25, "6.1");

      expect(outcome.accepted).toBe(true);
      expect(outcome.message).toBe("Adjusted OD sphere to -0.25D");
      expect(controller.getLens(Eye.OD).sphere).toBe(-0.25);

      const history = controller.snapshot().state.adjustmentHistory;
      expect(history).toHaveLength(1);
      expect(history[0]).toMatchObject({
        eye: Eye.OD,
        parameter: "sphere",
        magnitude: -0.25,
        previousValue: 0,
        newValue: -0.25,
        sourceStep: "6.1",
      });
    });

    it("returns a rejected_adjustment outcome without mutating state", () => {
      const outcome = controller.adjustParameter(Eye.OS, "sphere", 0.75);

      expect(outcome).toMatchObject({
        accepted: false,
        kind: "rejected_adjustment",
        reason: "unsafe_jump",
        request: { eye: Eye.OS, parameter: "sphere", magnitude: 0.75, sourceStep: null },
      });
      expect(controller.getLens(Eye.OS).sphere).toBe(0);
      expect(controller.snapshot().state.adjustmentHistory).toEqual([]);
    });

    it("leaves the other eye untouched", () => {
      controller.adjustParameter(Eye.OD, "cylinder", -0.5);
      expect(controller.getLens(Eye.OS)).toEqual({ sphere: 0, cylinder: 0, axis: 0 });
    });
  });

  // ─── JCC & duochrome ────────────────────────────────────────────────────────

  describe("applyJCCResult()", () => {
    it("moves the axis by +5 when the first orientation is clearer", () => {
      const outcome = controller.applyJCCResult(Eye.OD, "horizontal", "first_better");
      expect(outcome?.accepted).toBe(true);
      expect(controller.getLens(Eye.OD).axis).toBe(5);
    });

    it("adds minus cylinder when the first vertical orientation is clearer", () => {
      controller.applyJCCResult(Eye.OD, "vertical", "first_better");
      expect(controller.getLens(Eye.OD).cylinder).toBe(-0.25);
    });

    it("rejects reducing cylinder below plano", () => {
      const outcome = controller.applyJCCResult(Eye.OD, "vertical", "second_better");
      expect(outcome).toMatchObject({ accepted: false, reason: "out_of_range" });
      expect(controller.getLens(Eye.OD).cylinder).toBe(0);
    });

    it("returns null when both orientations look the same", () => {
      expect(controller.applyJCCResult(Eye.OS, "horizontal", "both_same")).toBeNull();
      expect(controller.snapshot().state.adjustmentHistory).toEqual([]);
    });
  });

  describe("applyDuochromeResult()", () => {
    it("nudges sphere by exactly -0.125 when red is clearer", () => {
      controller.adjustParameter(Eye.OD, "sphere", -0.5);
      const before = controller.getLens(Eye.OD).sphere;

      controller.applyDuochromeResult(Eye.OD, "red_clearer");

      expect(controller.getLens(Eye.OD).sphere).toBe(before - 0.125);
    });

    it("nudges sphere by exactly +0.125 when green is clearer", () => {
      const before = controller.getLens(Eye.OS).sphere;
      controller.applyDuochromeResult(Eye.OS, "green_clearer");
      expect(controller.getLens(Eye.OS).sphere).toBe(before + 0.125);
    });

    it("leaves sphere unchanged when both are equal", () => {
      const before = controller.getLens(Eye.OD).sphere;
      expect(controller.applyDuochromeResult(Eye.OD, "equal")).toBeNull();
      expect(controller.getLens(Eye.OD).sphere).toBe(before);
    });
  });

  // ─── Presentations ──────────────────────────────────────────────────────────

  describe("presentLensPair()", () => {
    it("builds a present_lens_pair command with the current occlusion", () => {
      const outcome = controller.presentLensPair(
        Eye.OD,
        { sphere: 0.25, cylinder: 0, axis: 0 },
        { sphere: 0, cylinder: 0, axis: 0 },
      );

      expect(outcome).toEqual({
        ok: true,
        command: {
          type: "present_lens_pair",
          eye: Eye.OD,
          occludedEye: Eye.OS,
          lensA: { sphere: 0.25, cylinder: 0, axis: 0 },
          lensB: { sphere: 0, cylinder: 0, axis: 0 },
          questionKey: QUESTION_KEYS.lensPair,
          options: ["first_better", "second_better", "both_same"],
        },
      });
    });

    it("rejects lenses outside the safe domain", () => {
      const outcome = controller.presentLensPair(
        Eye.OD,
        { sphere: 20.25, cylinder: 0, axis: 0 },
        { sphere: 20, cylinder: 0, axis: 0 },
      );
      expect(outcome).toEqual({
        ok: false,
        kind: "out_of_range",
        message: "Lens pair outside safe domain: lensA.sphere",
      });
    });
  });

  describe("presentJCC()", () => {
    it("lists the three JCC parts in order", () => {
      const outcome = controller.presentJCC(Eye.OS);
      expect(outcome.ok).toBe(true);
      if (outcome.ok && outcome.command.type === "present_jcc") {
        expect(outcome.command.sequence.map((s) => s.part)).toEqual([
          "horizontal",
          "vertical",
          "duochrome",
        ]);
        expect(outcome.command.eye).toBe(Eye.OS);
      }
    });

    it("starts the sequence at the requested part", () => {
      const outcome = controller.presentJCC(Eye.OD, "vertical");
      if (!outcome.ok || outcome.command.type !== "present_jcc") {
        throw new Error("expected a present_jcc command");
      }
      expect(outcome.command.sequence).toEqual([
        { part: "vertical", questionKey: "jcc.vertical.which_clearer" },
        { part: "duochrome", questionKey: "jcc.duochrome.red_or_green" },
      ]);
    });
  });

  // ─── Settings ───────────────────────────────────────────────────────────────

  describe("setPupillaryDistance()", () => {
    it("derives the near PD from the distance PD when not measured", () => {
      const outcome = controller.setPupillaryDistance(66);
      expect(outcome.ok).toBe(true);
      expect(controller.pupillaryDistance).toEqual({ distanceMm: 66, nearMm: 63 });
    });

    it("rejects a distance PD outside 50-80 mm", () => {
      const outcome = controller.setPupillaryDistance(85);
      expect(outcome).toEqual({
        ok: false,
        kind: "out_of_range",
        message: "PD out of range: 85mm not in [50, 80]",
      });
      expect(controller.pupillaryDistance).toEqual({ distanceMm: 63, nearMm: 60 });
    });

    it("rejects a near PD outside 45-75 mm", () => {
      const outcome = controller.setPupillaryDistance(60, 40);
      expect(outcome.ok).toBe(false);
      if (!outcome.ok) expect(outcome.kind).toBe("out_of_range");
    });
  });

  describe("setOcclusion()", () => {
    it("occludes an eye or opens both", () => {
      controller.setOcclusion(Eye.OD);
      expect(controller.snapshot().state.occludedEye).toBe(Eye.OD);
      controller.setOcclusion(null);
      expect(controller.snapshot().state.occludedEye).toBeNull();
    });
  });

  // ─── Binocular balance ──────────────────────────────────────────────────────

  describe("balanceBinocular()", () => {
    it("nudges the fellow eye and requests a retest when one eye is clearer", () => {
      const outcome = controller.balanceBinocular("od_clearer");

      expect(outcome.status).toBe("retest");
      if (outcome.status === "retest") {
        expect(outcome.adjustment.accepted).toBe(true);
        expect(outcome.command.type).toBe("balance_binocular");
      }
      expect(controller.getLens(Eye.OS).sphere).toBe(-0.25);
      expect(controller.getLens(Eye.OD).sphere).toBe(0);
    });

    it("finalizes when both eyes are equal", () => {
      const outcome = controller.balanceBinocular("equal");

      expect(outcome.status).toBe("finalized");
      expect(controller.controllerState).toBe(ControllerState.FINALIZED);
    });

    it("finalizes with current values once the retest budget is spent", () => {
      const limited = new PhoropterController(resolveEngineConfig({ nudges: { maxBalanceIterations: 1 } }));

      expect(limited.balanceBinocular("os_clearer").status).toBe("retest");
      expect(limited.balanceBinocular("os_clearer").status).toBe("finalized");
      expect(limited.getLens(Eye.OD).sphere).toBe(-0.25);
    });
  });

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  describe("lifecycle", () => {
    it("finalize() returns the prescription and a finalize command", () => {
      controller.adjustParameter(Eye.OD, "sphere", -0.5);
      const outcome = controller.finalize();

      expect(outcome.ok).toBe(true);
      if (outcome.ok) {
        expect(outcome.snapshot.od.sphere).toBe(-0.5);
        expect(outcome.command.type).toBe("finalize");
      }
      expect(controller.snapshot().finalPrescription?.od.sphere).toBe(-0.5);
    });

    it("snapshot() returns a copy of the final prescription", () => {
      controller.finalize();
      const leaked = controller.snapshot().finalPrescription;
      if (!leaked) throw new Error("expected a final prescription");
      leaked.od.sphere = 12;
      leaked.pupillaryDistance.distanceMm = 99;

      const fresh = controller.snapshot().finalPrescription;
      expect(fresh?.od.sphere).toBe(0);
      expect(fresh?.pupillaryDistance.distanceMm).toBe(63);
    });

    it("finalize() twice is an invalid transition", () => {
      controller.finalize();
      const second = controller.finalize();
      expect(second).toEqual({
        ok: false,
        kind: "invalid_transition",
        message: 'Invalid state transition: cannot call finalize() in "finalized" state.',
      });
    });

    it("rejects adjustments and presentations after finalize without touching history", () => {
      controller.adjustParameter(Eye.OD, "sphere", 0.25);
      controller.finalize();

      const adjust = controller.adjustParameter(Eye.OD, "sphere", 0.25);
      const present = controller.presentLensPair(
        Eye.OD,
        { sphere: 0.5, cylinder: 0, axis: 0 },
        { sphere: 0.25, cylinder: 0, axis: 0 },
      );

      expect(adjust).toMatchObject({ accepted: false, kind: "invalid_transition" });
      expect(present).toMatchObject({ ok: false, kind: "invalid_transition" });
      expect(controller.snapshot().state.adjustmentHistory).toHaveLength(1);
    });

    it("escalate() halts with a shutdown command", () => {
      const outcome = controller.escalate("red_flag");

      expect(outcome).toEqual({
        reason: "red_flag",
        command: { type: "escalate", reason: "red_flag", action: "shutdown" },
        alreadyHalted: false,
      });
      expect(controller.controllerState).toBe(ControllerState.HALTED);
    });

    it("escalate() is idempotent and keeps the first reason", () => {
      controller.escalate("red_flag");
      const second = controller.escalate("duration_exceeded");

      expect(second.alreadyHalted).toBe(true);
      expect(second.reason).toBe("red_flag");
      expect(controller.snapshot().haltReason).toBe("red_flag");
    });

    it("escalate() still halts a finalized controller", () => {
      controller.finalize();
      controller.escalate("operator_abort");
      expect(controller.controllerState).toBe(ControllerState.HALTED);
    });

    it("rejects balanceBinocular() once halted", () => {
      controller.escalate("operator_abort");
      const outcome = controller.balanceBinocular("equal");
      expect(outcome).toMatchObject({ status: "rejected", kind: "invalid_transition" });
    });
  });
});
