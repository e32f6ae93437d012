// Phoropter Refraction Engine - Phoropter Controller
// Owns the PhoropterState, applies validated adjustments and builds abstract
// device commands. Transport to real hardware is the caller's concern.
//
// Lifecycle:
//   ACTIVE → FINALIZED  finalize() (binocular balance agreed)
//   ACTIVE → HALTED     escalate()
//   FINALIZED → HALTED  escalate() (a safety stop still applies after finalize)
// FINALIZED and HALTED accept no further adjustments or presentations.

import { ControllerState, Eye } from "./types.js";
import type {
  AdjustmentOutcome,
  AdjustmentRecord,
  AdjustmentRequest,
  BinocularReport,
  ClarityFeedback,
  CommandOutcome,
  DeviceCommand,
  DuochromeResult,
  EscalationReason,
  JCCTestPart,
  LensConfiguration,
  PhoropterState,
  PrescriptionSnapshot,
  PupillaryDistance,
  RefractiveParameter,
  SettingOutcome,
  StepId,
} from "./types.js";
import type { EngineConfig } from "./engine-config.js";
import { validateAdjustment } from "./adjustment-validator.js";
import {
  cloneLens,
  clonePhoropterState,
  clonePrescription,
  createPhoropterState,
  formatDiopters,
  getLens,
  lensDomainViolations,
  otherEye,
  toPrescription,
} from "./lens-state.js";

// ─── Question keys (opaque; the orchestration layer owns the wording) ──────────

export const QUESTION_KEYS = {
  lensPair: "lens_pair.which_sharper",
  jccHorizontal: "jcc.horizontal.which_clearer",
  jccVertical: "jcc.vertical.which_clearer",
  duochrome: "jcc.duochrome.red_or_green",
  binocular: "binocular.which_eye_clearer",
} as const;

export const JCC_SEQUENCE: readonly { part: JCCTestPart; questionKey: string }[] = [
  { part: "horizontal", questionKey: QUESTION_KEYS.jccHorizontal },
  { part: "vertical", questionKey: QUESTION_KEYS.jccVertical },
  { part: "duochrome", questionKey: QUESTION_KEYS.duochrome },
];

export const LENS_PAIR_OPTIONS = ["first_better", "second_better", "both_same"];
export const BINOCULAR_OPTIONS = ["od_clearer", "os_clearer", "equal"];

// ─── Outcome types ──────────────────────────────────────────────────────────────

export type BalanceOutcome =
  | { status: "retest"; adjustment: AdjustmentOutcome; command: DeviceCommand }
  | { status: "finalized"; snapshot: PrescriptionSnapshot; command: DeviceCommand }
  | { status: "rejected"; kind: "invalid_transition"; message: string };

export type FinalizeOutcome =
  | { ok: true; snapshot: PrescriptionSnapshot; command: DeviceCommand }
  | { ok: false; kind: "invalid_transition"; message: string };

export interface EscalationOutcome {
  reason: EscalationReason;
  command: DeviceCommand;
  /** True when the controller was already halted; the reason is the original one. */
  alreadyHalted: boolean;
}

export interface ControllerSnapshot {
  controllerState: ControllerState;
  state: PhoropterState;
  haltReason: EscalationReason | null;
  finalPrescription: PrescriptionSnapshot | null;
}

export class PhoropterController {
  private readonly state: PhoropterState;
  private readonly config: EngineConfig;
  private lifecycle: ControllerState = ControllerState.ACTIVE;
  private haltReason: EscalationReason | null = null;
  private finalPrescription: PrescriptionSnapshot | null = null;
  private balanceIterations = 0;

  private log(level: string, msg: string): void {
    console.log(`[${level}] [PhoropterController] ${msg}`);
  }

  constructor(config: EngineConfig) {
    this.config = config;
    this.state = createPhoropterState(config.pupillaryDistance);
  }

  get controllerState(): ControllerState {
    return this.lifecycle;
  }

  get isTerminal(): boolean {
    return this.lifecycle !== ControllerState.ACTIVE;
  }

  get pupillaryDistance(): PupillaryDistance {
    return { ...this.state.pupillaryDistance };
  }

  /** Read-only view of one eye's current lens. */
  getLens(eye: Eye): LensConfiguration {
    return cloneLens(getLens(this.state, eye));
  }

  // ─── Adjustments ────────────────────────────────────────────────────────────

  /**
   * Validate and apply a single parameter change.
   * On rejection the state and the history are left untouched.
   */
  adjustParameter(
    eye: Eye,
    parameter: RefractiveParameter,
    magnitude: number,
    sourceStep: StepId | null = null,
  ): AdjustmentOutcome {
    const request: AdjustmentRequest = { eye, parameter, magnitude, sourceStep };

    if (this.isTerminal) {
      return {
        accepted: false,
        kind: "invalid_transition",
        message: this.terminalMessage("adjustParameter"),
        request,
      };
    }

    const validation = validateAdjustment(this.state, request, this.config.limits);
    if (!validation.ok) {
      this.log("WARN", `Rejected ${eye} ${parameter} ${magnitude}: ${validation.message}`);
      return {
        accepted: false,
        kind: "rejected_adjustment",
        reason: validation.reason,
        message: validation.message,
        request,
      };
    }

    getLens(this.state, eye)[parameter] = validation.newValue;

    const record: AdjustmentRecord = {
      timestamp: new Date(),
      eye,
      parameter,
      magnitude,
      previousValue: validation.previousValue,
      newValue: validation.newValue,
      sourceStep,
    };
    this.state.adjustmentHistory.push(record);

    const shown =
      parameter === "axis" ? `${validation.newValue}°` : `${formatDiopters(validation.newValue)}D`;
    return { accepted: true, message: `Adjusted ${eye} ${parameter} to ${shown}`, record };
  }

  /**
   * Apply one Jackson Cross Cylinder sub-result. The horizontal part refines
   * the axis, the vertical part refines cylinder power. Returns null when the
   * patient saw no difference.
   */
  applyJCCResult(
    eye: Eye,
    part: "horizontal" | "vertical",
    clarity: ClarityFeedback,
    sourceStep: StepId | null = null,
  ): AdjustmentOutcome | null {
    if (clarity === "both_same") return null;

    const direction = clarity === "first_better" ? 1 : -1;
    if (part === "horizontal") {
      return this.adjustParameter(eye, "axis", direction * this.config.nudges.jccAxisStep, sourceStep);
    }
    // First orientation preferred → more minus cylinder
    return this.adjustParameter(
      eye,
      "cylinder",
      -direction * this.config.nudges.jccCylinderStep,
      sourceStep,
    );
  }

  /**
   * Duochrome nudge: red clearer → sphere −step, green clearer → +step,
   * equal → no change (returns null).
   */
  applyDuochromeResult(
    eye: Eye,
    result: DuochromeResult,
    sourceStep: StepId | null = null,
  ): AdjustmentOutcome | null {
    const step = this.config.nudges.duochromeSphereStep;
    switch (result) {
      case "red_clearer":
        return this.adjustParameter(eye, "sphere", -step, sourceStep);
      case "green_clearer":
        return this.adjustParameter(eye, "sphere", step, sourceStep);
      case "equal":
        return null;
    }
  }

  // ─── Settings ───────────────────────────────────────────────────────────────

  setOcclusion(occludedEye: Eye | null): SettingOutcome {
    if (this.isTerminal) {
      return { ok: false, kind: "invalid_transition", message: this.terminalMessage("setOcclusion") };
    }
    this.state.occludedEye = occludedEye;
    return {
      ok: true,
      message: occludedEye ? `Occluded ${occludedEye}` : "Both eyes open (binocular)",
    };
  }

  /**
   * Set pupillary distance. When the near PD is not measured it is derived
   * from the distance PD minus the configured offset.
   */
  setPupillaryDistance(distanceMm: number, nearMm?: number): SettingOutcome {
    if (this.isTerminal) {
      return {
        ok: false,
        kind: "invalid_transition",
        message: this.terminalMessage("setPupillaryDistance"),
      };
    }

    const limits = this.config.pupillaryDistance;
    const [minDistance, maxDistance] = limits.distanceRangeMm;
    if (!(distanceMm >= minDistance && distanceMm <= maxDistance)) {
      return {
        ok: false,
        kind: "out_of_range",
        message: `PD out of range: ${distanceMm}mm not in [${minDistance}, ${maxDistance}]`,
      };
    }

    const near = nearMm ?? distanceMm - limits.nearOffsetMm;
    const [minNear, maxNear] = limits.nearRangeMm;
    if (!(near >= minNear && near <= maxNear)) {
      return {
        ok: false,
        kind: "out_of_range",
        message: `Near PD out of range: ${near}mm not in [${minNear}, ${maxNear}]`,
      };
    }

    this.state.pupillaryDistance = { distanceMm, nearMm: near };
    return { ok: true, message: `PD set to ${distanceMm}mm (distance), ${near}mm (near)` };
  }

  // ─── Presentations ──────────────────────────────────────────────────────────

  /**
   * Build a lens-pair comparison command. Does not mutate state.
   */
  presentLensPair(
    eye: Eye,
    lensA: LensConfiguration,
    lensB: LensConfiguration,
    questionKey: string = QUESTION_KEYS.lensPair,
    options: string[] = LENS_PAIR_OPTIONS,
  ): CommandOutcome {
    if (this.isTerminal) {
      return { ok: false, kind: "invalid_transition", message: this.terminalMessage("presentLensPair") };
    }

    const violations = [
      ...lensDomainViolations(lensA, this.config.limits).map((p) => `lensA.${p}`),
      ...lensDomainViolations(lensB, this.config.limits).map((p) => `lensB.${p}`),
    ];
    if (violations.length > 0) {
      return {
        ok: false,
        kind: "out_of_range",
        message: `Lens pair outside safe domain: ${violations.join(", ")}`,
      };
    }

    return {
      ok: true,
      command: {
        type: "present_lens_pair",
        eye,
        occludedEye: this.state.occludedEye,
        lensA: cloneLens(lensA),
        lensB: cloneLens(lensB),
        questionKey,
        options: [...options],
      },
    };
  }

  /**
   * Build the JCC sequence (horizontal axis, vertical axis, duochrome)
   * starting at `fromPart`. Each sub-result comes back later through
   * applyJCCResult() or applyDuochromeResult().
   */
  presentJCC(eye: Eye, fromPart: JCCTestPart = "horizontal"): CommandOutcome {
    if (this.isTerminal) {
      return { ok: false, kind: "invalid_transition", message: this.terminalMessage("presentJCC") };
    }
    const start = JCC_SEQUENCE.findIndex((entry) => entry.part === fromPart);
    return {
      ok: true,
      command: {
        type: "present_jcc",
        eye,
        currentPrescription: this.getLens(eye),
        sequence: JCC_SEQUENCE.slice(start).map((entry) => ({ ...entry })),
      },
    };
  }

  presentBinocularBalance(): CommandOutcome {
    if (this.isTerminal) {
      return {
        ok: false,
        kind: "invalid_transition",
        message: this.terminalMessage("presentBinocularBalance"),
      };
    }
    return { ok: true, command: this.binocularCommand() };
  }

  /**
   * Compare the OD/OS clarity report. If one eye is clearer the fellow eye's
   * sphere is nudged by −step and a re-test is requested; if equal (or the
   * retest budget is spent) the prescription is finalized.
   */
  balanceBinocular(report: BinocularReport, sourceStep: StepId | null = null): BalanceOutcome {
    if (this.isTerminal) {
      return { status: "rejected", kind: "invalid_transition", message: this.terminalMessage("balanceBinocular") };
    }

    if (report === "equal" || this.balanceIterations >= this.config.nudges.maxBalanceIterations) {
      if (report !== "equal") {
        this.log("WARN", `Binocular balance did not converge after ${this.balanceIterations} retests; finalizing current values`);
      }
      const finalized = this.finalize();
      if (!finalized.ok) {
        return { status: "rejected", kind: "invalid_transition", message: finalized.message };
      }
      return { status: "finalized", snapshot: finalized.snapshot, command: finalized.command };
    }

    const clearerEye = report === "od_clearer" ? Eye.OD : Eye.OS;
    this.balanceIterations++;
    const adjustment = this.adjustParameter(
      otherEye(clearerEye),
      "sphere",
      -this.config.nudges.binocularBalanceStep,
      sourceStep,
    );

    return {
      status: "retest",
      adjustment,
      command: adjustment.accepted ? this.binocularCommand() : { type: "no_action" },
    };
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  /**
   * Freeze both lenses and return the final prescription.
   */
  finalize(): FinalizeOutcome {
    if (this.isTerminal) {
      return { ok: false, kind: "invalid_transition", message: this.terminalMessage("finalize") };
    }

    this.lifecycle = ControllerState.FINALIZED;
    const snapshot = toPrescription(this.state);
    this.finalPrescription = snapshot;
    this.log("INFO", `Prescription finalized: OD ${this.describe(Eye.OD)}, OS ${this.describe(Eye.OS)}`);

    return { ok: true, snapshot, command: { type: "finalize", prescription: toPrescription(this.state) } };
  }

  /**
   * Halt the device. Idempotent: a second call returns the original reason
   * without changing anything.
   */
  escalate(reason: EscalationReason): EscalationOutcome {
    if (this.lifecycle === ControllerState.HALTED && this.haltReason !== null) {
      return {
        reason: this.haltReason,
        command: { type: "escalate", reason: this.haltReason, action: "shutdown" },
        alreadyHalted: true,
      };
    }

    this.lifecycle = ControllerState.HALTED;
    this.haltReason = reason;
    this.log("ESCALATE", `Phoropter halted: ${reason}`);

    return {
      reason,
      command: { type: "escalate", reason, action: "shutdown" },
      alreadyHalted: false,
    };
  }

  snapshot(): ControllerSnapshot {
    return {
      controllerState: this.lifecycle,
      state: clonePhoropterState(this.state),
      haltReason: this.haltReason,
      finalPrescription: this.finalPrescription ? clonePrescription(this.finalPrescription) : null,
    };
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private binocularCommand(): DeviceCommand {
    return {
      type: "balance_binocular",
      od: this.getLens(Eye.OD),
      os: this.getLens(Eye.OS),
      questionKey: QUESTION_KEYS.binocular,
      options: [...BINOCULAR_OPTIONS],
    };
  }

  private describe(eye: Eye): string {
    const lens = getLens(this.state, eye);
    return `${formatDiopters(lens.sphere)} / ${formatDiopters(lens.cylinder)} x ${lens.axis}`;
  }

  private terminalMessage(operation: string): string {
    return `Invalid state transition: cannot call ${operation}() in "${this.lifecycle}" state.`;
  }
}
