// Phoropter Refraction Engine - Refraction Engine
// One instance per exam session. Composes the quality gate, the step graph,
// the safety monitor and the phoropter controller for each patient turn.
//
// Turn flow:
//   1. Refuse turns once the session reached a terminal step or was halted
//   2. Assess the verdict, record the turn with the safety monitor
//   3. red_flag / hard_stop / severe_fatigue → escalate, next step =
//      escalate_to_professional
//   4. persona_override → repeat the step, no adjustment
//   5. Not clear → repeat the step
//   6. Clear → run the step category's action. Escalate if the incident log
//      now warrants it. A rejected adjustment repeats the step with
//      no_action; otherwise advance and present the next stimulus
//
// JCC steps hold for three answers (horizontal, vertical, duochrome) and
// only advance once the duochrome part is answered.

import {
  COMPLETE_STEP,
  ControllerState,
  ESCALATION_STEP,
  Eye,
} from "./types.js";
import type {
  AdjustmentOutcome,
  BinocularReport,
  ClarityFeedback,
  CommandOutcome,
  DeviceCommand,
  DuochromeResult,
  EngineSnapshot,
  EscalationEvent,
  EscalationReason,
  IncidentReport,
  IncidentSeverity,
  JCCTestPart,
  LensConfiguration,
  RejectionReason,
  ProtocolStep,
  ResponseVerdict,
  SafetyAssessment,
  SafetyIncident,
  SlotMap,
  StepId,
  TurnInput,
  TurnResult,
} from "./types.js";
import { resolveEngineConfig } from "./engine-config.js";
import type { EngineConfig } from "./engine-config.js";
import { ConfigurationError, InvalidTransitionError } from "./errors.js";
import { assessResponse } from "./response-quality-gate.js";
import { ProtocolGraph, isTerminalStep } from "./step-progression.js";
import { COLOR_PREFERENCE_VALUES, DEFAULT_PROTOCOL } from "./protocol-steps.js";
import { SafetyMonitor } from "./safety-monitor.js";
import { PhoropterController } from "./phoropter-controller.js";
import { clonePhoropterState, otherEye, roundLensValue } from "./lens-state.js";

export interface RefractionEngineOptions {
  config?: EngineConfig;
  protocol?: readonly ProtocolStep[];
  /** Start somewhere other than the protocol's first step. */
  startStep?: StepId;
  /** Whole years. Unknown age takes the full protocol path. */
  patientAge?: number | null;
}

export interface EscalationResult {
  event: EscalationEvent;
  command: DeviceCommand;
  /** True when the session had already escalated; the event is the original one. */
  alreadyEscalated: boolean;
}

export interface IncidentResult {
  incident: SafetyIncident;
  /** Set when this incident pushed the session over the escalation limit. */
  escalation: EscalationResult | null;
}

export const MAX_PATIENT_AGE = 130;

/** Outcome of a clear turn's category action. */
interface StepActionResult {
  adjustments: AdjustmentOutcome[];
  messages: string[];
  rejected: boolean;
  /** Command produced by the action itself (balance retest or finalize). */
  command: DeviceCommand | null;
  /** Keep the current step even though the verdict was clear. */
  repeat: boolean;
}

const CLARITY_TO_BALANCE: Record<ClarityFeedback, BinocularReport> = {
  first_better: "od_clearer",
  second_better: "os_clearer",
  both_same: "equal",
};

function toDuochrome(color: string | undefined): DuochromeResult | null {
  switch (color) {
    case "red":
      return "red_clearer";
    case "green":
      return "green_clearer";
    case "both":
      return "equal";
    default:
      return null;
  }
}

function isClarityFeedback(value: string | undefined): value is ClarityFeedback {
  return value === "first_better" || value === "second_better" || value === "both_same";
}

const REJECTION_SEVERITY: Record<RejectionReason, IncidentSeverity> = {
  unsafe_jump: "HIGH",
  out_of_range: "MEDIUM",
  invalid_magnitude: "LOW",
};

const NEXT_JCC_PART: Record<JCCTestPart, JCCTestPart | null> = {
  horizontal: "vertical",
  vertical: "duochrome",
  duochrome: null,
};

export class RefractionEngine {
  readonly config: EngineConfig;
  private readonly graph: ProtocolGraph;
  private readonly controller: PhoropterController;
  private readonly safety: SafetyMonitor;
  private readonly patientAge: number | null;
  private currentStepId: StepId;
  private jccPart: JCCTestPart = "horizontal";
  private escalation: EscalationEvent | null = null;

  private log(level: string, msg: string): void {
    console.log(`[${level}] [RefractionEngine] ${msg}`);
  }

  /**
   * @throws ConfigurationError when the protocol table or the configuration
   *   is inconsistent
   */
  constructor(options: RefractionEngineOptions = {}) {
    this.config = options.config ?? resolveEngineConfig();
    this.graph = ProtocolGraph.load(options.protocol ?? DEFAULT_PROTOCOL);
    this.controller = new PhoropterController(this.config);
    this.safety = new SafetyMonitor(this.config.fatigue, this.config.duration, this.config.monitoring);
    const start = options.startStep ?? this.graph.initialStep;
    if (!this.graph.hasStep(start)) {
      throw new ConfigurationError([`start step "${start}" is not part of the protocol`]);
    }
    const age = options.patientAge ?? null;
    if (age !== null && (!Number.isInteger(age) || age < 0 || age > MAX_PATIENT_AGE)) {
      throw new ConfigurationError([
        `patient age must be an integer between 0 and ${MAX_PATIENT_AGE} (got ${age})`,
      ]);
    }
    this.patientAge = age;
    this.currentStepId = start;
  }

  get currentStep(): StepId {
    return this.currentStepId;
  }

  get controllerState(): ControllerState {
    return this.controller.controllerState;
  }

  /** True once the session reached `complete` or `escalate_to_professional`. */
  get isTerminal(): boolean {
    return isTerminalStep(this.currentStepId) || this.controller.controllerState === ControllerState.HALTED;
  }

  /** Stimulus for the step the session currently sits on. */
  currentCommand(): DeviceCommand {
    if (this.isTerminal) return { type: "no_action" };
    return this.stimulusFor(this.graph.getStep(this.currentStepId), []);
  }

  // ─── Turn Processing ────────────────────────────────────────────────────────

  /**
   * @throws InvalidTransitionError when the session already terminated
   */
  processTurn(input: TurnInput): TurnResult {
    if (this.isTerminal) {
      throw new InvalidTransitionError(
        "processTurn",
        this.controller.controllerState,
        `Session ended at step "${this.currentStepId}".`,
      );
    }

    const step = this.graph.getStep(this.currentStepId);
    const verdict = assessResponse(
      input.confidence,
      input.intent,
      input.slots,
      this.effectiveStep(step),
      this.config.quality,
    );

    const assessment = this.safety.recordTurn({
      stepId: step.id,
      parsed: verdict.quality !== "invalid",
      accuracy: verdict.quality === "clear" ? 1 : 0,
      confidence: input.confidence,
      latencySeconds: input.responseLatencySeconds,
      sentiment: input.sentiment,
      redFlag: input.redFlag,
      personaOverride: input.personaOverride,
      elapsedSeconds: input.elapsedSeconds,
    });
    const messages = this.advisoryMessages(assessment);

    switch (assessment.override) {
      case "red_flag":
        return this.escalateTurn(step, verdict, assessment, "red_flag", [
          ...messages,
          "Red flag reported; escalating to a professional",
        ]);
      case "hard_stop":
        return this.escalateTurn(step, verdict, assessment, "duration_exceeded", [
          ...messages,
          `Session duration ${input.elapsedSeconds}s reached the hard stop`,
        ]);
      case "severe_fatigue":
        return this.escalateTurn(step, verdict, assessment, "severe_fatigue", [
          ...messages,
          `Severe fatigue (score ${assessment.fatigueScore.toFixed(2)}); escalating to a professional`,
        ]);
      case "persona_override":
        return this.buildResult(step.id, step.id, verdict, assessment, {
          command: { type: "repeat_presentation", stepId: step.id, reason: "persona_override" },
          adjustments: [],
          messages: [...messages, "Persona override; repeating the current presentation"],
        });
      case null:
        break;
    }

    if (verdict.quality !== "clear") {
      const why =
        verdict.missingSlots.length > 0 && verdict.quality === "ambiguous"
          ? `missing or unrecognized: ${verdict.missingSlots.join(", ")}`
          : `confidence ${verdict.confidence}`;
      return this.buildResult(step.id, step.id, verdict, assessment, {
        command: { type: "repeat_presentation", stepId: step.id, reason: `response_${verdict.quality}` },
        adjustments: [],
        messages: [...messages, `Response ${verdict.quality} (${why}); repeating step ${step.id}`],
      });
    }

    const action = this.runStepAction(step, input.slots);
    messages.push(...action.messages);

    const incidents = this.safety.incidentEscalation();
    if (incidents.escalate) {
      return this.escalateTurn(
        step,
        verdict,
        assessment,
        "safety_incidents",
        [...messages, `Safety incidents warrant escalation: ${incidents.reason}`],
        action.adjustments,
      );
    }

    const nextStepId =
      action.rejected || action.repeat
        ? step.id
        : this.graph.nextStep(step.id, verdict.quality, false, this.patientAge);
    if (nextStepId !== step.id) this.jccPart = "horizontal";

    let command: DeviceCommand;
    if (action.rejected) {
      messages.push(`Adjustment rejected; repeating step ${step.id}`);
      command = { type: "no_action" };
    } else if (action.command) {
      command = action.command;
    } else if (nextStepId === COMPLETE_STEP) {
      command = this.completeExam(messages);
    } else {
      command = this.stimulusFor(this.graph.getStep(nextStepId), messages);
    }

    this.currentStepId = nextStepId;
    return this.buildResult(step.id, nextStepId, verdict, assessment, {
      command,
      adjustments: action.adjustments,
      messages,
    });
  }

  // ─── External Abort, Incidents & Snapshot ───────────────────────────────────

  /**
   * Log an incident raised outside a turn (an operator or device report).
   * Escalates the session when the incident log warrants it.
   */
  reportIncident(report: IncidentReport): IncidentResult {
    const stepId = this.escalation ? this.escalation.stepId : this.currentStepId;
    const incident = this.safety.recordIncident(report, stepId);

    const verdict = this.safety.incidentEscalation();
    if (!verdict.escalate || this.escalation) {
      return { incident, escalation: null };
    }
    this.log("WARN", `Incident log warrants escalation: ${verdict.reason}`);
    return { incident, escalation: this.escalate("safety_incidents") };
  }

  /**
   * Halt the session from outside a turn (operator abort). Idempotent: a
   * second call returns the first escalation event unchanged.
   */
  escalate(reason: EscalationReason): EscalationResult {
    if (this.escalation) {
      const existing = this.escalation;
      return {
        event: existing,
        command: { type: "escalate", reason: existing.reason, action: "shutdown" },
        alreadyEscalated: true,
      };
    }

    const outcome = this.controller.escalate(reason);
    const event: EscalationEvent = { reason, stepId: this.currentStepId, timestamp: new Date() };
    this.escalation = event;
    this.currentStepId = ESCALATION_STEP;
    this.log("ESCALATE", `Session escalated at step ${event.stepId}: ${reason}`);

    return { event, command: outcome.command, alreadyEscalated: false };
  }

  snapshot(): EngineSnapshot {
    const controllerSnapshot = this.controller.snapshot();
    const state = clonePhoropterState(controllerSnapshot.state);
    const onJccStep =
      !isTerminalStep(this.currentStepId) &&
      this.graph.getStep(this.currentStepId).category === "jcc_refinement";
    return {
      currentStep: this.currentStepId,
      jccPart: onJccStep ? this.jccPart : null,
      patientAge: this.patientAge,
      controllerState: controllerSnapshot.controllerState,
      state,
      adjustmentHistory: state.adjustmentHistory.map((record) => ({
        ...record,
        timestamp: new Date(record.timestamp.getTime()),
      })),
      safety: this.safety.snapshot(),
      escalation: this.escalation ? { ...this.escalation } : null,
    };
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private escalateTurn(
    step: ProtocolStep,
    verdict: ResponseVerdict,
    assessment: SafetyAssessment,
    reason: EscalationReason,
    messages: string[],
    adjustments: AdjustmentOutcome[] = [],
  ): TurnResult {
    const { event, command } = this.escalate(reason);
    return this.buildResult(step.id, ESCALATION_STEP, verdict, assessment, {
      command,
      adjustments,
      messages,
      escalation: event,
    });
  }

  private buildResult(
    stepId: StepId,
    nextStepId: StepId,
    verdict: ResponseVerdict,
    assessment: SafetyAssessment,
    parts: {
      command: DeviceCommand;
      adjustments: AdjustmentOutcome[];
      messages: string[];
      escalation?: EscalationEvent;
    },
  ): TurnResult {
    return {
      stepId,
      nextStepId,
      verdict,
      command: parts.command,
      adjustments: parts.adjustments,
      messages: parts.messages,
      escalation: parts.escalation ?? null,
      advisories: {
        fatigue: assessment.fatigue,
        fatigueScore: assessment.fatigueScore,
        duration: assessment.duration,
      },
      controllerState: this.controller.controllerState,
    };
  }

  private advisoryMessages(assessment: SafetyAssessment): string[] {
    const messages: string[] = [];
    if (assessment.fatigue.fatigued) {
      messages.push(`Fatigue advisory: ${assessment.fatigue.reason}; recommend a break`);
    }
    if (assessment.duration === "offer_break") {
      messages.push("Duration advisory: offer the patient a break");
    } else if (assessment.duration === "warn_and_complete") {
      messages.push("Duration advisory: warn the patient and complete the exam");
    }
    return messages;
  }

  /**
   * The step as the quality gate should see it. On a JCC step the pending
   * part narrows `jcc_part`, and the duochrome part asks for a colour
   * preference instead of a clarity answer.
   */
  private effectiveStep(step: ProtocolStep): ProtocolStep {
    if (step.category !== "jcc_refinement") return step;
    const pending = this.jccPart;
    return {
      ...step,
      requiredSlots:
        pending === "duochrome" ? { color_preference: COLOR_PREFERENCE_VALUES } : step.requiredSlots,
      optionalSlots: { ...step.optionalSlots, jcc_part: [pending] },
    };
  }

  private trackDevice(success: boolean): void {
    this.safety.recordDeviceAction(success);
  }

  /**
   * Validator rejections become incidents; controller refusals count as
   * failed device actions.
   */
  private noteAdjustment(outcome: AdjustmentOutcome, stepId: StepId): void {
    if (outcome.accepted) {
      this.trackDevice(true);
    } else if (outcome.kind === "rejected_adjustment") {
      this.safety.recordIncident(
        { type: outcome.reason, description: outcome.message, severity: REJECTION_SEVERITY[outcome.reason] },
        stepId,
      );
    } else {
      this.trackDevice(false);
    }
  }

  /**
   * Category action for a clear turn. Exhaustive over StepCategory.
   */
  private runStepAction(step: ProtocolStep, slots: SlotMap): StepActionResult {
    const result: StepActionResult = {
      adjustments: [],
      messages: [],
      rejected: false,
      command: null,
      repeat: false,
    };
    const record = (outcome: AdjustmentOutcome | null): void => {
      if (!outcome) return;
      this.noteAdjustment(outcome, step.id);
      result.adjustments.push(outcome);
      result.messages.push(outcome.message);
      if (!outcome.accepted) result.rejected = true;
    };

    const clarity = slots.clarity_feedback;
    const eye = step.eye ?? Eye.OD;

    switch (step.category) {
      case "monocular_refraction": {
        const delta = this.config.nudges.refractionSphereStep;
        if (clarity === "first_better") {
          record(this.controller.adjustParameter(eye, "sphere", delta, step.id));
        } else if (clarity === "second_better") {
          record(this.controller.adjustParameter(eye, "sphere", -delta, step.id));
        }
        return result;
      }

      case "jcc_refinement": {
        const part = this.jccPart;
        if (part === "duochrome") {
          const duochrome = toDuochrome(slots.color_preference);
          if (duochrome) record(this.controller.applyDuochromeResult(eye, duochrome, step.id));
        } else if (isClarityFeedback(clarity)) {
          record(this.controller.applyJCCResult(eye, part, clarity, step.id));
        }

        // A rejected answer is asked again; duochrome is the last part
        const next = NEXT_JCC_PART[part];
        if (result.rejected || next === null) return result;
        this.jccPart = next;
        result.repeat = true;
        result.messages.push(`JCC ${part} answered; presenting ${next}`);
        result.command = this.unwrap(this.controller.presentJCC(eye, next), result.messages);
        return result;
      }

      case "binocular_balance": {
        if (!isClarityFeedback(clarity)) return result;
        const balance = this.controller.balanceBinocular(CLARITY_TO_BALANCE[clarity], step.id);
        if (balance.status === "retest") {
          record(balance.adjustment);
          result.repeat = true;
          result.command = balance.command;
        } else if (balance.status === "finalized") {
          this.trackDevice(true);
          result.messages.push("Binocular balance reached; prescription finalized");
          result.command = balance.command;
        } else {
          this.trackDevice(false);
          result.messages.push(balance.message);
          result.rejected = true;
        }
        return result;
      }

      case "pupillary_distance":
        this.applyPupillaryDistance(step, slots, result);
        return result;

      case "general":
      case "near_vision":
        return result;

      default: {
        const _exhaustive: never = step.category;
        throw new Error(`Unhandled step category: ${String(_exhaustive)}`);
      }
    }
  }

  private applyPupillaryDistance(step: ProtocolStep, slots: SlotMap, result: StepActionResult): void {
    const rawDistance = slots.pd_distance_mm;
    const rawNear = slots.pd_near_mm;
    if (rawDistance === undefined && rawNear === undefined) return;

    const distance = rawDistance !== undefined ? Number(rawDistance) : this.controller.pupillaryDistance.distanceMm;
    const near = rawNear !== undefined ? Number(rawNear) : undefined;

    if (!Number.isFinite(distance) || (near !== undefined && !Number.isFinite(near))) {
      result.messages.push(`PD slot is not a number (distance "${rawDistance ?? ""}", near "${rawNear ?? ""}")`);
      result.rejected = true;
      return;
    }

    const outcome = this.controller.setPupillaryDistance(distance, near);
    result.messages.push(outcome.message);
    if (outcome.ok) {
      this.trackDevice(true);
      return;
    }
    result.rejected = true;
    if (outcome.kind === "out_of_range") {
      this.safety.recordIncident(
        { type: "out_of_range", description: outcome.message, severity: "MEDIUM" },
        step.id,
      );
    } else {
      this.trackDevice(false);
    }
  }

  /**
   * Reaching `complete` with the controller still active finalizes the
   * prescription; otherwise there is nothing left to present.
   */
  private completeExam(messages: string[]): DeviceCommand {
    if (this.controller.controllerState !== ControllerState.ACTIVE) {
      return { type: "no_action" };
    }
    const outcome = this.controller.finalize();
    this.trackDevice(outcome.ok);
    if (!outcome.ok) {
      messages.push(outcome.message);
      return { type: "no_action" };
    }
    messages.push("Exam complete; prescription finalized");
    return outcome.command;
  }

  /**
   * Device command that presents a step's stimulus, occluding the fellow eye
   * for monocular steps. Steps without a stimulus, and any step after the
   * prescription was finalized, yield no_action.
   */
  private stimulusFor(step: ProtocolStep, messages: string[]): DeviceCommand {
    if (this.controller.controllerState !== ControllerState.ACTIVE) {
      return { type: "no_action" };
    }

    const eye = step.eye ?? Eye.OD;
    switch (step.category) {
      case "monocular_refraction": {
        this.controller.setOcclusion(otherEye(eye));
        const current = this.controller.getLens(eye);
        const plus: LensConfiguration = {
          ...current,
          sphere: roundLensValue(current.sphere + this.config.nudges.refractionSphereStep),
        };
        const presented = this.controller.presentLensPair(eye, plus, current);
        return this.unwrap(presented, messages);
      }
      case "jcc_refinement":
        this.controller.setOcclusion(otherEye(eye));
        return this.unwrap(this.controller.presentJCC(eye, this.jccPart), messages);
      case "binocular_balance":
        this.controller.setOcclusion(null);
        return this.unwrap(this.controller.presentBinocularBalance(), messages);
      case "pupillary_distance":
      case "general":
      case "near_vision":
        return { type: "no_action" };
      default: {
        const _exhaustive: never = step.category;
        throw new Error(`Unhandled step category: ${String(_exhaustive)}`);
      }
    }
  }

  private unwrap(outcome: CommandOutcome, messages: string[]): DeviceCommand {
    this.trackDevice(outcome.ok);
    if (outcome.ok) return outcome.command;
    messages.push(outcome.message);
    return { type: "no_action" };
  }
}
