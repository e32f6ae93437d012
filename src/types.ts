// Phoropter Refraction Engine - Shared TypeScript interfaces and types

// ─── Eyes and Lens Parameters ───────────────────────────────────────────────────

export enum Eye {
  OD = "OD", // right eye
  OS = "OS", // left eye
}

export type RefractiveParameter = "sphere" | "cylinder" | "axis";

export interface LensConfiguration {
  /** Diopters, domain [-20.00, +20.00]. */
  sphere: number;
  /** Diopters, minus-cylinder convention, domain [-6.00, 0.00]. */
  cylinder: number;
  /** Integer degrees, domain [0, 180]. */
  axis: number;
}

export interface PupillaryDistance {
  distanceMm: number;
  nearMm: number;
}

// ─── Phoropter State ────────────────────────────────────────────────────────────

export interface AdjustmentRecord {
  timestamp: Date;
  eye: Eye;
  parameter: RefractiveParameter;
  magnitude: number;
  previousValue: number;
  newValue: number;
  sourceStep: StepId | null;
}

export interface PhoropterState {
  od: LensConfiguration;
  os: LensConfiguration;
  occludedEye: Eye | null;
  pupillaryDistance: PupillaryDistance;
  adjustmentHistory: AdjustmentRecord[]; // append-only
}

export enum ControllerState {
  ACTIVE = "active",
  FINALIZED = "finalized",
  HALTED = "halted",
}

// ─── Adjustments ────────────────────────────────────────────────────────────────

export interface AdjustmentRequest {
  eye: Eye;
  parameter: RefractiveParameter;
  magnitude: number;
  sourceStep: StepId | null;
}

export type RejectionReason = "invalid_magnitude" | "unsafe_jump" | "out_of_range";

export type ValidationResult =
  | { ok: true; previousValue: number; newValue: number }
  | { ok: false; reason: RejectionReason; message: string };

export type AdjustmentOutcome =
  | { accepted: true; message: string; record: AdjustmentRecord }
  | {
      accepted: false;
      kind: "rejected_adjustment";
      reason: RejectionReason;
      message: string;
      request: AdjustmentRequest;
    }
  | {
      accepted: false;
      kind: "invalid_transition";
      message: string;
      request: AdjustmentRequest;
    };

// ─── Protocol Steps ─────────────────────────────────────────────────────────────

export type StepId = string;

export const ESCALATION_STEP = "escalate_to_professional";
export const COMPLETE_STEP = "complete";

export type StepCategory =
  | "general"
  | "pupillary_distance"
  | "monocular_refraction"
  | "jcc_refinement"
  | "binocular_balance"
  | "near_vision";

/** Alternative successor taken when the patient is younger than `belowAge`. */
export interface AgeBranch {
  belowAge: number;
  successor: StepId;
}

export interface ProtocolStep {
  id: StepId;
  name: string;
  successor: StepId;
  category: StepCategory;
  /** Eye under test for monocular steps. */
  eye?: Eye;
  /** Required slot key → accepted values. */
  requiredSlots: Readonly<Record<string, readonly string[]>>;
  /** Slots that may be omitted, but must hold an accepted value when sent. */
  optionalSlots?: Readonly<Record<string, readonly string[]>>;
  ageBranch?: AgeBranch;
}

// ─── Turn Input (pre-classified by the NLU collaborator) ───────────────────────

export type Sentiment =
  | "confident"
  | "under_confident"
  | "confused"
  | "overconfident"
  | "fatigued"
  | "neutral";

export type SlotMap = Readonly<Record<string, string>>;

export interface TurnInput {
  intent: string;
  confidence: number; // 0.0-1.0
  slots: SlotMap;
  sentiment: Sentiment;
  redFlag: boolean;
  personaOverride: boolean;
  elapsedSeconds: number; // session clock, supplied externally
  responseLatencySeconds?: number;
}

// ─── Response Verdict ───────────────────────────────────────────────────────────

export type ResponseQuality = "clear" | "ambiguous" | "unclear" | "invalid";

export interface ResponseVerdict {
  quality: ResponseQuality;
  confidence: number;
  requiredSlotsPresent: boolean;
  missingSlots: string[];
}

// ─── Safety ─────────────────────────────────────────────────────────────────────

export type DurationStatus = "continue" | "offer_break" | "warn_and_complete" | "hard_stop";

export interface FatigueStatus {
  fatigued: boolean;
  reason: string | null;
}

export type IncidentSeverity = "LOW" | "MEDIUM" | "HIGH" | "CRITICAL";

export interface IncidentReport {
  type: string;
  description: string;
  severity: IncidentSeverity;
}

export interface SafetyIncident extends IncidentReport {
  timestamp: Date;
  stepId: StepId | null;
}

export interface QualityMetrics {
  responsesAnalyzed: number;
  parseSuccessRate: number;
  averageConfidence: number;
  deviceActions: number;
  deviceSuccessRate: number;
  acceptable: boolean;
}

export interface SafetySnapshot {
  turnCount: number;
  elapsedSeconds: number;
  redFlagCount: number; // monotonically non-decreasing
  personaOverrideCount: number;
  fatigueScore: number; // 0 = fresh, 1 = exhausted
  incidents: SafetyIncident[];
  quality: QualityMetrics;
  baseline: { accuracy: number[]; confidence: number[] };
  recent: {
    accuracy: number[];
    confidence: number[];
    latencySeconds: number[];
    sentiments: Sentiment[];
  };
}

export type SafetyOverride = "red_flag" | "hard_stop" | "severe_fatigue" | "persona_override";

export interface SafetyAssessment {
  override: SafetyOverride | null;
  fatigue: FatigueStatus;
  fatigueScore: number;
  duration: DurationStatus;
}

export type EscalationReason =
  | "red_flag"
  | "duration_exceeded"
  | "severe_fatigue"
  | "safety_incidents"
  | "operator_abort";

export interface EscalationEvent {
  reason: EscalationReason;
  stepId: StepId;
  timestamp: Date;
}

// ─── Device Commands ────────────────────────────────────────────────────────────

export type JCCTestPart = "horizontal" | "vertical" | "duochrome";

export type DuochromeResult = "red_clearer" | "green_clearer" | "equal";

export type ClarityFeedback = "first_better" | "second_better" | "both_same";

export type ColorPreference = "red" | "green" | "both";

export type BinocularReport = "od_clearer" | "os_clearer" | "equal";

export interface PrescriptionSnapshot {
  od: LensConfiguration;
  os: LensConfiguration;
  pupillaryDistance: PupillaryDistance;
}

export type DeviceCommand =
  | {
      type: "present_lens_pair";
      eye: Eye;
      occludedEye: Eye | null;
      lensA: LensConfiguration;
      lensB: LensConfiguration;
      questionKey: string;
      options: string[];
    }
  | {
      type: "present_jcc";
      eye: Eye;
      currentPrescription: LensConfiguration;
      sequence: { part: JCCTestPart; questionKey: string }[];
    }
  | {
      type: "balance_binocular";
      od: LensConfiguration;
      os: LensConfiguration;
      questionKey: string;
      options: string[];
    }
  | { type: "finalize"; prescription: PrescriptionSnapshot }
  | { type: "escalate"; reason: EscalationReason; action: "shutdown" }
  | { type: "no_action" }
  | { type: "repeat_presentation"; stepId: StepId; reason: string };

export type CommandOutcome =
  | { ok: true; command: DeviceCommand }
  | { ok: false; kind: "invalid_transition" | "out_of_range"; message: string };

export type SettingOutcome =
  | { ok: true; message: string }
  | { ok: false; kind: "invalid_transition" | "out_of_range"; message: string };

// ─── Turn Result ────────────────────────────────────────────────────────────────

export interface TurnResult {
  stepId: StepId;
  nextStepId: StepId;
  verdict: ResponseVerdict;
  command: DeviceCommand;
  adjustments: AdjustmentOutcome[];
  messages: string[]; // plain-text reasons for audit logs
  escalation: EscalationEvent | null;
  advisories: { fatigue: FatigueStatus; fatigueScore: number; duration: DurationStatus };
  controllerState: ControllerState;
}

export interface EngineSnapshot {
  currentStep: StepId;
  /** Pending part while the session sits on a JCC step, else null. */
  jccPart: JCCTestPart | null;
  patientAge: number | null;
  controllerState: ControllerState;
  state: PhoropterState;
  adjustmentHistory: AdjustmentRecord[];
  safety: SafetySnapshot;
  escalation: EscalationEvent | null;
}

// ─── Exam Session ───────────────────────────────────────────────────────────────

export interface TurnLogEntry {
  timestamp: Date;
  stepId: StepId;
  intent: string;
  sentiment: Sentiment;
  confidence: number;
  verdict: ResponseQuality;
  command: DeviceCommand["type"];
  nextStepId: StepId;
}

// ─── WebSocket Protocol ─────────────────────────────────────────────────────────

// Client → Server messages
export type ClientMessage =
  | { type: "submit_turn"; turn?: unknown }
  | { type: "abort_exam" }
  | { type: "request_snapshot" }
  | { type: "report_incident"; incident?: unknown }
  | { type: "save_outputs" };

// Server → Client messages
export type ServerMessage =
  | { type: "session_ready"; sessionId: string; stepId: StepId; command: DeviceCommand }
  | { type: "turn_result"; result: TurnResult }
  | { type: "escalation"; reason: EscalationReason; stepId: StepId }
  | { type: "snapshot"; snapshot: EngineSnapshot }
  | { type: "incident_recorded"; incident: SafetyIncident }
  | { type: "outputs_saved"; paths: string[] }
  | { type: "error"; message: string; recoverable: boolean };
