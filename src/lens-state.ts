// Phoropter Refraction Engine - Lens State Model
// Per-eye prescription record, domain checks and deep copies of PhoropterState.

import { Eye } from "./types.js";
import type {
  LensConfiguration,
  PhoropterState,
  PrescriptionSnapshot,
  RefractiveParameter,
} from "./types.js";
import type { PupillaryDistanceLimits, SafetyLimits } from "./engine-config.js";

/** Values are rounded to this many decimals after arithmetic. */
const VALUE_PRECISION = 1e6;

export function roundLensValue(value: number): number {
  const rounded = Math.round(value * VALUE_PRECISION) / VALUE_PRECISION;
  // Normalize -0 so serialized state never shows "-0"
  return rounded === 0 ? 0 : rounded;
}

export function createPlanoLens(): LensConfiguration {
  return { sphere: 0, cylinder: 0, axis: 0 };
}

/**
 * Creates the initial device state: plano lenses in both eyes, the left eye
 * occluded (testing starts on OD) and the default pupillary distances.
 */
export function createPhoropterState(pd: PupillaryDistanceLimits): PhoropterState {
  return {
    od: createPlanoLens(),
    os: createPlanoLens(),
    occludedEye: Eye.OS,
    pupillaryDistance: { distanceMm: pd.defaultDistanceMm, nearMm: pd.defaultNearMm },
    adjustmentHistory: [],
  };
}

export function getLens(state: PhoropterState, eye: Eye): LensConfiguration {
  return eye === Eye.OD ? state.od : state.os;
}

export function otherEye(eye: Eye): Eye {
  return eye === Eye.OD ? Eye.OS : Eye.OD;
}

export function rangeFor(
  parameter: RefractiveParameter,
  limits: SafetyLimits,
): readonly [number, number] {
  switch (parameter) {
    case "sphere":
      return limits.sphereRange;
    case "cylinder":
      return limits.cylinderRange;
    case "axis":
      return limits.axisRange;
  }
}

export function maxStepFor(parameter: RefractiveParameter, limits: SafetyLimits): number {
  switch (parameter) {
    case "sphere":
      return limits.maxSphereStep;
    case "cylinder":
      return limits.maxCylinderStep;
    case "axis":
      return limits.maxAxisStep;
  }
}

export function isWithinDomain(
  parameter: RefractiveParameter,
  value: number,
  limits: SafetyLimits,
): boolean {
  if (!Number.isFinite(value)) return false;
  if (parameter === "axis" && !Number.isInteger(value)) return false;
  const [min, max] = rangeFor(parameter, limits);
  return value >= min && value <= max;
}

/**
 * Checks all three parameters of a lens. Returns the names of parameters that
 * fall outside their domain (empty when the lens is valid).
 */
export function lensDomainViolations(
  lens: LensConfiguration,
  limits: SafetyLimits,
): RefractiveParameter[] {
  const parameters: RefractiveParameter[] = ["sphere", "cylinder", "axis"];
  return parameters.filter((p) => !isWithinDomain(p, lens[p], limits));
}

export function cloneLens(lens: LensConfiguration): LensConfiguration {
  return { sphere: lens.sphere, cylinder: lens.cylinder, axis: lens.axis };
}

export function clonePhoropterState(state: PhoropterState): PhoropterState {
  return {
    od: cloneLens(state.od),
    os: cloneLens(state.os),
    occludedEye: state.occludedEye,
    pupillaryDistance: { ...state.pupillaryDistance },
    adjustmentHistory: state.adjustmentHistory.map((record) => ({
      ...record,
      timestamp: new Date(record.timestamp.getTime()),
    })),
  };
}

export function toPrescription(state: PhoropterState): PrescriptionSnapshot {
  return {
    od: cloneLens(state.od),
    os: cloneLens(state.os),
    pupillaryDistance: { ...state.pupillaryDistance },
  };
}

export function clonePrescription(prescription: PrescriptionSnapshot): PrescriptionSnapshot {
  return {
    od: cloneLens(prescription.od),
    os: cloneLens(prescription.os),
    pupillaryDistance: { ...prescription.pupillaryDistance },
  };
}

/**
 * Formats a lens in the usual clinical notation, e.g. "-1.25 / -0.50 x 90".
 */
export function formatLens(lens: LensConfiguration): string {
  return `${formatDiopters(lens.sphere)} / ${formatDiopters(lens.cylinder)} x ${lens.axis}`;
}

export function formatDiopters(value: number): string {
  const sign = value > 0 ? "+" : value < 0 ? "-" : "";
  const abs = Math.abs(value);
  // Eighth-diopter nudges need a third decimal
  const digits = Math.round(abs * 1000) % 10 === 0 ? 2 : 3;
  return `${sign}${abs.toFixed(digits)}`;
}
