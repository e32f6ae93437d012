// Phoropter Refraction Engine - Engine Configuration
// All thresholds, step sizes and duration breakpoints live here and are passed
// into each engine at construction. Nothing below is read from module globals
// at turn time.

import { ConfigurationError } from "./errors.js";

// ─── Configuration Shape ────────────────────────────────────────────────────────

export interface QualityThresholds {
  /** Confidence strictly below this is "unclear". Default: 0.3 */
  unclearBelow: number;
  /** Confidence at or above this is "clear" (subject to slot checks). Default: 0.6 */
  clearAtOrAbove: number;
}

export interface SafetyLimits {
  maxSphereStep: number; // diopters, default: 0.50
  maxCylinderStep: number; // diopters, default: 0.50
  maxAxisStep: number; // degrees, default: 10
  sphereRange: readonly [number, number]; // default: [-20, 20]
  cylinderRange: readonly [number, number]; // default: [-6, 0]
  axisRange: readonly [number, number]; // default: [0, 180]
}

/**
 * Nudge magnitudes used by the fixed-step heuristics. These are clinical
 * conventions awaiting domain-expert confirmation, so they are configurable.
 */
export interface NudgeSizes {
  refractionSphereStep: number; // lens-pair sphere step, default: 0.25
  jccAxisStep: number; // degrees, default: 5
  jccCylinderStep: number; // diopters, default: 0.25
  duochromeSphereStep: number; // diopters, default: 0.125
  binocularBalanceStep: number; // diopters, default: 0.25
  maxBalanceIterations: number; // retests before balance finalizes as-is, default: 4
}

export interface FatigueThresholds {
  windowSize: number; // default: 5
  accuracyDropThreshold: number; // default: 0.2
  confidenceDropThreshold: number; // default: 0.3
  maxMeanLatencySeconds: number; // default: 3.0
  fatiguedSentimentCount: number; // "fatigued" sentiments in the window, default: 2
  latencyCeilingSeconds: number; // mean latency scored as full hesitation, default: 5
  severeScore: number; // fatigue score above which a fatigue flag escalates, default: 0.7
}

export interface DurationThresholds {
  offerBreakSeconds: number; // default: 720 (12 min)
  warnAndCompleteSeconds: number; // default: 1200 (20 min)
  hardStopSeconds: number; // default: 1500 (25 min)
}

/** Incident escalation and examination-quality acceptance. */
export interface MonitoringThresholds {
  highSeverityIncidentLimit: number; // HIGH incidents that force escalation, default: 2
  minParseSuccessRate: number; // default: 0.9
  minAverageConfidence: number; // default: 0.7
  minDeviceSuccessRate: number; // default: 0.95
}

export interface PupillaryDistanceLimits {
  distanceRangeMm: readonly [number, number]; // default: [50, 80]
  nearRangeMm: readonly [number, number]; // default: [45, 75]
  nearOffsetMm: number; // near PD = distance PD - offset when not measured, default: 3
  defaultDistanceMm: number; // default: 63
  defaultNearMm: number; // default: 60
}

export interface EngineConfig {
  quality: QualityThresholds;
  limits: SafetyLimits;
  nudges: NudgeSizes;
  fatigue: FatigueThresholds;
  duration: DurationThresholds;
  monitoring: MonitoringThresholds;
  pupillaryDistance: PupillaryDistanceLimits;
}

export type EngineConfigOverrides = {
  [K in keyof EngineConfig]?: Partial<EngineConfig[K]>;
};

// ─── Defaults ───────────────────────────────────────────────────────────────────

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  quality: { unclearBelow: 0.3, clearAtOrAbove: 0.6 },
  limits: {
    maxSphereStep: 0.5,
    maxCylinderStep: 0.5,
    maxAxisStep: 10,
    sphereRange: [-20, 20] as const,
    cylinderRange: [-6, 0] as const,
    axisRange: [0, 180] as const,
  },
  nudges: {
    refractionSphereStep: 0.25,
    jccAxisStep: 5,
    jccCylinderStep: 0.25,
    duochromeSphereStep: 0.125,
    binocularBalanceStep: 0.25,
    maxBalanceIterations: 4,
  },
  fatigue: {
    windowSize: 5,
    accuracyDropThreshold: 0.2,
    confidenceDropThreshold: 0.3,
    maxMeanLatencySeconds: 3.0,
    fatiguedSentimentCount: 2,
    latencyCeilingSeconds: 5,
    severeScore: 0.7,
  },
  duration: {
    offerBreakSeconds: 720,
    warnAndCompleteSeconds: 1200,
    hardStopSeconds: 1500,
  },
  monitoring: {
    highSeverityIncidentLimit: 2,
    minParseSuccessRate: 0.9,
    minAverageConfidence: 0.7,
    minDeviceSuccessRate: 0.95,
  },
  pupillaryDistance: {
    distanceRangeMm: [50, 80] as const,
    nearRangeMm: [45, 75] as const,
    nearOffsetMm: 3,
    defaultDistanceMm: 63,
    defaultNearMm: 60,
  },
});

// ─── Resolution & Validation ────────────────────────────────────────────────────

/**
 * Merge overrides section by section on top of the defaults and validate the
 * result.
 *
 * @throws ConfigurationError listing every inconsistency found
 */
export function resolveEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const config: EngineConfig = {
    quality: { ...DEFAULT_ENGINE_CONFIG.quality, ...overrides.quality },
    limits: { ...DEFAULT_ENGINE_CONFIG.limits, ...overrides.limits },
    nudges: { ...DEFAULT_ENGINE_CONFIG.nudges, ...overrides.nudges },
    fatigue: { ...DEFAULT_ENGINE_CONFIG.fatigue, ...overrides.fatigue },
    duration: { ...DEFAULT_ENGINE_CONFIG.duration, ...overrides.duration },
    monitoring: { ...DEFAULT_ENGINE_CONFIG.monitoring, ...overrides.monitoring },
    pupillaryDistance: {
      ...DEFAULT_ENGINE_CONFIG.pupillaryDistance,
      ...overrides.pupillaryDistance,
    },
  };

  const problems = validateEngineConfig(config);
  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }
  return config;
}

/**
 * Returns a list of human-readable problems; empty when the config is usable.
 */
export function validateEngineConfig(config: EngineConfig): string[] {
  const problems: string[] = [];
  const { quality, limits, nudges, fatigue, duration, monitoring, pupillaryDistance } = config;

  if (!(quality.unclearBelow >= 0 && quality.unclearBelow < quality.clearAtOrAbove && quality.clearAtOrAbove <= 1)) {
    problems.push(
      `quality thresholds must satisfy 0 <= unclearBelow < clearAtOrAbove <= 1 (got ${quality.unclearBelow}, ${quality.clearAtOrAbove})`,
    );
  }

  for (const [name, value] of [
    ["limits.maxSphereStep", limits.maxSphereStep],
    ["limits.maxCylinderStep", limits.maxCylinderStep],
    ["limits.maxAxisStep", limits.maxAxisStep],
    ["nudges.refractionSphereStep", nudges.refractionSphereStep],
    ["nudges.jccAxisStep", nudges.jccAxisStep],
    ["nudges.jccCylinderStep", nudges.jccCylinderStep],
    ["nudges.duochromeSphereStep", nudges.duochromeSphereStep],
    ["nudges.binocularBalanceStep", nudges.binocularBalanceStep],
    ["fatigue.maxMeanLatencySeconds", fatigue.maxMeanLatencySeconds],
    ["fatigue.latencyCeilingSeconds", fatigue.latencyCeilingSeconds],
  ] as const) {
    if (!Number.isFinite(value) || value <= 0) {
      problems.push(`${name} must be a positive number (got ${value})`);
    }
  }

  for (const [name, range] of [
    ["limits.sphereRange", limits.sphereRange],
    ["limits.cylinderRange", limits.cylinderRange],
    ["limits.axisRange", limits.axisRange],
    ["pupillaryDistance.distanceRangeMm", pupillaryDistance.distanceRangeMm],
    ["pupillaryDistance.nearRangeMm", pupillaryDistance.nearRangeMm],
  ] as const) {
    if (!(range[0] < range[1])) {
      problems.push(`${name} must be an increasing [min, max] pair (got [${range[0]}, ${range[1]}])`);
    }
  }

  for (const [name, value] of [
    ["fatigue.severeScore", fatigue.severeScore],
    ["monitoring.minParseSuccessRate", monitoring.minParseSuccessRate],
    ["monitoring.minAverageConfidence", monitoring.minAverageConfidence],
    ["monitoring.minDeviceSuccessRate", monitoring.minDeviceSuccessRate],
  ] as const) {
    if (!(value >= 0 && value <= 1)) {
      problems.push(`${name} must be within [0, 1] (got ${value})`);
    }
  }

  if (!Number.isInteger(fatigue.windowSize) || fatigue.windowSize < 1) {
    problems.push(`fatigue.windowSize must be a positive integer (got ${fatigue.windowSize})`);
  }
  if (!Number.isInteger(monitoring.highSeverityIncidentLimit) || monitoring.highSeverityIncidentLimit < 1) {
    problems.push(
      `monitoring.highSeverityIncidentLimit must be a positive integer (got ${monitoring.highSeverityIncidentLimit})`,
    );
  }
  if (!Number.isInteger(nudges.maxBalanceIterations) || nudges.maxBalanceIterations < 0) {
    problems.push(`nudges.maxBalanceIterations must be a non-negative integer (got ${nudges.maxBalanceIterations})`);
  }

  if (
    !(
      duration.offerBreakSeconds > 0 &&
      duration.offerBreakSeconds < duration.warnAndCompleteSeconds &&
      duration.warnAndCompleteSeconds < duration.hardStopSeconds
    )
  ) {
    problems.push(
      `duration thresholds must satisfy 0 < offerBreak < warnAndComplete < hardStop ` +
        `(got ${duration.offerBreakSeconds}, ${duration.warnAndCompleteSeconds}, ${duration.hardStopSeconds})`,
    );
  }

  return problems;
}

// ─── Environment ────────────────────────────────────────────────────────────────

interface EnvOverrideTarget {
  quality: Partial<QualityThresholds>;
  duration: Partial<DurationThresholds>;
  nudges: Partial<NudgeSizes>;
}

/**
 * Environment variable → config field. Only numeric overrides are supported.
 */
const ENV_OVERRIDES: Record<string, (target: EnvOverrideTarget, value: number) => void> = {
  REFRACTION_CLEAR_CONFIDENCE: (t, v) => { t.quality.clearAtOrAbove = v; },
  REFRACTION_UNCLEAR_CONFIDENCE: (t, v) => { t.quality.unclearBelow = v; },
  REFRACTION_BREAK_SECONDS: (t, v) => { t.duration.offerBreakSeconds = v; },
  REFRACTION_WARN_SECONDS: (t, v) => { t.duration.warnAndCompleteSeconds = v; },
  REFRACTION_HARD_STOP_SECONDS: (t, v) => { t.duration.hardStopSeconds = v; },
  REFRACTION_DUOCHROME_STEP: (t, v) => { t.nudges.duochromeSphereStep = v; },
  REFRACTION_BALANCE_STEP: (t, v) => { t.nudges.binocularBalanceStep = v; },
};

/**
 * Read numeric overrides from the environment. Unset or empty variables are
 * skipped; anything else must parse as a finite number.
 *
 * @throws ConfigurationError when a variable is set to a non-numeric value
 */
export function loadEngineConfigOverrides(
  env: Record<string, string | undefined> = process.env,
): EngineConfigOverrides {
  const target: EnvOverrideTarget = { quality: {}, duration: {}, nudges: {} };
  const problems: string[] = [];

  for (const [variable, apply] of Object.entries(ENV_OVERRIDES)) {
    const raw = env[variable];
    if (raw === undefined || raw.trim() === "") continue;

    const value = Number(raw);
    if (!Number.isFinite(value)) {
      problems.push(`${variable} must be a number (got "${raw}")`);
      continue;
    }
    apply(target, value);
  }

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }

  const overrides: EngineConfigOverrides = {};
  if (Object.keys(target.quality).length > 0) overrides.quality = target.quality;
  if (Object.keys(target.duration).length > 0) overrides.duration = target.duration;
  if (Object.keys(target.nudges).length > 0) overrides.nudges = target.nudges;
  return overrides;
}
