// Phoropter Refraction Engine - Adjustment Validator
// Pure validation of a proposed lens change against step-size and domain
// limits. The controller performs the mutation; nothing here touches state.

import type { AdjustmentRequest, PhoropterState, ValidationResult } from "./types.js";
import type { SafetyLimits } from "./engine-config.js";
import {
  formatDiopters,
  getLens,
  maxStepFor,
  rangeFor,
  roundLensValue,
} from "./lens-state.js";

function formatValue(parameter: AdjustmentRequest["parameter"], value: number): string {
  return parameter === "axis" ? `${value}°` : `${formatDiopters(value)}D`;
}

function formatStepSize(parameter: AdjustmentRequest["parameter"], size: number): string {
  return formatValue(parameter, size).replace("+", "");
}

/**
 * Validate an adjustment request against the current state.
 *
 * Checks, in order:
 * 1. The magnitude is a finite number (and an integer for axis)
 * 2. |magnitude| does not exceed the per-parameter maximum step ("unsafe jump")
 * 3. current + magnitude stays inside the parameter's domain ("out of range")
 *
 * Magnitudes are not assumed to be quantized; any real value within the step
 * bound is accepted.
 */
export function validateAdjustment(
  state: PhoropterState,
  request: AdjustmentRequest,
  limits: SafetyLimits,
): ValidationResult {
  const { parameter, magnitude } = request;

  if (!Number.isFinite(magnitude)) {
    return {
      ok: false,
      reason: "invalid_magnitude",
      message: `Invalid magnitude: ${magnitude} is not a finite number`,
    };
  }

  if (parameter === "axis" && !Number.isInteger(magnitude)) {
    return {
      ok: false,
      reason: "invalid_magnitude",
      message: `Invalid magnitude: axis changes must be whole degrees (got ${magnitude})`,
    };
  }

  const maxStep = maxStepFor(parameter, limits);
  if (Math.abs(magnitude) > maxStep) {
    return {
      ok: false,
      reason: "unsafe_jump",
      message:
        `Unsafe jump: ${parameter} change of ±${formatStepSize(parameter, Math.abs(magnitude))} ` +
        `exceeds ±${formatStepSize(parameter, maxStep)}`,
    };
  }

  const previousValue = getLens(state, request.eye)[parameter];
  const newValue = roundLensValue(previousValue + magnitude);
  const [min, max] = rangeFor(parameter, limits);

  if (newValue < min || newValue > max) {
    return {
      ok: false,
      reason: "out_of_range",
      message:
        `Out of range: ${request.eye} ${parameter} ${formatValue(parameter, newValue)} ` +
        `not in [${formatValue(parameter, min)}, ${formatValue(parameter, max)}]`,
    };
  }

  return { ok: true, previousValue, newValue };
}
