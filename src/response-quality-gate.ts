// Phoropter Refraction Engine - Response Quality Gate
// Pure classification of a pre-classified patient turn into a verdict. The
// state machine uses the verdict to decide whether the step advances.

import type { ProtocolStep, ResponseQuality, ResponseVerdict, SlotMap } from "./types.js";
import type { QualityThresholds } from "./engine-config.js";

/** Intent tags the NLU collaborator reserves for "could not classify". */
export const INVALID_INTENTS: ReadonlySet<string> = new Set(["invalid", "unknown"]);

/**
 * Returns the required slot keys that are absent or hold a value outside the
 * step's vocabulary for that key, followed by optional slot keys that were
 * sent with an unrecognized value.
 */
export function findMissingSlots(slots: SlotMap, step: ProtocolStep): string[] {
  const missing: string[] = [];
  for (const [key, accepted] of Object.entries(step.requiredSlots)) {
    const value = slots[key];
    if (value === undefined || !accepted.includes(value)) {
      missing.push(key);
    }
  }
  for (const [key, accepted] of Object.entries(step.optionalSlots ?? {})) {
    const value = slots[key];
    if (value !== undefined && !accepted.includes(value)) {
      missing.push(key);
    }
  }
  return missing;
}

function qualityFromConfidence(confidence: number, thresholds: QualityThresholds): ResponseQuality {
  if (confidence < thresholds.unclearBelow) return "unclear";
  if (confidence < thresholds.clearAtOrAbove) return "ambiguous";
  return "clear";
}

/**
 * Classify a turn.
 *
 * - An invalid/unknown intent is always `invalid`.
 * - Otherwise confidence bands decide unclear / ambiguous / clear.
 * - A would-be `clear` verdict is downgraded to `ambiguous` when the step's
 *   required slots are missing or unrecognized, or an optional slot holds an
 *   unrecognized value.
 */
export function assessResponse(
  confidence: number,
  intent: string,
  slots: SlotMap,
  step: ProtocolStep,
  thresholds: QualityThresholds,
): ResponseVerdict {
  const missingSlots = findMissingSlots(slots, step);
  const requiredSlotsPresent = missingSlots.length === 0;

  let quality: ResponseQuality;
  if (INVALID_INTENTS.has(intent)) {
    quality = "invalid";
  } else {
    quality = qualityFromConfidence(confidence, thresholds);
    if (quality === "clear" && !requiredSlotsPresent) {
      quality = "ambiguous";
    }
  }

  return { quality, confidence, requiredSlotsPresent, missingSlots };
}
