// Phoropter Refraction Engine - Default Clinical Protocol
// The 27-step examination sequence, 0.1 (greeting) through 9.2 (coatings).

import { COMPLETE_STEP, Eye } from "./types.js";
import type { ProtocolStep } from "./types.js";

export const CLARITY_FEEDBACK_VALUES = ["first_better", "second_better", "both_same"] as const;
export const COLOR_PREFERENCE_VALUES = ["red", "green", "both"] as const;
export const JCC_PART_VALUES = ["horizontal", "vertical", "duochrome"] as const;

const REFRACTION_SLOTS = { clarity_feedback: CLARITY_FEEDBACK_VALUES };
const JCC_OPTIONAL_SLOTS = { jcc_part: JCC_PART_VALUES };
const NEAR_VISION_SLOTS = { color_preference: COLOR_PREFERENCE_VALUES };

function general(id: string, name: string, successor: string): ProtocolStep {
  return { id, name, successor, category: "general", requiredSlots: {} };
}

export const DEFAULT_PROTOCOL: readonly ProtocolStep[] = [
  general("0.1", "Welcome & Introduction", "0.2"),
  general("0.2", "Language Selection", "1.1"),
  general("1.1", "Auto-Refractometer Test", "1.2"),
  general("1.2", "Lensometer Power Check", "2.1"),
  general("2.1", "Distance Vision (6 m)", "2.2"),
  general("2.2", "Intermediate Vision", "2.3"),
  general("2.3", "Near Vision (33-40 cm)", "3.1"),
  general("3.1", "External Eye Inspection", "3.2"),
  general("3.2", "Pupil Tests", "3.3"),
  general("3.3", "Anterior Chamber Assessment", "4.1"),
  general("4.1", "Hirschberg Test", "4.2"),
  general("4.2", "Broad H Motility Test", "4.3"),
  general("4.3", "Cover/Uncover Tests", "4.4"),
  general("4.4", "Convergence Test", "5.1"),
  {
    id: "5.1",
    name: "Distance PD Measurement",
    successor: "5.2",
    category: "pupillary_distance",
    requiredSlots: {},
  },
  {
    id: "5.2",
    name: "Near PD Measurement",
    successor: "6.1",
    category: "pupillary_distance",
    requiredSlots: {},
  },
  {
    id: "6.1",
    name: "Right Eye Refraction (Left Occluded)",
    successor: "6.2",
    category: "monocular_refraction",
    eye: Eye.OD,
    requiredSlots: REFRACTION_SLOTS,
  },
  {
    id: "6.2",
    name: "Right Eye JCC & Duochrome",
    successor: "6.3",
    category: "jcc_refinement",
    eye: Eye.OD,
    requiredSlots: REFRACTION_SLOTS,
    optionalSlots: JCC_OPTIONAL_SLOTS,
  },
  {
    id: "6.3",
    name: "Left Eye Refraction (Right Occluded)",
    successor: "6.4",
    category: "monocular_refraction",
    eye: Eye.OS,
    requiredSlots: REFRACTION_SLOTS,
  },
  {
    id: "6.4",
    name: "Left Eye JCC & Duochrome",
    successor: "6.5",
    category: "jcc_refinement",
    eye: Eye.OS,
    requiredSlots: REFRACTION_SLOTS,
    optionalSlots: JCC_OPTIONAL_SLOTS,
  },
  {
    id: "6.5",
    name: "Binocular Balance (Both Eyes Open)",
    successor: "7.1",
    category: "binocular_balance",
    requiredSlots: REFRACTION_SLOTS,
  },
  {
    id: "7.1",
    name: "Near Vision Assessment",
    successor: "7.2",
    category: "near_vision",
    requiredSlots: NEAR_VISION_SLOTS,
    // No presbyopia addition before 40
    ageBranch: { belowAge: 40, successor: "8.1" },
  },
  {
    id: "7.2",
    name: "Presbyopia Addition",
    successor: "8.1",
    category: "near_vision",
    requiredSlots: NEAR_VISION_SLOTS,
  },
  general("8.1", "Real-World Testing", "8.2"),
  general("8.2", "Final Comfort Check", "9.1"),
  general("9.1", "Lens Type Recommendation", "9.2"),
  general("9.2", "Coating & Material Selection", COMPLETE_STEP),
];
