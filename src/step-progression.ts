// Phoropter Refraction Engine - Step Progression State Machine
//
// The step graph is a static successor map, validated once when loaded:
//   - step ids are unique and never shadow a built-in terminal
//   - every successor (and age-branch successor) is a declared step or a
//     built-in terminal
//   - following any edge from any step reaches a terminal (no cycles)
// Per-turn progression is then a plain lookup.

import { COMPLETE_STEP, ESCALATION_STEP } from "./types.js";
import type { ProtocolStep, ResponseQuality, StepId } from "./types.js";
import { ConfigurationError } from "./errors.js";

export const TERMINAL_STEPS: ReadonlySet<StepId> = new Set([COMPLETE_STEP, ESCALATION_STEP]);

export function isTerminalStep(stepId: StepId): boolean {
  return TERMINAL_STEPS.has(stepId);
}

export class ProtocolGraph {
  private readonly steps: ReadonlyMap<StepId, ProtocolStep>;
  readonly initialStep: StepId;

  private constructor(steps: Map<StepId, ProtocolStep>, initialStep: StepId) {
    this.steps = steps;
    this.initialStep = initialStep;
  }

  /**
   * Validate a step table and build the graph. The first definition is the
   * initial step.
   *
   * @throws ConfigurationError listing every structural problem found
   */
  static load(definitions: readonly ProtocolStep[]): ProtocolGraph {
    const problems: string[] = [];
    const steps = new Map<StepId, ProtocolStep>();

    if (definitions.length === 0) {
      throw new ConfigurationError(["protocol has no steps"]);
    }

    for (const step of definitions) {
      if (isTerminalStep(step.id)) {
        problems.push(`step "${step.id}" uses a reserved terminal id`);
        continue;
      }
      if (steps.has(step.id)) {
        problems.push(`duplicate step id "${step.id}"`);
        continue;
      }
      steps.set(step.id, step);
    }

    for (const step of steps.values()) {
      if (!steps.has(step.successor) && !isTerminalStep(step.successor)) {
        problems.push(`step "${step.id}" has unknown successor "${step.successor}"`);
      }
      const branch = step.ageBranch;
      if (branch) {
        if (!steps.has(branch.successor) && !isTerminalStep(branch.successor)) {
          problems.push(`step "${step.id}" has unknown age-branch successor "${branch.successor}"`);
        }
        if (!Number.isFinite(branch.belowAge) || branch.belowAge <= 0) {
          problems.push(`step "${step.id}" has an invalid age-branch bound (${branch.belowAge})`);
        }
      }
    }

    // Only walk the graph once every edge resolves
    if (problems.length === 0) {
      problems.push(...findCycles(steps));
    }

    if (problems.length > 0) {
      throw new ConfigurationError(problems);
    }

    return new ProtocolGraph(steps, definitions[0].id);
  }

  get size(): number {
    return this.steps.size;
  }

  hasStep(stepId: StepId): boolean {
    return this.steps.has(stepId);
  }

  getStep(stepId: StepId): ProtocolStep {
    const step = this.steps.get(stepId);
    if (!step) {
      throw new Error(`Unknown protocol step: ${stepId}`);
    }
    return step;
  }

  /**
   * Red flag → escalation terminal; anything but a clear verdict repeats the
   * current step; a clear verdict advances to the successor. A step with an
   * age branch takes the branch successor when the patient's age is known and
   * below the bound. An unknown age follows the full path.
   */
  nextStep(
    current: StepId,
    verdict: ResponseQuality,
    redFlag: boolean,
    patientAge: number | null = null,
  ): StepId {
    if (redFlag) return ESCALATION_STEP;
    if (verdict !== "clear") return current;
    const step = this.getStep(current);
    if (step.ageBranch && patientAge !== null && patientAge < step.ageBranch.belowAge) {
      return step.ageBranch.successor;
    }
    return step.successor;
  }
}

function edgesOf(step: ProtocolStep): StepId[] {
  return step.ageBranch ? [step.successor, step.ageBranch.successor] : [step.successor];
}

/**
 * Depth-first walk over every edge. A step met again while still on the
 * current path closes a cycle.
 */
function findCycles(steps: ReadonlyMap<StepId, ProtocolStep>): string[] {
  const problems: string[] = [];
  const settled = new Set<StepId>();
  const path: StepId[] = [];
  const onPath = new Set<StepId>();

  const visit = (id: StepId): void => {
    if (isTerminalStep(id) || settled.has(id)) return;
    if (onPath.has(id)) {
      const loop = path.slice(path.indexOf(id));
      problems.push(`cycle detected: ${[...loop, id].join(" → ")}`);
      return;
    }
    const step = steps.get(id);
    if (!step) return;

    onPath.add(id);
    path.push(id);
    for (const next of edgesOf(step)) visit(next);
    path.pop();
    onPath.delete(id);
    settled.add(id);
  };

  for (const start of steps.keys()) visit(start);
  return problems;
}
