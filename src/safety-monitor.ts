// Phoropter Refraction Engine - Safety Monitor
// Cross-cutting override authority for one exam session. Tracks per-turn
// accuracy, confidence, latency and sentiment for the fatigue heuristic, the
// externally supplied session clock for duration limits, and the red-flag and
// persona-override counters. Owns the session's incident log and quality
// metrics.
//
// Precedence of the per-turn override, highest first:
//   red_flag > hard_stop > severe_fatigue > persona_override
//   > (none: quality verdict decides)

import type {
  DurationStatus,
  FatigueStatus,
  IncidentReport,
  SafetyAssessment,
  SafetyIncident,
  SafetyOverride,
  SafetySnapshot,
  Sentiment,
  StepId,
} from "./types.js";
import type { DurationThresholds, FatigueThresholds, MonitoringThresholds } from "./engine-config.js";
import { IncidentTracker } from "./incident-tracker.js";
import type { IncidentEscalation } from "./incident-tracker.js";
import { ExamQualityMonitor } from "./quality-monitor.js";

export interface SafetyTurnSample {
  /** 1 when the turn's verdict was clear, else 0. */
  accuracy: number;
  confidence: number;
  latencySeconds?: number;
  sentiment: Sentiment;
  redFlag: boolean;
  personaOverride: boolean;
  elapsedSeconds: number;
  /** False when the response could not be classified at all. */
  parsed: boolean;
  stepId?: StepId;
}

export function classifyDuration(elapsedSeconds: number, thresholds: DurationThresholds): DurationStatus {
  if (elapsedSeconds >= thresholds.hardStopSeconds) return "hard_stop";
  if (elapsedSeconds >= thresholds.warnAndCompleteSeconds) return "warn_and_complete";
  if (elapsedSeconds >= thresholds.offerBreakSeconds) return "offer_break";
  return "continue";
}

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function pushBounded<T>(buffer: T[], value: T, limit: number): void {
  buffer.push(value);
  if (buffer.length > limit) buffer.shift();
}

export class SafetyMonitor {
  private readonly fatigueConfig: FatigueThresholds;
  private readonly durationConfig: DurationThresholds;
  private readonly incidents: IncidentTracker;
  private readonly quality: ExamQualityMonitor;

  private turnCount = 0;
  private elapsedSeconds = 0;
  private redFlagCount = 0;
  private personaOverrideCount = 0;
  private wasFatigued = false;

  private readonly baselineAccuracy: number[] = [];
  private readonly baselineConfidence: number[] = [];
  private readonly recentAccuracy: number[] = [];
  private readonly recentConfidence: number[] = [];
  private readonly recentLatency: number[] = [];
  private readonly recentSentiments: Sentiment[] = [];

  private log(level: string, msg: string): void {
    console.log(`[${level}] [SafetyMonitor] ${msg}`);
  }

  constructor(fatigue: FatigueThresholds, duration: DurationThresholds, monitoring: MonitoringThresholds) {
    this.fatigueConfig = fatigue;
    this.durationConfig = duration;
    this.incidents = new IncidentTracker(monitoring.highSeverityIncidentLimit);
    this.quality = new ExamQualityMonitor(monitoring);
  }

  /**
   * Record one turn and return the override that applies to it, along with
   * the advisory fatigue and duration status.
   */
  recordTurn(sample: SafetyTurnSample): SafetyAssessment {
    const n = this.fatigueConfig.windowSize;

    this.turnCount++;
    // The session clock never runs backwards
    this.elapsedSeconds = Math.max(this.elapsedSeconds, sample.elapsedSeconds);
    if (sample.redFlag) this.redFlagCount++;
    if (sample.personaOverride) this.personaOverrideCount++;

    if (this.baselineAccuracy.length < n) {
      this.baselineAccuracy.push(sample.accuracy);
      this.baselineConfidence.push(sample.confidence);
    }
    pushBounded(this.recentAccuracy, sample.accuracy, n);
    pushBounded(this.recentConfidence, sample.confidence, n);
    pushBounded(this.recentSentiments, sample.sentiment, n);
    if (sample.latencySeconds !== undefined) {
      pushBounded(this.recentLatency, sample.latencySeconds, n);
    }
    this.quality.recordResponse(sample.confidence, sample.parsed);

    const fatigue = this.checkFatigue();
    const fatigueScore = this.fatigueScore();
    const duration = this.checkDuration();
    const severeFatigue = fatigue.fatigued && fatigueScore > this.fatigueConfig.severeScore;

    let override: SafetyOverride | null = null;
    if (sample.redFlag) {
      override = "red_flag";
    } else if (duration === "hard_stop") {
      override = "hard_stop";
    } else if (severeFatigue) {
      override = "severe_fatigue";
    } else if (sample.personaOverride) {
      override = "persona_override";
    }

    if (fatigue.fatigued) {
      this.log("WARN", `Fatigue detected after ${this.turnCount} turns: ${fatigue.reason}`);
    }
    this.recordTurnIncidents(sample, fatigue, fatigueScore, severeFatigue, duration);
    this.wasFatigued = fatigue.fatigued;

    return { override, fatigue, fatigueScore, duration };
  }

  /**
   * Weighted fatigue score over the recent window: 0.4 inaccuracy, 0.3
   * hesitation (mean latency against the configured ceiling), 0.3 lack of
   * confidence. 0 before any turn.
   */
  fatigueScore(): number {
    if (this.recentAccuracy.length === 0) return 0;
    const inaccuracy = 1 - mean(this.recentAccuracy);
    const hesitation = Math.min(1, mean(this.recentLatency) / this.fatigueConfig.latencyCeilingSeconds);
    const unsure = 1 - mean(this.recentConfidence);
    const score = inaccuracy * 0.4 + hesitation * 0.3 + unsure * 0.3;
    return Math.min(1, Math.max(0, score));
  }

  // ─── Incidents & device actions ─────────────────────────────────────────────

  recordIncident(report: IncidentReport, stepId: StepId | null): SafetyIncident {
    return this.incidents.record(report, stepId);
  }

  recordDeviceAction(success: boolean): void {
    this.quality.recordDeviceAction(success);
  }

  incidentEscalation(): IncidentEscalation {
    return this.incidents.shouldEscalate();
  }

  /**
   * Fatigue flag. Alone it only recommends a break; together with a fatigue
   * score above `severeScore` the turn escalates. Accuracy and confidence
   * drops need 2·N turns so that baseline and recent windows do not overlap.
   */
  checkFatigue(): FatigueStatus {
    const cfg = this.fatigueConfig;
    const n = cfg.windowSize;

    if (this.turnCount >= 2 * n) {
      const accuracyDrop = mean(this.baselineAccuracy) - mean(this.recentAccuracy);
      if (accuracyDrop > cfg.accuracyDropThreshold) {
        return { fatigued: true, reason: `accuracy dropped by ${accuracyDrop.toFixed(2)}` };
      }
      const confidenceDrop = mean(this.baselineConfidence) - mean(this.recentConfidence);
      if (confidenceDrop > cfg.confidenceDropThreshold) {
        return { fatigued: true, reason: `confidence dropped by ${confidenceDrop.toFixed(2)}` };
      }
    }

    if (this.recentLatency.length >= n) {
      const latency = mean(this.recentLatency);
      if (latency > cfg.maxMeanLatencySeconds) {
        return { fatigued: true, reason: `mean response latency ${latency.toFixed(1)}s` };
      }
    }

    const fatiguedCount = this.recentSentiments.filter((s) => s === "fatigued").length;
    if (fatiguedCount >= cfg.fatiguedSentimentCount) {
      return { fatigued: true, reason: `${fatiguedCount} fatigued responses in the last ${n} turns` };
    }

    return { fatigued: false, reason: null };
  }

  private recordTurnIncidents(
    sample: SafetyTurnSample,
    fatigue: FatigueStatus,
    fatigueScore: number,
    severeFatigue: boolean,
    duration: DurationStatus,
  ): void {
    const stepId = sample.stepId ?? null;
    if (sample.redFlag) {
      this.recordIncident(
        { type: "red_flag", description: "Patient reported a red-flag symptom", severity: "CRITICAL" },
        stepId,
      );
    }
    if (duration === "hard_stop") {
      this.recordIncident(
        {
          type: "duration_exceeded",
          description: `Session reached ${this.elapsedSeconds}s of ${this.durationConfig.hardStopSeconds}s allowed`,
          severity: "HIGH",
        },
        stepId,
      );
    }
    if (severeFatigue) {
      this.recordIncident(
        {
          type: "severe_fatigue",
          description: `Severe patient fatigue (score ${fatigueScore.toFixed(2)}): ${fatigue.reason ?? ""}`,
          severity: "HIGH",
        },
        stepId,
      );
    } else if (fatigue.fatigued && !this.wasFatigued) {
      this.recordIncident(
        { type: "fatigue", description: fatigue.reason ?? "fatigue detected", severity: "MEDIUM" },
        stepId,
      );
    }
    if (sample.personaOverride) {
      this.recordIncident(
        { type: "persona_override", description: "Persona override held the current step", severity: "LOW" },
        stepId,
      );
    }
  }

  checkDuration(): DurationStatus {
    return classifyDuration(this.elapsedSeconds, this.durationConfig);
  }

  snapshot(): SafetySnapshot {
    return {
      turnCount: this.turnCount,
      elapsedSeconds: this.elapsedSeconds,
      redFlagCount: this.redFlagCount,
      personaOverrideCount: this.personaOverrideCount,
      fatigueScore: this.fatigueScore(),
      incidents: this.incidents.list(),
      quality: this.quality.metrics(),
      baseline: {
        accuracy: [...this.baselineAccuracy],
        confidence: [...this.baselineConfidence],
      },
      recent: {
        accuracy: [...this.recentAccuracy],
        confidence: [...this.recentConfidence],
        latencySeconds: [...this.recentLatency],
        sentiments: [...this.recentSentiments],
      },
    };
  }
}
