// Phoropter Refraction Engine - Examination Quality Monitor

import type { QualityMetrics } from "./types.js";
import type { MonitoringThresholds } from "./engine-config.js";

export class ExamQualityMonitor {
  private readonly thresholds: MonitoringThresholds;
  private responsesAnalyzed = 0;
  private parseFailures = 0;
  private confidenceTotal = 0;
  private deviceActions = 0;
  private deviceFailures = 0;

  constructor(thresholds: MonitoringThresholds) {
    this.thresholds = thresholds;
  }

  /** A response that could not be classified counts as a parse failure. */
  recordResponse(confidence: number, parsed: boolean): void {
    this.responsesAnalyzed++;
    this.confidenceTotal += confidence;
    if (!parsed) this.parseFailures++;
  }

  recordDeviceAction(success: boolean): void {
    this.deviceActions++;
    if (!success) this.deviceFailures++;
  }

  /**
   * With no responses yet every rate is 0 and quality is not acceptable.
   * With no device actions the device success rate is 1.
   */
  metrics(): QualityMetrics {
    const analyzed = this.responsesAnalyzed;
    const parseSuccessRate = analyzed === 0 ? 0 : 1 - this.parseFailures / analyzed;
    const averageConfidence = analyzed === 0 ? 0 : this.confidenceTotal / analyzed;
    const deviceSuccessRate =
      this.deviceActions === 0 ? 1 : 1 - this.deviceFailures / this.deviceActions;

    return {
      responsesAnalyzed: analyzed,
      parseSuccessRate,
      averageConfidence,
      deviceActions: this.deviceActions,
      deviceSuccessRate,
      acceptable:
        analyzed > 0 &&
        parseSuccessRate >= this.thresholds.minParseSuccessRate &&
        averageConfidence >= this.thresholds.minAverageConfidence &&
        deviceSuccessRate >= this.thresholds.minDeviceSuccessRate,
    };
  }
}
