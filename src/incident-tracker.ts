// Phoropter Refraction Engine - Safety Incident Tracker
// Severity-graded incident log for one exam session. One CRITICAL incident,
// or HIGH incidents up to the configured limit, warrant escalation.

import type { IncidentReport, IncidentSeverity, SafetyIncident, StepId } from "./types.js";

export type IncidentEscalation = { escalate: true; reason: string } | { escalate: false };

export class IncidentTracker {
  private readonly incidents: SafetyIncident[] = [];
  private readonly highSeverityLimit: number;

  private log(level: string, msg: string): void {
    console.log(`[${level}] [IncidentTracker] ${msg}`);
  }

  constructor(highSeverityLimit: number) {
    this.highSeverityLimit = highSeverityLimit;
  }

  record(report: IncidentReport, stepId: StepId | null): SafetyIncident {
    const incident: SafetyIncident = { ...report, timestamp: new Date(), stepId };
    this.incidents.push(incident);
    this.log(
      "WARN",
      `Safety incident logged: ${report.type} (${report.severity}) - ${report.description}`,
    );
    return { ...incident };
  }

  count(severity?: IncidentSeverity): number {
    if (!severity) return this.incidents.length;
    return this.incidents.filter((incident) => incident.severity === severity).length;
  }

  shouldEscalate(): IncidentEscalation {
    const critical = this.incidents.find((incident) => incident.severity === "CRITICAL");
    if (critical) {
      return { escalate: true, reason: critical.description };
    }
    const high = this.count("HIGH");
    if (high >= this.highSeverityLimit) {
      return { escalate: true, reason: `${high} high-severity incidents recorded` };
    }
    return { escalate: false };
  }

  list(): SafetyIncident[] {
    return this.incidents.map((incident) => ({
      ...incident,
      timestamp: new Date(incident.timestamp.getTime()),
    }));
  }
}
