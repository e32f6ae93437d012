// Phoropter Refraction Engine - File Persistence
// Opt-in saving of an exam's read-only snapshot and audit log to disk.
//
// Nothing is written unless the operator asks for it. The engine snapshot is
// the only input; this module never reaches into engine internals.

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { AdjustmentRecord, EngineSnapshot, TurnLogEntry } from "./types.js";
import type { ExamSession } from "./session-manager.js";
import { formatDiopters, formatLens } from "./lens-state.js";

function formatValue(record: AdjustmentRecord, value: number): string {
  return record.parameter === "axis" ? `${value}°` : `${formatDiopters(value)}D`;
}

/**
 * One line per history entry:
 *   2026-01-05T10:00:00.000Z [6.1] OD sphere +0.25D → +0.25D (was 0.00D)
 */
export function formatAdjustmentHistory(history: AdjustmentRecord[]): string {
  return history
    .map((record) => {
      const magnitude =
        record.parameter === "axis"
          ? `${record.magnitude > 0 ? "+" : ""}${record.magnitude}°`
          : `${formatDiopters(record.magnitude)}D`;
      return (
        `${record.timestamp.toISOString()} [${record.sourceStep ?? "-"}] ` +
        `${record.eye} ${record.parameter} ${magnitude} → ${formatValue(record, record.newValue)} ` +
        `(was ${formatValue(record, record.previousValue)})`
      );
    })
    .join("\n");
}

/**
 * Serializes the prescription report: final lenses, PD, controller state,
 * escalation (if any), the safety summary (fatigue score, incidents, quality
 * metrics) and the full adjustment history.
 */
export function formatPrescription(session: ExamSession, snapshot: EngineSnapshot): string {
  return JSON.stringify(
    {
      sessionId: session.id,
      patientId: session.patientId,
      patientAge: session.patientAge,
      createdAt: session.createdAt.toISOString(),
      currentStep: snapshot.currentStep,
      controllerState: snapshot.controllerState,
      prescription: {
        od: { ...snapshot.state.od, notation: formatLens(snapshot.state.od) },
        os: { ...snapshot.state.os, notation: formatLens(snapshot.state.os) },
        pupillaryDistance: snapshot.state.pupillaryDistance,
      },
      escalation: snapshot.escalation
        ? {
            reason: snapshot.escalation.reason,
            stepId: snapshot.escalation.stepId,
            timestamp: snapshot.escalation.timestamp.toISOString(),
          }
        : null,
      safety: {
        fatigueScore: snapshot.safety.fatigueScore,
        incidents: snapshot.safety.incidents.map((incident) => ({
          ...incident,
          timestamp: incident.timestamp.toISOString(),
        })),
        quality: snapshot.safety.quality,
      },
      adjustmentHistory: snapshot.adjustmentHistory.map((record) => ({
        ...record,
        timestamp: record.timestamp.toISOString(),
      })),
    },
    null,
    2,
  );
}

export function formatTurnLog(entries: TurnLogEntry[]): string {
  return JSON.stringify(
    entries.map((entry) => ({ ...entry, timestamp: entry.timestamp.toISOString() })),
    null,
    2,
  );
}

/**
 * Generates the output directory name from a session.
 * Format: `{YYYY-MM-DD_HH-mm-ss}_{sessionId}`
 */
export function buildDirectoryName(session: ExamSession): string {
  const date = session.createdAt;
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  const hours = String(date.getHours()).padStart(2, "0");
  const minutes = String(date.getMinutes()).padStart(2, "0");
  const seconds = String(date.getSeconds()).padStart(2, "0");

  const timestamp = `${year}-${month}-${day}_${hours}-${minutes}-${seconds}`;
  return `${timestamp}_${session.id}`;
}

/**
 * Output directory structure:
 *   {baseDir}/{YYYY-MM-DD_HH-mm-ss}_{sessionId}/
 *     prescription.json
 *     adjustments.txt
 *     session-log.json
 */
export class FilePersistence {
  private baseDir: string;

  constructor(baseDir: string = "output") {
    this.baseDir = baseDir;
  }

  /**
   * Saves the session's outputs. Sets session.outputsSaved = true after a
   * successful save.
   *
   * @returns Array of file paths that were written.
   */
  async saveSession(session: ExamSession): Promise<string[]> {
    const dirPath = join(this.baseDir, buildDirectoryName(session));
    await mkdir(dirPath, { recursive: true });

    const snapshot = session.engine.snapshot();
    const files: [string, string][] = [
      ["prescription.json", formatPrescription(session, snapshot)],
      ["adjustments.txt", formatAdjustmentHistory(snapshot.adjustmentHistory)],
      ["session-log.json", formatTurnLog(session.turnLog)],
    ];

    const savedPaths: string[] = [];
    for (const [name, content] of files) {
      const path = join(dirPath, name);
      await writeFile(path, content, "utf-8");
      savedPaths.push(path);
    }

    session.outputsSaved = true;
    return savedPaths;
  }
}
