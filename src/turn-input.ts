// Phoropter Refraction Engine - Turn input contract
// Zod schemas for payloads that arrive over the wire. The engine itself only
// ever sees a parsed TurnInput.

import { z } from "zod";
import type { ClientMessage, IncidentReport, TurnInput } from "./types.js";
import { MAX_PATIENT_AGE } from "./refraction-engine.js";

export const sentimentSchema = z.enum([
  "confident",
  "under_confident",
  "confused",
  "overconfident",
  "fatigued",
  "neutral",
]);

export const turnInputSchema = z.object({
  intent: z.string().min(1),
  confidence: z.number().min(0).max(1),
  slots: z.record(z.string(), z.string()).default({}),
  sentiment: sentimentSchema.default("neutral"),
  redFlag: z.boolean().default(false),
  personaOverride: z.boolean().default(false),
  elapsedSeconds: z.number().finite().min(0),
  responseLatencySeconds: z.number().finite().min(0).optional(),
});

export type TurnInputPayload = z.input<typeof turnInputSchema>;

export const incidentReportSchema = z.object({
  type: z.string().min(1),
  description: z.string().min(1),
  severity: z.enum(["LOW", "MEDIUM", "HIGH", "CRITICAL"]),
});

export const patientAgeSchema = z.coerce.number().int().min(0).max(MAX_PATIENT_AGE);

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

export type TurnInputValidation =
  | { ok: true; input: TurnInput }
  | { ok: false; errors: string[] };

/**
 * Validate an untrusted turn payload. Missing optional flags default to
 * false, sentiment to "neutral" and slots to an empty map.
 */
export function validateTurnInput(raw: unknown): TurnInputValidation {
  const parsed = turnInputSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, errors: describeIssues(parsed.error) };
  }
  return { ok: true, input: parsed.data };
}

export type IncidentReportValidation =
  | { ok: true; report: IncidentReport }
  | { ok: false; errors: string[] };

export function validateIncidentReport(raw: unknown): IncidentReportValidation {
  const parsed = incidentReportSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, errors: describeIssues(parsed.error) };
  }
  return { ok: true, report: parsed.data };
}

export type PatientAgeParse = { ok: true; age: number | null } | { ok: false; error: string };

/**
 * Parse the `patientAge` connection parameter. Absent or empty means the age
 * is unknown.
 */
export function parsePatientAge(raw: string | null): PatientAgeParse {
  if (raw === null || raw.trim() === "") return { ok: true, age: null };
  const parsed = patientAgeSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: `Invalid patientAge "${raw}": ${describeIssues(parsed.error).join("; ")}` };
  }
  return { ok: true, age: parsed.data };
}

// ─── Client messages ────────────────────────────────────────────────────────────

export const clientMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("submit_turn"), turn: z.unknown() }),
  z.object({ type: z.literal("abort_exam") }),
  z.object({ type: z.literal("request_snapshot") }),
  z.object({ type: z.literal("report_incident"), incident: z.unknown() }),
  z.object({ type: z.literal("save_outputs") }),
]);

/**
 * Parse a decoded WebSocket frame into a ClientMessage. Returns null for
 * anything that is not one of the known message shapes.
 */
export function parseClientMessage(raw: unknown): ClientMessage | null {
  const parsed = clientMessageSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}
