// Phoropter Refraction Engine - Session Manager
// Maps session ids to per-exam RefractionEngine instances and keeps the audit
// log of every processed turn. Sessions share no mutable state.

import { v4 as uuidv4 } from "uuid";
import type {
  EngineSnapshot,
  IncidentReport,
  ProtocolStep,
  TurnInput,
  TurnLogEntry,
  TurnResult,
} from "./types.js";
import type { EngineConfig } from "./engine-config.js";
import { resolveEngineConfig } from "./engine-config.js";
import { RefractionEngine } from "./refraction-engine.js";
import type { EscalationResult, IncidentResult } from "./refraction-engine.js";
import { ProtocolGraph } from "./step-progression.js";
import { DEFAULT_PROTOCOL } from "./protocol-steps.js";
import type { FilePersistence } from "./file-persistence.js";

export interface ExamSession {
  id: string;
  patientId: string;
  patientAge: number | null;
  createdAt: Date;
  engine: RefractionEngine;
  turnLog: TurnLogEntry[];
  outputsSaved: boolean;
}

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface SessionManagerDeps {
  config?: EngineConfig;
  protocol?: readonly ProtocolStep[];
  filePersistence?: FilePersistence;
}

export interface CreateSessionOptions {
  /** Anonymized patient identifier. Default: "ANON" */
  patientId?: string;
  /** Whole years; steers age-dependent steps. Default: unknown */
  patientAge?: number | null;
}

export class SessionManager {
  private sessions: Map<string, ExamSession> = new Map();
  private readonly deps: SessionManagerDeps;
  private readonly config: EngineConfig;
  private readonly protocol: readonly ProtocolStep[];

  private log(level: string, msg: string): void {
    console.log(`[${level}] [SessionManager] ${msg}`);
  }

  /**
   * @throws ConfigurationError when the protocol table or configuration is
   *   inconsistent; nothing is served in that case
   */
  constructor(deps: SessionManagerDeps = {}) {
    this.deps = deps;
    this.config = deps.config ?? resolveEngineConfig();
    this.protocol = deps.protocol ?? DEFAULT_PROTOCOL;

    const graph = ProtocolGraph.load(this.protocol);
    this.log(
      "INIT",
      `Protocol loaded (${graph.size} steps, starting at ${graph.initialStep}); ` +
        `persistence ${deps.filePersistence ? "enabled" : "disabled"}`,
    );
  }

  /**
   * Creates a new exam session positioned at the protocol's first step.
   *
   * @throws ConfigurationError when the patient age is out of range
   */
  createSession(options: CreateSessionOptions = {}): ExamSession {
    const patientAge = options.patientAge ?? null;
    const session: ExamSession = {
      id: uuidv4(),
      patientId: options.patientId ?? "ANON",
      patientAge,
      createdAt: new Date(),
      engine: new RefractionEngine({ config: this.config, protocol: this.protocol, patientAge }),
      turnLog: [],
      outputsSaved: false,
    };

    this.sessions.set(session.id, session);
    this.log("INFO", `Session ${session.id} created for patient ${session.patientId}`);
    return session;
  }

  /**
   * Retrieves a session by ID.
   * @throws Error if the session does not exist.
   */
  getSession(sessionId: string): ExamSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new Error(`Session not found: ${sessionId}`);
    }
    return session;
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  listSessionIds(): string[] {
    return [...this.sessions.keys()];
  }

  /**
   * Runs one patient turn through the session's engine and appends an audit
   * entry.
   *
   * @throws Error if the session does not exist
   * @throws InvalidTransitionError if the exam already ended
   */
  submitTurn(sessionId: string, input: TurnInput): TurnResult {
    const session = this.getSession(sessionId);
    const result = session.engine.processTurn(input);

    session.turnLog.push({
      timestamp: new Date(),
      stepId: result.stepId,
      intent: input.intent,
      sentiment: input.sentiment,
      confidence: input.confidence,
      verdict: result.verdict.quality,
      command: result.command.type,
      nextStepId: result.nextStepId,
    });

    if (result.escalation) {
      this.log(
        "ESCALATE",
        `Session ${sessionId} escalated at step ${result.escalation.stepId}: ${result.escalation.reason}`,
      );
    }

    return result;
  }

  /**
   * Operator abort. Idempotent: an already escalated session reports its
   * original escalation.
   */
  abortSession(sessionId: string): EscalationResult {
    const session = this.getSession(sessionId);
    const result = session.engine.escalate("operator_abort");
    if (!result.alreadyEscalated) {
      this.log("WARN", `Session ${sessionId} aborted by operator at step ${result.event.stepId}`);
    }
    return result;
  }

  /**
   * Logs an incident reported from outside a turn. The session escalates
   * when its incident log warrants it.
   */
  reportIncident(sessionId: string, report: IncidentReport): IncidentResult {
    const session = this.getSession(sessionId);
    const result = session.engine.reportIncident(report);
    if (result.escalation && !result.escalation.alreadyEscalated) {
      this.log(
        "ESCALATE",
        `Session ${sessionId} escalated at step ${result.escalation.event.stepId}: ${result.escalation.event.reason}`,
      );
    }
    return result;
  }

  getSnapshot(sessionId: string): EngineSnapshot {
    return this.getSession(sessionId).engine.snapshot();
  }

  /**
   * Writes the session's snapshot and audit log via the configured
   * FilePersistence. Returns the written paths (empty when persistence is
   * not configured).
   */
  async saveOutputs(sessionId: string): Promise<string[]> {
    const session = this.getSession(sessionId);

    if (this.deps.filePersistence) {
      return this.deps.filePersistence.saveSession(session);
    }

    return [];
  }

  /**
   * Destroys the session's engine. Returns false when the id was unknown.
   */
  endSession(sessionId: string): boolean {
    const removed = this.sessions.delete(sessionId);
    if (removed) {
      this.log("INFO", `Session ${sessionId} ended`);
    }
    return removed;
  }
}
