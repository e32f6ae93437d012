// Phoropter Refraction Engine - WebSocket Handler and Express Server
//
// Each WebSocket connection owns one exam session. The client (the
// orchestration layer sitting next to the NLU classifier and the device
// transport) submits pre-classified turns and receives device commands.
// Session data lives in server memory only unless save_outputs is requested.

import express, { type Express } from "express";
import { createServer, type IncomingMessage, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket } from "ws";
import { SessionManager } from "./session-manager.js";
import { InvalidTransitionError } from "./errors.js";
import {
  parseClientMessage,
  parsePatientAge,
  validateIncidentReport,
  validateTurnInput,
} from "./turn-input.js";
import type { ClientMessage, ServerMessage } from "./types.js";

// ─── Per-Connection State ───────────────────────────────────────────────────────

interface ConnectionState {
  sessionId: string;
}

// ─── Logging ────────────────────────────────────────────────────────────────────

export interface ServerLogger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const defaultLogger: ServerLogger = {
  info: (msg, ...args) => console.log(`[INFO] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[WARN] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[ERROR] ${msg}`, ...args),
};

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  /** Custom logger. Defaults to console-based logger. */
  logger?: ServerLogger;
  /** Externally provided SessionManager (for testing). Created internally if omitted. */
  sessionManager?: SessionManager;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  sessionManager: SessionManager;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions = {}): AppServer {
  const { logger = defaultLogger, sessionManager = new SessionManager() } = options;

  const app = express();
  const httpServer = createServer(app);

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/sessions/:id/snapshot", (req, res) => {
    const sessionId = req.params.id;
    if (!sessionManager.hasSession(sessionId)) {
      res.status(404).json({ error: `Session not found: ${sessionId}` });
      return;
    }
    res.json(sessionManager.getSnapshot(sessionId));
  });

  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
    handleConnection(ws, req, sessionManager, logger);
  });

  return {
    app,
    httpServer,
    wss,
    sessionManager,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
        httpServer.on("error", reject);
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function connectionParams(req: IncomingMessage): URLSearchParams {
  return new URL(req.url ?? "/", "http://localhost").searchParams;
}

function handleConnection(
  ws: WebSocket,
  req: IncomingMessage,
  sessionManager: SessionManager,
  logger: ServerLogger,
): void {
  const params = connectionParams(req);
  const age = parsePatientAge(params.get("patientAge"));
  const session = sessionManager.createSession({
    patientId: params.get("patientId") ?? undefined,
    patientAge: age.ok ? age.age : null,
  });
  const connState: ConnectionState = { sessionId: session.id };

  logger.info(`New WebSocket connection, session ${session.id}`);

  sendMessage(ws, {
    type: "session_ready",
    sessionId: session.id,
    stepId: session.engine.currentStep,
    command: session.engine.currentCommand(),
  });
  if (!age.ok) {
    logger.warn(`${age.error} (session ${session.id})`);
    sendMessage(ws, {
      type: "error",
      message: `${age.error}; continuing with unknown age`,
      recoverable: true,
    });
  }

  ws.on("message", (data: Buffer | string, isBinary: boolean) => {
    try {
      if (isBinary) {
        sendMessage(ws, {
          type: "error",
          message: "Binary frames are not supported; send JSON text frames.",
          recoverable: true,
        });
        return;
      }
      const text = typeof data === "string" ? data : data.toString("utf-8");
      const message = parseClientMessage(JSON.parse(text));
      if (!message) {
        sendMessage(ws, { type: "error", message: "Unknown or malformed message.", recoverable: true });
        return;
      }
      handleClientMessage(ws, message, connState, sessionManager, logger);
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      logger.error(`Error handling message for session ${connState.sessionId}: ${errorMessage}`);
      sendMessage(ws, {
        type: "error",
        message: errorMessage,
        recoverable: !(err instanceof InvalidTransitionError),
      });
    }
  });

  ws.on("close", () => {
    logger.info(`WebSocket closed, session ${connState.sessionId}`);
    sessionManager.endSession(connState.sessionId);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error for session ${connState.sessionId}: ${err.message}`);
  });
}

// ─── Client Message Router ──────────────────────────────────────────────────────

function handleClientMessage(
  ws: WebSocket,
  message: ClientMessage,
  connState: ConnectionState,
  sessionManager: SessionManager,
  logger: ServerLogger,
): void {
  switch (message.type) {
    case "submit_turn":
      handleSubmitTurn(ws, message, connState, sessionManager, logger);
      break;

    case "abort_exam":
      handleAbortExam(ws, connState, sessionManager, logger);
      break;

    case "request_snapshot":
      sendMessage(ws, { type: "snapshot", snapshot: sessionManager.getSnapshot(connState.sessionId) });
      break;

    case "report_incident":
      handleReportIncident(ws, message, connState, sessionManager, logger);
      break;

    case "save_outputs":
      handleSaveOutputs(ws, connState, sessionManager, logger);
      break;

    default: {
      const exhaustiveCheck: never = message;
      sendMessage(ws, {
        type: "error",
        message: `Unknown message type: ${String(exhaustiveCheck)}`,
        recoverable: true,
      });
    }
  }
}

// ─── Handlers ───────────────────────────────────────────────────────────────────

function handleSubmitTurn(
  ws: WebSocket,
  message: Extract<ClientMessage, { type: "submit_turn" }>,
  connState: ConnectionState,
  sessionManager: SessionManager,
  logger: ServerLogger,
): void {
  const validation = validateTurnInput(message.turn);
  if (!validation.ok) {
    const errorMsg = `Invalid turn: ${validation.errors.join("; ")}`;
    logger.warn(`${errorMsg} (session ${connState.sessionId})`);
    sendMessage(ws, { type: "error", message: errorMsg, recoverable: true });
    return;
  }

  const result = sessionManager.submitTurn(connState.sessionId, validation.input);
  sendMessage(ws, { type: "turn_result", result });

  if (result.escalation) {
    sendMessage(ws, {
      type: "escalation",
      reason: result.escalation.reason,
      stepId: result.escalation.stepId,
    });
  }
}

function handleAbortExam(
  ws: WebSocket,
  connState: ConnectionState,
  sessionManager: SessionManager,
  logger: ServerLogger,
): void {
  const { event, alreadyEscalated } = sessionManager.abortSession(connState.sessionId);
  if (!alreadyEscalated) {
    logger.info(`Exam aborted for session ${connState.sessionId} at step ${event.stepId}`);
  }
  sendMessage(ws, { type: "escalation", reason: event.reason, stepId: event.stepId });
}

function handleReportIncident(
  ws: WebSocket,
  message: Extract<ClientMessage, { type: "report_incident" }>,
  connState: ConnectionState,
  sessionManager: SessionManager,
  logger: ServerLogger,
): void {
  const validation = validateIncidentReport(message.incident);
  if (!validation.ok) {
    const errorMsg = `Invalid incident: ${validation.errors.join("; ")}`;
    logger.warn(`${errorMsg} (session ${connState.sessionId})`);
    sendMessage(ws, { type: "error", message: errorMsg, recoverable: true });
    return;
  }

  const { incident, escalation } = sessionManager.reportIncident(connState.sessionId, validation.report);
  sendMessage(ws, { type: "incident_recorded", incident });

  if (escalation) {
    sendMessage(ws, { type: "escalation", reason: escalation.event.reason, stepId: escalation.event.stepId });
  }
}

function handleSaveOutputs(
  ws: WebSocket,
  connState: ConnectionState,
  sessionManager: SessionManager,
  logger: ServerLogger,
): void {
  sessionManager
    .saveOutputs(connState.sessionId)
    .then((paths) => {
      if (paths.length > 0) {
        sendMessage(ws, { type: "outputs_saved", paths });
        logger.info(`Outputs saved for session ${connState.sessionId}: ${paths.join(", ")}`);
      } else {
        sendMessage(ws, {
          type: "error",
          message: "No file persistence configured.",
          recoverable: true,
        });
      }
    })
    .catch((err: unknown) => {
      const errorMessage = err instanceof Error ? err.message : String(err);
      logger.error(`Failed to save outputs for session ${connState.sessionId}: ${errorMessage}`);
      sendMessage(ws, {
        type: "error",
        message: `Failed to save outputs: ${errorMessage}`,
        recoverable: true,
      });
    });
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

export type { ConnectionState };
