// Phoropter Refraction Engine - Entry point
// Loads configuration, wires the session manager and starts the server.

import "dotenv/config";
import { pathToFileURL } from "node:url";
import { createAppServer } from "./server.js";
import { SessionManager } from "./session-manager.js";
import { FilePersistence } from "./file-persistence.js";
import { loadEngineConfigOverrides, resolveEngineConfig } from "./engine-config.js";
import type { EngineConfig } from "./engine-config.js";
import { ConfigurationError } from "./errors.js";

export const APP_NAME = "Phoropter Refraction Engine";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

export interface StartupOptions {
  port: number;
  outputDir: string;
  config: EngineConfig;
}

/**
 * Reads PORT, OUTPUT_DIR and the REFRACTION_* overrides.
 *
 * @throws ConfigurationError on a malformed port or inconsistent thresholds
 */
export function loadStartupOptions(env: Record<string, string | undefined> = process.env): StartupOptions {
  const rawPort = env.PORT || "3000";
  const port = Number(rawPort);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigurationError([`PORT must be an integer between 0 and 65535 (got "${rawPort}")`]);
  }

  return {
    port,
    outputDir: env.OUTPUT_DIR || "output",
    config: resolveEngineConfig(loadEngineConfigOverrides(env)),
  };
}

export async function main(): Promise<void> {
  logInit("Loading configuration...");
  const options = loadStartupOptions();
  const { duration, quality } = options.config;
  logInit(
    `Quality thresholds: unclear < ${quality.unclearBelow}, clear >= ${quality.clearAtOrAbove}; ` +
      `duration: break ${duration.offerBreakSeconds}s, warn ${duration.warnAndCompleteSeconds}s, ` +
      `hard stop ${duration.hardStopSeconds}s`,
  );

  logInit(`Initializing FilePersistence (${options.outputDir}/)...`);
  const filePersistence = new FilePersistence(options.outputDir);

  logInit("Loading protocol and wiring SessionManager...");
  const sessionManager = new SessionManager({ config: options.config, filePersistence });

  const server = createAppServer({ sessionManager });
  await server.listen(options.port);

  logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${options.port}`);
  logInit("Ready for connections");
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main().catch((err: unknown) => {
    if (err instanceof ConfigurationError) {
      logFatal(err.message);
    } else {
      logFatal(`Startup failed: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exit(1);
  });
}
