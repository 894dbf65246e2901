import pino from "pino";

/**
 * Engine diagnostics. Silent unless SCRIPT_ENGINE_LOG_LEVEL is set,
 * e.g. `SCRIPT_ENGINE_LOG_LEVEL=debug`.
 */
export const logger = pino({
  name: "script-engine",
  level: process.env["SCRIPT_ENGINE_LOG_LEVEL"] || "silent",
});
