import { Network, Networks } from "../bitcoin/network";

export type ScriptEngineConfig = {
  /** Version byte used for addresses extracted while parsing. */
  network: Network;
  /** Reject signatures whose S value is in the upper half of the curve order. */
  strictLowS: boolean;
  /** Maximum number of steps kept when a trace is collected. */
  traceLimit: number;
};

const defaultScriptEngineConfig: ScriptEngineConfig = {
  network: Networks.Mainnet,
  strictLowS: false,
  traceLimit: 400,
};

let scriptEngineConfig: ScriptEngineConfig = { ...defaultScriptEngineConfig };

export const getScriptEngineConfig = (): ScriptEngineConfig =>
  scriptEngineConfig;

export const configureScriptEngine = (
  patch: Partial<ScriptEngineConfig>,
): ScriptEngineConfig => {
  if (patch.traceLimit !== undefined && patch.traceLimit < 0)
    throw new Error("traceLimit must not be negative");

  scriptEngineConfig = { ...scriptEngineConfig, ...patch };

  return scriptEngineConfig;
};

export const resetScriptEngineConfig = (): ScriptEngineConfig => {
  scriptEngineConfig = { ...defaultScriptEngineConfig };

  return scriptEngineConfig;
};
