import Ajv from "ajv";
import schema from "../../config/schema.json";
import type { Compounding } from "../../shared/cashflow-types";

export type NodeEnv = "local" | "test" | "dev" | "staging" | "prod";
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface AppConfig {
  nodeEnv: NodeEnv;
  serviceName: string;
  logLevel: LogLevel;
  logPretty: boolean;
  yieldMaxIterations: number;
  yieldTolerance: number;
  yieldCompounding: Compounding;
}

const ajv = new Ajv({ allErrors: true, useDefaults: true });
const validate = ajv.compile<AppConfig>(schema);

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cfg: Record<string, unknown> = {
    nodeEnv: env.NODE_ENV || "local",
    serviceName: env.SERVICE_NAME || "portfolio-cashflow-engine",
    logLevel: env.LOG_LEVEL || "info",
    logPretty: env.LOG_PRETTY === "true",
    yieldMaxIterations: Number(env.YIELD_MAX_ITER || "100"),
    yieldTolerance: Number(env.YIELD_TOLERANCE || "1e-10"),
    yieldCompounding: env.YIELD_COMPOUNDING || "monthly"
  };

  if (!validate(cfg)) {
    const msgs = (validate.errors || []).map(e => `${e.instancePath} ${e.message}`).join("; ");
    throw new Error(`Invalid configuration: ${msgs}`);
  }
  return cfg;
}
