import pino, { type Logger } from "pino";
import { AsyncLocalStorage } from "node:async_hooks";
import type { AppConfig } from "./config";

export const runStore = new AsyncLocalStorage<{ runId: string }>();

export function getLogger(level: string, pretty: boolean): Logger {
  return pino({
    level,
    transport: pretty ? { target: "pino-pretty", options: { colorize: true } } : undefined,
    base: undefined, // do not inject pid and hostname automatically
    timestamp: pino.stdTimeFunctions.isoTime,
    mixin: () => {
      const runId = currentRunId();
      return runId ? { runId } : {};
    }
  });
}

export function loggerFromConfig(config: AppConfig): Logger {
  return getLogger(config.logLevel, config.logPretty).child({ service: config.serviceName });
}

export function withRunId<T>(runId: string, fn: () => T): T {
  return runStore.run({ runId }, fn);
}

export function currentRunId(): string | undefined {
  return runStore.getStore()?.runId;
}
