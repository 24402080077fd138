import pino from "pino";
import type { Logger } from "../types/logger";
import { envs } from "./envs";

export function createPinoInstance(): pino.Logger {
  if (!envs.LOG_PRETTY) return pino({ level: envs.LOG_LEVEL });

  return pino({
    level: envs.LOG_LEVEL,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        ignore: "pid,hostname,time",
        translateTime: true,
      },
    },
  });
}

let rootLogger: pino.Logger | null = null;

export class PinoLogger implements Logger {
  private readonly pino: pino.Logger;

  constructor(
    private readonly prefix: string,
    instance?: pino.Logger,
  ) {
    if (!instance) {
      rootLogger ??= createPinoInstance();
      instance = rootLogger;
    }
    this.pino = instance;
  }

  debug(msg: string, meta?: unknown) {
    this.write("debug", msg, meta);
  }

  log(msg: string, meta?: unknown) {
    this.write("info", msg, meta);
  }

  warn(msg: string, meta?: unknown) {
    this.write("warn", msg, meta);
  }

  error(msg: string, meta?: unknown) {
    this.write("error", msg, meta);
  }

  private write(
    level: "debug" | "info" | "warn" | "error",
    msg: string,
    meta: unknown,
  ) {
    const line = `[${this.prefix}] ${msg}`;
    if (meta === undefined) this.pino[level](line);
    else if (meta instanceof Error) this.pino[level]({ err: meta }, line);
    else this.pino[level]({ meta }, line);
  }
}
