/**
 * @fileoverview Pino-backed logger exposing the MCP log levels.
 * Output goes to stderr: stdout belongs to the stdio transport.
 * @module src/utils/internal/logger
 */
import { pino, type Level, type Logger as PinoLogger } from 'pino';

import {
  McpLogLevelSchema,
  SERVER_NAME,
  type McpLogLevel,
} from '@/config/index.js';

const MCP_TO_PINO_LEVEL: Record<McpLogLevel, Level> = {
  debug: 'debug',
  info: 'info',
  notice: 'info',
  warning: 'warn',
  error: 'error',
  crit: 'fatal',
  alert: 'fatal',
  emerg: 'fatal',
};

/**
 * Level from `MCP_LOG_LEVEL`. Read on its own so logging works before the
 * rest of the environment is validated; `parseConfig` reports a bad value.
 */
function levelFromEnv(): McpLogLevel {
  const parsed = McpLogLevelSchema.safeParse(process.env.MCP_LOG_LEVEL ?? 'info');
  return parsed.success ? parsed.data : 'info';
}

/** Context attached to a log line; usually a spread `RequestContext`. */
export type LogContext = Record<string, unknown>;

export class Logger {
  private static instance: Logger | undefined;
  private readonly pinoLogger: PinoLogger;

  private constructor(level: McpLogLevel) {
    this.pinoLogger = pino(
      {
        name: SERVER_NAME,
        level: MCP_TO_PINO_LEVEL[level],
        base: { pid: process.pid },
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true }),
    );
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger(levelFromEnv());
    }
    return Logger.instance;
  }

  public debug(msg: string, context?: LogContext): void {
    this.write('debug', msg, context);
  }

  public info(msg: string, context?: LogContext): void {
    this.write('info', msg, context);
  }

  public notice(msg: string, context?: LogContext): void {
    this.write('notice', msg, context);
  }

  public error(msg: string, context?: LogContext): void {
    this.write('error', msg, context);
  }

  public crit(msg: string, context?: LogContext): void {
    this.write('crit', msg, context);
  }

  private write(level: McpLogLevel, msg: string, context?: LogContext): void {
    const pinoLevel = MCP_TO_PINO_LEVEL[level];
    const payload: LogContext = { ...context, mcpLevel: level };
    const { error } = payload;
    if (error instanceof Error) {
      this.pinoLogger[pinoLevel](
        { ...payload, err: error, error: undefined },
        msg,
      );
      return;
    }
    this.pinoLogger[pinoLevel](payload, msg);
  }
}

export const logger = Logger.getInstance();
