import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { AsyncLocalStorage } from 'async_hooks';
import { config, type AppConfig } from '../config';

// ============================================================================
// Types
// ============================================================================

/**
 * Per-call context stored in AsyncLocalStorage so that every engine log line
 * emitted while serving one game action carries the same identifiers.
 */
export interface GameContext {
  gameId: string;
  requestId?: string;
  playerId?: string;
}

// ============================================================================
// Game Context (AsyncLocalStorage)
// ============================================================================

export const gameContextStorage = new AsyncLocalStorage<GameContext>();

/**
 * Get the current game context. Returns undefined outside of
 * {@link runWithGameContext}.
 */
export const getGameContext = (): GameContext | undefined => {
  return gameContextStorage.getStore();
};

/**
 * Run a function within a game context. All logs written inside the callback
 * (including from async continuations) carry the context fields.
 */
export const runWithGameContext = <T>(context: GameContext, fn: () => T): T => {
  return gameContextStorage.run(context, fn);
};

// ============================================================================
// Formats
// ============================================================================

/**
 * Copies the active game context onto the log entry.
 */
export const addGameContext = winston.format((info) => {
  const context = getGameContext();
  if (context) {
    info.gameId = context.gameId;
    if (context.requestId) {
      info.requestId = context.requestId;
    }
    if (context.playerId) {
      info.playerId = context.playerId;
    }
  }
  return info;
});

/**
 * Flattens Error values (including engine errors, via their toJSON) so they
 * survive JSON serialisation.
 */
export const serializeErrors = winston.format((info) => {
  const error = info.error;
  if (error instanceof Error) {
    const json: unknown =
      'toJSON' in error && typeof error.toJSON === 'function' ? error.toJSON() : undefined;
    info.error =
      json ?? {
        message: error.message,
        name: error.name,
        stack: error.stack,
      };
  }
  return info;
});

const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  addGameContext(),
  serializeErrors(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  addGameContext(),
  serializeErrors(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, gameId, service, environment, ...meta }) => {
    const gameStr = typeof gameId === 'string' ? ` [${gameId}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}${gameStr}: ${String(message)}${metaStr}`;
  })
);

// ============================================================================
// Logger Factory
// ============================================================================

export type LoggingOptions = Pick<AppConfig, 'nodeEnv' | 'logging'> & {
  serviceName: string;
};

/**
 * Create a Winston logger. Console output always; a JSON file transport only
 * when `logging.file` is set.
 */
export function createLogger(options: LoggingOptions): winston.Logger {
  const consoleTransport = new winston.transports.Console({
    format: options.logging.format === 'json' ? jsonFormat : consoleFormat,
  });

  const configuredLogFile = options.logging.file?.trim();
  let fileTransport: InstanceType<typeof winston.transports.File> | null = null;
  if (configuredLogFile) {
    const logPath = path.resolve(configuredLogFile);
    fs.mkdirSync(path.dirname(logPath), { recursive: true });
    fileTransport = new winston.transports.File({
      filename: logPath,
      format: jsonFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    });
  }

  return winston.createLogger({
    level: options.logging.level,
    defaultMeta: {
      service: options.serviceName,
      environment: options.nodeEnv,
    },
    transports: fileTransport ? [consoleTransport, fileTransport] : [consoleTransport],
  });
}

const logger = createLogger({
  nodeEnv: config.nodeEnv,
  logging: config.logging,
  serviceName: config.app.serviceName,
});

// ============================================================================
// Exports
// ============================================================================

export { logger };
