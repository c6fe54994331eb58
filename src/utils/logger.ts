import pino, { Logger as PinoLogger, LoggerOptions, TransportTargetOptions } from 'pino';

export const APP_NAME = 'magnet-framer';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

type EmitLevel = Exclude<LogLevel, 'silent'>;

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface LoggingOptions {
  level: LogLevel;
  logFile?: string;
}

export interface ModuleLogger {
  trace(msg: string, fields?: Record<string, unknown>): void;
  debug(msg: string, fields?: Record<string, unknown>): void;
  info(msg: string, fields?: Record<string, unknown>): void;
  warn(msg: string, fields?: Record<string, unknown>): void;
  error(msg: string, fields?: Record<string, unknown>): void;
  fatal(msg: string, fields?: Record<string, unknown>): void;
}

const isTest = process.env.NODE_ENV === 'test';

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LOG_LEVELS as readonly string[]).includes(value);
}

function envLevel(): LogLevel | undefined {
  const raw = process.env.LOG_LEVEL;
  return isLogLevel(raw) ? raw : undefined;
}

function baseOptions(level: LogLevel): LoggerOptions {
  return {
    level,
    base: { service: APP_NAME },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      error: pino.stdSerializers.err,
    },
  };
}

let rootLogger: PinoLogger = pino(baseOptions(isTest ? 'silent' : envLevel() ?? 'info'));
const moduleLoggers = new Map<string, PinoLogger>();

/**
 * Route logs to a colourised console and, when `logFile` is given, to a
 * plain-text log file that is truncated on every run.
 */
export function configureLogging(options: LoggingOptions): void {
  moduleLoggers.clear();

  if (isTest) {
    rootLogger = pino(baseOptions('silent'));
    return;
  }

  const level = envLevel() ?? options.level;
  const targets: TransportTargetOptions[] = [
    {
      target: 'pino-pretty',
      level,
      options: {
        colorize: true,
        translateTime: 'SYS:HH:MM:ss.l',
        ignore: 'pid,hostname,service,module',
        messageFormat: '{module}  {msg}',
        destination: 1,
      },
    },
  ];

  if (options.logFile) {
    targets.push({
      target: 'pino-pretty',
      level,
      options: {
        colorize: false,
        translateTime: 'SYS:yyyy-mm-dd HH:MM:ss.l',
        ignore: 'pid,hostname,service,module',
        messageFormat: '{module}  {msg}',
        destination: options.logFile,
        mkdir: true,
        append: false,
      },
    });
  }

  rootLogger = pino(baseOptions(level), pino.transport({ targets }));
}

function moduleLogger(module: string): PinoLogger {
  let logger = moduleLoggers.get(module);
  if (!logger) {
    logger = rootLogger.child({ module });
    moduleLoggers.set(module, logger);
  }
  return logger;
}

export function createLogger(module: string): ModuleLogger {
  // Resolved on every call so loggers created at import time follow configureLogging()
  const emit = (level: EmitLevel) => (msg: string, fields?: Record<string, unknown>): void => {
    const logger = moduleLogger(module);
    if (fields) {
      logger[level](fields, msg);
    } else {
      logger[level](msg);
    }
  };

  return {
    trace: emit('trace'),
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
    fatal: emit('fatal'),
  };
}
