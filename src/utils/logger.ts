import path from 'path';
import winston from 'winston';

export interface LoggerOptions {
  level?: string | undefined;
  name: string;
  logFile?: string | undefined;
}

function resolveLevel(level: string | undefined): string {
  return level ?? process.env['LOG_LEVEL'] ?? 'info';
}

function fileTransport(filename: string): winston.transport {
  return new winston.transports.File({
    filename,
    maxsize: 10485760, // 10MB
    maxFiles: 5,
  });
}

export function createLogger(options: LoggerOptions): winston.Logger {
  const { name, logFile } = options;
  const level = resolveLevel(options.level);

  const transports: winston.transport[] = [
    new winston.transports.Console(),
  ];

  if (logFile) {
    transports.push(fileTransport(logFile));
  }

  return winston.createLogger({
    level: level === 'silent' ? 'error' : level,
    silent: level === 'silent',
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${timestamp} ${level.toUpperCase()} [${name}] ${message}${metaStr}`;
      })
    ),
    transports,
  });
}

export interface SessionLoggerOptions {
  level?: string | undefined;
  logDir?: string | undefined;
}

export function createSessionLogger(sessionId: string, options: SessionLoggerOptions = {}): winston.Logger {
  const level = resolveLevel(options.level);
  const dir = options.logDir ?? process.env['SCAN_LOG_DIR'];

  const transports: winston.transport[] = [
    new winston.transports.Console(),
  ];

  if (dir) {
    transports.push(fileTransport(path.join(dir, `scan-${sessionId}.log`)));
  }

  return winston.createLogger({
    level: level === 'silent' ? 'error' : level,
    silent: level === 'silent',
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message, target, workerId, error }) => {
        const workerTag = workerId ? ` <${workerId}>` : '';
        const targetTag = target ? ` [${target}]` : '';
        const errorTag = error ? ` ERROR: ${error}` : '';
        return `${timestamp} ${level.toUpperCase()} [${sessionId}]${workerTag}${targetTag} ${message}${errorTag}`;
      })
    ),
    defaultMeta: { sessionId },
    transports,
  });
}
