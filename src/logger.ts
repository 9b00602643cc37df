import path from 'path';

import { createLogger, format, transports, Logger } from 'winston';
import Transport from 'winston-transport';

// Relative log file names are taken from the directory the command runs in
export function resolveLogFilePath(fileName: string): string {
  return path.resolve(process.cwd(), fileName);
}

const combinedLogFilePath = resolveLogFilePath(process.env.LOG_FILE ?? 'data-lake.log');
const errorLogFilePath = resolveLogFilePath(process.env.ERROR_LOG_FILE ?? 'data-lake-error.log');
const logFormat = process.env.LOG_FORMAT?.toLowerCase() === 'json' ? 'json' : 'simple';
const enableFileLogging = process.env.LOG_TO_FILE?.toLowerCase() === 'true';

const isTestEnvironment = process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;

interface ILogLine {
  level: string;
  message?: unknown;
  time?: unknown;
}

// Writes straight to stdout/stderr so Jest does not capture and reformat the lines
class DirectConsoleTransport extends Transport {
  public log(info: ILogLine, callback: () => void): void {
    setImmediate(() => {
      this.emit('logged', info);
    });

    const message = `${info.time} ${info.level.toUpperCase()} ${info.message}\n`;

    if (info.level === 'error') {
      process.stderr.write(message);
    } else {
      process.stdout.write(message);
    }

    callback();
  }
}

const testFormat = format.combine(format.timestamp({ alias: 'time' }));

const productionFormat = format.combine(
  format.errors({ stack: true }),
  format.timestamp({ alias: 'time' }),
  logFormat === 'json'
    ? format.json()
    : format.printf(({ time, level, message, stack }) => {
        const text = `${time} ${level.toUpperCase()} ${message}`;
        return stack ? `${text}\n${stack}` : text;
      }),
);

const logger: Logger = createLogger({
  level: isTestEnvironment ? 'warn' : (process.env.LOG_LEVEL ?? 'info'),
  transports: [
    isTestEnvironment
      ? new DirectConsoleTransport({ format: testFormat })
      : new transports.Console({ format: productionFormat }),
    ...(enableFileLogging
      ? [
          new transports.File({
            format: format.combine(format.timestamp({ alias: 'time' }), format.json()),
            filename: combinedLogFilePath,
          }),
          new transports.File({
            level: 'error',
            format: format.combine(format.timestamp({ alias: 'time' }), format.json()),
            filename: errorLogFilePath,
          }),
        ]
      : []),
  ],
});

export default logger;
