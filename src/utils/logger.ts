import { pino, destination, multistream, type Logger, type DestinationStream } from 'pino';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type UtilLogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string | undefined): value is UtilLogLevel {
  return LOG_LEVELS.some(level => level === value);
}

// Quiet by default under the test runner unless LOG_LEVEL asks otherwise
const envLevel = process.env['LOG_LEVEL'];
const logLevel: UtilLogLevel = isLogLevel(envLevel)
  ? envLevel
  : process.env['VITEST'] ? 'silent' : 'info';

// Optional file sink next to stdout, e.g. MODEM_MONITOR_LOG_FILE=/var/log/modem-monitor.log
const logFile = process.env['MODEM_MONITOR_LOG_FILE'];

const streams: Array<{ stream: DestinationStream }> = [
  { stream: process.stdout },
];

if (logFile) {
  streams.push({
    stream: destination({
      dest: logFile,
      sync: false,
      mkdir: true,
    }),
  });
}

export const logger = pino(
  {
    level: logLevel,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
  },
  multistream(streams)
);

export function createChildLogger(module: string): Logger {
  return logger.child({ module });
}
