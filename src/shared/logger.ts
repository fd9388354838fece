import pino, { type Logger, type LoggerOptions } from 'pino';

const nodeEnv = process.env['NODE_ENV'];

const baseOptions: LoggerOptions = {
  level: process.env['LOG_LEVEL'] ?? 'info',
  redact: {
    paths: ['gemini_api_key', 'api_key', 'apiKey', '*.gemini_api_key', '*.api_key', '*.apiKey'],
    censor: '***REDACTED***',
  },
};

export const logger: Logger = pino({
  ...baseOptions,
  transport:
    nodeEnv !== 'production' && nodeEnv !== 'test'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
});

/**
 * Logger for a single scrape run: JSON lines appended to `logFile`
 * and pretty output on stdout.
 */
export function createRunLogger(logFile: string): Logger {
  const level = baseOptions.level ?? 'info';
  const transport = pino.transport({
    targets: [
      { target: 'pino/file', level, options: { destination: logFile, mkdir: true, append: true } },
      { target: 'pino-pretty', level, options: { colorize: true, destination: 1 } },
    ],
  });
  return pino(baseOptions, transport);
}
