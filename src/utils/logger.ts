import pino, { type Logger } from 'pino';

const LOG_LEVEL = process.env.LOG_LEVEL ?? 'info';

//structured logger using pino
//- LOG_LEVEL controls verbosity (trace, debug, info, warn, error, fatal, silent)
//- ISO timestamps, JSON lines
//- credentials that end up in a logged object are redacted
export const logger: Logger = pino({
  level: LOG_LEVEL,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: ['*.password', '*.token', '*.secret', '*.apiKey'],
    censor: '[REDACTED]',
  },
});

//child logger scoped to one component of the pipeline
export function createChildLogger(bindings: Record<string, unknown>, parent: Logger = logger): Logger {
  return parent.child(bindings);
}
