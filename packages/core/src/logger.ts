import pino, { type DestinationStream, type Logger } from 'pino';

/**
 * Study logger
 *
 * Patient and doctor names are personal data: they are censored wherever
 * a log payload carries them under one of the keys below.
 */

export const NAME_REDACTION_PATHS = [
  'patientName',
  'doctorName',
  '*.name',
  '*.patientName',
  '*.doctorName',
  'patients[*].name',
];

export interface CreateLoggerOptions {
  /** Module name, e.g. 'inflammation-stats' */
  name: string;
  /** Defaults to LOG_LEVEL, then 'info' */
  level?: string;
  /** Output stream; stdout when omitted */
  destination?: DestinationStream;
}

export function createLogger({ name, level, destination }: CreateLoggerOptions): Logger {
  return pino(
    {
      name,
      level: level ?? process.env.LOG_LEVEL ?? 'info',
      redact: { paths: NAME_REDACTION_PATHS, censor: '[REDACTED]' },
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    destination
  );
}

export type { Logger };
