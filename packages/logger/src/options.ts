import path from 'node:path';
import type { Params } from 'nestjs-pino';
import type { LevelWithSilent } from 'pino';

/**
 * The console owns stdout for screens and prompts, so log lines go to stderr in every mode.
 */
export const productionTarget = {
  target: 'pino/file',
  options: { destination: 2 },
};

export const developmentTarget = {
  // https://github.com/pinojs/pino-pretty?tab=readme-ov-file#handling-non-serializable-options
  target: path.resolve(__dirname, './development'),
};

export const REDACTED_PATHS = [
  'cookies.fedAuth',
  'cookies.rtFa',
  '*.cookies.fedAuth',
  '*.cookies.rtFa',
  'headers.cookie',
  '*.headers.cookie',
  'encryptionKey',
];

export interface LoggerOptionsInput {
  level: LevelWithSilent;
  pretty: boolean;
}

export function createLoggerOptions({ level, pretty }: LoggerOptionsInput): Params {
  return {
    renameContext: pretty ? 'caller' : undefined,
    pinoHttp: {
      level,
      redact: {
        paths: REDACTED_PATHS,
        censor: () => '[Redacted]',
      },
      transport: pretty ? developmentTarget : productionTarget,
    },
  };
}
