import { env } from 'node:process';
import { registerAs } from '@nestjs/config';
import type { LevelWithSilent } from 'pino';
import { z } from 'zod';

const namespace = 'app' as const;

const EnvironmentVariables = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .prefault('production')
    .describe('Specifies the environment in which the console is running'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .prefault('info')
    .describe('The log level at which the console writes to stderr (pino)'),
  LOGS_DIAGNOSTICS_DATA_POLICY: z
    .enum(['conceal', 'disclose'])
    .prefault('conceal')
    .describe('Controls whether site URLs, user names and file names are logged in full or smeared'),
});

export interface AppConfig {
  [namespace]: {
    nodeEnv: 'development' | 'production' | 'test';
    isDev: boolean;
    logLevel: LevelWithSilent;
    logsDiagnosticsDataPolicy: 'conceal' | 'disclose';
  };
}

export const appConfig = registerAs<AppConfig[typeof namespace]>(namespace, () => {
  const validEnv = EnvironmentVariables.safeParse(env);
  if (!validEnv.success) {
    throw new TypeError(`Invalid config for namespace "${namespace}": ${validEnv.error.message}`);
  }

  return {
    nodeEnv: validEnv.data.NODE_ENV,
    isDev: validEnv.data.NODE_ENV === 'development',
    logLevel: validEnv.data.LOG_LEVEL,
    logsDiagnosticsDataPolicy: validEnv.data.LOGS_DIAGNOSTICS_DATA_POLICY,
  };
});
