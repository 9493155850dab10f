import { env } from 'node:process';
import { registerAs } from '@nestjs/config';
import { z } from 'zod';

const namespace = 'sharepoint' as const;

const EnvironmentVariables = z.object({
  SHAREPOINT_REQUEST_TIMEOUT_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .prefault(60)
    .describe('Headers and body timeout for a single SharePoint REST request'),
  SHAREPOINT_MAX_RETRIES: z.coerce
    .number()
    .int()
    .min(0)
    .prefault(3)
    .describe('How often a throttled (429/503) or failed request is retried'),
});

export interface SharepointConfig {
  [namespace]: {
    requestTimeoutSeconds: number;
    maxRetries: number;
  };
}

export const sharepointConfig = registerAs<SharepointConfig[typeof namespace]>(namespace, () => {
  const validEnv = EnvironmentVariables.safeParse(env);
  if (!validEnv.success) {
    throw new TypeError(`Invalid config for namespace "${namespace}": ${validEnv.error.message}`);
  }

  return {
    requestTimeoutSeconds: validEnv.data.SHAREPOINT_REQUEST_TIMEOUT_SECONDS,
    maxRetries: validEnv.data.SHAREPOINT_MAX_RETRIES,
  };
});
