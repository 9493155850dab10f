import { homedir } from 'node:os';
import { join } from 'node:path';
import { env } from 'node:process';
import { Redacted, redacted } from '@spo-admin/utils';
import { registerAs } from '@nestjs/config';
import { z } from 'zod';

const namespace = 'storage' as const;

const EnvironmentVariables = z.object({
  DATA_DIR: z
    .string()
    .nonempty()
    .optional()
    .describe('Directory holding connections, tasks, report results and encrypted session cookies'),
  COOKIE_ENCRYPTION_KEY: redacted(
    z
      .hex()
      .transform((key) => Buffer.from(key, 'hex'))
      .or(z.base64().transform((key) => Buffer.from(key, 'base64')))
      .refine(
        (buffer) => buffer.length === 32,
        "Key must be 32 bytes (AES-256). Generate one with 'openssl rand -hex 32'.",
      ),
  ).describe('Secret used to encrypt the stored FedAuth/rtFa session cookies'),
});

export interface StorageConfig {
  [namespace]: {
    dataDirectory: string;
    cookieEncryptionKey: Redacted<Buffer>;
  };
}

export const DEFAULT_DATA_DIRECTORY = join(homedir(), '.spo-admin');

export const storageConfig = registerAs<StorageConfig[typeof namespace]>(namespace, () => {
  const validEnv = EnvironmentVariables.safeParse(env);
  if (!validEnv.success) {
    throw new TypeError(`Invalid config for namespace "${namespace}": ${validEnv.error.message}`);
  }

  return {
    dataDirectory: validEnv.data.DATA_DIR ?? DEFAULT_DATA_DIRECTORY,
    cookieEncryptionKey: validEnv.data.COOKIE_ENCRYPTION_KEY,
  };
});
