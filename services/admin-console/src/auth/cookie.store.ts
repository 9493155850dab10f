import { mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { sanitizeError } from '@spo-admin/utils';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Config } from '../config';
import { AesGcmEncryptionService } from '../storage/aes-gcm-encryption.service';
import { isMissingFileError } from '../storage/json-data.store';
import { toSafeDomainFileName } from '../utils/file-name.util';
import { type AuthCookies, AuthCookiesSchema } from './auth-cookies';

const COOKIE_FILE_EXTENSION = '.dat';

/**
 * One encrypted file per domain under `{dataDir}/cookies`.
 */
@Injectable()
export class CookieStore {
  private readonly logger = new Logger(this.constructor.name);

  public constructor(
    private readonly configService: ConfigService<Config, true>,
    private readonly encryptionService: AesGcmEncryptionService,
  ) {}

  public async save(cookies: AuthCookies): Promise<void> {
    const payload = this.encryptionService.encrypt(JSON.stringify(cookies));
    await mkdir(this.directory, { recursive: true, mode: 0o700 });
    await writeFile(this.pathFor(cookies.domain), payload, { mode: 0o600 });
  }

  public async load(domain: string): Promise<AuthCookies | undefined> {
    return this.readFile(this.pathFor(domain));
  }

  public async remove(domain: string): Promise<void> {
    await rm(this.pathFor(domain), { force: true });
  }

  public async removeAll(): Promise<void> {
    for (const fileName of await this.listFiles()) {
      await rm(join(this.directory, fileName), { force: true });
    }
  }

  public async loadAll(): Promise<AuthCookies[]> {
    const all: AuthCookies[] = [];
    for (const fileName of await this.listFiles()) {
      const cookies = await this.readFile(join(this.directory, fileName));
      if (cookies) all.push(cookies);
    }
    return all;
  }

  private async readFile(filePath: string): Promise<AuthCookies | undefined> {
    let payload: Buffer;
    try {
      payload = await readFile(filePath);
    } catch (error) {
      if (isMissingFileError(error)) return undefined;
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(this.encryptionService.decrypt(payload));
      return AuthCookiesSchema.parse(parsed);
    } catch (error) {
      // A different key or a damaged file; the operator has to sign in again.
      this.logger.warn({
        msg: 'Stored cookies could not be decrypted, ignoring them',
        filePath,
        error: sanitizeError(error),
      });
      return undefined;
    }
  }

  private async listFiles(): Promise<string[]> {
    try {
      const entries = await readdir(this.directory);
      return entries.filter((entry) => entry.endsWith(COOKIE_FILE_EXTENSION));
    } catch (error) {
      if (isMissingFileError(error)) return [];
      throw error;
    }
  }

  private pathFor(domain: string): string {
    return join(this.directory, toSafeDomainFileName(domain));
  }

  private get directory(): string {
    return join(this.configService.get('storage.dataDirectory', { infer: true }), 'cookies');
  }
}
