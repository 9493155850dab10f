import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createTestConfigService } from '../../test/config';
import { someCookies } from '../../test/fixtures';
import { AesGcmEncryptionService } from '../storage/aes-gcm-encryption.service';
import { CookieStore } from './cookie.store';

describe('CookieStore', () => {
  let directory: string;
  let store: CookieStore;

  const createStore = (encryptionKey?: Buffer) => {
    const configService = createTestConfigService(directory, { encryptionKey });
    return new CookieStore(configService, new AesGcmEncryptionService(configService));
  };

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'cookie-store-'));
    store = createStore();
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('stores one encrypted file per domain', async () => {
    await store.save(someCookies({ domain: 'Contoso-Admin.SharePoint.com' }));

    expect(await readdir(join(directory, 'cookies'))).toEqual(['contoso-admin.sharepoint.com.dat']);
    expect(await store.load('contoso-admin.sharepoint.com')).toEqual(
      someCookies({ domain: 'Contoso-Admin.SharePoint.com' }),
    );
  });

  it('returns undefined for unknown domains', async () => {
    expect(await store.load('fabrikam.sharepoint.com')).toBeUndefined();
  });

  it('ignores files written with another key', async () => {
    await createStore(Buffer.alloc(32, 1)).save(someCookies());

    expect(await store.load('contoso-admin.sharepoint.com')).toBeUndefined();
  });

  it('ignores damaged files', async () => {
    await store.save(someCookies());
    await writeFile(join(directory, 'cookies', 'contoso-admin.sharepoint.com.dat'), 'garbage');

    expect(await store.load('contoso-admin.sharepoint.com')).toBeUndefined();
  });

  it('lists and removes stored cookies', async () => {
    await store.save(someCookies({ domain: 'contoso.sharepoint.com' }));
    await store.save(someCookies({ domain: 'fabrikam.sharepoint.com' }));

    expect((await store.loadAll()).map((cookies) => cookies.domain).sort()).toEqual([
      'contoso.sharepoint.com',
      'fabrikam.sharepoint.com',
    ]);

    await store.remove('contoso.sharepoint.com');
    expect(await store.load('contoso.sharepoint.com')).toBeUndefined();

    await store.removeAll();
    expect(await store.loadAll()).toEqual([]);
  });

  it('lists nothing before the cookie directory exists', async () => {
    expect(await store.loadAll()).toEqual([]);
  });
});
