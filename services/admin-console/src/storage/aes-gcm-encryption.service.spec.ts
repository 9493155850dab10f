import { describe, expect, it } from 'vitest';
import { createTestConfigService } from '../../test/config';
import { AesGcmEncryptionService } from './aes-gcm-encryption.service';

describe('AesGcmEncryptionService', () => {
  const service = new AesGcmEncryptionService(createTestConfigService('/unused'));

  it('decrypts what it encrypted', () => {
    const payload = service.encrypt('{"fedAuth":"test-fedauth"}');

    expect(service.decrypt(payload)).toBe('{"fedAuth":"test-fedauth"}');
  });

  it('prefixes the ciphertext with a fresh IV and the auth tag', () => {
    const first = service.encrypt('same text');
    const second = service.encrypt('same text');

    expect(first).toHaveLength(12 + 16 + 'same text'.length);
    expect(first.subarray(0, 12).equals(second.subarray(0, 12))).toBe(false);
  });

  it('rejects tampered payloads', () => {
    const payload = service.encrypt('secret');
    const lastIndex = payload.length - 1;
    payload.writeUInt8(payload.readUInt8(lastIndex) ^ 0xff, lastIndex);

    expect(() => service.decrypt(payload)).toThrow();
  });

  it('rejects payloads encrypted with another key', () => {
    const other = new AesGcmEncryptionService(
      createTestConfigService('/unused', { encryptionKey: Buffer.alloc(32, 9) }),
    );

    expect(() => service.decrypt(other.encrypt('secret'))).toThrow();
  });

  it('rejects truncated payloads', () => {
    expect(() => service.decrypt(Buffer.alloc(10))).toThrow('Encrypted payload is truncated');
  });
});
