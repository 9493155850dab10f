import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AesGcmEncryptionService } from './aes-gcm-encryption.service';
import { JsonDataStoreFactory } from './json-data-store.factory';

@Module({
  imports: [ConfigModule],
  providers: [AesGcmEncryptionService, JsonDataStoreFactory],
  exports: [AesGcmEncryptionService, JsonDataStoreFactory],
})
export class StorageModule {}
