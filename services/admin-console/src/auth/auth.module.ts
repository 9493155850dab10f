import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { StorageModule } from '../storage/storage.module';
import { AuthenticationService } from './authentication.service';
import { AUTHENTICATION_SERVICE } from './authentication-service.interface';
import { CookieStore } from './cookie.store';

@Module({
  imports: [ConfigModule, StorageModule],
  providers: [CookieStore, { provide: AUTHENTICATION_SERVICE, useClass: AuthenticationService }],
  exports: [AUTHENTICATION_SERVICE],
})
export class AuthModule {}
