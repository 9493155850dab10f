import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { StorageModule } from '../storage/storage.module';
import { CONNECTION_MANAGER } from './connection-manager.interface';
import { ConnectionManagerService } from './connection-manager.service';

@Module({
  imports: [AuthModule, StorageModule],
  providers: [{ provide: CONNECTION_MANAGER, useClass: ConnectionManagerService }],
  exports: [CONNECTION_MANAGER],
})
export class ConnectionsModule {}
