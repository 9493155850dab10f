import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { ConnectionsModule } from '../connections/connections.module';
import { ExportModule } from '../export/export.module';
import { TasksModule } from '../tasks/tasks.module';
import { TerminalModule } from '../terminal/terminal.module';
import { NavigationService } from './navigation.service';
import { ScreenFactory } from './screen.factory';

@Module({
  imports: [AuthModule, ConnectionsModule, ExportModule, TasksModule, TerminalModule],
  providers: [ScreenFactory, NavigationService],
  exports: [NavigationService],
})
export class ScreensModule {}
