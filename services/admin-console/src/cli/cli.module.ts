import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { ConnectionsModule } from '../connections/connections.module';
import { ScreensModule } from '../screens/screens.module';
import { TasksModule } from '../tasks/tasks.module';
import { TerminalModule } from '../terminal/terminal.module';
import { ConsoleCommandRunner } from './console-command.runner';

@Module({
  imports: [AuthModule, ConnectionsModule, ScreensModule, TasksModule, TerminalModule],
  providers: [ConsoleCommandRunner],
  exports: [ConsoleCommandRunner],
})
export class CliModule {}
