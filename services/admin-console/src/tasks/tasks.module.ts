import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AdHocUsersCollector } from '../reports/ad-hoc-users/ad-hoc-users.collector';
import { DocumentReportCollector } from '../reports/document-report/document-report.collector';
import { SharepointApiModule } from '../sharepoint-api/sharepoint-api.module';
import { StorageModule } from '../storage/storage.module';
import { TaskService } from './task.service';
import { TaskResultStore } from './task-result.store';
import { TASK_SERVICE } from './task-service.interface';

@Module({
  imports: [ConfigModule, StorageModule, SharepointApiModule],
  providers: [
    AdHocUsersCollector,
    DocumentReportCollector,
    TaskResultStore,
    { provide: TASK_SERVICE, useClass: TaskService },
  ],
  exports: [TASK_SERVICE],
})
export class TasksModule {}
