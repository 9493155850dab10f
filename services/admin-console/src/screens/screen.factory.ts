import { Inject, Injectable } from '@nestjs/common';
import {
  AUTHENTICATION_SERVICE,
  type IAuthenticationService,
} from '../auth/authentication-service.interface';
import { type ISignInProvider, SIGN_IN_PROVIDER } from '../auth/sign-in-provider.interface';
import {
  CONNECTION_MANAGER,
  type IConnectionManager,
} from '../connections/connection-manager.interface';
import { CSV_EXPORTER, type ICsvExporter } from '../export/csv-exporter.interface';
import { type ITaskService, TASK_SERVICE } from '../tasks/task-service.interface';
import type { NavigationService } from './navigation.service';
import { AdHocUsersDetailScreen } from './report-detail/ad-hoc-users-detail.screen';
import { DocumentReportDetailScreen } from './report-detail/document-report-detail.screen';
import { type IScreen, ScreenKey } from './screen.interface';
import { SCREEN_HOST, type ScreenHost } from './screen-host.interface';
import { AdHocUsersConfigScreen } from './task-config/ad-hoc-users-config.screen';
import { DocumentReportConfigScreen } from './task-config/document-report-config.screen';

/**
 * Screens are short lived and created per navigation, each with its collaborators passed in.
 */
@Injectable()
export class ScreenFactory {
  public constructor(
    @Inject(TASK_SERVICE) private readonly taskService: ITaskService,
    @Inject(CONNECTION_MANAGER) private readonly connectionManager: IConnectionManager,
    @Inject(AUTHENTICATION_SERVICE) private readonly authService: IAuthenticationService,
    @Inject(CSV_EXPORTER) private readonly csvExporter: ICsvExporter,
    @Inject(SIGN_IN_PROVIDER) private readonly signInProvider: ISignInProvider,
    @Inject(SCREEN_HOST) private readonly host: ScreenHost,
  ) {}

  public create(key: ScreenKey, navigation: NavigationService): IScreen {
    const { taskService, connectionManager, authService, host } = this;

    switch (key) {
      case ScreenKey.AdHocUsersDetail:
      case ScreenKey.DocumentReportDetail: {
        const dependencies = {
          taskService,
          connectionManager,
          authService,
          csvExporter: this.csvExporter,
          host,
          navigation,
        };
        return key === ScreenKey.AdHocUsersDetail
          ? new AdHocUsersDetailScreen(dependencies)
          : new DocumentReportDetailScreen(dependencies);
      }
      case ScreenKey.AdHocUsersConfig:
      case ScreenKey.DocumentReportConfig: {
        const dependencies = {
          taskService,
          connectionManager,
          authService,
          signInProvider: this.signInProvider,
          host,
          navigation,
        };
        return key === ScreenKey.AdHocUsersConfig
          ? new AdHocUsersConfigScreen(dependencies)
          : new DocumentReportConfigScreen(dependencies);
      }
    }
  }
}
