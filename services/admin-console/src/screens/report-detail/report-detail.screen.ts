import { normalizeError, sanitizeError } from '@spo-admin/utils';
import { Logger } from '@nestjs/common';
import type { IAuthenticationService } from '../../auth/authentication-service.interface';
import type { IConnectionManager } from '../../connections/connection-manager.interface';
import { ALL_SITES_OPTION } from '../../constants/defaults.constants';
import type { ICsvExporter } from '../../export/csv-exporter.interface';
import type { TaskDefinition } from '../../tasks/task-definition';
import type { ITaskService } from '../../tasks/task-service.interface';
import type { NavigationService } from '../navigation.service';
import type { IScreen, NavigationParameter, ScreenCommand, ScreenKey } from '../screen.interface';
import type { ScreenHost } from '../screen-host.interface';
import type { AnyReportResult, ReportDescriptor } from './report-descriptor';
import {
  createReportDetailReducer,
  initialReportDetailState,
  LEAVE_WHILE_RUNNING_CONFIRMATION,
  needsLeaveConfirmation,
  type ReportDetailAction,
  type ReportDetailEffect,
  type ReportDetailState,
  renderReportDetailView,
  siteOptions,
} from './report-detail.state';

export interface ReportDetailDependencies {
  taskService: ITaskService;
  connectionManager: IConnectionManager;
  authService: IAuthenticationService;
  csvExporter: ICsvExporter;
  host: ScreenHost;
  navigation: NavigationService;
}

const EXPORT_OPEN_PROMPT = 'Export completed. Would you like to open the file?';

/**
 * Shows the latest result of one task and runs, exports or deletes it. State changes go through
 * the pure reducer; this class only carries out the effects it returns.
 */
export class ReportDetailScreen<TResult extends AnyReportResult, TItem> implements IScreen {
  private readonly logger = new Logger(this.constructor.name);
  private readonly reduce: ReturnType<typeof createReportDetailReducer<TResult, TItem>>;
  private state: ReportDetailState<TResult> = initialReportDetailState<TResult>();
  private abortController?: AbortController;
  private runInFlight: Promise<void> = Promise.resolve();
  // Cleared once the operator left; a late run must not draw over the next screen
  private active = false;

  public readonly commands: Readonly<Record<string, ScreenCommand>>;

  public constructor(
    public readonly key: ScreenKey,
    private readonly descriptor: ReportDescriptor<TResult, TItem>,
    private readonly dependencies: ReportDetailDependencies,
  ) {
    this.reduce = createReportDetailReducer(descriptor);
    this.commands = {
      run: {
        description: 'Run the task, or cancel the running one',
        run: () => this.executeTask(),
      },
      site: {
        description: 'Filter by site: number from the Sites table, or "all"',
        run: (argument) => this.selectSite(argument),
      },
      search: {
        description: 'Search text, empty to clear',
        run: (argument) => this.dispatch({ type: 'searchChanged', searchText: argument }),
      },
      export: {
        description: 'Export the rows to CSV',
        run: () => this.dispatch({ type: 'exportRequested', scope: 'items', now: new Date() }),
      },
      summary: {
        description: 'Export the per-site summary to CSV',
        run: () => this.dispatch({ type: 'exportRequested', scope: 'summary', now: new Date() }),
      },
      delete: {
        description: 'Delete the task and its results',
        run: () => this.dispatch({ type: 'deleteRequested' }),
      },
    };
  }

  public get currentState(): ReportDetailState<TResult> {
    return this.state;
  }

  public async onNavigatedTo(parameter?: NavigationParameter): Promise<void> {
    this.active = true;
    await this.dispatch({ type: 'navigatedTo', parameter });
  }

  public async onNavigatingFrom(): Promise<boolean> {
    if (needsLeaveConfirmation(this.state)) {
      const { host } = this.dependencies;
      if (!(await host.confirm(LEAVE_WHILE_RUNNING_CONFIRMATION, 'Task Running'))) return false;
      await this.dispatch({ type: 'cancelRequested' });
    }

    this.active = false;
    return true;
  }

  /** Starts a run when idle; while running, asks the run to stop. */
  public async executeTask(): Promise<void> {
    await this.dispatch({ type: 'runToggled' });
  }

  /** Resolves once no run is in flight. */
  public async whenIdle(): Promise<void> {
    await this.runInFlight;
  }

  private async selectSite(argument: string): Promise<void> {
    const options = siteOptions(this.state.result);
    const index = Number.parseInt(argument, 10);
    const siteFilter =
      argument.toLowerCase() === 'all' ? ALL_SITES_OPTION : (options[index] ?? argument);
    await this.dispatch({ type: 'siteFilterChanged', siteFilter });
  }

  private transition(action: ReportDetailAction<TResult>): ReportDetailEffect[] {
    const previousStatus = this.state.status;
    const { state, effects } = this.reduce(this.state, action);
    this.state = state;

    if (this.active) {
      const { host } = this.dependencies;
      host.render(renderReportDetailView(this.descriptor, state));
      if (state.status !== previousStatus) host.setStatus(state.status);
    }
    return effects;
  }

  private async dispatch(action: ReportDetailAction<TResult>): Promise<void> {
    for (const effect of this.transition(action)) {
      await this.perform(effect);
    }
  }

  private async perform(effect: ReportDetailEffect): Promise<void> {
    const { host, navigation } = this.dependencies;

    switch (effect.type) {
      case 'showError':
        await host.showError(effect.message);
        return;
      case 'goBack':
        await navigation.goBack();
        return;
      case 'loadDetails':
        await this.loadDetails(effect.task);
        return;
      case 'toggleRun':
        await this.dispatch({ type: 'runToggled' });
        return;
      case 'startRun':
        // Runs detached so that the screen keeps taking commands, `run` again cancels it
        this.runInFlight = this.run(effect.task).catch((error: unknown) => {
          this.logger.error({
            msg: 'Could not finish task run',
            taskId: effect.task.id,
            error: sanitizeError(error),
          });
        });
        return;
      case 'abortRun':
        this.abortController?.abort();
        return;
      case 'exportFile':
        await this.exportFile(effect.scope, effect.defaultFileName);
        return;
      case 'deleteTask':
        await this.deleteTask(effect.task, effect.confirmation);
        return;
    }
  }

  private async loadDetails(task: TaskDefinition): Promise<void> {
    const { taskService, connectionManager, host } = this.dependencies;
    try {
      const connection = await connectionManager.getConnection(task.connectionId);
      const result = await this.descriptor.loadLatest(taskService, task.id);
      await this.dispatch({
        type: 'detailsLoaded',
        task,
        connectionName: connection?.name ?? 'Unknown',
        result,
      });
    } catch (error) {
      this.logger.error({
        msg: 'Failed to load task details',
        taskId: task.id,
        error: sanitizeError(error),
      });
      await host.showError(`Failed to load task details: ${normalizeError(error).message}`);
    }
  }

  private async run(task: TaskDefinition): Promise<void> {
    const { taskService, authService } = this.dependencies;
    const abortController = new AbortController();
    this.abortController = abortController;

    let outcome: { result: TResult } | { message: string };
    try {
      const result = await this.descriptor.execute(
        taskService,
        task,
        authService,
        (progress) => this.transition({ type: 'progressReported', progress }),
        abortController.signal,
      );
      outcome = { result };
    } catch (error) {
      this.logger.error({
        msg: 'Task execution failed',
        taskId: task.id,
        error: sanitizeError(error),
      });
      outcome = { message: normalizeError(error).message };
    } finally {
      this.abortController = undefined;
    }

    const reloadedTask = await this.reloadTask(task);
    await this.dispatch(
      'result' in outcome
        ? { type: 'runCompleted', result: outcome.result, task: reloadedTask }
        : { type: 'runFailed', message: outcome.message, task: reloadedTask },
    );
  }

  private async reloadTask(task: TaskDefinition): Promise<TaskDefinition> {
    try {
      return (await this.dependencies.taskService.getTask(task.id)) ?? task;
    } catch (error) {
      this.logger.warn({
        msg: 'Could not reload task',
        taskId: task.id,
        error: sanitizeError(error),
      });
      return task;
    }
  }

  private async exportFile(scope: 'items' | 'summary', defaultFileName: string): Promise<void> {
    const { host, csvExporter } = this.dependencies;
    const { result } = this.state;
    if (!result) return;

    const filePath = await host.chooseSavePath(defaultFileName);
    if (!filePath) return;

    try {
      if (scope === 'items') {
        await this.descriptor.exportItems(csvExporter, result, filePath);
      } else {
        await this.descriptor.exportSummary(csvExporter, result, filePath);
      }
    } catch (error) {
      await host.showError(`Export failed: ${normalizeError(error).message}`);
      return;
    }

    await this.dispatch({ type: 'statusChanged', status: `Exported to ${filePath}` });
    if (await host.confirm(EXPORT_OPEN_PROMPT, 'Export Complete')) {
      await host.openPath(filePath);
    }
  }

  private async deleteTask(task: TaskDefinition, confirmation: string): Promise<void> {
    const { host, taskService, navigation } = this.dependencies;
    if (!(await host.confirm(confirmation, 'Delete Task'))) return;

    try {
      await taskService.deleteTask(task.id);
    } catch (error) {
      await host.showError(`Failed to delete task: ${normalizeError(error).message}`);
      return;
    }

    await this.dispatch({ type: 'statusChanged', status: `Task '${task.name}' deleted` });
    await navigation.goBack();
  }
}
