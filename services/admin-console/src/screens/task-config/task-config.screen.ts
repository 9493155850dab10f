import { readFile } from 'node:fs/promises';
import { normalizeError, sanitizeError } from '@spo-admin/utils';
import { Logger } from '@nestjs/common';
import type { IAuthenticationService } from '../../auth/authentication-service.interface';
import type { ISignInProvider } from '../../auth/sign-in-provider.interface';
import { type Connection, cookieDomain, primaryUrl } from '../../connections/connection';
import type { IConnectionManager } from '../../connections/connection-manager.interface';
import { createTaskDefinition } from '../../tasks/task-definition';
import type { ITaskService } from '../../tasks/task-service.interface';
import type { NavigationService } from '../navigation.service';
import type { IScreen, ScreenCommand, ScreenKey } from '../screen.interface';
import type { ScreenHost } from '../screen-host.interface';
import {
  createTaskConfigReducer,
  initialTaskConfigState,
  type NewTaskRequest,
  renderTaskConfigView,
  type TaskConfigAction,
  type TaskConfigDescriptor,
  type TaskConfigEffect,
  type TaskConfigState,
  type TaskOptionValue,
} from './task-config.state';

export interface TaskConfigDependencies {
  taskService: ITaskService;
  connectionManager: IConnectionManager;
  authService: IAuthenticationService;
  signInProvider: ISignInProvider;
  host: ScreenHost;
  navigation: NavigationService;
}

/**
 * Collects the connection, the target sites and the report options of a new task, then creates
 * it and opens its detail screen with an immediate run.
 */
export class TaskConfigScreen<TOptions extends Record<string, TaskOptionValue>> implements IScreen {
  private readonly logger = new Logger(this.constructor.name);
  private readonly reduce: ReturnType<typeof createTaskConfigReducer<TOptions>>;
  private state: TaskConfigState<TOptions>;
  // Cleared once the screen is left; work that finishes afterwards must not draw
  private active = false;

  public readonly commands: Readonly<Record<string, ScreenCommand>>;

  public constructor(
    public readonly key: ScreenKey,
    private readonly descriptor: TaskConfigDescriptor<TOptions>,
    private readonly dependencies: TaskConfigDependencies,
  ) {
    this.reduce = createTaskConfigReducer(descriptor);
    this.state = initialTaskConfigState(descriptor.defaultOptions);
    this.commands = {
      name: {
        description: 'Set the task name',
        run: (argument) => this.dispatch({ type: 'nameChanged', name: argument }),
      },
      connection: {
        description: 'Select a connection by its number',
        run: (argument) =>
          this.dispatch({ type: 'connectionSelected', index: Number.parseInt(argument, 10) }),
      },
      add: {
        description: 'Add a site URL',
        run: (argument) => this.dispatch({ type: 'siteAdded', url: argument }),
      },
      import: {
        description: 'Import site URLs from a CSV or text file',
        run: () => this.dispatch({ type: 'importRequested' }),
      },
      remove: {
        description: 'Remove a site by its number',
        run: (argument) =>
          this.dispatch({ type: 'siteRemoved', index: Number.parseInt(argument, 10) }),
      },
      clear: {
        description: 'Remove all sites',
        run: () => this.dispatch({ type: 'clearRequested' }),
      },
      option: {
        description: 'Set a report option: option <key> <value>',
        run: (argument) => {
          const [optionKey = '', ...rest] = argument.split(/\s+/);
          return this.dispatch({ type: 'optionChanged', key: optionKey, value: rest.join(' ') });
        },
      },
      create: {
        description: 'Create the task and run it',
        run: () => this.dispatch({ type: 'createRequested' }),
      },
    };
  }

  public get currentState(): TaskConfigState<TOptions> {
    return this.state;
  }

  public async onNavigatedTo(): Promise<void> {
    this.active = true;
    await this.dispatch({ type: 'navigatedTo' });
  }

  public async onNavigatingFrom(): Promise<boolean> {
    this.active = false;
    return true;
  }

  public async dispatch(action: TaskConfigAction): Promise<void> {
    const previousStatus = this.state.status;
    const { state, effects } = this.reduce(this.state, action);
    this.state = state;

    if (this.active) {
      const { host } = this.dependencies;
      host.render(renderTaskConfigView(this.descriptor, state));
      if (state.status !== previousStatus) host.setStatus(state.status);
    }

    for (const effect of effects) {
      await this.perform(effect);
    }
  }

  private async perform(effect: TaskConfigEffect): Promise<void> {
    const { host } = this.dependencies;

    switch (effect.type) {
      case 'loadConnections':
        await this.loadConnections();
        return;
      case 'showError':
        await host.showError(effect.message);
        return;
      case 'showWarning':
        await host.showWarning(effect.message);
        return;
      case 'confirmClear':
        if (await host.confirm(effect.message, 'Clear Sites')) {
          await this.dispatch({ type: 'sitesCleared' });
        }
        return;
      case 'chooseImportFile':
        await this.importFile();
        return;
      case 'createTask':
        try {
          await this.createTask(effect.request);
        } finally {
          await this.dispatch({ type: 'createFinished' });
        }
        return;
    }
  }

  private async loadConnections(): Promise<void> {
    try {
      const connections = await this.dependencies.connectionManager.getAllConnections();
      await this.dispatch({ type: 'connectionsLoaded', connections, now: new Date() });
    } catch (error) {
      this.logger.error({ msg: 'Failed to load connections', error: sanitizeError(error) });
      await this.dependencies.host.showError(
        `Failed to load connections: ${normalizeError(error).message}`,
      );
    }
  }

  private async importFile(): Promise<void> {
    const { host } = this.dependencies;
    const filePath = await host.chooseOpenPath();
    if (!filePath) return;

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      await host.showError(`Failed to import file: ${normalizeError(error).message}`);
      return;
    }
    await this.dispatch({ type: 'importFileRead', content });
  }

  private async createTask(request: NewTaskRequest): Promise<void> {
    const { host, taskService, navigation } = this.dependencies;
    try {
      if (!(await this.ensureAuthentication(request.connection))) return;

      const task = createTaskDefinition({
        name: request.name,
        type: this.descriptor.taskType,
        connectionId: request.connection.id,
        targetSiteUrls: request.siteUrls,
        configurationJson: request.configurationJson,
      });
      await taskService.saveTask(task);
      await this.dispatch({
        type: 'statusChanged',
        status: `Task '${task.name}' created with ${task.targetSiteUrls.length} sites`,
      });

      await navigation.navigateTo(this.descriptor.detailScreen, { task, executeImmediately: true });
    } catch (error) {
      this.logger.error({ msg: 'Failed to create task', error: sanitizeError(error) });
      await host.showError(`Failed to create task: ${normalizeError(error).message}`);
    }
  }

  private async ensureAuthentication(connection: Connection): Promise<boolean> {
    const { authService, connectionManager, signInProvider, host } = this.dependencies;
    const domain = cookieDomain(connection);
    if (await authService.hasStoredCredentials(domain)) return true;

    const signIn = await host.confirm(
      `Authentication required for connection '${connection.name}'. Sign in now?`,
      'Authentication Required',
    );
    if (!signIn) return false;

    await this.dispatch({
      type: 'statusChanged',
      status: `Opening sign-in for ${connection.name}...`,
    });
    const cookies = await signInProvider.signIn(primaryUrl(connection));
    if (!cookies) {
      await this.dispatch({ type: 'statusChanged', status: 'Authentication cancelled' });
      return false;
    }

    await authService.storeCookies(cookies);
    await connectionManager.updateLastConnected(connection.id);
    await this.dispatch({ type: 'statusChanged', status: `Authenticated to ${domain}` });
    return true;
  }
}
