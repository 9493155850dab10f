import { parseArgs } from 'node:util';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { normalizeError, sanitizeError } from '@spo-admin/utils';
import {
  AUTHENTICATION_SERVICE,
  type IAuthenticationService,
} from '../auth/authentication-service.interface';
import { type ISignInProvider, SIGN_IN_PROVIDER } from '../auth/sign-in-provider.interface';
import {
  ConnectionType,
  connectionDisplayName,
  createConnection,
  primaryUrl,
} from '../connections/connection';
import {
  CONNECTION_MANAGER,
  type IConnectionManager,
} from '../connections/connection-manager.interface';
import { NavigationService } from '../screens/navigation.service';
import { ReportDetailScreen } from '../screens/report-detail/report-detail.screen';
import { ScreenKey } from '../screens/screen.interface';
import {
  describeTaskStatus,
  describeTaskType,
  TaskStatus,
  TaskType,
  totalSites,
} from '../tasks/task-definition';
import { type ITaskService, TASK_SERVICE } from '../tasks/task-service.interface';
import { formatTable } from '../terminal/screen-view.formatter';
import { TerminalClosedError, TerminalIo } from '../terminal/terminal-io';
import { TerminalScreenHost } from '../terminal/terminal-screen.host';
import { splitCommandLine, splitCommandWord } from './command-line';

export const USAGE = [
  'Usage: spo-admin [command]',
  '',
  'Commands:',
  '  connections list',
  '  connections add --name <name> --tenant <tenant> [--site-url <url>]',
  '  connections remove <connectionId>',
  '  sign-in <connectionId>',
  '  tasks list',
  '  new <document-report|ad-hoc-users>',
  '  open <taskId> [--run]',
  '  help',
  '  quit',
  '',
  'Without a command an interactive prompt starts.',
].join('\n');

const NEW_TASK_SCREENS: Record<string, ScreenKey> = {
  'document-report': ScreenKey.DocumentReportConfig,
  'ad-hoc-users': ScreenKey.AdHocUsersConfig,
};

const DETAIL_SCREENS: Record<TaskType, ScreenKey> = {
  [TaskType.AdHocUsersReport]: ScreenKey.AdHocUsersDetail,
  [TaskType.DocumentReport]: ScreenKey.DocumentReportDetail,
};

export const ExitCode = {
  Success: 0,
  Failure: 1,
  Usage: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

class UsageError extends Error {}

function isParseArgsError(error: unknown): error is TypeError {
  return (
    error instanceof TypeError &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('ERR_PARSE_ARGS')
  );
}

type Outcome = ExitCode | 'quit';

/**
 * Entry point of the terminal surface. One-shot commands come from argv; without them the same
 * commands are read from an interactive prompt. Opening a screen hands the prompt to it until
 * the operator goes back or quits.
 */
@Injectable()
export class ConsoleCommandRunner {
  private readonly logger = new Logger(this.constructor.name);

  public constructor(
    private readonly io: TerminalIo,
    private readonly host: TerminalScreenHost,
    private readonly navigation: NavigationService,
    @Inject(TASK_SERVICE) private readonly taskService: ITaskService,
    @Inject(CONNECTION_MANAGER) private readonly connectionManager: IConnectionManager,
    @Inject(AUTHENTICATION_SERVICE) private readonly authService: IAuthenticationService,
    @Inject(SIGN_IN_PROVIDER) private readonly signInProvider: ISignInProvider,
  ) {}

  public async run(argv: string[]): Promise<ExitCode> {
    try {
      if (argv.length === 0) return await this.interactive();

      const outcome = await this.execute(argv);
      return outcome === 'quit' ? ExitCode.Success : outcome;
    } catch (error) {
      if (!(error instanceof TerminalClosedError)) throw error;
      const screen = this.navigation.current;
      if (screen instanceof ReportDetailScreen) await screen.whenIdle();
      return ExitCode.Success;
    }
  }

  private async interactive(): Promise<ExitCode> {
    this.io.write("SharePoint Online admin console. Type 'help' for commands.");
    while (true) {
      const line = await this.io.ask('spo-admin> ');
      const words = splitCommandLine(line);
      if (words.length === 0) continue;

      const outcome = await this.execute(words);
      if (outcome === 'quit') return ExitCode.Success;
    }
  }

  private async execute(words: string[]): Promise<Outcome> {
    const [command = '', ...rest] = words;
    try {
      switch (command.toLowerCase()) {
        case 'connections':
          return await this.connections(rest);
        case 'sign-in':
          return await this.signIn(rest);
        case 'tasks':
          return await this.tasks(rest);
        case 'new':
          return await this.newTask(rest);
        case 'open':
          return await this.openTask(rest);
        case 'help':
          this.io.write(USAGE);
          return ExitCode.Success;
        case 'quit':
        case 'exit':
          return 'quit';
        default:
          throw new UsageError(`Unknown command '${command}'`);
      }
    } catch (error) {
      if (error instanceof TerminalClosedError) throw error;
      if (error instanceof UsageError || isParseArgsError(error)) {
        this.io.write(`${error.message}\n\n${USAGE}`);
        return ExitCode.Usage;
      }
      this.logger.error({ msg: 'Command failed', command, error: sanitizeError(error) });
      this.io.write(`Error: ${normalizeError(error).message}`);
      return ExitCode.Failure;
    }
  }

  private async connections(args: string[]): Promise<Outcome> {
    const { values, positionals } = parseArgs({
      args,
      allowPositionals: true,
      options: {
        name: { type: 'string' },
        tenant: { type: 'string' },
        'site-url': { type: 'string' },
      },
    });
    const [subcommand = 'list', connectionId] = positionals;

    switch (subcommand) {
      case 'list': {
        const connections = await this.connectionManager.getAllConnections();
        const rows = await Promise.all(
          connections.map(async (connection) => [
            connection.id,
            connectionDisplayName(connection),
            connection.type,
            primaryUrl(connection),
            (await this.connectionManager.hasStoredCredentials(connection)) ? 'Signed in' : '-',
          ]),
        );
        this.writeTable('Connections', ['Id', 'Name', 'Type', 'Url', 'Credentials'], rows);
        return ExitCode.Success;
      }
      case 'add': {
        if (!values.name || !values.tenant) {
          throw new UsageError('connections add needs --name and --tenant');
        }
        const siteUrl = values['site-url'];
        const connection = createConnection({
          name: values.name,
          tenantName: values.tenant,
          type: siteUrl ? ConnectionType.SiteCollection : ConnectionType.Admin,
          siteUrl,
        });
        await this.connectionManager.saveConnection(connection);
        this.io.write(`Added connection ${connectionDisplayName(connection)}: ${connection.id}`);
        return ExitCode.Success;
      }
      case 'remove': {
        if (!connectionId) throw new UsageError('connections remove needs a connection id');
        const connection = await this.connectionManager.getConnection(connectionId);
        if (!connection) {
          this.io.write(`Connection '${connectionId}' not found`);
          return ExitCode.Failure;
        }
        await this.connectionManager.deleteConnection(connectionId);
        this.io.write(`Removed connection ${connectionDisplayName(connection)}`);
        return ExitCode.Success;
      }
      default:
        throw new UsageError(`Unknown connections command '${subcommand}'`);
    }
  }

  private async signIn(args: string[]): Promise<Outcome> {
    const [connectionId] = args;
    if (!connectionId) throw new UsageError('sign-in needs a connection id');

    const connection = await this.connectionManager.getConnection(connectionId);
    if (!connection) {
      this.io.write(`Connection '${connectionId}' not found`);
      return ExitCode.Failure;
    }

    const cookies = await this.signInProvider.signIn(primaryUrl(connection));
    if (!cookies) {
      this.io.write('Sign-in cancelled');
      return ExitCode.Failure;
    }

    await this.authService.storeCookies(cookies);
    await this.connectionManager.updateLastConnected(connection.id);
    this.io.write(`Signed in to ${connectionDisplayName(connection)}`);
    return ExitCode.Success;
  }

  private async tasks(args: string[]): Promise<Outcome> {
    const [subcommand = 'list'] = args;
    if (subcommand !== 'list') throw new UsageError(`Unknown tasks command '${subcommand}'`);

    const tasks = await this.taskService.getAllTasks();
    this.writeTable(
      'Tasks',
      ['Id', 'Name', 'Type', 'Status', 'Sites', 'Last run'],
      tasks.map((task) => [
        task.id,
        task.name,
        describeTaskType(task.type),
        describeTaskStatus(task.status),
        String(totalSites(task)),
        task.lastRunAt ?? '',
      ]),
    );
    return ExitCode.Success;
  }

  private async newTask(args: string[]): Promise<Outcome> {
    const [kind = ''] = args;
    const key = NEW_TASK_SCREENS[kind];
    if (!key) throw new UsageError(`new needs one of: ${Object.keys(NEW_TASK_SCREENS).join(', ')}`);

    await this.navigation.navigateTo(key);
    return this.screenLoop();
  }

  private async openTask(args: string[]): Promise<Outcome> {
    const { values, positionals } = parseArgs({
      args,
      allowPositionals: true,
      options: { run: { type: 'boolean', default: false } },
    });
    const [taskId] = positionals;
    if (!taskId) throw new UsageError('open needs a task id');

    const task = await this.taskService.getTask(taskId);
    if (!task) {
      this.io.write(`Task '${taskId}' not found`);
      return ExitCode.Failure;
    }

    await this.navigation.navigateTo(DETAIL_SCREENS[task.type], {
      task,
      executeImmediately: values.run,
    });
    return this.screenLoop();
  }

  /** Feeds prompt lines to the current screen until the operator leaves the last one. */
  private async screenLoop(): Promise<Outcome> {
    while (this.navigation.current) {
      const screen = this.navigation.current;
      let line: string;
      try {
        line = await this.io.ask(`${screen.key}> `);
      } catch (error) {
        if (!(error instanceof TerminalClosedError)) throw error;
        // Input ended: let a started run finish so piped sessions still produce results
        if (screen instanceof ReportDetailScreen) await screen.whenIdle();
        return this.finalOutcome(screen);
      }

      const { word, argument } = splitCommandWord(line);
      if (!word) continue;

      if (word === 'back') {
        this.host.invalidate();
        await this.navigation.goBack();
        continue;
      }
      if (word === 'quit' || word === 'exit') {
        if (await screen.onNavigatingFrom()) return 'quit';
        continue;
      }
      if (word === 'help') {
        this.writeScreenHelp(screen.commands);
        continue;
      }

      const command = screen.commands[word];
      if (!command) {
        this.io.write(`Unknown command '${word}'. Type 'help' for the commands of this screen.`);
        continue;
      }
      try {
        await command.run(argument);
      } catch (error) {
        if (error instanceof TerminalClosedError) throw error;
        this.logger.error({ msg: 'Screen command failed', word, error: sanitizeError(error) });
        this.io.write(`Error: ${normalizeError(error).message}`);
      }
    }
    return ExitCode.Success;
  }

  private async finalOutcome(screen: object): Promise<Outcome> {
    if (!(screen instanceof ReportDetailScreen)) return ExitCode.Success;

    const { task } = screen.currentState;
    if (!task) return ExitCode.Success;
    const latest = await this.taskService.getTask(task.id);
    return latest?.status === TaskStatus.Failed ? ExitCode.Failure : ExitCode.Success;
  }

  private writeScreenHelp(commands: Readonly<Record<string, { description: string }>>): void {
    const rows = Object.entries(commands).map(([word, { description }]) => [word, description]);
    rows.push(['back', 'Return to the previous screen'], ['quit', 'Leave the console']);
    this.writeTable('Commands', ['Command', 'Description'], rows);
  }

  private writeTable(title: string, columns: string[], rows: string[][]): void {
    this.io.write(formatTable({ title, columns, rows }, Number.POSITIVE_INFINITY).join('\n'));
  }
}
