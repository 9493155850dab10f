import { type Connection, connectionDisplayName } from '../../connections/connection';
import type { TaskType } from '../../tasks/task-definition';
import { formatMinuteStamp } from '../../utils/date-format.util';
import type { ScreenKey } from '../screen.interface';
import { type ScreenView, yesNo } from '../screen-view';
import type { Transition } from '../transition';
import { containsUrl, describeSiteImport, isValidSiteUrl, parseSiteImport } from './site-import';

export type TaskOptionValue = boolean | string;

export interface TaskOptionField<TOptions> {
  key: keyof TOptions & string;
  label: string;
}

/**
 * What differs between the task configuration screens.
 */
export interface TaskConfigDescriptor<TOptions extends Record<string, TaskOptionValue>> {
  readonly title: string;
  readonly taskType: TaskType;
  readonly defaultNamePrefix: string;
  readonly detailScreen: ScreenKey;
  readonly defaultOptions: TOptions;
  readonly optionFields: TaskOptionField<TOptions>[];
  /** Report configuration as stored in the task, camelCase keys. */
  buildConfiguration(connectionId: string, siteUrls: string[], options: TOptions): object;
}

export const CLEAR_SITES_CONFIRMATION = 'Are you sure you want to clear all sites?';
export const NO_CONNECTIONS_STATUS = 'No connections available. Add a connection first.';

export interface TaskConfigState<TOptions> {
  connections: Connection[];
  selectedConnectionId?: string;
  taskName: string;
  siteUrls: string[];
  options: TOptions;
  creating: boolean;
  status: string;
}

export interface NewTaskRequest {
  connection: Connection;
  name: string;
  siteUrls: string[];
  configurationJson: string;
}

export type TaskConfigAction =
  | { type: 'navigatedTo' }
  | { type: 'connectionsLoaded'; connections: Connection[]; now: Date }
  | { type: 'connectionSelected'; index: number }
  | { type: 'nameChanged'; name: string }
  | { type: 'siteAdded'; url: string }
  | { type: 'siteRemoved'; index: number }
  | { type: 'clearRequested' }
  | { type: 'sitesCleared' }
  | { type: 'importRequested' }
  | { type: 'importFileRead'; content: string }
  | { type: 'optionChanged'; key: string; value: string }
  | { type: 'createRequested' }
  | { type: 'createFinished' }
  | { type: 'statusChanged'; status: string };

export type TaskConfigEffect =
  | { type: 'loadConnections' }
  | { type: 'showError'; message: string }
  | { type: 'showWarning'; message: string }
  | { type: 'confirmClear'; message: string }
  | { type: 'chooseImportFile' }
  | { type: 'createTask'; request: NewTaskRequest };

export function initialTaskConfigState<TOptions>(
  defaultOptions: TOptions,
): TaskConfigState<TOptions> {
  return {
    connections: [],
    taskName: '',
    siteUrls: [],
    options: defaultOptions,
    creating: false,
    status: '',
  };
}

export function selectedConnection<TOptions>(
  state: TaskConfigState<TOptions>,
): Connection | undefined {
  return state.connections.find((connection) => connection.id === state.selectedConnectionId);
}

export function canCreate<TOptions>(state: TaskConfigState<TOptions>): boolean {
  return (
    selectedConnection(state) !== undefined &&
    state.siteUrls.length > 0 &&
    state.taskName.trim().length > 0
  );
}

const TRUE_WORDS = new Set(['true', 'yes', 'on', '1']);
const FALSE_WORDS = new Set(['false', 'no', 'off', '0']);

function parseBoolean(value: string): boolean | undefined {
  const word = value.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  return undefined;
}

export function createTaskConfigReducer<TOptions extends Record<string, TaskOptionValue>>(
  descriptor: TaskConfigDescriptor<TOptions>,
) {
  type State = TaskConfigState<TOptions>;
  type Result = Transition<State, TaskConfigEffect>;

  const unchanged = (state: State): Result => ({ state, effects: [] });
  const withStatus = (state: State, status: string): Result => unchanged({ ...state, status });

  const changeOption = (state: State, key: string, value: string): Result => {
    const field = descriptor.optionFields.find((candidate) => candidate.key === key);
    if (!field) {
      return { state, effects: [{ type: 'showWarning', message: `Unknown option '${key}'.` }] };
    }

    const current = state.options[field.key];
    if (typeof current === 'boolean') {
      const flag = parseBoolean(value);
      if (flag === undefined) {
        return {
          state,
          effects: [{ type: 'showWarning', message: `'${value}' is not a yes/no value.` }],
        };
      }
      return withStatus({ ...state, options: { ...state.options, [field.key]: flag } }, '');
    }
    return withStatus({ ...state, options: { ...state.options, [field.key]: value.trim() } }, '');
  };

  return function reduce(state: State, action: TaskConfigAction): Result {
    switch (action.type) {
      case 'navigatedTo':
        return { state, effects: [{ type: 'loadConnections' }] };

      case 'connectionsLoaded': {
        const { connections } = action;
        const stillSelected = connections.some(({ id }) => id === state.selectedConnectionId);
        const defaultName = `${descriptor.defaultNamePrefix} - ${formatMinuteStamp(action.now)}`;
        const status =
          connections.length > 0 ? `Loaded ${connections.length} connections` : NO_CONNECTIONS_STATUS;
        return withStatus(
          {
            ...state,
            connections,
            selectedConnectionId: stillSelected ? state.selectedConnectionId : connections[0]?.id,
            taskName: state.taskName || defaultName,
          },
          status,
        );
      }

      case 'connectionSelected': {
        const connection = state.connections[action.index];
        if (!connection) {
          return { state, effects: [{ type: 'showWarning', message: 'No such connection.' }] };
        }
        return withStatus({ ...state, selectedConnectionId: connection.id }, '');
      }

      case 'nameChanged':
        return unchanged({ ...state, taskName: action.name });

      case 'siteAdded': {
        const url = action.url.trim();
        if (!isValidSiteUrl(url)) {
          return {
            state,
            effects: [
              { type: 'showWarning', message: `'${url}' is not a valid http or https URL.` },
            ],
          };
        }
        if (containsUrl(state.siteUrls, url)) return withStatus(state, 'Site already added.');
        return withStatus({ ...state, siteUrls: [...state.siteUrls, url] }, `Added ${url}`);
      }

      case 'siteRemoved': {
        if (action.index < 0 || action.index >= state.siteUrls.length) return unchanged(state);
        return unchanged({
          ...state,
          siteUrls: state.siteUrls.filter((_, index) => index !== action.index),
        });
      }

      case 'clearRequested':
        if (state.siteUrls.length === 0) return unchanged(state);
        return { state, effects: [{ type: 'confirmClear', message: CLEAR_SITES_CONFIRMATION }] };

      case 'sitesCleared':
        return withStatus({ ...state, siteUrls: [] }, 'Sites cleared');

      case 'importRequested':
        return { state, effects: [{ type: 'chooseImportFile' }] };

      case 'importFileRead': {
        const outcome = parseSiteImport(action.content, state.siteUrls);
        const report = describeSiteImport(outcome);
        if (report.kind === 'failed') {
          return { state, effects: [{ type: 'showError', message: report.error }] };
        }
        return {
          state: {
            ...state,
            siteUrls: [...state.siteUrls, ...outcome.imported],
            status: report.status,
          },
          effects: report.warning ? [{ type: 'showWarning', message: report.warning }] : [],
        };
      }

      case 'optionChanged':
        return changeOption(state, action.key, action.value);

      case 'createRequested': {
        const connection = selectedConnection(state);
        if (state.creating) return unchanged(state);
        if (!connection || state.siteUrls.length === 0) {
          return {
            state,
            effects: [
              {
                type: 'showWarning',
                message: 'Please select a connection and add at least one site.',
              },
            ],
          };
        }
        if (!state.taskName.trim()) {
          return { state, effects: [{ type: 'showWarning', message: 'Please enter a task name.' }] };
        }

        const configuration = descriptor.buildConfiguration(
          connection.id,
          [...state.siteUrls],
          state.options,
        );
        return {
          state: { ...state, creating: true },
          effects: [
            {
              type: 'createTask',
              request: {
                connection,
                name: state.taskName.trim(),
                siteUrls: [...state.siteUrls],
                configurationJson: JSON.stringify(configuration),
              },
            },
          ],
        };
      }

      case 'createFinished':
        return unchanged({ ...state, creating: false });

      case 'statusChanged':
        return withStatus(state, action.status);
    }
  };
}

export function renderTaskConfigView<TOptions extends Record<string, TaskOptionValue>>(
  descriptor: TaskConfigDescriptor<TOptions>,
  state: TaskConfigState<TOptions>,
): ScreenView {
  const ready = canCreate(state) && !state.creating;
  const optionRows = descriptor.optionFields.map((field) => {
    const value: TaskOptionValue = state.options[field.key];
    return [field.key, field.label, typeof value === 'boolean' ? yesNo(value) : value];
  });

  return {
    title: descriptor.title,
    details: [`Task name: ${state.taskName}`, `Sites: ${state.siteUrls.length}`],
    actions: [
      { command: 'name', label: 'Task Name', enabled: true },
      {
        command: 'connection',
        label: 'Select Connection',
        enabled: state.connections.length > 0,
      },
      { command: 'add', label: 'Add Site', enabled: true },
      { command: 'import', label: 'Import CSV', enabled: true },
      { command: 'remove', label: 'Remove Site', enabled: state.siteUrls.length > 0 },
      { command: 'clear', label: 'Clear Sites', enabled: state.siteUrls.length > 0 },
      ...(optionRows.length > 0 ? [{ command: 'option', label: 'Set Option', enabled: true }] : []),
      { command: 'create', label: 'Create Task', enabled: ready },
      { command: 'back', label: 'Back', enabled: true },
    ],
    tables: [
      {
        title: 'Connections',
        columns: ['#', 'Connection', 'Selected'],
        rows: state.connections.map((connection, index) => [
          String(index),
          connectionDisplayName(connection),
          connection.id === state.selectedConnectionId ? '*' : '',
        ]),
      },
      {
        title: 'Sites',
        columns: ['#', 'Site URL'],
        rows: state.siteUrls.map((url, index) => [String(index), url]),
      },
      ...(optionRows.length > 0
        ? [{ title: 'Options', columns: ['Key', 'Option', 'Value'], rows: optionRows }]
        : []),
    ],
  };
}
