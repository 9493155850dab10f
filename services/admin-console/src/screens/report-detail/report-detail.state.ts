import { ALL_SITES_OPTION } from '../../constants/defaults.constants';
import { successfulSiteUrls } from '../../reports/report-result';
import {
  describeTaskStatus,
  describeTaskType,
  type TaskDefinition,
  TaskStatus,
  totalSites,
} from '../../tasks/task-definition';
import { percentComplete, type TaskProgress } from '../../tasks/task-progress';
import { formatFileTimestamp } from '../../utils/date-format.util';
import { toSafeFileName } from '../../utils/file-name.util';
import { isTaskExecutionParameter, type NavigationParameter } from '../screen.interface';
import type { ScreenView } from '../screen-view';
import type { Transition } from '../transition';
import type { AnyReportResult, ReportDescriptor } from './report-descriptor';

export const RunState = {
  Idle: 'Idle',
  Running: 'Running',
} as const;

export type RunState = (typeof RunState)[keyof typeof RunState];

export type ExportScope = 'items' | 'summary';

export const NO_RESULTS_LOG = "No results yet. Click 'Run Task' to execute.";
export const LEAVE_WHILE_RUNNING_CONFIRMATION =
  'A task is currently running. Are you sure you want to leave?';

export interface ReportDetailState<TResult extends AnyReportResult> {
  task?: TaskDefinition;
  connectionName: string;
  result?: TResult;
  runState: RunState;
  cancellationRequested: boolean;
  progress?: TaskProgress;
  // Progress messages of the run in flight, shown in place of the previous result's log
  runLog: string[];
  siteFilter: string;
  searchText: string;
  status: string;
}

export type ReportDetailAction<TResult extends AnyReportResult> =
  | { type: 'navigatedTo'; parameter: NavigationParameter }
  | { type: 'detailsLoaded'; task: TaskDefinition; connectionName: string; result?: TResult }
  | { type: 'runToggled' }
  | { type: 'cancelRequested' }
  | { type: 'progressReported'; progress: TaskProgress }
  | { type: 'runCompleted'; result: TResult; task: TaskDefinition }
  | { type: 'runFailed'; message: string; task: TaskDefinition }
  | { type: 'siteFilterChanged'; siteFilter: string }
  | { type: 'searchChanged'; searchText: string }
  | { type: 'exportRequested'; scope: ExportScope; now: Date }
  | { type: 'deleteRequested' }
  | { type: 'statusChanged'; status: string };

export type ReportDetailEffect =
  | { type: 'showError'; message: string }
  | { type: 'goBack' }
  | { type: 'loadDetails'; task: TaskDefinition }
  | { type: 'toggleRun' }
  | { type: 'startRun'; task: TaskDefinition }
  | { type: 'abortRun' }
  | { type: 'exportFile'; scope: ExportScope; defaultFileName: string }
  | { type: 'deleteTask'; task: TaskDefinition; confirmation: string };

export function initialReportDetailState<
  TResult extends AnyReportResult,
>(): ReportDetailState<TResult> {
  return {
    connectionName: '',
    runState: RunState.Idle,
    cancellationRequested: false,
    runLog: [],
    siteFilter: ALL_SITES_OPTION,
    searchText: '',
    status: '',
  };
}

export function siteOptions(result: AnyReportResult | undefined): string[] {
  return [ALL_SITES_OPTION, ...(result ? successfulSiteUrls(result) : [])];
}

/**
 * Site filter first, then the search text; both narrow the cached result only.
 */
export function visibleItems<TResult extends AnyReportResult, TItem>(
  descriptor: ReportDescriptor<TResult, TItem>,
  {
    result,
    siteFilter,
    searchText,
  }: Pick<ReportDetailState<TResult>, 'result' | 'siteFilter' | 'searchText'>,
): TItem[] {
  if (!result) return [];

  let items = descriptor.items(result);
  if (siteFilter !== ALL_SITES_OPTION) {
    const site = siteFilter.toLowerCase();
    items = items.filter((item) => descriptor.itemSiteUrl(item).toLowerCase() === site);
  }

  const needle = searchText.trim().toLowerCase();
  if (needle) {
    items = items.filter((item) => descriptor.matchesSearch(item, needle));
  }
  return items;
}

export function canExport(state: ReportDetailState<AnyReportResult>): boolean {
  return state.result !== undefined && state.runState === RunState.Idle;
}

export function needsLeaveConfirmation(state: ReportDetailState<AnyReportResult>): boolean {
  return state.runState === RunState.Running && !state.cancellationRequested;
}

function runOutcomeStatus<TResult extends AnyReportResult>(
  descriptor: ReportDescriptor<TResult, unknown>,
  result: TResult,
  task: TaskDefinition,
): string {
  if (task.status === TaskStatus.Cancelled) return 'Task cancelled.';
  if (result.errorMessage) return `Task failed: ${result.errorMessage}`;
  if (result.success) return descriptor.completedStatus(result);
  return `Task completed with errors. ${result.failedSites} site(s) failed.`;
}

export function createReportDetailReducer<TResult extends AnyReportResult, TItem>(
  descriptor: ReportDescriptor<TResult, TItem>,
) {
  type State = ReportDetailState<TResult>;
  type Result = Transition<State, ReportDetailEffect>;

  const unchanged = (state: State): Result => ({ state, effects: [] });

  const withFilterStatus = (state: State): State =>
    state.result
      ? {
          ...state,
          status: descriptor.filterStatus(visibleItems(descriptor, state).length, state.result),
        }
      : state;

  const cancel = (state: State): Result =>
    needsLeaveConfirmation(state)
      ? {
          state: { ...state, cancellationRequested: true, status: 'Cancelling...' },
          effects: [{ type: 'abortRun' }],
        }
      : unchanged(state);

  return function reduce(state: State, action: ReportDetailAction<TResult>): Result {
    switch (action.type) {
      case 'navigatedTo': {
        const { parameter } = action;
        const task = isTaskExecutionParameter(parameter) ? parameter.task : parameter;
        const executeImmediately =
          isTaskExecutionParameter(parameter) && parameter.executeImmediately;

        if (!task && state.task) {
          return { state, effects: [{ type: 'loadDetails', task: state.task }] };
        }
        if (!task) {
          return {
            state,
            effects: [{ type: 'showError', message: 'No task specified.' }, { type: 'goBack' }],
          };
        }
        return {
          state: { ...state, task },
          effects: [
            { type: 'loadDetails', task },
            ...(executeImmediately ? [{ type: 'toggleRun' } as const] : []),
          ],
        };
      }

      case 'detailsLoaded':
        return unchanged(
          withFilterStatus({
            ...state,
            task: action.task,
            connectionName: action.connectionName,
            result: action.result,
            siteFilter: ALL_SITES_OPTION,
          }),
        );

      case 'runToggled': {
        if (state.runState === RunState.Running) return cancel(state);
        if (!state.task) return unchanged(state);

        return {
          state: {
            ...state,
            result: undefined,
            siteFilter: ALL_SITES_OPTION,
            runState: RunState.Running,
            cancellationRequested: false,
            runLog: [],
            progress: {
              currentSite: 0,
              totalSites: totalSites(state.task),
              currentSiteUrl: '',
              message: 'Starting...',
            },
            status: `Running '${state.task.name}'...`,
          },
          effects: [{ type: 'startRun', task: state.task }],
        };
      }

      case 'cancelRequested':
        return cancel(state);

      case 'progressReported':
        return state.runState === RunState.Running
          ? unchanged({
              ...state,
              progress: action.progress,
              runLog: [...state.runLog, action.progress.message],
            })
          : unchanged(state);

      case 'runCompleted': {
        const idle = withFilterStatus({
          ...state,
          task: action.task,
          result: action.result,
          runState: RunState.Idle,
          cancellationRequested: false,
          progress: undefined,
          runLog: [],
          siteFilter: ALL_SITES_OPTION,
        });
        const status = runOutcomeStatus(descriptor, action.result, action.task);
        return unchanged({ ...idle, status });
      }

      case 'runFailed':
        return {
          state: {
            ...state,
            task: action.task,
            runState: RunState.Idle,
            cancellationRequested: false,
            progress: undefined,
            runLog: [],
            status: 'Task execution failed',
          },
          effects: [{ type: 'showError', message: `Task execution failed: ${action.message}` }],
        };

      case 'siteFilterChanged': {
        const requested = action.siteFilter.toLowerCase();
        const siteFilter =
          siteOptions(state.result).find((option) => option.toLowerCase() === requested) ??
          ALL_SITES_OPTION;
        return unchanged(withFilterStatus({ ...state, siteFilter }));
      }

      case 'searchChanged':
        return unchanged(withFilterStatus({ ...state, searchText: action.searchText }));

      case 'exportRequested': {
        if (!state.task || !canExport(state)) return unchanged(state);

        const part = action.scope === 'items' ? descriptor.exportName : 'Summary';
        const stamp = formatFileTimestamp(action.now);
        const defaultFileName = `${toSafeFileName(state.task.name)}_${part}_${stamp}.csv`;
        return { state, effects: [{ type: 'exportFile', scope: action.scope, defaultFileName }] };
      }

      case 'deleteRequested':
        if (!state.task || state.runState === RunState.Running) return unchanged(state);
        return {
          state,
          effects: [
            {
              type: 'deleteTask',
              task: state.task,
              confirmation: `Are you sure you want to delete the task '${state.task.name}'?\n\nThis will also delete all saved results.`,
            },
          ],
        };

      case 'statusChanged':
        return unchanged({ ...state, status: action.status });
    }
  };
}

export function renderReportDetailView<TResult extends AnyReportResult, TItem>(
  descriptor: ReportDescriptor<TResult, TItem>,
  state: ReportDetailState<TResult>,
): ScreenView {
  const { task, result, runState, progress } = state;
  const running = runState === RunState.Running;
  const exportable = canExport(state);

  return {
    title: task ? `${descriptor.title}: ${task.name}` : descriptor.title,
    details: task
      ? [
          `Type: ${describeTaskType(task.type)} | Status: ${describeTaskStatus(task.status)} | ` +
            `Connection: ${state.connectionName} | Sites: ${totalSites(task)}`,
          state.searchText.trim()
            ? `Site filter: ${state.siteFilter} | Search: ${state.searchText.trim()}`
            : `Site filter: ${state.siteFilter}`,
        ]
      : [],
    actions: [
      {
        command: 'run',
        label: running ? 'Cancel' : 'Run Task',
        enabled: !state.cancellationRequested,
      },
      { command: 'export', label: 'Export', enabled: exportable },
      { command: 'summary', label: 'Export Summary', enabled: exportable },
      { command: 'delete', label: 'Delete', enabled: !running },
      { command: 'site', label: 'Filter Site', enabled: result !== undefined },
      { command: 'search', label: 'Search', enabled: result !== undefined },
      { command: 'back', label: 'Back', enabled: true },
    ],
    tables: result
      ? [
          {
            title: 'Sites',
            columns: ['#', 'Site'],
            rows: siteOptions(result).map((option, index) => [String(index), option]),
          },
          {
            title: descriptor.itemsTitle,
            columns: descriptor.itemColumns,
            rows: visibleItems(descriptor, state).map((item) => descriptor.itemRow(item)),
          },
          {
            title: 'Summary',
            columns: descriptor.siteColumns,
            rows: descriptor.siteRows(result),
          },
        ]
      : [],
    progress:
      running && progress
        ? { message: progress.message, percent: percentComplete(progress) }
        : undefined,
    log: running
      ? state.runLog.join('\n')
      : result
        ? result.executionLog.join('\n')
        : NO_RESULTS_LOG,
  };
}
