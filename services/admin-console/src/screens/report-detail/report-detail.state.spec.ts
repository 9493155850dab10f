import { describe, expect, it } from 'vitest';
import {
  aDocument,
  aDocumentResult,
  aDocumentSite,
  aGuest,
  anAdHocResult,
  anAdHocSite,
  aTask,
  OTHER_SITE_URL,
  SITE_URL,
} from '../../../test/fixtures';
import type { DocumentReportResult } from '../../reports/document-report/document-report.models';
import { ALL_SITES_OPTION } from '../../constants/defaults.constants';
import { TaskStatus } from '../../tasks/task-definition';
import { adHocUsersReportDescriptor } from './ad-hoc-users-detail.screen';
import { documentReportDescriptor } from './document-report-detail.screen';
import {
  createReportDetailReducer,
  initialReportDetailState,
  NO_RESULTS_LOG,
  type ReportDetailState,
  RunState,
  renderReportDetailView,
  visibleItems,
} from './report-detail.state';

const reduce = createReportDetailReducer(documentReportDescriptor);

function twoSiteResult(overrides: Partial<DocumentReportResult> = {}): DocumentReportResult {
  return aDocumentResult(
    [
      aDocumentSite({
        documents: [
          aDocument(),
          aDocument({ fileName: 'notes.docx', extension: 'docx', sizeBytes: 1024 }),
        ],
      }),
      aDocumentSite({
        siteUrl: OTHER_SITE_URL,
        siteTitle: 'Legal',
        documents: [
          aDocument({
            fileName: 'contract.pdf',
            extension: 'pdf',
            sizeBytes: 512,
            siteCollectionUrl: OTHER_SITE_URL,
            siteTitle: 'Legal',
          }),
        ],
      }),
    ],
    overrides,
  );
}

function loadedState(): ReportDetailState<DocumentReportResult> {
  return reduce(initialReportDetailState(), {
    type: 'detailsLoaded',
    task: aTask(),
    connectionName: 'Contoso',
    result: twoSiteResult(),
  }).state;
}

function runningState(): ReportDetailState<DocumentReportResult> {
  return reduce(loadedState(), { type: 'runToggled' }).state;
}

describe('report detail reducer', () => {
  describe('navigation', () => {
    it('loads the task it was given and runs it when asked to', () => {
      const task = aTask();

      const { state, effects } = reduce(initialReportDetailState(), {
        type: 'navigatedTo',
        parameter: { task, executeImmediately: true },
      });

      expect(state.task).toBe(task);
      expect(effects).toEqual([{ type: 'loadDetails', task }, { type: 'toggleRun' }]);
    });

    it('only loads a task passed on its own', () => {
      const task = aTask();

      const { effects } = reduce(initialReportDetailState(), { type: 'navigatedTo', parameter: task });

      expect(effects).toEqual([{ type: 'loadDetails', task }]);
    });

    it('reloads the current task when coming back to the screen', () => {
      const state = loadedState();

      const { effects } = reduce(state, { type: 'navigatedTo', parameter: undefined });

      expect(effects).toEqual([{ type: 'loadDetails', task: state.task }]);
    });

    it('goes back when there is no task to show', () => {
      const { effects } = reduce(initialReportDetailState(), {
        type: 'navigatedTo',
        parameter: undefined,
      });

      expect(effects).toEqual([
        { type: 'showError', message: 'No task specified.' },
        { type: 'goBack' },
      ]);
    });
  });

  it('reports how many documents are shown once details are loaded', () => {
    const state = loadedState();

    expect(state.connectionName).toBe('Contoso');
    expect(state.siteFilter).toBe('All Sites');
    expect(state.status).toBe('Showing 3 of 3 documents (3.5 KB total)');
  });

  describe('filtering', () => {
    it('narrows to one site, matching the url without regard to case', () => {
      const { state } = reduce(loadedState(), {
        type: 'siteFilterChanged',
        siteFilter: OTHER_SITE_URL.toUpperCase(),
      });

      expect(state.siteFilter).toBe(OTHER_SITE_URL);
      expect(state.status).toBe('Showing 1 of 3 documents (3.5 KB total)');
    });

    it('falls back to all sites for an unknown site', () => {
      const narrowed = reduce(loadedState(), { type: 'siteFilterChanged', siteFilter: SITE_URL });

      const { state } = reduce(narrowed.state, {
        type: 'siteFilterChanged',
        siteFilter: 'https://contoso.sharepoint.com/sites/unknown',
      });

      expect(state.siteFilter).toBe('All Sites');
      expect(state.status).toBe('Showing 3 of 3 documents (3.5 KB total)');
    });

    it('searches file names and extensions after the site filter', () => {
      const bySite = reduce(loadedState(), { type: 'siteFilterChanged', siteFilter: SITE_URL });

      const { state } = reduce(bySite.state, { type: 'searchChanged', searchText: '  XLSX ' });

      expect(state.status).toBe('Showing 1 of 3 documents (3.5 KB total)');
    });

    it.each([
      [SITE_URL, 'x', ['budget.xlsx', 'notes.docx']],
      [SITE_URL, 'pdf', []],
      [OTHER_SITE_URL, 'CON', ['contract.pdf']],
      [ALL_SITES_OPTION, 'o', ['notes.docx', 'contract.pdf']],
      [OTHER_SITE_URL, '', ['contract.pdf']],
    ])(
      'shows the same rows for site %s and search "%s" in either order',
      (site, search, expected) => {
        const siteFirst = reduce(
          reduce(loadedState(), { type: 'siteFilterChanged', siteFilter: site }).state,
          { type: 'searchChanged', searchText: search },
        ).state;
        const searchFirst = reduce(
          reduce(loadedState(), { type: 'searchChanged', searchText: search }).state,
          { type: 'siteFilterChanged', siteFilter: site },
        ).state;

        const rows = visibleItems(documentReportDescriptor, siteFirst);
        expect(rows.map(({ fileName }) => fileName)).toEqual(expected);
        expect(visibleItems(documentReportDescriptor, searchFirst)).toEqual(rows);
        expect(searchFirst.status).toBe(siteFirst.status);
        expect(siteFirst.status).toBe(`Showing ${expected.length} of 3 documents (3.5 KB total)`);
      },
    );

    it('searches guest login names, display names and emails', () => {
      const reduceGuests = createReportDetailReducer(adHocUsersReportDescriptor);
      const result = anAdHocResult([
        anAdHocSite({
          users: [
            aGuest(),
            aGuest({
              id: 13,
              title: 'Sam Lee',
              email: 'sam@northwind.com',
              loginName: 'i:0#.f|membership|urn%3aspo%3aguest#sam@northwind.com',
            }),
          ],
        }),
      ]);
      const loaded = reduceGuests(initialReportDetailState(), {
        type: 'detailsLoaded',
        task: aTask(),
        connectionName: 'Contoso',
        result,
      });

      const { state } = reduceGuests(loaded.state, { type: 'searchChanged', searchText: 'Fabrikam' });

      expect(loaded.state.status).toBe('Showing 2 of 2 guest users across 1 sites');
      expect(state.status).toBe('Showing 1 of 2 guest users across 1 sites');
    });
  });

  describe('running', () => {
    it('starts a run from idle and hides the previous result', () => {
      const narrowed = reduce(loadedState(), { type: 'siteFilterChanged', siteFilter: SITE_URL });

      const { state, effects } = reduce(narrowed.state, { type: 'runToggled' });

      expect(state.runState).toBe(RunState.Running);
      expect(state.result).toBeUndefined();
      expect(state.siteFilter).toBe('All Sites');
      expect(state.runLog).toEqual([]);
      expect(state.status).toBe("Running 'Finance documents'...");
      expect(state.progress).toEqual({
        currentSite: 0,
        totalSites: 1,
        currentSiteUrl: '',
        message: 'Starting...',
      });
      expect(effects).toEqual([{ type: 'startRun', task: aTask() }]);
    });

    it('does nothing without a task', () => {
      const state = initialReportDetailState<DocumentReportResult>();

      expect(reduce(state, { type: 'runToggled' })).toEqual({ state, effects: [] });
    });

    it('cancels a running task once', () => {
      const cancelling = reduce(runningState(), { type: 'runToggled' });
      const again = reduce(cancelling.state, { type: 'runToggled' });

      expect(cancelling.state.cancellationRequested).toBe(true);
      expect(cancelling.state.status).toBe('Cancelling...');
      expect(cancelling.effects).toEqual([{ type: 'abortRun' }]);
      expect(again.effects).toEqual([]);
    });

    it('ignores cancel requests while idle', () => {
      const state = loadedState();

      expect(reduce(state, { type: 'cancelRequested' }).effects).toEqual([]);
    });

    it('takes progress only while running', () => {
      const progress = {
        currentSite: 1,
        totalSites: 1,
        currentSiteUrl: SITE_URL,
        message: 'Processing',
      };

      const { state } = reduce(runningState(), { type: 'progressReported', progress });

      expect(state.progress).toBe(progress);
      expect(state.runLog).toEqual(['Processing']);
      expect(
        reduce(loadedState(), { type: 'progressReported', progress }).state.progress,
      ).toBeUndefined();
    });

    it('summarizes a successful run', () => {
      const result = twoSiteResult({ id: 'result-2' });

      const { state } = reduce(runningState(), {
        type: 'runCompleted',
        result,
        task: aTask({ status: TaskStatus.Completed }),
      });

      expect(state.runState).toBe(RunState.Idle);
      expect(state.progress).toBeUndefined();
      expect(state.result).toBe(result);
      expect(state.task?.status).toBe(TaskStatus.Completed);
      expect(state.status).toBe('Task completed. 3 documents, 3.5 KB, 2 libraries.');
    });

    it('reports a cancelled run', () => {
      const { state } = reduce(runningState(), {
        type: 'runCompleted',
        result: twoSiteResult({ success: false }),
        task: aTask({ status: TaskStatus.Cancelled }),
      });

      expect(state.status).toBe('Task cancelled.');
    });

    it('reports a run that failed as a whole', () => {
      const { state } = reduce(runningState(), {
        type: 'runCompleted',
        result: aDocumentResult([], { success: false, errorMessage: 'Invalid task configuration' }),
        task: aTask({ status: TaskStatus.Failed }),
      });

      expect(state.status).toBe('Task failed: Invalid task configuration');
    });

    it('reports failed sites', () => {
      const result = aDocumentResult([
        aDocumentSite(),
        aDocumentSite({ siteUrl: OTHER_SITE_URL, success: false, errorMessage: 'Forbidden' }),
      ]);

      const { state } = reduce(runningState(), {
        type: 'runCompleted',
        result,
        task: aTask({ status: TaskStatus.Failed }),
      });

      expect(state.status).toBe('Task completed with errors. 1 site(s) failed.');
    });

    it('shows an error when the run could not finish', () => {
      const { state, effects } = reduce(runningState(), {
        type: 'runFailed',
        message: 'disk full',
        task: aTask(),
      });

      expect(state.runState).toBe(RunState.Idle);
      expect(state.status).toBe('Task execution failed');
      expect(effects).toEqual([{ type: 'showError', message: 'Task execution failed: disk full' }]);
    });
  });

  describe('export', () => {
    const now = new Date(2024, 2, 5, 7, 8, 9);

    it('names the items file after the task', () => {
      const state = {
        ...loadedState(),
        task: aTask({ name: 'Q1: report/final' }),
      };

      const { effects } = reduce(state, { type: 'exportRequested', scope: 'items', now });

      expect(effects).toEqual([
        {
          type: 'exportFile',
          scope: 'items',
          defaultFileName: 'Q1_ report_final_Documents_20240305_070809.csv',
        },
      ]);
    });

    it('names the summary file', () => {
      const { effects } = reduce(loadedState(), { type: 'exportRequested', scope: 'summary', now });

      expect(effects).toEqual([
        {
          type: 'exportFile',
          scope: 'summary',
          defaultFileName: 'Finance documents_Summary_20240305_070809.csv',
        },
      ]);
    });

    it('exports nothing without a result or while running', () => {
      const empty = { ...initialReportDetailState<DocumentReportResult>(), task: aTask() };

      expect(reduce(empty, { type: 'exportRequested', scope: 'items', now }).effects).toEqual([]);
      expect(
        reduce(runningState(), { type: 'exportRequested', scope: 'items', now }).effects,
      ).toEqual([]);
    });
  });

  describe('delete', () => {
    it('asks before deleting the task and its results', () => {
      const { effects } = reduce(loadedState(), { type: 'deleteRequested' });

      expect(effects).toEqual([
        {
          type: 'deleteTask',
          task: aTask(),
          confirmation:
            "Are you sure you want to delete the task 'Finance documents'?\n\nThis will also delete all saved results.",
        },
      ]);
    });

    it('refuses while the task runs', () => {
      expect(reduce(runningState(), { type: 'deleteRequested' }).effects).toEqual([]);
    });
  });
});

describe('renderReportDetailView', () => {
  it('shows an empty screen before anything is loaded', () => {
    const view = renderReportDetailView(documentReportDescriptor, initialReportDetailState());

    expect(view.title).toBe('Document Report');
    expect(view.details).toEqual([]);
    expect(view.tables).toEqual([]);
    expect(view.progress).toBeUndefined();
    expect(view.log).toBe(NO_RESULTS_LOG);
  });

  it('lays out the task, its sites and the summary', () => {
    const state = reduce(loadedState(), { type: 'searchChanged', searchText: ' budget ' }).state;

    const view = renderReportDetailView(documentReportDescriptor, state);

    expect(view.title).toBe('Document Report: Finance documents');
    expect(view.details).toEqual([
      'Type: Document Report | Status: Pending | Connection: Contoso | Sites: 1',
      'Site filter: All Sites | Search: budget',
    ]);
    expect(view.tables[0]?.rows).toEqual([
      ['0', 'All Sites'],
      ['1', SITE_URL],
      ['2', OTHER_SITE_URL],
    ]);
    expect(view.tables[1]?.rows.map((row) => row[0])).toEqual(['budget.xlsx']);
    expect(view.tables[2]?.rows[0]).toEqual([
      SITE_URL,
      'Finance',
      '1',
      '2',
      '3 KB',
      'Success',
      '',
    ]);
    expect(view.log).toBe('');
  });

  it('turns the run action into cancel and shows progress while running', () => {
    const state = reduce(runningState(), {
      type: 'progressReported',
      progress: { currentSite: 1, totalSites: 4, currentSiteUrl: SITE_URL, message: 'Processing' },
    }).state;

    const view = renderReportDetailView(documentReportDescriptor, state);

    expect(view.actions.find(({ command }) => command === 'run')).toEqual({
      command: 'run',
      label: 'Cancel',
      enabled: true,
    });
    expect(view.actions.find(({ command }) => command === 'export')?.enabled).toBe(false);
    expect(view.actions.find(({ command }) => command === 'delete')?.enabled).toBe(false);
    expect(view.progress).toEqual({ message: 'Processing', percent: 25 });
    expect(view.tables).toEqual([]);
    expect(view.log).toBe('Processing');
  });

  it('shows the log of the finished run once it completes', () => {
    const running = reduce(runningState(), {
      type: 'progressReported',
      progress: { currentSite: 1, totalSites: 1, currentSiteUrl: SITE_URL, message: 'Processing' },
    }).state;

    const { state } = reduce(running, {
      type: 'runCompleted',
      result: twoSiteResult({ executionLog: ['Started', 'Finished'] }),
      task: aTask({ status: TaskStatus.Completed }),
    });

    expect(state.runLog).toEqual([]);
    expect(renderReportDetailView(documentReportDescriptor, state).log).toBe('Started\nFinished');
  });
});
