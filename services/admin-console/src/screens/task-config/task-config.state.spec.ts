import { describe, expect, it } from 'vitest';
import { aConnection, OTHER_SITE_URL, SITE_URL } from '../../../test/fixtures';
import { adHocUsersConfigDescriptor } from './ad-hoc-users-config.screen';
import {
  type DocumentReportOptions,
  documentReportConfigDescriptor,
} from './document-report-config.screen';
import {
  CLEAR_SITES_CONFIRMATION,
  canCreate,
  createTaskConfigReducer,
  initialTaskConfigState,
  NO_CONNECTIONS_STATUS,
  renderTaskConfigView,
  type TaskConfigState,
} from './task-config.state';

const reduce = createTaskConfigReducer(documentReportConfigDescriptor);
const now = new Date(2024, 2, 5, 7, 8, 9);

function initial(): TaskConfigState<DocumentReportOptions> {
  return initialTaskConfigState(documentReportConfigDescriptor.defaultOptions);
}

function readyState(): TaskConfigState<DocumentReportOptions> {
  const loaded = reduce(initial(), { type: 'connectionsLoaded', connections: [aConnection()], now });
  return reduce(loaded.state, { type: 'siteAdded', url: SITE_URL }).state;
}

describe('task config reducer', () => {
  it('loads connections when shown', () => {
    expect(reduce(initial(), { type: 'navigatedTo' }).effects).toEqual([
      { type: 'loadConnections' },
    ]);
  });

  describe('connections', () => {
    it('selects the first connection and proposes a task name', () => {
      const connections = [aConnection(), aConnection({ id: 'connection-2', name: 'Fabrikam' })];

      const { state } = reduce(initial(), { type: 'connectionsLoaded', connections, now });

      expect(state.selectedConnectionId).toBe('connection-1');
      expect(state.taskName).toBe('Document Report - 2024-03-05 07:08');
      expect(state.status).toBe('Loaded 2 connections');
    });

    it('keeps a selection and a name the operator already made', () => {
      const connections = [aConnection(), aConnection({ id: 'connection-2', name: 'Fabrikam' })];
      const state = { ...initial(), selectedConnectionId: 'connection-2', taskName: 'Mine' };

      const next = reduce(state, { type: 'connectionsLoaded', connections, now }).state;

      expect(next.selectedConnectionId).toBe('connection-2');
      expect(next.taskName).toBe('Mine');
    });

    it('asks for a connection when there is none', () => {
      const { state } = reduce(initial(), { type: 'connectionsLoaded', connections: [], now });

      expect(state.selectedConnectionId).toBeUndefined();
      expect(state.status).toBe(NO_CONNECTIONS_STATUS);
    });

    it('selects by table index', () => {
      const connections = [aConnection(), aConnection({ id: 'connection-2', name: 'Fabrikam' })];
      const loaded = reduce(initial(), { type: 'connectionsLoaded', connections, now }).state;

      expect(reduce(loaded, { type: 'connectionSelected', index: 1 }).state.selectedConnectionId).toBe(
        'connection-2',
      );
      expect(reduce(loaded, { type: 'connectionSelected', index: 5 }).effects).toEqual([
        { type: 'showWarning', message: 'No such connection.' },
      ]);
    });
  });

  describe('sites', () => {
    it('adds a valid url once', () => {
      const added = reduce(initial(), { type: 'siteAdded', url: ` ${SITE_URL} ` });
      const again = reduce(added.state, { type: 'siteAdded', url: SITE_URL.toUpperCase() });

      expect(added.state.siteUrls).toEqual([SITE_URL]);
      expect(added.state.status).toBe(`Added ${SITE_URL}`);
      expect(again.state.siteUrls).toEqual([SITE_URL]);
      expect(again.state.status).toBe('Site already added.');
    });

    it('warns about an invalid url', () => {
      expect(reduce(initial(), { type: 'siteAdded', url: 'finance' }).effects).toEqual([
        { type: 'showWarning', message: "'finance' is not a valid http or https URL." },
      ]);
    });

    it('removes by index and ignores an index out of range', () => {
      const state = { ...initial(), siteUrls: [SITE_URL, OTHER_SITE_URL] };

      expect(reduce(state, { type: 'siteRemoved', index: 0 }).state.siteUrls).toEqual([
        OTHER_SITE_URL,
      ]);
      expect(reduce(state, { type: 'siteRemoved', index: 2 }).state).toBe(state);
    });

    it('confirms before clearing a non empty list', () => {
      const state = { ...initial(), siteUrls: [SITE_URL] };

      expect(reduce(initial(), { type: 'clearRequested' }).effects).toEqual([]);
      expect(reduce(state, { type: 'clearRequested' }).effects).toEqual([
        { type: 'confirmClear', message: CLEAR_SITES_CONFIRMATION },
      ]);
      expect(reduce(state, { type: 'sitesCleared' }).state).toMatchObject({
        siteUrls: [],
        status: 'Sites cleared',
      });
    });

    it('appends imported sites and warns about skipped lines', () => {
      const state = { ...initial(), siteUrls: [SITE_URL] };

      const { state: next, effects } = reduce(state, {
        type: 'importFileRead',
        content: `${SITE_URL}\n${OTHER_SITE_URL}\nlegal`,
      });

      const status = 'Imported 1 site(s).\n\n1 line(s) had errors and were skipped.';
      expect(next.siteUrls).toEqual([SITE_URL, OTHER_SITE_URL]);
      expect(next.status).toBe(status);
      expect(effects).toEqual([
        { type: 'showWarning', message: `${status}\n\nErrors:\nLine 3: Invalid URL 'legal'` },
      ]);
    });

    it('shows an error when a file holds no valid url', () => {
      const state = initial();

      const { state: next, effects } = reduce(state, { type: 'importFileRead', content: 'legal' });

      expect(next).toBe(state);
      expect(effects).toEqual([
        { type: 'showError', message: "No valid URLs found in file.\n\nLine 1: Invalid URL 'legal'" },
      ]);
    });
  });

  describe('options', () => {
    it('reads yes/no words for flags', () => {
      const { state } = reduce(initial(), {
        type: 'optionChanged',
        key: 'includeSubfolders',
        value: 'Off',
      });

      expect(state.options.includeSubfolders).toBe(false);
    });

    it('rejects a flag value it cannot read', () => {
      expect(
        reduce(initial(), { type: 'optionChanged', key: 'includeSubfolders', value: 'maybe' })
          .effects,
      ).toEqual([{ type: 'showWarning', message: "'maybe' is not a yes/no value." }]);
    });

    it('trims text options', () => {
      const { state } = reduce(initial(), {
        type: 'optionChanged',
        key: 'extensionFilter',
        value: ' pdf, docx ',
      });

      expect(state.options.extensionFilter).toBe('pdf, docx');
    });

    it('warns about an unknown option', () => {
      expect(
        reduce(initial(), { type: 'optionChanged', key: 'colour', value: 'red' }).effects,
      ).toEqual([{ type: 'showWarning', message: "Unknown option 'colour'." }]);
    });
  });

  describe('create', () => {
    it('needs a connection and a site', () => {
      const state = reduce(initial(), { type: 'siteAdded', url: SITE_URL }).state;

      expect(reduce(state, { type: 'createRequested' }).effects).toEqual([
        { type: 'showWarning', message: 'Please select a connection and add at least one site.' },
      ]);
    });

    it('needs a task name', () => {
      const state = { ...readyState(), taskName: '   ' };

      expect(canCreate(state)).toBe(false);
      expect(reduce(state, { type: 'createRequested' }).effects).toEqual([
        { type: 'showWarning', message: 'Please enter a task name.' },
      ]);
    });

    it('builds the task request with the report configuration', () => {
      const state = { ...readyState(), taskName: ' Finance documents ' };

      const { state: next, effects } = reduce(state, { type: 'createRequested' });

      expect(next.creating).toBe(true);
      expect(effects).toHaveLength(1);
      const [effect] = effects;
      if (effect?.type !== 'createTask') throw new Error('expected a createTask effect');
      expect(effect.request).toMatchObject({
        connection: aConnection(),
        name: 'Finance documents',
        siteUrls: [SITE_URL],
      });
      expect(JSON.parse(effect.request.configurationJson)).toEqual({
        connectionId: 'connection-1',
        targetSiteUrls: [SITE_URL],
        includeHiddenLibraries: false,
        includeSubfolders: true,
        includeVersionCount: true,
        extensionFilter: '',
      });
    });

    it('ignores a second create while the first is in progress', () => {
      const creating = reduce(readyState(), { type: 'createRequested' }).state;

      expect(reduce(creating, { type: 'createRequested' }).effects).toEqual([]);
      expect(reduce(creating, { type: 'createFinished' }).state.creating).toBe(false);
    });
  });
});

describe('renderTaskConfigView', () => {
  it('lists connections, sites and options', () => {
    const view = renderTaskConfigView(documentReportConfigDescriptor, readyState());

    expect(view.title).toBe('New Document Report');
    expect(view.details).toEqual([
      'Task name: Document Report - 2024-03-05 07:08',
      'Sites: 1',
    ]);
    expect(view.tables).toEqual([
      {
        title: 'Connections',
        columns: ['#', 'Connection', 'Selected'],
        rows: [['0', 'Contoso (contoso)', '*']],
      },
      { title: 'Sites', columns: ['#', 'Site URL'], rows: [['0', SITE_URL]] },
      {
        title: 'Options',
        columns: ['Key', 'Option', 'Value'],
        rows: [
          ['includeHiddenLibraries', 'Include hidden libraries', 'No'],
          ['includeSubfolders', 'Include subfolders', 'Yes'],
          ['includeVersionCount', 'Include version count', 'Yes'],
          ['extensionFilter', 'Extension filter', ''],
        ],
      },
    ]);
    expect(view.actions.find(({ command }) => command === 'create')?.enabled).toBe(true);
  });

  it('has no options for the ad hoc users report', () => {
    const state = initialTaskConfigState(adHocUsersConfigDescriptor.defaultOptions);

    const view = renderTaskConfigView(adHocUsersConfigDescriptor, state);

    expect(view.tables.map(({ title }) => title)).toEqual(['Connections', 'Sites']);
    expect(view.actions.map(({ command }) => command)).not.toContain('option');
    expect(view.actions.find(({ command }) => command === 'create')?.enabled).toBe(false);
  });
});
