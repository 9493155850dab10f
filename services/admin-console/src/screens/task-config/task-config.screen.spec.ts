import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';
import {
  aConnection,
  aDocumentResult,
  OTHER_SITE_URL,
  SITE_URL,
  someCookies,
} from '../../../test/fixtures';
import { command, createScreenCollaborators, type ScreenCollaborators } from '../../../test/screen-fakes';
import { TaskType } from '../../tasks/task-definition';
import type { NavigationService } from '../navigation.service';
import { DocumentReportDetailScreen } from '../report-detail/document-report-detail.screen';
import { ScreenKey } from '../screen.interface';
import { AdHocUsersConfigScreen } from './ad-hoc-users-config.screen';
import { DocumentReportConfigScreen } from './document-report-config.screen';

describe('DocumentReportConfigScreen', () => {
  let collaborators: ScreenCollaborators;
  let screen: DocumentReportConfigScreen;
  let navigateTo: MockInstance<NavigationService['navigateTo']>;

  beforeEach(async () => {
    collaborators = createScreenCollaborators();
    collaborators.connectionManager.getAllConnections.mockResolvedValue([aConnection()]);
    navigateTo = vi.spyOn(collaborators.navigation, 'navigateTo').mockResolvedValue(true);
    screen = new DocumentReportConfigScreen(collaborators);
    await screen.onNavigatedTo();
  });

  it('loads the connections when shown', () => {
    expect(screen.currentState.connections).toEqual([aConnection()]);
    expect(collaborators.host.setStatus).toHaveBeenCalledWith('Loaded 1 connections');
  });

  it('shows an error when connections cannot be read', async () => {
    collaborators.connectionManager.getAllConnections.mockRejectedValue(new Error('bad key'));

    await screen.onNavigatedTo();

    expect(collaborators.host.showError).toHaveBeenCalledWith(
      'Failed to load connections: bad key',
    );
  });

  describe('create', () => {
    beforeEach(async () => {
      await command(screen, 'name').run('Finance documents');
      await command(screen, 'add').run(SITE_URL);
    });

    it('saves the task and opens it with an immediate run', async () => {
      await command(screen, 'create').run('');

      expect(collaborators.authService.hasStoredCredentials).toHaveBeenCalledWith(
        'contoso-admin.sharepoint.com',
      );
      expect(collaborators.taskService.saveTask).toHaveBeenCalledOnce();
      const [task] = collaborators.taskService.saveTask.mock.calls[0] ?? [];
      expect(task).toMatchObject({
        name: 'Finance documents',
        type: TaskType.DocumentReport,
        connectionId: 'connection-1',
        targetSiteUrls: [SITE_URL],
      });
      expect(navigateTo).toHaveBeenCalledWith(ScreenKey.DocumentReportDetail, {
        task,
        executeImmediately: true,
      });
      expect(collaborators.host.setStatus).toHaveBeenCalledWith(
        "Task 'Finance documents' created with 1 sites",
      );
      expect(screen.currentState.creating).toBe(false);
    });

    it('signs in first when the connection has no credentials', async () => {
      collaborators.authService.hasStoredCredentials.mockResolvedValue(false);
      const cookies = someCookies();
      collaborators.signInProvider.signIn.mockResolvedValue(cookies);

      await command(screen, 'create').run('');

      expect(collaborators.host.confirm).toHaveBeenCalledWith(
        "Authentication required for connection 'Contoso'. Sign in now?",
        'Authentication Required',
      );
      expect(collaborators.signInProvider.signIn).toHaveBeenCalledWith(
        'https://contoso-admin.sharepoint.com',
      );
      expect(collaborators.authService.storeCookies).toHaveBeenCalledWith(cookies);
      expect(collaborators.connectionManager.updateLastConnected).toHaveBeenCalledWith(
        'connection-1',
      );
      expect(collaborators.host.setStatus).toHaveBeenCalledWith(
        'Authenticated to contoso-admin.sharepoint.com',
      );
      expect(collaborators.taskService.saveTask).toHaveBeenCalledOnce();
    });

    it('creates nothing when the sign-in is cancelled', async () => {
      collaborators.authService.hasStoredCredentials.mockResolvedValue(false);

      await command(screen, 'create').run('');

      expect(collaborators.host.setStatus).toHaveBeenLastCalledWith('Authentication cancelled');
      expect(collaborators.taskService.saveTask).not.toHaveBeenCalled();
      expect(screen.currentState.creating).toBe(false);
    });

    it('creates nothing when the operator declines to sign in', async () => {
      collaborators.authService.hasStoredCredentials.mockResolvedValue(false);
      collaborators.host.confirm.mockResolvedValue(false);

      await command(screen, 'create').run('');

      expect(collaborators.signInProvider.signIn).not.toHaveBeenCalled();
      expect(collaborators.taskService.saveTask).not.toHaveBeenCalled();
    });

    it('shows an error when the task cannot be saved', async () => {
      collaborators.taskService.saveTask.mockRejectedValue(new Error('disk full'));

      await command(screen, 'create').run('');

      expect(collaborators.host.showError).toHaveBeenCalledWith(
        'Failed to create task: disk full',
      );
      expect(navigateTo).not.toHaveBeenCalled();
      expect(screen.currentState.creating).toBe(false);
    });
  });

  it('sets options from the command argument', async () => {
    await command(screen, 'option').run('extensionFilter pdf docx');
    await command(screen, 'option').run('includeVersionCount no');

    expect(screen.currentState.options).toEqual({
      includeHiddenLibraries: false,
      includeSubfolders: true,
      includeVersionCount: false,
      extensionFilter: 'pdf docx',
    });
  });

  it('clears the sites after confirmation', async () => {
    await command(screen, 'add').run(SITE_URL);

    await command(screen, 'clear').run('');

    expect(collaborators.host.confirm).toHaveBeenCalledWith(
      'Are you sure you want to clear all sites?',
      'Clear Sites',
    );
    expect(screen.currentState.siteUrls).toEqual([]);
  });

  describe('import', () => {
    let directory: string;

    beforeEach(async () => {
      directory = await mkdtemp(join(tmpdir(), 'site-import-'));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it('adds the sites listed in the chosen file', async () => {
      const filePath = join(directory, 'sites.csv');
      await writeFile(filePath, `Site URL\n${SITE_URL}\n${OTHER_SITE_URL}\n`, 'utf-8');
      collaborators.host.chooseOpenPath.mockResolvedValue(filePath);

      await command(screen, 'import').run('');

      expect(screen.currentState.siteUrls).toEqual([SITE_URL, OTHER_SITE_URL]);
      expect(collaborators.host.setStatus).toHaveBeenLastCalledWith('Imported 2 site(s).');
      expect(collaborators.host.showWarning).not.toHaveBeenCalled();
    });

    it('shows an error for a file it cannot read', async () => {
      collaborators.host.chooseOpenPath.mockResolvedValue(join(directory, 'missing.csv'));

      await command(screen, 'import').run('');

      expect(collaborators.host.showError).toHaveBeenCalledWith(
        expect.stringMatching(/^Failed to import file: ENOENT/),
      );
    });
  });
});

describe('AdHocUsersConfigScreen', () => {
  it('creates an ad hoc users task and opens its detail screen', async () => {
    const collaborators = createScreenCollaborators();
    collaborators.connectionManager.getAllConnections.mockResolvedValue([aConnection()]);
    const navigateTo = vi.spyOn(collaborators.navigation, 'navigateTo').mockResolvedValue(true);
    const screen = new AdHocUsersConfigScreen(collaborators);
    await screen.onNavigatedTo();

    await command(screen, 'add').run(SITE_URL);
    await command(screen, 'create').run('');

    const [task] = collaborators.taskService.saveTask.mock.calls[0] ?? [];
    expect(task?.type).toBe(TaskType.AdHocUsersReport);
    expect(task?.name).toMatch(/^Ad Hoc Users Report - \d{4}-\d{2}-\d{2} \d{2}:\d{2}$/);
    expect(JSON.parse(task?.configurationJson ?? '{}')).toEqual({
      connectionId: 'connection-1',
      targetSiteUrls: [SITE_URL],
    });
    expect(navigateTo).toHaveBeenCalledWith(ScreenKey.AdHocUsersDetail, {
      task,
      executeImmediately: true,
    });
  });
});

describe('creating a task through navigation', () => {
  it('leaves the detail screen as the last view drawn', async () => {
    const collaborators = createScreenCollaborators();
    const { navigation, host, connectionManager, taskService } = collaborators;
    connectionManager.getAllConnections.mockResolvedValue([aConnection()]);
    taskService.executeDocumentReport.mockResolvedValue(aDocumentResult([]));
    await navigation.navigateTo(ScreenKey.DocumentReportConfig);
    const config = navigation.current;
    if (!config) throw new Error('expected the config screen');

    await command(config, 'name').run('Finance documents');
    await command(config, 'add').run(SITE_URL);
    await command(config, 'create').run('');

    const detail = navigation.current;
    if (!(detail instanceof DocumentReportDetailScreen)) {
      throw new Error('expected the document report detail screen');
    }
    await detail.whenIdle();
    const titles = host.render.mock.calls.map(([view]) => view.title);
    const firstDetail = titles.indexOf('Document Report: Finance documents');

    expect(firstDetail).toBeGreaterThan(0);
    expect(titles.slice(firstDetail)).not.toContain('New Document Report');
    expect(titles.at(-1)).toBe('Document Report: Finance documents');
  });
});
