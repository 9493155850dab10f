import { spawn } from 'node:child_process';
import { Injectable, Logger } from '@nestjs/common';
import { sanitizeError } from '@spo-admin/utils';
import type { ScreenHost } from '../screens/screen-host.interface';
import type { ScreenView } from '../screens/screen-view';
import { formatProgress, formatScreenView } from './screen-view.formatter';
import { TerminalIo } from './terminal-io';

function layoutOf({ progress: _progress, log: _log, ...layout }: ScreenView): string {
  return JSON.stringify(layout);
}

function openCommand(path: string): { command: string; args: string[] } {
  switch (process.platform) {
    case 'darwin':
      return { command: 'open', args: [path] };
    case 'win32':
      return { command: 'cmd', args: ['/c', 'start', '""', path] };
    default:
      return { command: 'xdg-open', args: [path] };
  }
}

/**
 * Renders screens as plain text. While a task runs only the progress line is printed, the full
 * view is drawn again once anything besides progress and log changes.
 */
@Injectable()
export class TerminalScreenHost implements ScreenHost {
  private readonly logger = new Logger(this.constructor.name);
  private lastLayout?: string;
  private lastProgress?: string;

  public constructor(private readonly io: TerminalIo) {}

  public render(view: ScreenView): void {
    const layout = layoutOf(view);
    const progress = view.progress ? formatProgress(view.progress) : undefined;

    if (layout === this.lastLayout) {
      if (progress && progress !== this.lastProgress) this.io.write(progress);
    } else {
      this.io.write(`\n${formatScreenView(view)}`);
    }
    this.lastLayout = layout;
    this.lastProgress = progress;
  }

  /** Forces the next `render` to draw the whole view. */
  public invalidate(): void {
    this.lastLayout = undefined;
  }

  public setStatus(text: string): void {
    this.io.write(`> ${text}`);
  }

  public async showInfo(message: string, title = 'Information'): Promise<void> {
    this.io.write(`[${title}] ${message}`);
  }

  public async showWarning(message: string, title = 'Warning'): Promise<void> {
    this.io.write(`[${title}] ${message}`);
  }

  public async showError(message: string, title = 'Error'): Promise<void> {
    this.io.write(`[${title}] ${message}`);
  }

  public async confirm(message: string, title?: string): Promise<boolean> {
    const prefix = title ? `[${title}] ` : '';
    const answer = await this.io.ask(`${prefix}${message} [y/N] `);
    return /^y(es)?$/i.test(answer.trim());
  }

  public async chooseSavePath(defaultFileName: string): Promise<string | undefined> {
    const answer = (await this.io.ask(`Save as [${defaultFileName}] ('-' to cancel): `)).trim();
    if (answer === '-') return undefined;
    return answer || defaultFileName;
  }

  public async chooseOpenPath(): Promise<string | undefined> {
    const answer = (await this.io.ask('File to open (empty to cancel): ')).trim();
    return answer || undefined;
  }

  public async openPath(path: string): Promise<void> {
    const { command, args } = openCommand(path);
    await new Promise<void>((resolve, reject) => {
      const child = spawn(command, args, { detached: true, stdio: 'ignore' });
      child.once('error', reject);
      child.once('spawn', () => {
        child.unref();
        resolve();
      });
    }).catch((error: unknown) => {
      this.logger.warn({ msg: 'Could not open file', path, error: sanitizeError(error) });
      this.io.write(`[Warning] Could not open ${path}. Open it manually.`);
    });
  }
}
