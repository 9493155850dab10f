import type { ScreenView } from './screen-view';

export const SCREEN_HOST = Symbol('SCREEN_HOST');

/**
 * Everything a screen needs from the surface it runs on: rendering, modal dialogs and the file
 * pickers.
 */
export interface ScreenHost {
  render(view: ScreenView): void;
  setStatus(text: string): void;
  showInfo(message: string, title?: string): Promise<void>;
  showWarning(message: string, title?: string): Promise<void>;
  showError(message: string, title?: string): Promise<void>;
  confirm(message: string, title?: string): Promise<boolean>;
  /** Resolves undefined when the operator cancels. */
  chooseSavePath(defaultFileName: string): Promise<string | undefined>;
  chooseOpenPath(): Promise<string | undefined>;
  openPath(path: string): Promise<void>;
}
