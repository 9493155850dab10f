import { Injectable, Logger } from '@nestjs/common';
import type { IScreen, NavigationParameter, ScreenKey } from './screen.interface';
import { ScreenFactory } from './screen.factory';

/**
 * Stack of open screens. Leaving a screen, forwards or back, needs its consent first.
 */
@Injectable()
export class NavigationService {
  private readonly logger = new Logger(this.constructor.name);
  private readonly stack: IScreen[] = [];

  public constructor(private readonly screenFactory: ScreenFactory) {}

  public get current(): IScreen | undefined {
    return this.stack.at(-1);
  }

  public get canGoBack(): boolean {
    return this.stack.length > 1;
  }

  public async navigateTo(key: ScreenKey, parameter?: NavigationParameter): Promise<boolean> {
    const current = this.current;
    if (current && !(await current.onNavigatingFrom())) return false;

    const screen = this.screenFactory.create(key, this);
    this.stack.push(screen);
    this.logger.debug({ msg: 'Navigated', to: key, depth: this.stack.length });
    await screen.onNavigatedTo(parameter);
    return true;
  }

  /** Pops the current screen; the one below is refreshed through `onNavigatedTo(undefined)`. */
  public async goBack(): Promise<boolean> {
    const current = this.current;
    if (!current || !(await current.onNavigatingFrom())) return false;

    this.stack.pop();
    const previous = this.current;
    this.logger.debug({ msg: 'Navigated back', to: previous?.key, depth: this.stack.length });
    if (previous) await previous.onNavigatedTo(undefined);
    return true;
  }
}
