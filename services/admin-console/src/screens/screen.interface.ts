import type { TaskDefinition } from '../tasks/task-definition';

export const ScreenKey = {
  AdHocUsersConfig: 'AdHocUsersConfig',
  AdHocUsersDetail: 'AdHocUsersDetail',
  DocumentReportConfig: 'DocumentReportConfig',
  DocumentReportDetail: 'DocumentReportDetail',
} as const;

export type ScreenKey = (typeof ScreenKey)[keyof typeof ScreenKey];

export interface TaskExecutionParameter {
  task: TaskDefinition;
  executeImmediately: boolean;
}

export type NavigationParameter = TaskExecutionParameter | TaskDefinition | undefined;

export function isTaskExecutionParameter(
  parameter: NavigationParameter,
): parameter is TaskExecutionParameter {
  return parameter !== undefined && 'executeImmediately' in parameter;
}

export interface ScreenCommand {
  description: string;
  /** Text after the command word, trimmed. */
  run: (argument: string) => Promise<void>;
}

export interface IScreen {
  readonly key: ScreenKey;
  readonly commands: Readonly<Record<string, ScreenCommand>>;
  /** Called with `undefined` when the screen becomes current again after a back navigation. */
  onNavigatedTo(parameter?: NavigationParameter): Promise<void>;
  /** Resolves false to keep the screen. */
  onNavigatingFrom(): Promise<boolean>;
}
