export interface ScreenAction {
  command: string;
  label: string;
  enabled: boolean;
}

export interface ViewTable {
  title: string;
  columns: string[];
  rows: string[][];
}

/**
 * Toolkit independent snapshot of what a screen shows. Hosts decide how to lay it out.
 */
export interface ScreenView {
  title: string;
  details: string[];
  actions: ScreenAction[];
  tables: ViewTable[];
  progress?: { message: string; percent: number };
  log?: string;
}

export const yesNo = (value: boolean): string => (value ? 'Yes' : 'No');
