export interface TaskProgress {
  currentSite: number;
  totalSites: number;
  currentSiteUrl: string;
  message: string;
}

export type ProgressSink = (progress: TaskProgress) => void;

export function percentComplete({ currentSite, totalSites }: TaskProgress): number {
  return totalSites > 0 ? Math.floor((currentSite * 100) / totalSites) : 0;
}
