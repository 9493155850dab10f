export function elapsedMilliseconds(startTime: Date | number | string): number {
  return Date.now() - new Date(startTime).getTime();
}

export function elapsedSeconds(startTime: Date | number | string): number {
  return elapsedMilliseconds(startTime) / 1000;
}

export function elapsedSecondsLog(startTime: Date | number | string): string {
  return `${elapsedSeconds(startTime).toFixed(2)}s`;
}

