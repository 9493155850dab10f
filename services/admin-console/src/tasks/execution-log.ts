import { formatLogTime } from '../utils/date-format.util';

/**
 * Appends a `[HH:mm:ss] message` line to a result's execution log.
 */
export function appendLog(log: string[], message: string, at: Date = new Date()): void {
  log.push(`[${formatLogTime(at)}] ${message}`);
}
