import dayjs from 'dayjs';

export type DateInput = Date | string | number;

// All of these render in local time, as the operator reads them.

export function formatLogTime(date: DateInput = new Date()): string {
  return dayjs(date).format('HH:mm:ss');
}

export function formatFileTimestamp(date: DateInput = new Date()): string {
  return dayjs(date).format('YYYYMMDD_HHmmss');
}

export function formatResultFileTimestamp(date: DateInput): string {
  return dayjs(date).format('YYYYMMDD_HHmmss_SSS');
}

export function formatMinuteStamp(date: DateInput = new Date()): string {
  return dayjs(date).format('YYYY-MM-DD HH:mm');
}

export function formatDisplayDate(date: DateInput | undefined): string {
  return date === undefined ? '' : dayjs(date).format('YYYY-MM-DD HH:mm');
}
