import { performance } from 'node:perf_hooks';

export function monotonicNow(): number {
  return performance.now();
}

export function isoNow(): string {
  return new Date().toISOString();
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local calendar date, `YYYY-MM-DD`. */
export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

/** Local calendar date, `YYYY年MM月DD日`. */
export function formatDateZh(date: Date): string {
  return `${date.getFullYear()}年${pad2(date.getMonth() + 1)}月${pad2(date.getDate())}日`;
}
