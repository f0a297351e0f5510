import fs from 'fs';
import path from 'path';
import { ZonedClock } from '../types/index';

export function log(level: 'info' | 'warn' | 'error', message: string, meta?: Record<string, unknown>): void {
  const timestamp = new Date().toISOString();
  const metaStr = meta ? ' ' + JSON.stringify(meta) : '';
  const fn = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
  fn(`[${timestamp}] [${level.toUpperCase()}] ${message}${metaStr}`);
}

export function roundPrice(value: number): number {
  return Math.round(value * 100) / 100;
}

export function formatUsd(value: number): string {
  return value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
}

export function getZonedClock(date: Date, timeZone: string): ZonedClock {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date);

  const pick = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find(part => part.type === type)?.value ?? '0';

  return {
    date: `${pick('year')}-${pick('month')}-${pick('day')}`,
    hour: Number(pick('hour')),
    minute: Number(pick('minute')),
    second: Number(pick('second')),
  };
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatClockTime(hour: number, minute: number): string {
  return `${pad2(hour)}:${pad2(minute)}`;
}

// YYYY-MM-DD HH:mm:ss in the given zone
export function formatZonedTimestamp(date: Date, timeZone: string): string {
  const clock = getZonedClock(date, timeZone);
  return `${clock.date} ${formatClockTime(clock.hour, clock.minute)}:${pad2(clock.second)}`;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function ensureJsonFile(filePath: string, defaults: unknown): boolean {
  if (fs.existsSync(filePath)) return false;

  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(filePath, JSON.stringify(defaults, null, 4), 'utf-8');
  log('info', `Created ${path.basename(filePath)} with defaults`);
  return true;
}
