import { OUTCOME_STATUSES, OutcomeStatus } from '../types/Delivery';

export function isValidTestId(id: string): boolean {
  if (!id || id.length === 0 || id.length > 128) return false;
  // Allow alphanumeric, hyphens, underscores, dots
  return /^[a-zA-Z0-9_.-]+$/.test(id);
}

export function isValidFilename(filename: string): boolean {
  if (!filename || filename.length === 0 || filename.length > 255) return false;
  // Reject path traversal, directory separators, null bytes
  if (filename.includes('..') || filename.includes('/') || filename.includes('\\')) return false;
  if (filename.includes('\0')) return false;
  // Reject drive letters
  if (filename.length >= 2 && filename[1] === ':') return false;
  return true;
}

export function isJsonFilename(filename: string): boolean {
  return isValidFilename(filename) && filename.toLowerCase().endsWith('.json') && filename.length > 5;
}

export function isOutcomeStatus(value: string): value is OutcomeStatus {
  return OUTCOME_STATUSES.some((s) => s === value);
}

export function parseLimit(raw: unknown, fallback: number, max: number): number | null {
  if (raw === undefined) return fallback;
  if (typeof raw !== 'string' || !/^\d+$/.test(raw)) return null;
  const value = parseInt(raw, 10);
  if (value < 1 || value > max) return null;
  return value;
}
