import { Timestamp } from 'firebase-admin/firestore';
import { isRecord } from '../utils/json';

export type StoredDocument = Record<string, unknown>;

export function readString(data: StoredDocument, ...keys: string[]): string | null {
  for (const key of keys) {
    const value = data[key];
    if (typeof value === 'string' && value.trim().length > 0) {
      return value.trim();
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
  }
  return null;
}

export function readTimestamp(data: StoredDocument, ...keys: string[]): string | null {
  for (const key of keys) {
    const iso = toIsoString(data[key]);
    if (iso) {
      return iso;
    }
  }
  return null;
}

export function readStringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const items: string[] = [];
  for (const entry of value) {
    if (typeof entry === 'string' && entry.trim()) {
      items.push(entry.trim());
    } else if (isRecord(entry)) {
      const id = readString(entry, 'entityValue', 'entityArn', 'id');
      if (id) {
        items.push(id);
      }
    }
  }
  return items;
}

function toIsoString(value: unknown): string | null {
  if (value instanceof Timestamp) {
    return value.toDate().toISOString();
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (typeof value === 'string' && value.trim()) {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString();
  }
  return null;
}
