import { Row } from './database';

// pg hands BIGINT back as a string and TIMESTAMPTZ as a Date

export function readNumber(row: Row, column: string): number {
  const value = readOptionalNumber(row, column);
  if (value === null) throw new Error(`Column ${column} is null`);
  return value;
}

export function readOptionalNumber(row: Row, column: string): number | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && /^-?\d+$/.test(value)) return Number(value);
  throw new Error(`Column ${column} is not numeric`);
}

export function readString(row: Row, column: string): string {
  const value = readOptionalString(row, column);
  if (value === null) throw new Error(`Column ${column} is null`);
  return value;
}

export function readOptionalString(row: Row, column: string): string | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  throw new Error(`Column ${column} is not a string`);
}

export function readOptionalDate(row: Row, column: string): Date | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value;
  if (typeof value === 'string') return new Date(value);
  throw new Error(`Column ${column} is not a timestamp`);
}

export function readDate(row: Row, column: string): Date {
  const value = readOptionalDate(row, column);
  if (value === null) throw new Error(`Column ${column} is null`);
  return value;
}

export function readBoolean(row: Row, column: string): boolean {
  return row[column] === true;
}
