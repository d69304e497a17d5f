import { ValidationError } from '../domain/errors.js';

/**
 * First string value of a query parameter; repeated parameters keep the first
 */
export function queryString(value: unknown): string | undefined {
  if (Array.isArray(value)) return queryString(value[0]);
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function queryPositiveInt(value: unknown, name: string, fallback: number): number {
  const raw = queryString(value);
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw) || Number(raw) < 1) {
    throw new ValidationError(`${name} must be a positive whole number`, { fields: [name] });
  }
  return Number(raw);
}

export function bodyBoolean(value: unknown): boolean {
  return value === true || value === 'true';
}
