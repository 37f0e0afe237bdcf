import type { EditableField, FieldBounds, FieldLimits } from '../config/env.js';
import { ValidationError } from './errors.js';

const INVISIBLE_CHARS = /[\u200B-\u200F\u202A-\u202E\u2066-\u2069\uFEFF]/g;

const PHONE_PATTERNS = [
  /^\+998\d{9}$/,
  /^998\d{9}$/,
  /^\d{9}$/,
  /^\+\d{10,15}$/,
];

const USERNAME_PATTERN = /^@[a-zA-Z0-9_]{5,32}$/;

/**
 * Strip bidi overrides and zero-width characters, then trim.
 * Inner whitespace and line breaks are kept: descriptions are multi-line.
 */
export function sanitizeInput(text: string): string {
  return text.replace(INVISIBLE_CHARS, '').trim();
}

/** Length in code points, so an emoji counts as one character. */
export function charLength(value: string): number {
  return [...value].length;
}

export function isWithinBounds(value: string, bounds: FieldBounds): boolean {
  const length = charLength(value);
  return length >= bounds.min && length <= bounds.max;
}

/**
 * Sanitize and length-check a listing field. Throws ValidationError on violation.
 */
export function validateField(field: EditableField, raw: string, limits: FieldLimits): string {
  const value = sanitizeInput(raw);
  const bounds = limits[field];
  if (!isWithinBounds(value, bounds)) {
    throw new ValidationError(field, `length must be between ${bounds.min} and ${bounds.max}, got ${charLength(value)}`);
  }
  return value;
}

export function isValidPhoneNumber(phone: string): boolean {
  const cleaned = phone.replace(/[^\d+]/g, '');
  return PHONE_PATTERNS.some((p) => p.test(cleaned));
}

export function isValidUsername(username: string): boolean {
  return USERNAME_PATTERN.test(username);
}

export function isValidContact(contact: string): boolean {
  return isValidPhoneNumber(contact) || isValidUsername(contact);
}

export function parseTelegramId(text: string): number | null {
  const trimmed = text.trim();
  if (!/^\d{5,15}$/.test(trimmed)) return null;
  const id = Number(trimmed);
  return Number.isSafeInteger(id) ? id : null;
}
