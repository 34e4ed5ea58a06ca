import { isEmail } from 'class-validator';
import { PatchValidationError } from './intake.errors';
import {
  FieldSpecification,
  FieldType,
  FormConfiguration,
  PartialRecord,
  RecordValue,
  ValidatedPatch,
} from './intake.types';

export type CoercionResult = { ok: true; value: RecordValue } | { ok: false; reason: string };

export interface PatchBatch {
  valid: ValidatedPatch[];
  rejected: PatchValidationError[];
}

const PATCH_OPS = new Set<string>(['add', 'replace', 'remove']);
const TRUE_WORDS = new Set(['true', 'yes', 'y', 'yeah', 'yep', '1']);
const FALSE_WORDS = new Set(['false', 'no', 'n', 'nope', '0']);
const NUMERIC = /^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i;
const CURRENCY_MARKS = /[$€£¥]|\b(usd|eur|gbp|cad|aud)\b/gi;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;
const CLOCK_TIME = /^(\d{1,2}):(\d{2})(?::(\d{2}))?\s*(am|pm)?$/i;
const PHONE_CHARS = /^[+()\d\s.\-x]+$/i;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Resolve a JSON pointer (`/email`) or bare key (`email`) to a field key.
 * Only top-level keys are addressable.
 */
export function parsePatchPath(path: string): string | null {
  const pointer = path.startsWith('/') ? path.slice(1) : path;
  if (pointer.length === 0 || pointer.includes('/')) {
    return null;
  }
  return pointer.replace(/~1/g, '/').replace(/~0/g, '~');
}

/**
 * Coerce a raw extracted value into the field's declared type
 */
export function coerceValue(field: FieldSpecification, raw: unknown): CoercionResult {
  if (raw === null || raw === undefined) {
    return { ok: false, reason: 'value is required for add/replace' };
  }

  switch (field.type) {
    case FieldType.NUMBER:
      return coerceNumber(raw, false);
    case FieldType.CURRENCY:
      return coerceNumber(raw, true);
    case FieldType.BOOLEAN:
      return coerceBoolean(raw);
    case FieldType.DATE:
      return coerceDate(raw);
    case FieldType.TIME:
      return coerceTime(raw);
    case FieldType.DATETIME:
      return coerceDateTime(raw);
    case FieldType.EMAIL:
      return coerceEmail(raw);
    case FieldType.PHONE:
      return coercePhone(raw);
    case FieldType.CHOICE:
      return coerceChoice(field, raw);
    case FieldType.MULTICHOICE:
      return coerceMultiChoice(field, raw);
    default:
      return coerceText(raw);
  }
}

/**
 * Check one raw operation against the configuration.
 * @throws PatchValidationError
 */
export function validatePatch(
  operation: unknown,
  fieldsByKey: ReadonlyMap<string, FieldSpecification>,
): ValidatedPatch {
  if (!isPlainObject(operation)) {
    throw new PatchValidationError(operation, 'operation must be an object');
  }

  const { op, path, value } = operation;
  if (typeof op !== 'string' || !PATCH_OPS.has(op)) {
    throw new PatchValidationError(operation, `unsupported op "${String(op)}"`);
  }
  if (typeof path !== 'string') {
    throw new PatchValidationError(operation, 'path must be a string');
  }

  const key = parsePatchPath(path);
  const field = key === null ? undefined : fieldsByKey.get(key);
  if (key === null || !field) {
    throw new PatchValidationError(operation, `unknown path "${path}"`);
  }

  if (op === 'remove') {
    return { op: 'remove', key };
  }

  const coerced = coerceValue(field, value);
  if (!coerced.ok) {
    throw new PatchValidationError(operation, `${key}: ${coerced.reason}`);
  }
  return { op: op === 'add' ? 'add' : 'replace', key, value: coerced.value };
}

/**
 * Validate a batch. Invalid operations are collected, not thrown, so the
 * rest of the batch can still apply.
 */
export function validatePatchBatch(operations: unknown[], config: FormConfiguration): PatchBatch {
  const fieldsByKey = new Map(config.fields.map((field) => [field.key, field] as const));
  const batch: PatchBatch = { valid: [], rejected: [] };

  for (const operation of operations) {
    try {
      batch.valid.push(validatePatch(operation, fieldsByKey));
    } catch (error) {
      if (!(error instanceof PatchValidationError)) {
        throw error;
      }
      batch.rejected.push(error);
    }
  }

  return batch;
}

/**
 * Apply validated operations in order and return a new record.
 * add and replace both set the key; remove clears it; last write wins.
 */
export function applyPatches(record: PartialRecord, patches: ValidatedPatch[]): PartialRecord {
  const next: PartialRecord = { ...record };
  for (const patch of patches) {
    if (patch.op === 'remove') {
      delete next[patch.key];
    } else {
      next[patch.key] = Array.isArray(patch.value) ? [...patch.value] : patch.value;
    }
  }
  return next;
}

/**
 * Own, non-null value only; field keys such as `constructor` would
 * otherwise resolve through the prototype
 */
export function hasRecordValue(record: PartialRecord, key: string): boolean {
  return Object.hasOwn(record, key) && record[key] !== undefined && record[key] !== null;
}

export function missingRequiredFields(config: FormConfiguration, record: PartialRecord): string[] {
  return config.fields
    .filter((field) => field.required)
    .filter((field) => !hasRecordValue(record, field.key))
    .map((field) => field.key);
}

/**
 * True iff every required field has a value
 */
export function isRecordComplete(config: FormConfiguration, record: PartialRecord): boolean {
  return missingRequiredFields(config, record).length === 0;
}

function coerceText(raw: unknown): CoercionResult {
  if (typeof raw === 'number' && Number.isFinite(raw)) {
    return { ok: true, value: String(raw) };
  }
  if (typeof raw !== 'string') {
    return { ok: false, reason: `expected text, got ${typeof raw}` };
  }
  const text = raw.trim();
  return text ? { ok: true, value: text } : { ok: false, reason: 'value is empty' };
}

function coerceNumber(raw: unknown, currency: boolean): CoercionResult {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? { ok: true, value: raw } : { ok: false, reason: 'not a finite number' };
  }
  if (typeof raw !== 'string') {
    return { ok: false, reason: `expected a number, got ${typeof raw}` };
  }
  let text = currency ? raw.replace(CURRENCY_MARKS, '') : raw;
  text = text.replace(/[,\s]/g, '');
  if (!NUMERIC.test(text)) {
    return { ok: false, reason: `"${raw}" is not a number` };
  }
  const parsed = Number(text);
  if (!Number.isFinite(parsed)) {
    return { ok: false, reason: `"${raw}" is out of range` };
  }
  return { ok: true, value: parsed };
}

function coerceBoolean(raw: unknown): CoercionResult {
  if (typeof raw === 'boolean') {
    return { ok: true, value: raw };
  }
  if (raw === 1 || raw === 0) {
    return { ok: true, value: raw === 1 };
  }
  if (typeof raw === 'string') {
    const word = raw.trim().toLowerCase();
    if (TRUE_WORDS.has(word)) {
      return { ok: true, value: true };
    }
    if (FALSE_WORDS.has(word)) {
      return { ok: true, value: false };
    }
  }
  return { ok: false, reason: `"${String(raw)}" is not a yes/no answer` };
}

function coerceDate(raw: unknown): CoercionResult {
  if (typeof raw !== 'string') {
    return { ok: false, reason: 'expected an ISO date string' };
  }
  const match = ISO_DATE.exec(raw.trim());
  if (!match) {
    return { ok: false, reason: `"${raw}" is not an ISO date (YYYY-MM-DD)` };
  }
  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day)
  ) {
    return { ok: false, reason: `"${raw}" is not a calendar date` };
  }
  return { ok: true, value: `${year}-${month}-${day}` };
}

function coerceTime(raw: unknown): CoercionResult {
  if (typeof raw !== 'string') {
    return { ok: false, reason: 'expected a time string' };
  }
  const match = CLOCK_TIME.exec(raw.trim());
  if (!match) {
    return { ok: false, reason: `"${raw}" is not a time (HH:MM)` };
  }
  let hours = Number(match[1]);
  const minutes = Number(match[2]);
  const meridiem = match[4]?.toLowerCase();

  if (meridiem) {
    if (hours < 1 || hours > 12) {
      return { ok: false, reason: `"${raw}" is not a 12-hour time` };
    }
    hours = (hours % 12) + (meridiem === 'pm' ? 12 : 0);
  }
  if (hours > 23 || minutes > 59) {
    return { ok: false, reason: `"${raw}" is out of range` };
  }
  return { ok: true, value: `${String(hours).padStart(2, '0')}:${match[2]}` };
}

function coerceDateTime(raw: unknown): CoercionResult {
  if (typeof raw !== 'string' || !ISO_DATE.test(raw.trim())) {
    return { ok: false, reason: 'expected an ISO date-time string' };
  }
  const timestamp = Date.parse(raw.trim());
  if (Number.isNaN(timestamp)) {
    return { ok: false, reason: `"${raw}" is not a valid date-time` };
  }
  return { ok: true, value: new Date(timestamp).toISOString() };
}

function coerceEmail(raw: unknown): CoercionResult {
  if (typeof raw !== 'string') {
    return { ok: false, reason: 'expected an email address' };
  }
  const email = raw.trim();
  return isEmail(email) ? { ok: true, value: email } : { ok: false, reason: `"${raw}" is not an email address` };
}

function coercePhone(raw: unknown): CoercionResult {
  const text = typeof raw === 'number' && Number.isInteger(raw) ? String(raw) : raw;
  if (typeof text !== 'string') {
    return { ok: false, reason: 'expected a phone number' };
  }
  const phone = text.trim();
  const digits = phone.replace(/\D/g, '').length;
  if (!PHONE_CHARS.test(phone) || digits < 7) {
    return { ok: false, reason: `"${phone}" is not a phone number` };
  }
  return { ok: true, value: phone };
}

function matchChoice(field: FieldSpecification, raw: string): string | undefined {
  const wanted = raw.trim().toLowerCase();
  return (field.choices ?? []).find((choice) => choice.trim().toLowerCase() === wanted);
}

function coerceChoice(field: FieldSpecification, raw: unknown): CoercionResult {
  if (typeof raw !== 'string') {
    return { ok: false, reason: 'expected one of the listed options' };
  }
  const choice = matchChoice(field, raw);
  return choice !== undefined
    ? { ok: true, value: choice }
    : { ok: false, reason: `"${raw}" is not one of: ${(field.choices ?? []).join(', ')}` };
}

function coerceMultiChoice(field: FieldSpecification, raw: unknown): CoercionResult {
  const items = typeof raw === 'string' ? raw.split(',') : raw;
  if (!Array.isArray(items)) {
    return { ok: false, reason: 'expected a list of options' };
  }

  const selected: string[] = [];
  for (const item of items) {
    if (typeof item !== 'string') {
      return { ok: false, reason: 'options must be strings' };
    }
    if (!item.trim()) {
      continue;
    }
    const choice = matchChoice(field, item);
    if (choice === undefined) {
      return { ok: false, reason: `"${item.trim()}" is not one of: ${(field.choices ?? []).join(', ')}` };
    }
    if (!selected.includes(choice)) {
      selected.push(choice);
    }
  }

  return selected.length > 0 ? { ok: true, value: selected } : { ok: false, reason: 'no options selected' };
}
