/**
 * Flexible Value Codec
 *
 * Converts feature values between native JSON values, the FeatureValue
 * tagged union, and the self-describing wire format:
 *
 *   single:      { "type": "integer", "value": 100 }
 *   translatable { "en": { "type": "integer", "value": 1000 },
 *                  "ar": { "type": "integer", "value": 2000 } }
 *
 * Plain strings that are not wire JSON go through legacy coercion.
 */

import type {
  FeatureValue,
  JsonObject,
  JsonValue,
  LocalizedWire,
  ScalarValue,
  TaggedWire,
  ValueType,
  WireValue,
} from '@/types/index.js';
import { VALUE_TYPES } from '@/types/index.js';

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

const LOCALE_PATTERN = /^[a-z]{2}(-[A-Z]{2})?$/;
const INTEGER_PATTERN = /^-?\d+$/;
const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const NULL_WORDS = new Set(['null', 'nil', '']);
const TRUE_WORDS = new Set(['true', '1', 'yes', 'on']);
const FALSE_WORDS = new Set(['false', '0', 'no', 'off']);

export function isLocaleKey(key: string): boolean {
  return LOCALE_PATTERN.test(key);
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isValueType(value: unknown): value is ValueType {
  return typeof value === 'string' && VALUE_TYPES.some((t) => t === value);
}

/**
 * Normalize an arbitrary value into JSON. Dates become ISO strings,
 * undefined object members are dropped, anything unrepresentable is null.
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'boolean' || typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map((item) => toJsonValue(item));
  }
  if (isPlainObject(value)) {
    const out: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      if (item !== undefined) {
        out[key] = toJsonValue(item);
      }
    }
    return out;
  }
  return null;
}

function isTranslatable(value: JsonValue): value is JsonObject {
  if (!isPlainObject(value)) {
    return false;
  }
  const keys = Object.keys(value);
  return keys.length > 0 && keys.every(isLocaleKey);
}

export function isTaggedWire(value: unknown): value is TaggedWire {
  return (
    isPlainObject(value) &&
    'type' in value &&
    'value' in value &&
    isValueType(value.type)
  );
}

export function isLocalizedWire(value: unknown): value is LocalizedWire {
  if (!isPlainObject(value)) {
    return false;
  }
  const entries = Object.entries(value);
  return (
    entries.length > 0 &&
    entries.every(([key, item]) => isLocaleKey(key) && isTaggedWire(item))
  );
}

function looksLikeJson(raw: string): boolean {
  const first = raw.trimStart().charAt(0);
  return first === '{' || first === '[' || first === '"';
}

function tryParseJson(raw: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(raw);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

function toNumber(value: JsonValue): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'string' && NUMERIC_PATTERN.test(value.trim())) {
    return Number(value.trim());
  }
  return 0;
}

function toBoolean(value: JsonValue): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return value !== 0;
  }
  if (typeof value === 'string') {
    return !NULL_WORDS.has(value.toLowerCase()) && !FALSE_WORDS.has(value.toLowerCase());
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  return value !== null;
}

function toText(value: JsonValue): string {
  if (value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return JSON.stringify(value);
}

// ─────────────────────────────────────────────────────────────
// CLASSIFICATION
// ─────────────────────────────────────────────────────────────

export function classifyScalar(value: JsonValue): ScalarValue {
  if (value === null) {
    return { kind: 'null' };
  }
  if (typeof value === 'boolean') {
    return { kind: 'boolean', value };
  }
  if (typeof value === 'number') {
    return Number.isInteger(value)
      ? { kind: 'integer', value }
      : { kind: 'float', value };
  }
  if (typeof value === 'string') {
    return { kind: 'string', value };
  }
  if (Array.isArray(value)) {
    return { kind: 'array', value };
  }
  return { kind: 'object', value };
}

/**
 * Tag a native value. A non-empty object whose keys are all locale codes
 * becomes a localized value; mixed or numeric keys stay a plain object.
 */
export function classifyValue(value: JsonValue): FeatureValue {
  if (isTranslatable(value)) {
    const entries: Record<string, ScalarValue> = {};
    for (const [locale, item] of Object.entries(value)) {
      entries[locale] = classifyScalar(item);
    }
    return { kind: 'localized', entries };
  }
  return classifyScalar(value);
}

export function unwrapScalar(value: ScalarValue): JsonValue {
  return value.kind === 'null' ? null : value.value;
}

export function unwrapValue(value: FeatureValue): JsonValue {
  if (value.kind !== 'localized') {
    return unwrapScalar(value);
  }
  const out: JsonObject = {};
  for (const [locale, item] of Object.entries(value.entries)) {
    out[locale] = unwrapScalar(item);
  }
  return out;
}

// ─────────────────────────────────────────────────────────────
// WIRE FORMAT
// ─────────────────────────────────────────────────────────────

function scalarToWire(value: ScalarValue): TaggedWire {
  return { type: value.kind, value: unwrapScalar(value) };
}

export function toWire(value: FeatureValue): WireValue {
  if (value.kind !== 'localized') {
    return scalarToWire(value);
  }
  const wire: LocalizedWire = {};
  for (const [locale, item] of Object.entries(value.entries)) {
    wire[locale] = scalarToWire(item);
  }
  return wire;
}

/**
 * Cast a tagged payload to its declared type
 */
export function castTagged(tagged: TaggedWire): ScalarValue {
  const raw = tagged.value;
  switch (tagged.type) {
    case 'integer':
      return { kind: 'integer', value: Math.trunc(toNumber(raw)) };
    case 'float':
      return { kind: 'float', value: toNumber(raw) };
    case 'boolean':
      return { kind: 'boolean', value: toBoolean(raw) };
    case 'string':
      return { kind: 'string', value: toText(raw) };
    case 'array':
      return { kind: 'array', value: Array.isArray(raw) ? raw : [] };
    case 'object':
      return { kind: 'object', value: isPlainObject(raw) ? raw : {} };
    case 'null':
      return { kind: 'null' };
  }
}

/**
 * Best-effort coercion of a plain string that is not wire JSON
 */
export function coerceLegacy(raw: string): FeatureValue {
  const lower = raw.trim().toLowerCase();

  if (NULL_WORDS.has(lower)) {
    return { kind: 'null' };
  }
  if (TRUE_WORDS.has(lower)) {
    return { kind: 'boolean', value: true };
  }
  if (FALSE_WORDS.has(lower)) {
    return { kind: 'boolean', value: false };
  }

  const trimmed = raw.trim();
  if (INTEGER_PATTERN.test(trimmed)) {
    return { kind: 'integer', value: Number.parseInt(trimmed, 10) };
  }
  if (NUMERIC_PATTERN.test(trimmed)) {
    return { kind: 'float', value: Number(trimmed) };
  }

  if (looksLikeJson(raw)) {
    const parsed = tryParseJson(raw);
    if (parsed.ok) {
      return classifyValue(toJsonValue(parsed.value));
    }
  }

  return { kind: 'string', value: raw };
}

export function encodeFeatureValue(value: JsonValue): WireValue {
  return toWire(classifyValue(value));
}

/**
 * Decode whatever storage handed back: a wire object, a JSON string
 * holding one, or a legacy plain value.
 */
export function decodeFeatureValue(raw: unknown): FeatureValue {
  if (raw === null || raw === undefined) {
    return { kind: 'null' };
  }

  if (typeof raw === 'string') {
    if (looksLikeJson(raw)) {
      const parsed = tryParseJson(raw);
      if (parsed.ok && (isTaggedWire(parsed.value) || isLocalizedWire(parsed.value))) {
        return decodeFeatureValue(parsed.value);
      }
    }
    return coerceLegacy(raw);
  }

  if (isTaggedWire(raw)) {
    return castTagged(raw);
  }

  if (isLocalizedWire(raw)) {
    const entries: Record<string, ScalarValue> = {};
    for (const [locale, item] of Object.entries(raw)) {
      entries[locale] = castTagged(item);
    }
    return { kind: 'localized', entries };
  }

  return classifyValue(toJsonValue(raw));
}

export function decodeNative(raw: unknown): JsonValue {
  return unwrapValue(decodeFeatureValue(raw));
}

// ─────────────────────────────────────────────────────────────
// LOCALE RESOLUTION
// ─────────────────────────────────────────────────────────────

/**
 * Pick one entry of a localized value: requested locale, then fallback,
 * then the first entry. Single values are returned as they are.
 */
export function resolveLocale(
  value: FeatureValue,
  locale: string,
  fallbackLocale: string
): ScalarValue {
  if (value.kind !== 'localized') {
    return value;
  }
  const { entries } = value;
  const picked =
    entries[locale] ?? entries[fallbackLocale] ?? Object.values(entries)[0];
  return picked ?? { kind: 'null' };
}

export function resolveLocalized(
  wire: unknown,
  locale: string,
  fallbackLocale: string
): JsonValue {
  return unwrapScalar(
    resolveLocale(decodeFeatureValue(wire), locale, fallbackLocale)
  );
}
