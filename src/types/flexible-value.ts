/**
 * Flexible Value Types
 *
 * A plan feature's value is one of a fixed set of kinds, optionally
 * varying per locale. FeatureValue is the in-memory form; WireValue is
 * what the codec writes to storage.
 */

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type ValueType =
  | 'integer'
  | 'float'
  | 'boolean'
  | 'string'
  | 'array'
  | 'object'
  | 'null';

export const VALUE_TYPES: readonly ValueType[] = [
  'integer',
  'float',
  'boolean',
  'string',
  'array',
  'object',
  'null',
];

export type ScalarValue =
  | { kind: 'integer'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'string'; value: string }
  | { kind: 'array'; value: JsonValue[] }
  | { kind: 'object'; value: JsonObject }
  | { kind: 'null' };

export interface LocalizedValue {
  kind: 'localized';
  /** Locale code -> value, in insertion order */
  entries: Record<string, ScalarValue>;
}

export type FeatureValue = ScalarValue | LocalizedValue;

/**
 * Tagged single value as stored
 */
export interface TaggedWire {
  type: ValueType;
  value: JsonValue;
}

/**
 * Locale code -> tagged value
 */
export type LocalizedWire = Record<string, TaggedWire>;

export type WireValue = TaggedWire | LocalizedWire;
