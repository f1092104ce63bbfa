/**
 * Record schemas
 *
 * A schema is a table of fields, each of which knows how to read one JSON key.
 * Decoding a payload with a schema yields a frozen record:
 * - every declared field, read by its field builder
 * - every derived field, computed from the declared ones
 * - `extensions`, holding the payload keys the schema did not claim
 *
 * The record's type name is kept off the enumerable fields; use `recordTypeOf`.
 */

import type { JsonObject, JsonValue } from '../types';
import { describeJsonKind, isPlainObject, SchemaMismatchError } from '../utils';
import { isFailure } from './envelope';

export const RECORD_TYPE: unique symbol = Symbol('recordType');

export type FieldNode =
  | { kind: 'string' }
  | { kind: 'number' }
  | { kind: 'boolean' }
  | { kind: 'json' }
  | { kind: 'record'; record: string }
  | { kind: 'list'; item: FieldNode }
  | { kind: 'optional'; inner: FieldNode }
  | { kind: 'nullable'; inner: FieldNode };

interface ReadContext {
  record: string;
  path: string;
}

export interface Field<T> {
  readonly node: FieldNode;
  read(raw: unknown, ctx: ReadContext): T;
}

export type FieldMap = Record<string, Field<unknown>>;

export type FieldValues<F extends FieldMap> = {
  -readonly [K in keyof F]: F[K] extends Field<infer T> ? T : never;
};

export type RiotRecord<T> = Readonly<T> & {
  readonly extensions: Readonly<JsonObject>;
};

export interface RecordSchema<T extends object> {
  readonly name: string;
  /** field descriptors keyed by record field name, for introspection */
  readonly fields: Readonly<Record<string, FieldNode>>;
  /** reads declared and derived fields; does not check the payload is an object */
  extract(json: Record<string, unknown>, path: string): T;
  decode(raw: unknown, path?: string): RiotRecord<T>;
}

export type RecordOf<S> = S extends RecordSchema<infer T> ? RiotRecord<T> : never;

// ============================================================================
// JSON helpers
// ============================================================================

function ownValue(json: Record<string, unknown>, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(json, key) ? json[key] : undefined;
}

/** Deep-copies a parsed JSON value and freezes the copy. */
export function freezeJson(value: unknown): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return Object.freeze(value.map(freezeJson));
  }
  if (isPlainObject(value)) {
    const out: JsonObject = {};
    for (const key of Object.keys(value)) {
      out[key] = freezeJson(value[key]);
    }
    return Object.freeze(out);
  }
  return null;
}

function at(ctx: ReadContext, segment: string): ReadContext {
  return { record: ctx.record, path: `${ctx.path}${segment}` };
}

function missing(ctx: ReadContext): SchemaMismatchError {
  return new SchemaMismatchError(ctx.record, ctx.path, 'missing required field');
}

// ============================================================================
// Field builders
// ============================================================================

function primitive<T>(kind: 'string' | 'number' | 'boolean', guard: (raw: unknown) => raw is T): Field<T> {
  return {
    node: { kind },
    read(raw, ctx) {
      if (raw === undefined) throw missing(ctx);
      if (!guard(raw)) {
        throw new SchemaMismatchError(ctx.record, ctx.path, `expected a ${kind}, got ${describeJsonKind(raw)}`);
      }
      return raw;
    },
  };
}

export function str(): Field<string> {
  return primitive('string', (raw): raw is string => typeof raw === 'string');
}

/** Any JSON number; integers and floats are both taken as-is. */
export function num(): Field<number> {
  return primitive('number', (raw): raw is number => typeof raw === 'number');
}

export function bool(): Field<boolean> {
  return primitive('boolean', (raw): raw is boolean => typeof raw === 'boolean');
}

/** Untyped JSON, copied and frozen. */
export function json(): Field<JsonValue> {
  return {
    node: { kind: 'json' },
    read(raw, ctx) {
      if (raw === undefined) throw missing(ctx);
      return freezeJson(raw);
    },
  };
}

export function list<T>(item: Field<T>): Field<readonly T[]> {
  return {
    node: { kind: 'list', item: item.node },
    read(raw, ctx) {
      if (raw === undefined) throw missing(ctx);
      if (!Array.isArray(raw)) {
        throw new SchemaMismatchError(ctx.record, ctx.path, `expected a list, got ${describeJsonKind(raw)}`);
      }
      return Object.freeze(raw.map((element, index) => item.read(element, at(ctx, `[${index}]`))));
    },
  };
}

export function strList(): Field<readonly string[]> {
  return list(str());
}

export function numList(): Field<readonly number[]> {
  return list(num());
}

export function nested<T extends object>(schema: RecordSchema<T>): Field<RiotRecord<T>> {
  return {
    node: { kind: 'record', record: schema.name },
    read(raw, ctx) {
      if (raw === undefined) throw missing(ctx);
      return schema.decode(raw, ctx.path);
    },
  };
}

/** Absent or null keys read as `fallback` (null unless given). */
export function optional<T>(field: Field<T>): Field<T | null>;
export function optional<T>(field: Field<T>, fallback: T): Field<T>;
export function optional<T>(field: Field<T>, fallback: T | null = null): Field<T | null> {
  return {
    node: { kind: 'optional', inner: field.node },
    read(raw, ctx) {
      if (raw === undefined || raw === null) return fallback;
      return field.read(raw, ctx);
    },
  };
}

/** The key must be present, but may hold null. */
export function nullable<T>(field: Field<T>): Field<T | null> {
  return {
    node: { kind: 'nullable', inner: field.node },
    read(raw, ctx) {
      if (raw === null) return null;
      return field.read(raw, ctx);
    },
  };
}

// ============================================================================
// Record schemas
// ============================================================================

function extractFields<F extends FieldMap>(
  record: string,
  fields: F,
  json: Record<string, unknown>,
  path: string
): FieldValues<F> {
  const out: Record<string, unknown> = {};
  for (const key of Object.keys(fields)) {
    out[key] = fields[key].read(ownValue(json, key), { record, path: `${path}.${key}` });
  }
  return out as FieldValues<F>;
}

function describeFields(fields: FieldMap): Record<string, FieldNode> {
  const nodes: Record<string, FieldNode> = {};
  for (const key of Object.keys(fields)) nodes[key] = fields[key].node;
  return nodes;
}

function makeRecordSchema<T extends object>(
  name: string,
  fields: Record<string, FieldNode>,
  claimedKeys: readonly string[],
  extract: (json: Record<string, unknown>, path: string) => T
): RecordSchema<T> {
  const claimed = new Set(claimedKeys);

  return {
    name,
    fields,
    extract,
    decode(raw, path = name) {
      if (!isPlainObject(raw)) {
        throw new SchemaMismatchError(name, path, `expected an object, got ${describeJsonKind(raw)}`);
      }
      const extensions: JsonObject = {};
      for (const key of Object.keys(raw)) {
        if (!claimed.has(key)) extensions[key] = freezeJson(raw[key]);
      }
      const record: RiotRecord<T> = { ...extract(raw, path), extensions: Object.freeze(extensions) };
      Object.defineProperty(record, RECORD_TYPE, { value: name, enumerable: false });
      Object.freeze(record);
      return record;
    },
  };
}

/**
 * Declares a record type.
 *
 * `derive` runs after the declared fields are read; its result is merged
 * into the record and may replace a declared field.
 */
export function defineRecord<F extends FieldMap>(name: string, fields: F): RecordSchema<FieldValues<F>>;
export function defineRecord<F extends FieldMap, D extends object>(
  name: string,
  fields: F,
  derive: (values: FieldValues<F>) => D
): RecordSchema<FieldValues<F> & D>;
export function defineRecord<F extends FieldMap, D extends object>(
  name: string,
  fields: F,
  derive?: (values: FieldValues<F>) => D
): RecordSchema<FieldValues<F> | (FieldValues<F> & D)> {
  return makeRecordSchema(name, describeFields(fields), Object.keys(fields), (json, path) => {
    const values = extractFields(name, fields, json, path);
    return derive ? { ...values, ...derive(values) } : values;
  });
}

/**
 * Declares a record type that carries every field of `base` plus its own.
 *
 * The base schema's extraction (fields and derivations) runs first, then the
 * extra fields, then `derive`; the result is one flat record.
 */
export function extendRecord<B extends object, F extends FieldMap>(
  base: RecordSchema<B>,
  name: string,
  fields: F
): RecordSchema<B & FieldValues<F>>;
export function extendRecord<B extends object, F extends FieldMap, D extends object>(
  base: RecordSchema<B>,
  name: string,
  fields: F,
  derive: (values: B & FieldValues<F>) => D
): RecordSchema<B & FieldValues<F> & D>;
export function extendRecord<B extends object, F extends FieldMap, D extends object>(
  base: RecordSchema<B>,
  name: string,
  fields: F,
  derive?: (values: B & FieldValues<F>) => D
): RecordSchema<(B & FieldValues<F>) | (B & FieldValues<F> & D)> {
  const nodes = { ...base.fields, ...describeFields(fields) };
  return makeRecordSchema(name, nodes, Object.keys(nodes), (json, path) => {
    const values = { ...base.extract(json, path), ...extractFields(name, fields, json, path) };
    return derive ? { ...values, ...derive(values) } : values;
  });
}

// ============================================================================
// Slot collections
// ============================================================================

type SlotIndex<N extends number, Seen extends unknown[] = [unknown]> = Seen['length'] extends N
  ? N
  : Seen['length'] | SlotIndex<N, [...Seen, unknown]>;

export type Slots<T, N extends number> = Record<`slot${SlotIndex<N>}`, T>;

/**
 * Declares a record for an object keyed by position ("1".."N") rather than by
 * name. Each position becomes a `slotK` field, in numeric order; every
 * position must be present. Other keys end up in `extensions`.
 */
export function slots<T extends object, N extends number>(
  name: string,
  item: RecordSchema<T>,
  count: N
): RecordSchema<Slots<RiotRecord<T>, N>> {
  const positions = Array.from({ length: count }, (_, i) => i + 1);
  const nodes: Record<string, FieldNode> = {};
  for (const position of positions) nodes[`slot${position}`] = { kind: 'record', record: item.name };

  return makeRecordSchema(name, nodes, positions.map(String), (json, path) => {
    const out: Record<string, RiotRecord<T>> = {};
    for (const position of positions) {
      const slotPath = `${path}["${position}"]`;
      const raw = ownValue(json, String(position));
      if (raw === undefined) {
        throw new SchemaMismatchError(name, slotPath, `missing slot ${position} of ${count}`);
      }
      out[`slot${position}`] = item.decode(raw, slotPath);
    }
    return out as Slots<RiotRecord<T>, N>;
  });
}

// ============================================================================
// Inspection & rendering
// ============================================================================

export function recordTypeOf(value: unknown): string | null {
  if (typeof value !== 'object' || value === null) return null;
  const type: unknown = Object.getOwnPropertyDescriptor(value, RECORD_TYPE)?.value;
  return typeof type === 'string' ? type : null;
}

export function isRecord(value: unknown): value is RiotRecord<object> {
  return recordTypeOf(value) !== null;
}

export interface RenderOptions {
  /** starting indentation level */
  level?: number;
  /** indentation unit */
  sep?: string;
}

function renderValue(value: unknown, level: number, sep: string): string {
  if (isRecord(value)) {
    return renderRecord(value, { level, sep });
  }
  if (Array.isArray(value) && value.length > 0 && value.every(isRecord)) {
    const inner = sep.repeat(level + 1);
    const items = value.map((item) => `${inner}${renderRecord(item, { level: level + 1, sep })}`);
    return `[\n${items.join(',\n')}\n${sep.repeat(level)}]`;
  }
  return JSON.stringify(value);
}

/**
 * Debug rendering: the type name, then one `name = value` line per field.
 * Nested records and lists of records are indented one `sep` per level;
 * everything else is compact JSON. Empty `extensions` are left out.
 * An ApiFailure renders under its own name, without the `ok` tag.
 */
export function renderRecord(record: object, { level = 0, sep = '    ' }: RenderOptions = {}): string {
  const failed = isFailure(record);
  const type = recordTypeOf(record) ?? (failed ? 'ApiFailure' : 'Record');
  const indent = sep.repeat(level + 1);
  const lines = Object.entries(record)
    .filter(([key]) => !(failed && key === 'ok'))
    .filter(([key, value]) => !(key === 'extensions' && isPlainObject(value) && Object.keys(value).length === 0))
    .map(([key, value]) => `${indent}${key} = ${renderValue(value, level + 1, sep)}`);
  if (lines.length === 0) {
    return `${type}()`;
  }
  return `${type}(\n${lines.join(',\n')}\n${sep.repeat(level)})`;
}
