/**
 * Response envelope
 *
 * Every endpoint answer is classified into a Result: a success carrying the
 * decoded value, or an ApiFailure carrying the upstream status. Failures are
 * returned, never thrown.
 */

import { dedupeStructurally, describeJsonKind, isPlainObject, SchemaMismatchError } from '../utils';
import type { RecordSchema, RiotRecord } from './schema';

export interface Success<T> {
  readonly ok: true;
  readonly value: T;
}

export interface ApiFailure {
  readonly ok: false;
  readonly statusCode: number;
  readonly message: string;
}

export type Result<T> = Success<T> | ApiFailure;

/** Set only by `failure()`; payload data shaped like a failure does not carry it. */
const FAILURE_BRAND: unique symbol = Symbol('ApiFailure');

export const DEFAULT_FAILURE_STATUS = 400;
export const DEFAULT_FAILURE_MESSAGE = 'Bad Request';

export function success<T>(value: T): Success<T> {
  const result: Success<T> = { ok: true, value };
  return Object.freeze(result);
}

export function failure(statusCode: number = DEFAULT_FAILURE_STATUS, message: string = DEFAULT_FAILURE_MESSAGE): ApiFailure {
  const result: ApiFailure = { ok: false, statusCode, message };
  Object.defineProperty(result, FAILURE_BRAND, { value: true, enumerable: false });
  return Object.freeze(result);
}

/**
 * Builds a failure from an error body of the form
 * `{ status: { message, status_code } }`. Anything missing or of the wrong
 * type falls back to the defaults.
 */
export function failureFromPayload(payload: unknown): ApiFailure {
  const status = isPlainObject(payload) ? payload.status : undefined;
  if (!isPlainObject(status)) {
    return failure();
  }
  const message = typeof status.message === 'string' ? status.message : DEFAULT_FAILURE_MESSAGE;
  const statusCode = typeof status.status_code === 'number' ? status.status_code : DEFAULT_FAILURE_STATUS;
  return failure(statusCode, message);
}

/** True only for values made by `failure()`, never for decoded data that looks like one. */
export function isFailure(value: unknown): value is ApiFailure {
  return typeof value === 'object' && value !== null && Object.prototype.hasOwnProperty.call(value, FAILURE_BRAND);
}

/**
 * `false` for failures and for the absent marker (`null` / `undefined`),
 * `true` for anything else, including records with empty lists.
 */
export function isOk<T>(value: Result<T> | null | undefined): value is Success<T>;
export function isOk(value: unknown): boolean;
export function isOk(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  return !isFailure(value);
}

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

// ============================================================================
// Decode targets
// ============================================================================

export type DecodeTarget<T> = (payload: unknown) => T;

/** An object payload becomes one record; a list payload one record per element. */
export function records<T extends object>(
  schema: RecordSchema<T>
): DecodeTarget<RiotRecord<T> | readonly RiotRecord<T>[]> {
  const decodeMany = many(schema);
  return (payload) => (Array.isArray(payload) ? decodeMany(payload) : schema.decode(payload));
}

export function one<T extends object>(schema: RecordSchema<T>): DecodeTarget<RiotRecord<T>> {
  return (payload) => schema.decode(payload);
}

export function many<T extends object>(schema: RecordSchema<T>): DecodeTarget<readonly RiotRecord<T>[]> {
  return (payload) => {
    if (!Array.isArray(payload)) {
      throw new SchemaMismatchError(schema.name, schema.name, `expected a list, got ${describeJsonKind(payload)}`);
    }
    return Object.freeze(payload.map((item, index) => schema.decode(item, `${schema.name}[${index}]`)));
  };
}

/** Like `many`, for endpoints whose answer is a set: structural duplicates are dropped. */
export function uniqueMany<T extends object>(schema: RecordSchema<T>): DecodeTarget<readonly RiotRecord<T>[]> {
  const decodeMany = many(schema);
  return (payload) => Object.freeze(dedupeStructurally(decodeMany(payload)));
}

export const stringList: DecodeTarget<readonly string[]> = (payload) => {
  if (!Array.isArray(payload)) {
    throw new SchemaMismatchError('StringList', 'StringList', `expected a list, got ${describeJsonKind(payload)}`);
  }
  return Object.freeze(
    payload.map((item, index) => {
      if (typeof item !== 'string') {
        throw new SchemaMismatchError('StringList', `StringList[${index}]`, `expected a string, got ${describeJsonKind(item)}`);
      }
      return item;
    })
  );
};

export const integer: DecodeTarget<number> = (payload) => {
  if (typeof payload !== 'number' || !Number.isInteger(payload)) {
    throw new SchemaMismatchError('Integer', 'Integer', `expected an integer, got ${describeJsonKind(payload)}`);
  }
  return payload;
};

// ============================================================================
// Classification
// ============================================================================

/**
 * Turns an upstream `(status, payload)` pair into a Result. A 2xx status is a
 * success, decoded by `target` when one is given and passed through as-is
 * otherwise; any other status is a failure read from the payload.
 *
 * Decoding errors (`SchemaMismatchError`) propagate to the caller.
 */
export function classify(statusCode: number, payload: unknown): Result<unknown>;
export function classify<T>(statusCode: number, payload: unknown, target: DecodeTarget<T>): Result<T>;
export function classify<T>(statusCode: number, payload: unknown, target?: DecodeTarget<T>): Result<unknown> {
  if (!isSuccessStatus(statusCode)) {
    return failureFromPayload(payload);
  }
  return success(target ? target(payload) : payload);
}
