/**
 * Shared utility functions
 */

import type { ErrorCode, JsonValue, RiotRegion } from '../types';

// ============================================================================
// Data Formatting
// ============================================================================

export function calculateKDA(kills: number, deaths: number, assists: number): number {
  return deaths === 0 ? kills + assists : (kills + assists) / deaths;
}

export function formatKDA(kills: number, deaths: number, assists: number): string {
  return calculateKDA(kills, deaths, assists).toFixed(2);
}

// ============================================================================
// Derived Record Fields
// ============================================================================

// Durations above this are taken to be milliseconds
export const MILLISECOND_DURATION_THRESHOLD = 10000;

export function durationInSeconds(duration: number): number {
  return duration > MILLISECOND_DURATION_THRESHOLD ? Math.floor(duration / 1000) : duration;
}

/**
 * Short rank label, e.g. GRANDMASTER I -> "GM1", GOLD IV -> "G4".
 * Returns "??" when the tier or the rank is missing.
 */
export function rankShort(tier: string | null | undefined, rank: string | null | undefined): string {
  if (!tier || !rank) {
    return '??';
  }
  const prefix = tier.startsWith('GR') ? 'GM' : tier[0];
  const division = rank.toLowerCase() === 'iv' ? '4' : String(rank.length);
  return `${prefix}${division}`;
}

// ============================================================================
// Structural Equality
// ============================================================================

function canonicalize(value: unknown): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (typeof value === 'object') {
    const out: Record<string, JsonValue> = {};
    for (const key of Object.keys(value).sort()) {
      out[key] = canonicalize(Reflect.get(value, key));
    }
    return out;
  }
  return null;
}

export function structuralKey(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

/**
 * Removes items that are structurally equal to an earlier item.
 * The first occurrence wins, so the remaining order follows the input.
 */
export function dedupeStructurally<T>(items: readonly T[]): T[] {
  const seen = new Map<string, T>();
  for (const item of items) {
    const key = structuralKey(item);
    if (!seen.has(key)) seen.set(key, item);
  }
  return [...seen.values()];
}

// ============================================================================
// String Similarity
// ============================================================================

export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0;

  let left = a;
  let right = b;
  if (left.length > right.length) {
    [left, right] = [right, left];
  }
  const m = left.length;
  const n = right.length;
  if (m === 0) return n;

  let prev = new Uint32Array(n + 1);
  let curr = new Uint32Array(n + 1);
  for (let j = 0; j <= n; j++) prev[j] = j;

  for (let i = 1; i <= m; i++) {
    curr[0] = i;
    const leftChar = left.charCodeAt(i - 1);
    for (let j = 1; j <= n; j++) {
      const cost = leftChar === right.charCodeAt(j - 1) ? 0 : 1;
      curr[j] = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
    }
    [prev, curr] = [curr, prev];
  }
  return prev[n];
}

/** 0-100, 100 meaning identical */
export function similarityRatio(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 100;
  return Math.round(100 * (1 - levenshteinDistance(a, b) / longest));
}

function tokenize(value: string): string[] {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .split(' ')
    .filter(Boolean);
}

/**
 * Token-set similarity: compares the shared tokens against each side's
 * remaining tokens, so word order and repeated words do not matter.
 */
export function tokenSetRatio(a: string, b: string): number {
  const left = new Set(tokenize(a));
  const right = new Set(tokenize(b));
  if (left.size === 0 || right.size === 0) return 0;

  const common = [...left].filter((t) => right.has(t)).sort();
  const onlyLeft = [...left].filter((t) => !right.has(t)).sort();
  const onlyRight = [...right].filter((t) => !left.has(t)).sort();

  const base = common.join(' ');
  const withLeft = [base, ...onlyLeft].join(' ').trim();
  const withRight = [base, ...onlyRight].join(' ').trim();

  const candidates = [similarityRatio(withLeft, withRight)];
  if (base) {
    candidates.push(similarityRatio(base, withLeft), similarityRatio(base, withRight));
  }
  return Math.max(...candidates);
}

/**
 * Picks the candidate with the highest token-set ratio.
 * Ties keep the earliest candidate; an empty list yields null.
 */
export function bestMatch(search: string, candidates: Iterable<string>): string | null {
  let best: string | null = null;
  let bestRatio = 0;
  for (const candidate of candidates) {
    const ratio = tokenSetRatio(search, candidate);
    if (ratio > bestRatio) {
      best = candidate;
      bestRatio = ratio;
    }
  }
  return best;
}

// ============================================================================
// Validation
// ============================================================================

const VALID_REGIONS: readonly RiotRegion[] = [
  'NA1', 'EUW1', 'EUN1', 'KR', 'BR1', 'LA1', 'LA2', 'OC1', 'TR1', 'RU', 'JP1', 'PH2', 'SG2', 'TH2', 'TW2', 'VN2',
];

export function isValidRegion(region: string): region is RiotRegion {
  return VALID_REGIONS.some((valid) => valid === region);
}

/** "a string", "an object", "a list", "null" */
export function describeJsonKind(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'a list';
  if (typeof value === 'object') return 'an object';
  return `a ${typeof value}`;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Error Handling
// ============================================================================

export class RiotClientError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RiotClientError';
  }
}

/**
 * A successful payload does not match the declared record schema:
 * upstream changed shape, so the data cannot be trusted.
 */
export class SchemaMismatchError extends RiotClientError {
  constructor(
    public record: string,
    public path: string,
    message: string
  ) {
    super('SCHEMA_MISMATCH', `${record} at ${path}: ${message}`, { record, path });
    this.name = 'SchemaMismatchError';
  }
}

export function createError(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): RiotClientError {
  return new RiotClientError(code, message, details);
}
