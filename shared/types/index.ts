/**
 * Shared TypeScript types for lol-records
 * Used by the record decoder, the Riot client and the ingestion handler
 */

// ============================================================================
// JSON
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | readonly JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

// ============================================================================
// Regions & Routing
// ============================================================================

export type RiotRegion =
  | 'NA1'
  | 'EUW1'
  | 'EUN1'
  | 'KR'
  | 'BR1'
  | 'LA1'
  | 'LA2'
  | 'OC1'
  | 'TR1'
  | 'RU'
  | 'JP1'
  | 'PH2'
  | 'SG2'
  | 'TH2'
  | 'TW2'
  | 'VN2';

export type RoutingValue = 'americas' | 'europe' | 'asia' | 'sea';

// ============================================================================
// Errors
// ============================================================================

export type ErrorCode =
  | 'SCHEMA_MISMATCH'
  | 'STATIC_DATA_NOT_LOADED'
  | 'STATIC_DATA_UNAVAILABLE'
  | 'VALIDATION_ERROR'
  | 'PLAYER_NOT_FOUND'
  | 'RIOT_API_ERROR'
  | 'CONFIG_ERROR'
  | 'INTERNAL_ERROR';

export interface APIError {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
}

// ============================================================================
// Configuration
// ============================================================================

export interface IngestionConfig {
  region: RiotRegion;
  routingValue?: RoutingValue;
  debug: boolean;
  awsRegion?: string;
  apiKeySecretName?: string;
  apiKey?: string;
}

// ============================================================================
// Ingestion API
// ============================================================================

export interface IngestionRequest {
  riotId: string;
  region?: RiotRegion;
}

export interface PlayerProfile {
  puuid: string;
  riotId: string;
  summonerLevel: number;
  profileIconId: number;
  soloRank: string | null;
  flexRank: string | null;
}

export interface LastMatchSummary {
  matchId: string;
  queue: string;
  durationSeconds: number;
  championName: string;
  win: boolean;
  kills: number;
  deaths: number;
  assists: number;
  kda: string;
}

export interface IngestionResponse {
  player: PlayerProfile;
  lastMatch: LastMatchSummary | null;
}
