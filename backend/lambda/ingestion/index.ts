import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { isOk, type ApiFailure, type Match } from '../../../shared/records';
import type {
  APIError,
  ErrorCode,
  IngestionConfig,
  IngestionRequest,
  IngestionResponse,
  LastMatchSummary,
  RiotRegion,
} from '../../../shared/types';
import { formatKDA, isPlainObject, isValidRegion, RiotClientError } from '../../../shared/utils';
import { createApiKeyProvider, createSecretsManagerFetcher, loadConfig } from './config';
import { RiotClient } from './riot-client';
import { StaticDataCache } from './static-data';

/**
 * Ingestion Lambda - Look up a player by Riot ID
 *
 * This function:
 * 1. Receives a Riot ID (Name#TAG) + optional region
 * 2. Resolves account, summoner and ranked entries
 * 3. Fetches the most recent match
 * 4. Returns a player summary
 */

const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type, Authorization',
};

export interface IngestionDependencies {
  config: IngestionConfig;
  getApiKey: () => Promise<string>;
  staticData: StaticDataCache;
  createClient: (apiKey: string, region: RiotRegion, staticData: StaticDataCache) => RiotClient;
}

/** The parts of an API Gateway proxy event the handler reads */
export type IngestionEvent = Pick<APIGatewayProxyEvent, 'httpMethod' | 'path' | 'body'>;

export type IngestionHandler = (event: IngestionEvent) => Promise<APIGatewayProxyResult>;

function jsonResponse(statusCode: number, body: unknown): APIGatewayProxyResult {
  return {
    statusCode,
    headers: {
      'Content-Type': 'application/json',
      ...CORS_HEADERS,
    },
    body: JSON.stringify(body),
  };
}

function errorResponse(
  statusCode: number,
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): APIGatewayProxyResult {
  const error: APIError = { code, message, details, timestamp: new Date().toISOString() };
  return jsonResponse(statusCode, error);
}

function failureResponse(failure: ApiFailure, step: string): APIGatewayProxyResult {
  console.warn('Riot API request failed', { step, statusCode: failure.statusCode, message: failure.message });
  return errorResponse(failure.statusCode, 'RIOT_API_ERROR', failure.message, { step });
}

/** Parses and validates the POST body; returns an error message when invalid. */
export function parseRequest(body: string | null): IngestionRequest | string {
  let parsed: unknown;
  try {
    parsed = body ? JSON.parse(body) : {};
  } catch {
    return 'Request body must be valid JSON';
  }
  if (!isPlainObject(parsed)) {
    return 'Request body must be a JSON object';
  }

  const { riotId, region } = parsed;
  if (typeof riotId !== 'string' || !/^[^#]+#[^#]+$/.test(riotId.trim())) {
    return 'riotId is required in the format Name#TAG (e.g. "Faker#KR1")';
  }
  if (region === undefined) {
    return { riotId: riotId.trim() };
  }
  const upper = typeof region === 'string' ? region.toUpperCase() : '';
  if (!isValidRegion(upper)) {
    return `Unknown region "${String(region)}"`;
  }
  return { riotId: riotId.trim(), region: upper };
}

function summarizeMatch(match: Match, puuid: string, staticData: StaticDataCache): LastMatchSummary {
  const participant = match.info.participants.find((p) => p.puuid === puuid);
  if (!participant) {
    throw new RiotClientError('INTERNAL_ERROR', `Player is missing from match ${match.metadata.matchId}`, {
      matchId: match.metadata.matchId,
    });
  }
  return {
    matchId: match.metadata.matchId,
    queue: staticData.queueDescription(match.info.queueId),
    durationSeconds: match.info.gameDurationSeconds,
    championName: participant.championName,
    win: participant.win,
    kills: participant.kills,
    deaths: participant.deaths,
    assists: participant.assists,
    kda: formatKDA(participant.kills, participant.deaths, participant.assists),
  };
}

export function createHandler(deps: IngestionDependencies): IngestionHandler {
  return async (event) => {
    console.log('Ingestion Lambda invoked', { httpMethod: event.httpMethod, path: event.path });

    // Handle OPTIONS preflight request
    if (event.httpMethod === 'OPTIONS') {
      return { statusCode: 200, headers: CORS_HEADERS, body: '' };
    }

    const request = parseRequest(event.body);
    if (typeof request === 'string') {
      return errorResponse(400, 'VALIDATION_ERROR', request);
    }

    const region = request.region ?? deps.config.region;
    const [gameName, tagLine] = request.riotId.split('#');

    try {
      const apiKey = await deps.getApiKey();
      await deps.staticData.load();
      const client = deps.createClient(apiKey, region, deps.staticData);

      // Step 1: Resolve the Riot ID
      console.log(`Looking up ${gameName}#${tagLine} in ${region}`);
      const account = await client.getAccountByRiotId(gameName, tagLine);
      if (!isOk(account)) {
        if (account.statusCode === 404) {
          return errorResponse(404, 'PLAYER_NOT_FOUND', `Player "${request.riotId}" not found in region ${region}`, {
            riotId: request.riotId,
            region,
          });
        }
        return failureResponse(account, 'account');
      }
      const { puuid } = account.value;

      // Step 2: Summoner profile and ranked entries
      const summoner = await client.getSummonerByPuuid(puuid);
      if (!isOk(summoner)) return failureResponse(summoner, 'summoner');

      const solo = await client.getSoloLeague(summoner.value.id);
      if (solo && !isOk(solo)) return failureResponse(solo, 'league');
      const flex = await client.getFlexLeague(summoner.value.id);
      if (flex && !isOk(flex)) return failureResponse(flex, 'league');

      // Step 3: Most recent match
      const lastMatch = await client.getLastMatch(puuid);
      if (lastMatch && !isOk(lastMatch)) return failureResponse(lastMatch, 'match');
      console.log(lastMatch ? `Found last match ${lastMatch.value.metadata.matchId}` : 'Player has no matches');

      const response: IngestionResponse = {
        player: {
          puuid,
          riotId: `${account.value.gameName}#${account.value.tagLine}`,
          summonerLevel: summoner.value.summonerLevel,
          profileIconId: summoner.value.profileIconId,
          soloRank: solo ? solo.value.short : null,
          flexRank: flex ? flex.value.short : null,
        },
        lastMatch: lastMatch ? summarizeMatch(lastMatch.value, puuid, deps.staticData) : null,
      };
      return jsonResponse(200, response);
    } catch (error) {
      console.error('Error in ingestion:', error);
      const details = error instanceof RiotClientError ? { cause: error.code, ...error.details } : undefined;
      return errorResponse(500, 'INTERNAL_ERROR', error instanceof Error ? error.message : 'Unknown error', details);
    }
  };
}

export function defaultDependencies(config: IngestionConfig): IngestionDependencies {
  return {
    config,
    getApiKey: createApiKeyProvider(config, createSecretsManagerFetcher(config)),
    staticData: new StaticDataCache({ debug: config.debug }),
    createClient: (apiKey, region, staticData) =>
      new RiotClient(apiKey, region, {
        // The configured routing value only applies to the configured region
        routingValue: region === config.region ? config.routingValue : undefined,
        debug: config.debug,
        staticData,
      }),
  };
}

// Built on first invocation and reused for the life of the container
let defaultHandler: IngestionHandler | null = null;

export const handler: IngestionHandler = async (event) => {
  if (!defaultHandler) {
    try {
      defaultHandler = createHandler(defaultDependencies(loadConfig(process.env)));
    } catch (error) {
      // Not cached: the next invocation reads the environment again
      console.error('Error loading ingestion config:', error);
      if (error instanceof RiotClientError) {
        return errorResponse(500, error.code, error.message, error.details);
      }
      return errorResponse(500, 'INTERNAL_ERROR', error instanceof Error ? error.message : 'Unknown error');
    }
  }
  return defaultHandler(event);
};
