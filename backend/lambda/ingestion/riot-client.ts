/**
 * Riot API Client
 *
 * Typed endpoint methods over the Riot Games REST API. Every method resolves
 * to a Result: API errors come back as values, transport errors reject.
 * Documentation: https://developer.riotgames.com/apis
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import {
  AccountSchema,
  ActiveShardSchema,
  ChampionMasterySchema,
  ChampionRotationSchema,
  ClashPlayerSchema,
  ClashTournamentSchema,
  classify,
  CurrentGameInfoSchema,
  FeaturedGamesSchema,
  integer,
  isOk,
  LeagueEntrySchema,
  LeagueListSchema,
  LorLeaderboardSchema,
  LorMatchSchema,
  many,
  MatchSchema,
  MatchTimelineSchema,
  one,
  PlatformDataSchema,
  ShardStatusSchema,
  stringList,
  success,
  SummonerSchema,
  uniqueMany,
  type Account,
  type ActiveShard,
  type ChampionMastery,
  type ChampionRotation,
  type ClashPlayer,
  type ClashTournament,
  type CurrentGameInfo,
  type DecodeTarget,
  type FeaturedGames,
  type LeagueEntry,
  type LeagueList,
  type LorLeaderboard,
  type LorMatch,
  type Match,
  type MatchTimeline,
  type PlatformData,
  type Result,
  type ShardStatus,
  type Summoner,
} from '../../../shared/records';
import type { RiotRegion, RoutingValue } from '../../../shared/types';
import { isValidRegion, RiotClientError } from '../../../shared/utils';
import type { StaticDataCache } from './static-data';

// Region routing values
const REGION_ROUTING: Record<RiotRegion, RoutingValue> = {
  NA1: 'americas',
  BR1: 'americas',
  LA1: 'americas',
  LA2: 'americas',
  EUW1: 'europe',
  EUN1: 'europe',
  TR1: 'europe',
  RU: 'europe',
  KR: 'asia',
  JP1: 'asia',
  OC1: 'sea',
  PH2: 'sea',
  SG2: 'sea',
  TH2: 'sea',
  TW2: 'sea',
  VN2: 'sea',
};

export function routingValueFor(region: string): RoutingValue {
  return isValidRegion(region) ? REGION_ROUTING[region] : 'americas';
}

export type RankedQueue = 'RANKED_SOLO_5x5' | 'RANKED_FLEX_SR' | 'RANKED_FLEX_TT';
export type Division = 'I' | 'II' | 'III' | 'IV';
export type ShardGame = 'val' | 'lor';

export interface RiotClientOptions {
  /** overrides the routing value derived from the platform */
  routingValue?: RoutingValue;
  timeoutMs?: number;
  /** logs status and URL of every request */
  debug?: boolean;
  adapter?: AxiosAdapter;
  staticData?: StaticDataCache;
}

type QueryParams = Record<string, string | number>;

export class RiotClient {
  private regionalClient: AxiosInstance;
  private routingClient: AxiosInstance;
  private debug: boolean;
  private staticData: StaticDataCache | null;

  readonly region: RiotRegion;
  readonly routingValue: RoutingValue;

  constructor(apiKey: string, region: RiotRegion, options: RiotClientOptions = {}) {
    this.region = region;
    this.routingValue = options.routingValue ?? routingValueFor(region);
    this.debug = options.debug ?? false;
    this.staticData = options.staticData ?? null;

    // Platform endpoint (summoner, league, mastery, spectator, status)
    this.regionalClient = this.createHttpClient(`https://${region.toLowerCase()}.api.riotgames.com`, apiKey, options);

    // Routing value endpoint (account, match, lor)
    this.routingClient = this.createHttpClient(`https://${this.routingValue}.api.riotgames.com`, apiKey, options);
  }

  // ==========================================================================
  // ACCOUNT-V1
  // ==========================================================================

  /** Account by Riot ID (gameName#tagLine) */
  async getAccountByRiotId(gameName: string, tagLine: string): Promise<Result<Account>> {
    return this.request(
      this.routingClient,
      `/riot/account/v1/accounts/by-riot-id/${encodeURIComponent(gameName)}/${encodeURIComponent(tagLine)}`,
      one(AccountSchema)
    );
  }

  async getAccountByPuuid(puuid: string): Promise<Result<Account>> {
    return this.request(this.routingClient, `/riot/account/v1/accounts/by-puuid/${puuid}`, one(AccountSchema));
  }

  async getActiveShard(game: ShardGame, puuid: string): Promise<Result<ActiveShard>> {
    return this.request(
      this.routingClient,
      `/riot/account/v1/active-shards/by-game/${game}/by-puuid/${puuid}`,
      one(ActiveShardSchema)
    );
  }

  // ==========================================================================
  // CHAMPION-MASTERY-V4
  // ==========================================================================

  async getMasteries(summonerId: string): Promise<Result<readonly ChampionMastery[]>> {
    return this.request(
      this.regionalClient,
      `/lol/champion-mastery/v4/champion-masteries/by-summoner/${summonerId}`,
      many(ChampionMasterySchema)
    );
  }

  async getChampionMastery(summonerId: string, championId: number): Promise<Result<ChampionMastery>> {
    return this.request(
      this.regionalClient,
      `/lol/champion-mastery/v4/champion-masteries/by-summoner/${summonerId}/by-champion/${championId}`,
      one(ChampionMasterySchema)
    );
  }

  /** Sum of the player's champion mastery levels */
  async getMasteryScore(summonerId: string): Promise<Result<number>> {
    return this.request(this.regionalClient, `/lol/champion-mastery/v4/scores/by-summoner/${summonerId}`, integer);
  }

  // ==========================================================================
  // CHAMPION-V3
  // ==========================================================================

  async getChampionRotation(): Promise<Result<ChampionRotation>> {
    return this.request(this.regionalClient, '/lol/platform/v3/champion-rotations', one(ChampionRotationSchema));
  }

  // ==========================================================================
  // CLASH-V1
  // ==========================================================================

  async getClashPlayers(summonerId: string): Promise<Result<readonly ClashPlayer[]>> {
    return this.request(this.regionalClient, `/lol/clash/v1/players/by-summoner/${summonerId}`, many(ClashPlayerSchema));
  }

  async getClashTournaments(): Promise<Result<readonly ClashTournament[]>> {
    return this.request(this.regionalClient, '/lol/clash/v1/tournaments', many(ClashTournamentSchema));
  }

  // ==========================================================================
  // LEAGUE-V4
  // ==========================================================================

  /** The player's entries, one per ranked queue; duplicates are dropped. */
  async getLeague(summonerId: string): Promise<Result<readonly LeagueEntry[]>> {
    return this.request(
      this.regionalClient,
      `/lol/league/v4/entries/by-summoner/${summonerId}`,
      uniqueMany(LeagueEntrySchema)
    );
  }

  /** One page of the entries of a division; duplicates are dropped. */
  async getLeagueEntries(
    queue: RankedQueue,
    tier: string,
    division: Division,
    page = 1
  ): Promise<Result<readonly LeagueEntry[]>> {
    return this.request(
      this.regionalClient,
      `/lol/league/v4/entries/${queue}/${tier}/${division}`,
      uniqueMany(LeagueEntrySchema),
      { page }
    );
  }

  async getChallengerLeague(queue: RankedQueue): Promise<Result<LeagueList>> {
    return this.request(this.regionalClient, `/lol/league/v4/challengerleagues/by-queue/${queue}`, one(LeagueListSchema));
  }

  async getGrandmasterLeague(queue: RankedQueue): Promise<Result<LeagueList>> {
    return this.request(this.regionalClient, `/lol/league/v4/grandmasterleagues/by-queue/${queue}`, one(LeagueListSchema));
  }

  async getMasterLeague(queue: RankedQueue): Promise<Result<LeagueList>> {
    return this.request(this.regionalClient, `/lol/league/v4/masterleagues/by-queue/${queue}`, one(LeagueListSchema));
  }

  // ==========================================================================
  // LOL-STATUS
  // ==========================================================================

  async getPlatformDataV3(): Promise<Result<ShardStatus>> {
    return this.request(this.regionalClient, '/lol/status/v3/shard-data', one(ShardStatusSchema));
  }

  async getPlatformData(): Promise<Result<PlatformData>> {
    return this.request(this.regionalClient, '/lol/status/v4/platform-data', one(PlatformDataSchema));
  }

  // ==========================================================================
  // LOR-MATCH-V1 / LOR-RANKED-V1
  // ==========================================================================

  async getLorMatchIds(puuid: string): Promise<Result<readonly string[]>> {
    return this.request(this.routingClient, `/lor/match/v1/matches/by-puuid/${puuid}/ids`, stringList);
  }

  async getLorMatch(matchId: string): Promise<Result<LorMatch>> {
    return this.request(this.routingClient, `/lor/match/v1/matches/${matchId}`, one(LorMatchSchema));
  }

  async getLorLeaderboard(): Promise<Result<LorLeaderboard>> {
    return this.request(this.routingClient, '/lor/ranked/v1/leaderboards', one(LorLeaderboardSchema));
  }

  // ==========================================================================
  // MATCH-V5
  // ==========================================================================

  /**
   * Match IDs for a player, most recent first
   * @param start Starting index (default 0)
   * @param count Number of matches to retrieve (max 100)
   */
  async getMatchIds(puuid: string, start = 0, count = 20): Promise<Result<readonly string[]>> {
    return this.request(this.routingClient, `/lol/match/v5/matches/by-puuid/${puuid}/ids`, stringList, {
      start,
      count,
    });
  }

  async getMatch(matchId: string): Promise<Result<Match>> {
    return this.request(this.routingClient, `/lol/match/v5/matches/${matchId}`, one(MatchSchema));
  }

  async getMatchTimeline(matchId: string): Promise<Result<MatchTimeline>> {
    return this.request(this.routingClient, `/lol/match/v5/matches/${matchId}/timeline`, one(MatchTimelineSchema));
  }

  // ==========================================================================
  // SPECTATOR-V4
  // ==========================================================================

  async getActiveGame(summonerId: string): Promise<Result<CurrentGameInfo>> {
    return this.request(
      this.regionalClient,
      `/lol/spectator/v4/active-games/by-summoner/${summonerId}`,
      one(CurrentGameInfoSchema)
    );
  }

  async getFeaturedGames(): Promise<Result<FeaturedGames>> {
    return this.request(this.regionalClient, '/lol/spectator/v4/featured-games', one(FeaturedGamesSchema));
  }

  // ==========================================================================
  // SUMMONER-V4
  // ==========================================================================

  async getSummonerByAccountId(accountId: string): Promise<Result<Summoner>> {
    return this.request(this.regionalClient, `/lol/summoner/v4/summoners/by-account/${accountId}`, one(SummonerSchema));
  }

  /**
   * Summoner by summoner name
   * NOTE: names are no longer unique since Riot IDs; prefer getAccountByRiotId + getSummonerByPuuid
   */
  async getSummonerByName(summonerName: string): Promise<Result<Summoner>> {
    return this.request(
      this.regionalClient,
      `/lol/summoner/v4/summoners/by-name/${encodeURIComponent(summonerName)}`,
      one(SummonerSchema)
    );
  }

  async getSummonerByPuuid(puuid: string): Promise<Result<Summoner>> {
    return this.request(this.regionalClient, `/lol/summoner/v4/summoners/by-puuid/${puuid}`, one(SummonerSchema));
  }

  async getSummonerById(summonerId: string): Promise<Result<Summoner>> {
    return this.request(this.regionalClient, `/lol/summoner/v4/summoners/${summonerId}`, one(SummonerSchema));
  }

  // ==========================================================================
  // Composite operations
  // ==========================================================================

  /**
   * The player's n-th most recent match (0 = last).
   * Resolves to null, without fetching a match, when there is no such match.
   */
  async getNthMatch(puuid: string, n = 0): Promise<Result<Match> | null> {
    const ids = await this.getMatchIds(puuid, n, 1);
    if (!isOk(ids)) return ids;
    if (ids.value.length === 0) return null;
    return this.getMatch(ids.value[0]);
  }

  async getLastMatch(puuid: string): Promise<Result<Match> | null> {
    return this.getNthMatch(puuid, 0);
  }

  async getSoloLeague(summonerId: string): Promise<Result<LeagueEntry> | null> {
    return this.getLeagueOfType(summonerId, 'solo');
  }

  async getFlexLeague(summonerId: string): Promise<Result<LeagueEntry> | null> {
    return this.getLeagueOfType(summonerId, 'flex');
  }

  // ==========================================================================
  // Data Dragon
  // ==========================================================================

  profileIconUrl(iconId: number): string {
    return this.requireStaticData().profileIconUrl(iconId);
  }

  championImageUrl(championId: number, skin = 0, type = 'splash'): string | null {
    return this.requireStaticData().championImageUrl(championId, skin, type);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private createHttpClient(baseURL: string, apiKey: string, options: RiotClientOptions): AxiosInstance {
    return axios.create({
      baseURL,
      headers: {
        'X-Riot-Token': apiKey,
      },
      timeout: options.timeoutMs ?? 10000,
      // Error statuses are classified, not thrown
      validateStatus: () => true,
      adapter: options.adapter,
    });
  }

  private async request<T>(
    http: AxiosInstance,
    url: string,
    target: DecodeTarget<T>,
    params?: QueryParams
  ): Promise<Result<T>> {
    const response = await http.get<unknown>(url, { params });
    if (this.debug) {
      console.log('Riot API response', { status: response.status, url: `${http.defaults.baseURL ?? ''}${url}` });
    }
    return classify(response.status, response.data, target);
  }

  private async getLeagueOfType(summonerId: string, leagueType: 'solo' | 'flex'): Promise<Result<LeagueEntry> | null> {
    const entries = await this.getLeague(summonerId);
    if (!isOk(entries)) return entries;
    const entry = entries.value.find((league) => league.queueType.toLowerCase().includes(leagueType));
    return entry ? success(entry) : null;
  }

  private requireStaticData(): StaticDataCache {
    if (!this.staticData) {
      throw new RiotClientError('STATIC_DATA_UNAVAILABLE', 'No static data cache was given to this client');
    }
    return this.staticData;
  }
}
