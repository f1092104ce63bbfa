import type { AxiosAdapter } from 'axios';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { isOk, type Result } from '../../../shared/records';
import { RiotClient, routingValueFor } from './riot-client';
import { DDRAGON_BASE_URL, QUEUES_URL, StaticDataCache } from './static-data';
import { ok, stubAdapter, type StubReply } from './test-helpers';
import languages from './fixtures/languages.json';
import queues from './fixtures/queues.json';
import versions from './fixtures/versions.json';
import championList from '../../../shared/records/fixtures/champion-list.json';
import endpoints from '../../../shared/records/fixtures/endpoints.json';
import matchFixture from '../../../shared/records/fixtures/match.json';
import timelineFixture from '../../../shared/records/fixtures/timeline.json';

const PLATFORM = 'https://euw1.api.riotgames.com';
const ROUTING = 'https://europe.api.riotgames.com';

const account = { puuid: 'puuid-alpha', gameName: 'Test Player', tagLine: 'EUW' };

const summoner = {
  accountId: 'account-1',
  profileIconId: 4568,
  revisionDate: 1700000000000,
  name: 'Test Player',
  id: 'summoner-1',
  puuid: 'puuid-alpha',
  summonerLevel: 312,
};

function leagueEntry(queueType: string, tier: string, rank: string): Record<string, unknown> {
  return {
    leagueId: `league-${queueType}`,
    summonerId: 'summoner-1',
    summonerName: 'Test Player',
    queueType,
    tier,
    rank,
    leaguePoints: 50,
    wins: 20,
    losses: 18,
    hotStreak: false,
    veteran: false,
    freshBlood: false,
    inactive: false,
  };
}

function client(routes: Record<string, StubReply>, options: { debug?: boolean } = {}) {
  const stub = stubAdapter(routes);
  return { client: new RiotClient('test-secret', 'EUW1', { adapter: stub.adapter, ...options }), requests: stub.requests };
}

/** Serves `payload` at `url` only, and unwraps the decoded value of the one request made. */
async function fetchDecoded<T>(url: string, payload: unknown, call: (riot: RiotClient) => Promise<Result<T>>): Promise<T> {
  const { client: riot, requests } = client({ [url]: ok(payload) });
  const result = await call(riot);

  expect(requests.map((request) => request.url)).toEqual([url]);
  if (!isOk(result)) throw new Error(`expected a success, got ${result.statusCode} ${result.message}`);
  return result.value;
}

describe('routingValueFor', () => {
  it('maps platforms to their routing value', () => {
    expect(routingValueFor('NA1')).toBe('americas');
    expect(routingValueFor('EUW1')).toBe('europe');
    expect(routingValueFor('KR')).toBe('asia');
    expect(routingValueFor('VN2')).toBe('sea');
  });

  it('falls back to americas for unknown platforms', () => {
    expect(routingValueFor('XX1')).toBe('americas');
  });
});

describe('RiotClient', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('requests', () => {
    it('sends account lookups to the routing host with the API key', async () => {
      const { client: riot, requests } = client({
        [`${ROUTING}/riot/account/v1/accounts/by-riot-id/Test%20Player/EUW`]: ok(account),
      });

      const result = await riot.getAccountByRiotId('Test Player', 'EUW');

      expect(result).toEqual({ ok: true, value: expect.objectContaining({ puuid: 'puuid-alpha' }) });
      expect(requests).toEqual([
        {
          url: 'https://europe.api.riotgames.com/riot/account/v1/accounts/by-riot-id/Test%20Player/EUW',
          params: undefined,
          token: 'test-secret',
        },
      ]);
    });

    it('sends summoner lookups to the platform host', async () => {
      const { client: riot, requests } = client({
        [`${PLATFORM}/lol/summoner/v4/summoners/by-puuid/puuid-alpha`]: ok(summoner),
      });

      const result = await riot.getSummonerByPuuid('puuid-alpha');

      expect(isOk(result) && result.value.summonerLevel).toBe(312);
      expect(requests[0].url).toBe('https://euw1.api.riotgames.com/lol/summoner/v4/summoners/by-puuid/puuid-alpha');
    });

    it('uses the configured routing value instead of the derived one', async () => {
      const stub = stubAdapter({});
      const riot = new RiotClient('test-secret', 'EUW1', { adapter: stub.adapter, routingValue: 'americas' });

      await riot.getMatch('EUW1_1');

      expect(riot.routingValue).toBe('americas');
      expect(stub.requests[0].url).toBe('https://americas.api.riotgames.com/lol/match/v5/matches/EUW1_1');
    });

    it('passes paging as query parameters', async () => {
      const { client: riot, requests } = client({
        [`${ROUTING}/lol/match/v5/matches/by-puuid/puuid-alpha/ids`]: ok(['EUW1_1', 'EUW1_2']),
        [`${PLATFORM}/lol/league/v4/entries/RANKED_SOLO_5x5/GOLD/IV`]: ok([]),
      });

      const ids = await riot.getMatchIds('puuid-alpha');
      await riot.getLeagueEntries('RANKED_SOLO_5x5', 'GOLD', 'IV', 3);

      expect(ids).toEqual({ ok: true, value: ['EUW1_1', 'EUW1_2'] });
      expect(requests.map((request) => request.params)).toEqual([{ start: 0, count: 20 }, { page: 3 }]);
    });

    it('returns API errors as failures', async () => {
      const { client: riot } = client({
        [`${PLATFORM}/lol/status/v4/platform-data`]: {
          status: 403,
          data: { status: { message: 'Forbidden', status_code: 403 } },
        },
      });

      expect(await riot.getPlatformData()).toEqual({ ok: false, statusCode: 403, message: 'Forbidden' });
      expect(await riot.getSummonerById('nobody')).toEqual({ ok: false, statusCode: 404, message: 'Data not found' });
    });

    it('rejects on transport errors', async () => {
      const adapter: AxiosAdapter = async () => {
        throw new Error('socket hang up');
      };
      const riot = new RiotClient('test-secret', 'EUW1', { adapter });

      await expect(riot.getFeaturedGames()).rejects.toThrow('socket hang up');
    });

    it('logs status and full URL in debug mode', async () => {
      const { client: riot } = client({ [`${PLATFORM}/lol/champion-mastery/v4/scores/by-summoner/summoner-1`]: ok(42) }, {
        debug: true,
      });

      const score = await riot.getMasteryScore('summoner-1');

      expect(score).toEqual({ ok: true, value: 42 });
      expect(console.log).toHaveBeenCalledWith('Riot API response', {
        status: 200,
        url: 'https://euw1.api.riotgames.com/lol/champion-mastery/v4/scores/by-summoner/summoner-1',
      });
    });
  });

  describe('decoding', () => {
    it('decodes matches and timelines', async () => {
      const { client: riot } = client({
        [`${ROUTING}/lol/match/v5/matches/EUW1_7000000001`]: ok(matchFixture),
        [`${ROUTING}/lol/match/v5/matches/EUW1_7000000001/timeline`]: ok(timelineFixture),
      });

      const match = await riot.getMatch('EUW1_7000000001');
      const timeline = await riot.getMatchTimeline('EUW1_7000000001');

      expect(isOk(match) && match.value.info.gameDurationSeconds).toBe(1834);
      expect(isOk(timeline) && timeline.value.info.frames[0].participantFrames.slot10.participantId).toBe(10);
    });

    it('drops duplicate league entries', async () => {
      const solo = leagueEntry('RANKED_SOLO_5x5', 'GOLD', 'II');
      const { client: riot } = client({
        [`${PLATFORM}/lol/league/v4/entries/by-summoner/summoner-1`]: ok([solo, { ...solo }]),
      });

      const result = await riot.getLeague('summoner-1');

      expect(isOk(result) && result.value.length).toBe(1);
    });
  });

  describe('ranked queues', () => {
    const route = `${PLATFORM}/lol/league/v4/entries/by-summoner/summoner-1`;

    it('picks the solo and flex entries by queue type', async () => {
      const { client: riot } = client({
        [route]: ok([leagueEntry('RANKED_FLEX_SR', 'SILVER', 'I'), leagueEntry('RANKED_SOLO_5x5', 'GRANDMASTER', 'I')]),
      });

      const solo = await riot.getSoloLeague('summoner-1');
      const flex = await riot.getFlexLeague('summoner-1');

      expect(isOk(solo) && solo.value.short).toBe('GM1');
      expect(isOk(flex) && flex.value.short).toBe('S1');
    });

    it('resolves to null when the player is unranked in a queue', async () => {
      const { client: riot } = client({ [route]: ok([leagueEntry('RANKED_SOLO_5x5', 'GOLD', 'IV')]) });

      expect(await riot.getFlexLeague('summoner-1')).toBeNull();
    });

    it('passes failures through', async () => {
      const { client: riot } = client({});

      expect(await riot.getSoloLeague('summoner-1')).toEqual({ ok: false, statusCode: 404, message: 'Data not found' });
    });
  });

  describe('getNthMatch', () => {
    const idsRoute = `${ROUTING}/lol/match/v5/matches/by-puuid/puuid-alpha/ids`;

    it('fetches the match at the given offset', async () => {
      const { client: riot, requests } = client({
        [idsRoute]: ok(['EUW1_7000000001']),
        [`${ROUTING}/lol/match/v5/matches/EUW1_7000000001`]: ok(matchFixture),
      });

      const match = await riot.getNthMatch('puuid-alpha', 2);

      expect(isOk(match) && match.value.metadata.matchId).toBe('EUW1_7000000001');
      expect(requests[0].params).toEqual({ start: 2, count: 1 });
      expect(requests).toHaveLength(2);
    });

    it('resolves to null without a second request when there is no match', async () => {
      const { client: riot, requests } = client({ [idsRoute]: ok([]) });

      expect(await riot.getLastMatch('puuid-alpha')).toBeNull();
      expect(requests).toHaveLength(1);
      expect(requests[0].params).toEqual({ start: 0, count: 1 });
    });

    it('passes a failed id lookup through', async () => {
      const { client: riot, requests } = client({
        [idsRoute]: { status: 429, data: { status: { message: 'Rate limit exceeded', status_code: 429 } } },
      });

      expect(await riot.getLastMatch('puuid-alpha')).toEqual({ ok: false, statusCode: 429, message: 'Rate limit exceeded' });
      expect(requests).toHaveLength(1);
    });
  });

  describe('endpoints', () => {
    it('reads accounts and active shards from the routing host', async () => {
      const account = await fetchDecoded(
        `${ROUTING}/riot/account/v1/accounts/by-puuid/puuid-alpha`,
        endpoints.account,
        (riot) => riot.getAccountByPuuid('puuid-alpha')
      );
      const shard = await fetchDecoded(
        `${ROUTING}/riot/account/v1/active-shards/by-game/lor/by-puuid/puuid-alpha`,
        endpoints.activeShard,
        (riot) => riot.getActiveShard('lor', 'puuid-alpha')
      );

      expect(account.tagLine).toBe('EUW');
      expect(shard.activeShard).toBe('europe');
    });

    it('reads champion masteries and the rotation from the platform host', async () => {
      const masteries = await fetchDecoded(
        `${PLATFORM}/lol/champion-mastery/v4/champion-masteries/by-summoner/summoner-1`,
        [endpoints.championMastery],
        (riot) => riot.getMasteries('summoner-1')
      );
      const mastery = await fetchDecoded(
        `${PLATFORM}/lol/champion-mastery/v4/champion-masteries/by-summoner/summoner-1/by-champion/103`,
        endpoints.championMastery,
        (riot) => riot.getChampionMastery('summoner-1', 103)
      );
      const rotation = await fetchDecoded(
        `${PLATFORM}/lol/platform/v3/champion-rotations`,
        endpoints.championRotation,
        (riot) => riot.getChampionRotation()
      );

      expect(masteries.map((entry) => entry.championPoints)).toEqual([245000]);
      expect(mastery.championLevel).toBe(7);
      expect(rotation.freeChampionIds).toEqual([103, 86, 62]);
    });

    it('reads clash players and tournaments', async () => {
      const players = await fetchDecoded(
        `${PLATFORM}/lol/clash/v1/players/by-summoner/summoner-1`,
        [endpoints.clashPlayer],
        (riot) => riot.getClashPlayers('summoner-1')
      );
      const tournaments = await fetchDecoded(
        `${PLATFORM}/lol/clash/v1/tournaments`,
        [endpoints.clashTournament],
        (riot) => riot.getClashTournaments()
      );

      expect(players[0].teamId).toBe('team-1');
      expect(tournaments[0].schedule[0].id).toBe(5001);
    });

    it('reads the apex leagues of a queue', async () => {
      const challenger = await fetchDecoded(
        `${PLATFORM}/lol/league/v4/challengerleagues/by-queue/RANKED_SOLO_5x5`,
        endpoints.leagueList,
        (riot) => riot.getChallengerLeague('RANKED_SOLO_5x5')
      );
      const grandmaster = await fetchDecoded(
        `${PLATFORM}/lol/league/v4/grandmasterleagues/by-queue/RANKED_FLEX_SR`,
        { ...endpoints.leagueList, tier: 'GRANDMASTER' },
        (riot) => riot.getGrandmasterLeague('RANKED_FLEX_SR')
      );
      const master = await fetchDecoded(
        `${PLATFORM}/lol/league/v4/masterleagues/by-queue/RANKED_SOLO_5x5`,
        { ...endpoints.leagueList, tier: 'MASTER', entries: [] },
        (riot) => riot.getMasterLeague('RANKED_SOLO_5x5')
      );

      expect(challenger.entries[0].leaguePoints).toBe(1024);
      expect(grandmaster.tier).toBe('GRANDMASTER');
      expect(master.entries).toEqual([]);
    });

    it('reads both status versions', async () => {
      const shard = await fetchDecoded(`${PLATFORM}/lol/status/v3/shard-data`, endpoints.shardStatus, (riot) =>
        riot.getPlatformDataV3()
      );
      const platform = await fetchDecoded(`${PLATFORM}/lol/status/v4/platform-data`, endpoints.platformData, (riot) =>
        riot.getPlatformData()
      );

      expect(shard.services[0].status).toBe('online');
      expect(platform.maintenances[0].updated_at).toBeNull();
      expect(platform.incidents[0].archive_at).toBeNull();
    });

    it('reads Legends of Runeterra matches and the leaderboard from the routing host', async () => {
      const ids = await fetchDecoded(
        `${ROUTING}/lor/match/v1/matches/by-puuid/puuid-alpha/ids`,
        endpoints.lorMatchIds,
        (riot) => riot.getLorMatchIds('puuid-alpha')
      );
      const match = await fetchDecoded(`${ROUTING}/lor/match/v1/matches/lor-match-1`, endpoints.lorMatch, (riot) =>
        riot.getLorMatch('lor-match-1')
      );
      const leaderboard = await fetchDecoded(
        `${ROUTING}/lor/ranked/v1/leaderboards`,
        endpoints.lorLeaderboard,
        (riot) => riot.getLorLeaderboard()
      );

      expect(ids).toEqual(['lor-match-1']);
      expect(match.info.players[1].deck_code).toBe('CODEBRAVO');
      expect(leaderboard.players[0].lp).toBe(1200);
    });

    it('reads active and featured games', async () => {
      const game = await fetchDecoded(
        `${PLATFORM}/lol/spectator/v4/active-games/by-summoner/summoner-1`,
        endpoints.currentGame,
        (riot) => riot.getActiveGame('summoner-1')
      );
      const featured = await fetchDecoded(
        `${PLATFORM}/lol/spectator/v4/featured-games`,
        endpoints.featuredGames,
        (riot) => riot.getFeaturedGames()
      );

      expect(game.participants[0].perks.perkStyle).toBe(8100);
      expect(featured.gameList[0].gameQueueConfigId).toBe(450);
    });

    it('reads summoners by account, id and escaped name', async () => {
      const byAccount = await fetchDecoded(
        `${PLATFORM}/lol/summoner/v4/summoners/by-account/account-1`,
        endpoints.summoner,
        (riot) => riot.getSummonerByAccountId('account-1')
      );
      const byId = await fetchDecoded(`${PLATFORM}/lol/summoner/v4/summoners/summoner-1`, endpoints.summoner, (riot) =>
        riot.getSummonerById('summoner-1')
      );
      const byName = await fetchDecoded(
        `${PLATFORM}/lol/summoner/v4/summoners/by-name/Test%20Player%2F2`,
        endpoints.summoner,
        (riot) => riot.getSummonerByName('Test Player/2')
      );

      expect(byAccount.puuid).toBe('puuid-alpha');
      expect(byId.accountId).toBe('account-1');
      expect(byName.name).toBe('Test Player');
    });
  });

  describe('Data Dragon URLs', () => {
    it('requires a static data cache', () => {
      const riot = new RiotClient('test-secret', 'EUW1');

      expect(() => riot.profileIconUrl(1)).toThrow('No static data cache was given to this client');
    });

    it('delegates to the static data cache', async () => {
      const { adapter } = stubAdapter({
        [`${DDRAGON_BASE_URL}/api/versions.json`]: ok(versions),
        [QUEUES_URL]: ok(queues),
        [`${DDRAGON_BASE_URL}/cdn/14.3.1/data/en_US/champion.json`]: ok(championList),
        [`${DDRAGON_BASE_URL}/cdn/languages.json`]: ok(languages),
      });
      const staticData = new StaticDataCache({ adapter });
      await staticData.load();
      const riot = new RiotClient('test-secret', 'EUW1', { staticData });

      expect(riot.profileIconUrl(7)).toBe('https://ddragon.leagueoflegends.com/cdn/14.3.1/img/profileicon/7.png');
      expect(riot.championImageUrl(86)).toBe('https://ddragon.leagueoflegends.com/cdn/img/champion/splash/Garen_0.jpg');
    });
  });
});
