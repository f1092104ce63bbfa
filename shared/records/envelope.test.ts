import { describe, expect, it } from 'vitest';
import { SchemaMismatchError } from '../utils';
import { LeagueEntrySchema, MiniSeriesSchema } from './definitions';
import { renderRecord } from './schema';
import {
  classify,
  failure,
  failureFromPayload,
  integer,
  isFailure,
  isOk,
  many,
  one,
  records,
  stringList,
  success,
  uniqueMany,
} from './envelope';

const miniSeries = { losses: 1, progress: 'WLN', target: 3, wins: 1 };

const leagueEntry = {
  leagueId: 'league-1',
  summonerId: 'summoner-1',
  summonerName: 'Player1',
  queueType: 'RANKED_SOLO_5x5',
  tier: 'GOLD',
  rank: 'IV',
  leaguePoints: 42,
  wins: 10,
  losses: 8,
  hotStreak: false,
  veteran: false,
  freshBlood: true,
  inactive: false,
};

describe('classify', () => {
  it('decodes 2xx payloads with the target', () => {
    for (const status of [200, 204, 299]) {
      const result = classify(status, miniSeries, one(MiniSeriesSchema));

      expect(isOk(result)).toBe(true);
      if (isOk(result)) {
        expect(result.value.progress).toBe('WLN');
      }
    }
  });

  it('passes the raw payload through without a target', () => {
    const payload = { anything: [1, 2] };

    expect(classify(200, payload)).toEqual({ ok: true, value: payload });
  });

  it('reads failures from the status object of the payload', () => {
    const result = classify(404, { status: { message: 'Data not found', status_code: 404 } }, one(MiniSeriesSchema));

    expect(result).toEqual({ ok: false, statusCode: 404, message: 'Data not found' });
    expect(isOk(result)).toBe(false);
  });

  it('takes the failure content from the payload, not the HTTP status', () => {
    expect(classify(429, { status: { message: 'Rate limit exceeded', status_code: 429 } })).toEqual(
      failure(429, 'Rate limit exceeded')
    );
    expect(classify(503, { status: { message: 'Unavailable' } })).toEqual(failure(400, 'Unavailable'));
  });

  it('falls back to 400 Bad Request for unreadable error bodies', () => {
    for (const status of [199, 300, 404, 500]) {
      expect(classify(status, null)).toEqual({ ok: false, statusCode: 400, message: 'Bad Request' });
    }
    expect(classify(500, 'Internal Server Error')).toEqual(failure());
    expect(classify(500, { status: 'broken' })).toEqual(failure());
    expect(classify(500, { status: { message: 7, status_code: '500' } })).toEqual(failure());
  });

  it('never decodes a failure payload', () => {
    expect(() => classify(400, { unexpected: true }, one(MiniSeriesSchema))).not.toThrow();
  });

  it('propagates schema mismatches on success', () => {
    expect(() => classify(200, { losses: 1 }, one(MiniSeriesSchema))).toThrow(SchemaMismatchError);
  });
});

describe('isOk', () => {
  it('is false for the absent marker', () => {
    expect(isOk(null)).toBe(false);
    expect(isOk(undefined)).toBe(false);
  });

  it('separates successes from failures by tag, not by content', () => {
    expect(isOk(success([]))).toBe(true);
    expect(isOk(success(0))).toBe(true);
    expect(isOk(failure())).toBe(false);
  });

  it('is true for records', () => {
    expect(isOk(MiniSeriesSchema.decode(miniSeries))).toBe(true);
  });

  it('recognises only failures it made', () => {
    expect(isFailure(failureFromPayload({}))).toBe(true);
    expect(isFailure({ ok: false })).toBe(false);
    expect(isFailure({ ok: false, statusCode: 404, message: 'Data not found' })).toBe(false);
  });

  it('treats decoded data shaped like a failure as a success', () => {
    const result = classify(200, { ok: false, statusCode: 1, message: 'x' });

    expect(isOk(result)).toBe(true);
    expect(isOk(result) && isOk(result.value)).toBe(true);
  });

  it('keeps the failure tag off the enumerable fields', () => {
    expect(Object.keys(failure(404, 'Data not found'))).toEqual(['ok', 'statusCode', 'message']);
    expect(JSON.stringify(failure(404, 'Data not found'))).toBe('{"ok":false,"statusCode":404,"message":"Data not found"}');
  });
});

describe('rendering results', () => {
  it('renders failures under their own name without the tag', () => {
    expect(renderRecord(failure(404, 'Data not found'))).toBe(
      'ApiFailure(\n    statusCode = 404,\n    message = "Data not found"\n)'
    );
  });
});

describe('decode targets', () => {
  it('decodes objects to one record and lists to many with records()', () => {
    const single = records(MiniSeriesSchema)(miniSeries);
    const several = records(MiniSeriesSchema)([miniSeries, { ...miniSeries, wins: 2 }]);

    expect(Array.isArray(single)).toBe(false);
    expect(Array.isArray(several)).toBe(true);
    expect(several).toHaveLength(2);
  });

  it('requires a list for many()', () => {
    expect(() => many(MiniSeriesSchema)(miniSeries)).toThrow('MiniSeries at MiniSeries: expected a list, got an object');
  });

  it('keeps payload order in many()', () => {
    const decoded = many(MiniSeriesSchema)([
      { ...miniSeries, wins: 2 },
      { ...miniSeries, wins: 0 },
    ]);

    expect(decoded.map((series) => series.wins)).toEqual([2, 0]);
    expect(Object.isFrozen(decoded)).toBe(true);
  });

  it('names the failing element in many()', () => {
    expect(() => many(MiniSeriesSchema)([miniSeries, { wins: 1 }])).toThrow(
      'MiniSeries at MiniSeries[1].losses: missing required field'
    );
  });

  it('collapses structurally identical entries in uniqueMany()', () => {
    const reordered = Object.fromEntries(Object.entries(leagueEntry).reverse());
    const flex = { ...leagueEntry, queueType: 'RANKED_FLEX_SR' };
    const decoded = uniqueMany(LeagueEntrySchema)([leagueEntry, reordered, flex]);

    expect(decoded.map((entry) => entry.queueType)).toEqual(['RANKED_SOLO_5x5', 'RANKED_FLEX_SR']);
  });

  it('narrows primitive payloads', () => {
    expect(stringList(['EUW1_1', 'EUW1_2'])).toEqual(['EUW1_1', 'EUW1_2']);
    expect(integer(42)).toBe(42);
    expect(() => stringList(['EUW1_1', 2])).toThrow('StringList at StringList[1]: expected a string, got a number');
    expect(() => integer(4.5)).toThrow(SchemaMismatchError);
  });
});
