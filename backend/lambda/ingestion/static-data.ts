/**
 * Data Dragon static data
 *
 * Champion, queue and language tables used to turn ids into names and URLs.
 * Nothing is fetched until `load()`; the host decides when (and how often)
 * to pay for it.
 * Documentation: https://developer.riotgames.com/docs/lol#data-dragon
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import {
  ChampionSchema,
  classify,
  isOk,
  many,
  QueueSchema,
  ShortChampionSchema,
  stringList,
  type Champion,
  type DecodeTarget,
  type Result,
  type ShortChampion,
} from '../../../shared/records';
import { bestMatch, isPlainObject, RiotClientError, SchemaMismatchError } from '../../../shared/utils';

export const DDRAGON_BASE_URL = 'https://ddragon.leagueoflegends.com';
export const QUEUES_URL = 'https://static.developer.riotgames.com/docs/lol/queues.json';
export const DEFAULT_LANGUAGE = 'en_US';

const LANGUAGE_ALIASES: Record<string, string> = {
  en: 'en_US',
  it: 'it_IT',
};

export interface StaticDataOptions {
  baseUrl?: string;
  queuesUrl?: string;
  timeoutMs?: number;
  debug?: boolean;
  adapter?: AxiosAdapter;
}

interface StaticSnapshot {
  version: string;
  queues: Map<number, string>;
  champions: Map<string, ShortChampion>;
  championNamesById: Map<number, string>;
  languages: readonly string[];
}

function describeQueue(description: string | null): string {
  return description ? description.replace(/games/g, '').trim() : 'Custom';
}

/** `data` of a champion document, keyed by champion name. */
function championData(payload: unknown): Record<string, unknown> {
  const data = isPlainObject(payload) ? payload.data : undefined;
  if (!isPlainObject(data)) {
    throw new SchemaMismatchError('ChampionList', 'ChampionList.data', 'missing required field');
  }
  return data;
}

const championList: DecodeTarget<Map<string, ShortChampion>> = (payload) => {
  const data = championData(payload);
  const champions = new Map<string, ShortChampion>();
  for (const name of Object.keys(data)) {
    champions.set(name, ShortChampionSchema.decode(data[name], `ChampionList.data.${name}`));
  }
  return champions;
};

function fullChampion(name: string): DecodeTarget<Champion> {
  return (payload) => {
    const data = championData(payload);
    if (!Object.prototype.hasOwnProperty.call(data, name)) {
      throw new SchemaMismatchError('ChampionList', `ChampionList.data.${name}`, 'missing required field');
    }
    return ChampionSchema.decode(data[name], `Champion(${name})`);
  };
}

export class StaticDataCache {
  private http: AxiosInstance;
  private baseUrl: string;
  private queuesUrl: string;
  private debug: boolean;
  private snapshot: StaticSnapshot | null = null;
  private pending: Promise<void> | null = null;

  constructor(options: StaticDataOptions = {}) {
    this.baseUrl = options.baseUrl ?? DDRAGON_BASE_URL;
    this.queuesUrl = options.queuesUrl ?? QUEUES_URL;
    this.debug = options.debug ?? false;
    this.http = axios.create({
      baseURL: this.baseUrl,
      timeout: options.timeoutMs ?? 10000,
      validateStatus: () => true,
      adapter: options.adapter,
    });
  }

  get isLoaded(): boolean {
    return this.snapshot !== null;
  }

  /**
   * Fetches every table unless they are already loaded.
   * Concurrent callers share one fetch.
   */
  async load(): Promise<void> {
    if (this.snapshot) return;
    await this.refresh();
  }

  /** Refetches every table; the previous tables stay in use until the new ones are complete. */
  async refresh(): Promise<void> {
    if (!this.pending) {
      this.pending = this.fetchSnapshot()
        .then((snapshot) => {
          this.snapshot = snapshot;
        })
        .finally(() => {
          this.pending = null;
        });
    }
    return this.pending;
  }

  get version(): string {
    return this.require().version;
  }

  get languages(): readonly string[] {
    return this.require().languages;
  }

  /** Queue description without the word "games"; unknown ids use queue 0's. */
  queueDescription(queueId: number): string {
    const { queues } = this.require();
    return queues.get(queueId) ?? queues.get(0) ?? 'Custom';
  }

  /** Looks a champion up by its Data Dragon name ("MonkeyKing", not "Wukong"). */
  championByName(name: string): ShortChampion | null {
    return this.require().champions.get(name) ?? null;
  }

  championById(championId: number): ShortChampion | null {
    const name = this.require().championNamesById.get(championId);
    return name === undefined ? null : this.championByName(name);
  }

  championFromSimilarName(search: string): ShortChampion | null {
    const { champions } = this.require();
    const name = bestMatch(search, champions.keys());
    return name === null ? null : champions.get(name) ?? null;
  }

  language(search: string): string | null {
    const { languages } = this.require();
    if (languages.includes(search)) return search;
    const alias = LANGUAGE_ALIASES[search.toLowerCase()];
    if (alias && languages.includes(alias)) return alias;
    return bestMatch(search, languages);
  }

  profileIconUrl(iconId: number): string {
    return `${this.baseUrl}/cdn/${this.version}/img/profileicon/${iconId}.png`;
  }

  /** Splash (or `type`) art of a champion skin; null for an unknown champion id. */
  championImageUrl(championId: number, skin = 0, type = 'splash'): string | null {
    const name = this.require().championNamesById.get(championId);
    if (name === undefined) return null;
    return `${this.baseUrl}/cdn/img/champion/${type}/${name}_${skin}.jpg`;
  }

  /** Full champion document in the given language (normalised through `language()` when not listed). */
  async getFullChampion(name: string, language: string = DEFAULT_LANGUAGE): Promise<Result<Champion>> {
    const { version, languages } = this.require();
    const lang = languages.includes(language) ? language : this.language(language) ?? DEFAULT_LANGUAGE;
    const url = `/cdn/${version}/data/${lang}/champion/${encodeURIComponent(name)}.json`;
    const response = await this.http.get<unknown>(url);
    this.log(response.status, url);
    return classify(response.status, response.data, fullChampion(name));
  }

  private require(): StaticSnapshot {
    if (!this.snapshot) {
      throw new RiotClientError('STATIC_DATA_NOT_LOADED', 'Static data has not been loaded; call load() first');
    }
    return this.snapshot;
  }

  private async fetchSnapshot(): Promise<StaticSnapshot> {
    const versions = await this.fetchTable('/api/versions.json', stringList);
    if (versions.length === 0) {
      throw new RiotClientError('STATIC_DATA_UNAVAILABLE', 'Data Dragon returned no versions');
    }
    const version = versions[0];

    const queueRecords = await this.fetchTable(this.queuesUrl, many(QueueSchema));
    const queues = new Map<number, string>(
      queueRecords.map((queue): [number, string] => [queue.queueId, describeQueue(queue.description)])
    );

    const champions = await this.fetchTable(`/cdn/${version}/data/${DEFAULT_LANGUAGE}/champion.json`, championList);
    const championNamesById = new Map<number, string>();
    for (const [name, champion] of champions) {
      championNamesById.set(champion.intId, name);
    }

    const languages = await this.fetchTable('/cdn/languages.json', stringList);

    console.log('Static data loaded', {
      version,
      queues: queues.size,
      champions: champions.size,
      languages: languages.length,
    });
    return { version, queues, champions, championNamesById, languages };
  }

  private async fetchTable<T>(url: string, target: DecodeTarget<T>): Promise<T> {
    const response = await this.http.get<unknown>(url);
    this.log(response.status, url);
    const result = classify(response.status, response.data, target);
    if (!isOk(result)) {
      console.error('Static data request failed', { url, statusCode: result.statusCode, message: result.message });
      throw new RiotClientError('STATIC_DATA_UNAVAILABLE', `Failed to fetch ${url}: ${result.message}`, {
        url,
        statusCode: result.statusCode,
      });
    }
    return result.value;
  }

  private log(status: number, url: string): void {
    if (this.debug) {
      console.log('Data Dragon response', { status, url });
    }
  }
}
