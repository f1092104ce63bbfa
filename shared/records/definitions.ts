/**
 * Record schemas for every payload shape the client decodes.
 *
 * Leaf records come first in each section so that parents can nest them.
 * Each schema is exported as `XSchema`, its decoded record type as `X`.
 */

import { durationInSeconds, rankShort, SchemaMismatchError } from '../utils';
import {
  bool,
  defineRecord,
  extendRecord,
  json,
  list,
  nested,
  num,
  numList,
  optional,
  slots,
  str,
  strList,
  type RecordOf,
} from './schema';

// ============================================================================
// Data Dragon
// ============================================================================

const SPRITE_FIELDS = {
  full: str(),
  sprite: str(),
  group: str(),
  x: num(),
  y: num(),
  w: num(),
  h: num(),
};

export const ChampionImageSchema = defineRecord('ChampionImage', SPRITE_FIELDS);
export type ChampionImage = RecordOf<typeof ChampionImageSchema>;

export const ChampionSpellImageSchema = defineRecord('ChampionSpellImage', SPRITE_FIELDS);
export type ChampionSpellImage = RecordOf<typeof ChampionSpellImageSchema>;

export const ChampionPassiveImageSchema = defineRecord('ChampionPassiveImage', SPRITE_FIELDS);
export type ChampionPassiveImage = RecordOf<typeof ChampionPassiveImageSchema>;

export const ChampionSkinSchema = defineRecord('ChampionSkin', {
  id: str(),
  num: num(),
  name: str(),
  chromas: bool(),
});
export type ChampionSkin = RecordOf<typeof ChampionSkinSchema>;

export const ChampionInfoSchema = defineRecord('ChampionInfo', {
  attack: num(),
  defense: num(),
  magic: num(),
  difficulty: num(),
});
export type ChampionInfo = RecordOf<typeof ChampionInfoSchema>;

export const ChampionStatsSchema = defineRecord('ChampionStats', {
  hp: num(),
  hpperlevel: num(),
  mp: num(),
  mpperlevel: num(),
  movespeed: num(),
  armor: num(),
  armorperlevel: num(),
  spellblock: num(),
  spellblockperlevel: num(),
  attackrange: num(),
  hpregen: num(),
  hpregenperlevel: num(),
  mpregen: num(),
  mpregenperlevel: num(),
  crit: num(),
  critperlevel: num(),
  attackdamage: num(),
  attackdamageperlevel: num(),
  attackspeedperlevel: num(),
  attackspeed: num(),
});
export type ChampionStats = RecordOf<typeof ChampionStatsSchema>;

export const ChampionSpellLeveltipSchema = defineRecord('ChampionSpellLeveltip', {
  label: strList(),
  effect: strList(),
});
export type ChampionSpellLeveltip = RecordOf<typeof ChampionSpellLeveltipSchema>;

// Free-form: every key lands in `extensions`
export const ChampionSpellDatavaluesSchema = defineRecord('ChampionSpellDatavalues', {});
export type ChampionSpellDatavalues = RecordOf<typeof ChampionSpellDatavaluesSchema>;

export const ChampionSpellSchema = defineRecord('ChampionSpell', {
  id: str(),
  name: str(),
  description: str(),
  tooltip: str(),
  leveltip: nested(ChampionSpellLeveltipSchema),
  maxrank: num(),
  cooldown: numList(),
  cooldownBurn: str(),
  cost: numList(),
  costBurn: str(),
  datavalues: nested(ChampionSpellDatavaluesSchema),
  effect: list(json()),
  effectBurn: list(json()),
  vars: list(json()),
  costType: str(),
  maxammo: str(),
  range: numList(),
  rangeBurn: str(),
  image: nested(ChampionSpellImageSchema),
  resource: str(),
});
export type ChampionSpell = RecordOf<typeof ChampionSpellSchema>;

export const ChampionPassiveSchema = defineRecord('ChampionPassive', {
  name: str(),
  description: str(),
  image: nested(ChampionPassiveImageSchema),
});
export type ChampionPassive = RecordOf<typeof ChampionPassiveSchema>;

function parseChampionKey(key: string): number {
  if (!/^-?\d+$/.test(key)) {
    throw new SchemaMismatchError('ShortChampion', 'ShortChampion.key', `expected an integer string, got ${JSON.stringify(key)}`);
  }
  return Number.parseInt(key, 10);
}

/** Champion summary, as listed in `champion.json`. `intId` is `key` as a number. */
export const ShortChampionSchema = defineRecord(
  'ShortChampion',
  {
    blurb: str(),
    id: str(),
    image: nested(ChampionImageSchema),
    info: nested(ChampionInfoSchema),
    key: str(),
    name: str(),
    partype: str(),
    stats: nested(ChampionStatsSchema),
    tags: strList(),
    title: str(),
    version: str(),
  },
  (values) => ({ intId: parseChampionKey(values.key) })
);
export type ShortChampion = RecordOf<typeof ShortChampionSchema>;

/** Full champion document, from `champion/{name}.json`. */
export const ChampionSchema = extendRecord(ShortChampionSchema, 'Champion', {
  skins: list(nested(ChampionSkinSchema)),
  lore: str(),
  allytips: strList(),
  enemytips: strList(),
  spells: list(nested(ChampionSpellSchema)),
  passive: nested(ChampionPassiveSchema),
  recommended: list(json()),
});
export type Champion = RecordOf<typeof ChampionSchema>;

/** One entry of the queue list published with the developer docs. */
export const QueueSchema = defineRecord('Queue', {
  queueId: num(),
  map: str(),
  description: optional(str()),
  notes: optional(str()),
});
export type Queue = RecordOf<typeof QueueSchema>;

// ============================================================================
// account-v1
// ============================================================================

export const AccountSchema = defineRecord('Account', {
  puuid: str(),
  gameName: str(),
  tagLine: str(),
});
export type Account = RecordOf<typeof AccountSchema>;

export const ActiveShardSchema = defineRecord('ActiveShard', {
  puuid: str(),
  game: str(),
  activeShard: str(),
});
export type ActiveShard = RecordOf<typeof ActiveShardSchema>;

// ============================================================================
// champion-mastery-v4 / champion-v3
// ============================================================================

export const ChampionMasterySchema = defineRecord('ChampionMastery', {
  championPointsUntilNextLevel: num(),
  chestGranted: bool(),
  championId: num(),
  lastPlayTime: num(),
  championLevel: num(),
  summonerId: str(),
  championPoints: num(),
  championPointsSinceLastLevel: num(),
  tokensEarned: num(),
});
export type ChampionMastery = RecordOf<typeof ChampionMasterySchema>;

export const ChampionRotationSchema = defineRecord('ChampionRotation', {
  maxNewPlayerLevel: num(),
  freeChampionIdsForNewPlayers: numList(),
  freeChampionIds: numList(),
});
export type ChampionRotation = RecordOf<typeof ChampionRotationSchema>;

// ============================================================================
// clash-v1
// ============================================================================

export const ClashPlayerSchema = defineRecord('ClashPlayer', {
  summonerId: str(),
  teamId: str(),
  position: str(),
  role: str(),
});
export type ClashPlayer = RecordOf<typeof ClashPlayerSchema>;

export const ClashTournamentPhaseSchema = defineRecord('ClashTournamentPhase', {
  id: num(),
  registrationTime: num(),
  startTime: num(),
  cancelled: bool(),
});
export type ClashTournamentPhase = RecordOf<typeof ClashTournamentPhaseSchema>;

export const ClashTournamentSchema = defineRecord('ClashTournament', {
  id: num(),
  themeId: num(),
  nameKey: str(),
  nameKeySecondary: str(),
  schedule: list(nested(ClashTournamentPhaseSchema)),
});
export type ClashTournament = RecordOf<typeof ClashTournamentSchema>;

// ============================================================================
// league-v4
// ============================================================================

export const MiniSeriesSchema = defineRecord('MiniSeries', {
  losses: num(),
  progress: str(),
  target: num(),
  wins: num(),
});
export type MiniSeries = RecordOf<typeof MiniSeriesSchema>;

/** One player's standing inside a LeagueList. `miniSeries` is null outside promotion series. */
export const LeagueItemSchema = defineRecord('LeagueItem', {
  summonerId: str(),
  summonerName: str(),
  leaguePoints: num(),
  rank: optional(str()),
  wins: num(),
  losses: num(),
  veteran: bool(),
  inactive: bool(),
  freshBlood: bool(),
  hotStreak: bool(),
  miniSeries: optional(nested(MiniSeriesSchema)),
});
export type LeagueItem = RecordOf<typeof LeagueItemSchema>;

export const LeagueListSchema = defineRecord('LeagueList', {
  tier: str(),
  leagueId: str(),
  queue: str(),
  name: str(),
  entries: list(nested(LeagueItemSchema)),
});
export type LeagueList = RecordOf<typeof LeagueListSchema>;

/** A player's entry in one ranked queue, with `short` as the compact rank label ("G4", "GM1", "??"). */
export const LeagueEntrySchema = extendRecord(
  LeagueItemSchema,
  'LeagueEntry',
  {
    queueType: str(),
    leagueId: optional(str()),
    tier: optional(str()),
  },
  (values) => ({ short: rankShort(values.tier, values.rank) })
);
export type LeagueEntry = RecordOf<typeof LeagueEntrySchema>;

// ============================================================================
// lol-status-v3
// ============================================================================

export const TranslationSchema = defineRecord('Translation', {
  locale: str(),
  heading: str(),
  content: str(),
});
export type Translation = RecordOf<typeof TranslationSchema>;

export const MessageSchema = defineRecord('Message', {
  id: str(),
  author: str(),
  heading: str(),
  content: str(),
  severity: str(),
  created_at: str(),
  updated_at: str(),
  translations: list(nested(TranslationSchema)),
});
export type Message = RecordOf<typeof MessageSchema>;

export const IncidentSchema = defineRecord('Incident', {
  id: num(),
  active: bool(),
  created_at: str(),
  updates: list(nested(MessageSchema)),
});
export type Incident = RecordOf<typeof IncidentSchema>;

export const ServiceSchema = defineRecord('Service', {
  name: str(),
  slug: str(),
  status: str(),
  incidents: list(nested(IncidentSchema)),
});
export type Service = RecordOf<typeof ServiceSchema>;

export const ShardStatusSchema = defineRecord('ShardStatus', {
  name: str(),
  slug: str(),
  locales: strList(),
  hostname: str(),
  region_tag: str(),
  services: list(nested(ServiceSchema)),
});
export type ShardStatus = RecordOf<typeof ShardStatusSchema>;

// ============================================================================
// lol-status-v4
// ============================================================================

export const ContentSchema = defineRecord('Content', {
  locale: str(),
  content: str(),
});
export type Content = RecordOf<typeof ContentSchema>;

export const UpdateSchema = defineRecord('Update', {
  id: num(),
  author: str(),
  publish: bool(),
  publish_locations: strList(),
  translations: list(nested(ContentSchema)),
  created_at: str(),
  updated_at: str(),
});
export type Update = RecordOf<typeof UpdateSchema>;

export const StatusSchema = defineRecord('Status', {
  id: num(),
  maintenance_status: optional(str()),
  incident_severity: optional(str()),
  titles: list(nested(ContentSchema)),
  updates: list(nested(UpdateSchema)),
  created_at: str(),
  archive_at: optional(str()),
  updated_at: optional(str()),
  platforms: strList(),
});
export type Status = RecordOf<typeof StatusSchema>;

export const PlatformDataSchema = defineRecord('PlatformData', {
  id: str(),
  name: str(),
  locales: strList(),
  maintenances: list(nested(StatusSchema)),
  incidents: list(nested(StatusSchema)),
});
export type PlatformData = RecordOf<typeof PlatformDataSchema>;

// ============================================================================
// lor-match-v1 / lor-ranked-v1
// ============================================================================

export const LorMetadataSchema = defineRecord('LorMetadata', {
  data_version: str(),
  match_id: str(),
  participants: strList(),
});
export type LorMetadata = RecordOf<typeof LorMetadataSchema>;

export const LorPlayerSchema = defineRecord('LorPlayer', {
  puuid: str(),
  deck_id: str(),
  deck_code: str(),
  factions: strList(),
  game_outcome: str(),
  order_of_play: num(),
});
export type LorPlayer = RecordOf<typeof LorPlayerSchema>;

export const LorInfoSchema = defineRecord('LorInfo', {
  game_mode: str(),
  game_type: str(),
  game_start_time_utc: str(),
  game_version: str(),
  players: list(nested(LorPlayerSchema)),
  total_turn_count: num(),
});
export type LorInfo = RecordOf<typeof LorInfoSchema>;

export const LorMatchSchema = defineRecord('LorMatch', {
  metadata: nested(LorMetadataSchema),
  info: nested(LorInfoSchema),
});
export type LorMatch = RecordOf<typeof LorMatchSchema>;

export const LorLeaderboardPlayerSchema = defineRecord('LorLeaderboardPlayer', {
  name: str(),
  rank: num(),
  lp: num(),
});
export type LorLeaderboardPlayer = RecordOf<typeof LorLeaderboardPlayerSchema>;

export const LorLeaderboardSchema = defineRecord('LorLeaderboard', {
  players: list(nested(LorLeaderboardPlayerSchema)),
});
export type LorLeaderboard = RecordOf<typeof LorLeaderboardSchema>;

// ============================================================================
// match-v5
// ============================================================================

export const MatchMetadataSchema = defineRecord('MatchMetadata', {
  dataVersion: str(),
  matchId: str(),
  participants: strList(),
});
export type MatchMetadata = RecordOf<typeof MatchMetadataSchema>;

export const PerkStatsSchema = defineRecord('PerkStats', {
  defense: num(),
  flex: num(),
  offense: num(),
});
export type PerkStats = RecordOf<typeof PerkStatsSchema>;

export const PerkStyleSelectionSchema = defineRecord('PerkStyleSelection', {
  perk: num(),
  var1: num(),
  var2: num(),
  var3: num(),
});
export type PerkStyleSelection = RecordOf<typeof PerkStyleSelectionSchema>;

export const PerkStyleSchema = defineRecord('PerkStyle', {
  description: str(),
  selections: list(nested(PerkStyleSelectionSchema)),
  style: num(),
});
export type PerkStyle = RecordOf<typeof PerkStyleSchema>;

export const PerksSchema = defineRecord('Perks', {
  statPerks: nested(PerkStatsSchema),
  styles: list(nested(PerkStyleSchema)),
});
export type Perks = RecordOf<typeof PerksSchema>;

export const ParticipantSchema = defineRecord('Participant', {
  assists: num(),
  baronKills: num(),
  bountyLevel: num(),
  champExperience: num(),
  champLevel: num(),
  championId: num(),
  championName: str(),
  championTransform: num(),
  consumablesPurchased: num(),
  damageDealtToBuildings: num(),
  damageDealtToObjectives: num(),
  damageDealtToTurrets: num(),
  damageSelfMitigated: num(),
  deaths: num(),
  detectorWardsPlaced: num(),
  doubleKills: num(),
  dragonKills: num(),
  firstBloodAssist: bool(),
  firstBloodKill: bool(),
  firstTowerAssist: bool(),
  firstTowerKill: bool(),
  gameEndedInEarlySurrender: bool(),
  gameEndedInSurrender: bool(),
  goldEarned: num(),
  goldSpent: num(),
  individualPosition: str(),
  inhibitorKills: num(),
  inhibitorTakedowns: optional(num(), 0),
  inhibitorsLost: num(),
  item0: num(),
  item1: num(),
  item2: num(),
  item3: num(),
  item4: num(),
  item5: num(),
  item6: num(),
  itemsPurchased: num(),
  killingSprees: num(),
  kills: num(),
  lane: str(),
  largestCriticalStrike: num(),
  largestKillingSpree: num(),
  largestMultiKill: num(),
  longestTimeSpentLiving: num(),
  magicDamageDealt: num(),
  magicDamageDealtToChampions: num(),
  magicDamageTaken: num(),
  neutralMinionsKilled: num(),
  nexusKills: num(),
  nexusTakedowns: optional(num(), 0),
  nexusLost: num(),
  objectivesStolen: num(),
  objectivesStolenAssists: num(),
  participantId: num(),
  pentaKills: num(),
  perks: nested(PerksSchema),
  physicalDamageDealt: num(),
  physicalDamageDealtToChampions: num(),
  physicalDamageTaken: num(),
  profileIcon: num(),
  puuid: str(),
  quadraKills: num(),
  riotIdName: str(),
  riotIdTagline: str(),
  role: str(),
  sightWardsBoughtInGame: num(),
  spell1Casts: num(),
  spell2Casts: num(),
  spell3Casts: num(),
  spell4Casts: num(),
  summoner1Casts: num(),
  summoner1Id: num(),
  summoner2Casts: num(),
  summoner2Id: num(),
  summonerId: str(),
  summonerLevel: num(),
  summonerName: str(),
  teamEarlySurrendered: bool(),
  teamId: num(),
  teamPosition: str(),
  timeCCingOthers: num(),
  timePlayed: num(),
  totalDamageDealt: num(),
  totalDamageDealtToChampions: num(),
  totalDamageShieldedOnTeammates: num(),
  totalDamageTaken: num(),
  totalHeal: num(),
  totalHealsOnTeammates: num(),
  totalMinionsKilled: num(),
  totalTimeCCDealt: num(),
  totalTimeSpentDead: num(),
  totalUnitsHealed: num(),
  tripleKills: num(),
  trueDamageDealt: num(),
  trueDamageDealtToChampions: num(),
  trueDamageTaken: num(),
  turretKills: num(),
  turretTakedowns: optional(num(), 0),
  turretsLost: num(),
  unrealKills: num(),
  visionScore: num(),
  visionWardsBoughtInGame: num(),
  wardsKilled: num(),
  wardsPlaced: num(),
  win: bool(),
});
export type Participant = RecordOf<typeof ParticipantSchema>;

export const BanSchema = defineRecord('Ban', {
  championId: num(),
  pickTurn: num(),
});
export type Ban = RecordOf<typeof BanSchema>;

export const ObjectiveSchema = defineRecord('Objective', {
  first: bool(),
  kills: num(),
});
export type Objective = RecordOf<typeof ObjectiveSchema>;

export const ObjectivesSchema = defineRecord('Objectives', {
  baron: nested(ObjectiveSchema),
  champion: nested(ObjectiveSchema),
  dragon: nested(ObjectiveSchema),
  inhibitor: nested(ObjectiveSchema),
  riftHerald: nested(ObjectiveSchema),
  tower: nested(ObjectiveSchema),
});
export type Objectives = RecordOf<typeof ObjectivesSchema>;

export const TeamSchema = defineRecord('Team', {
  bans: list(nested(BanSchema)),
  objectives: nested(ObjectivesSchema),
  teamId: num(),
  win: bool(),
});
export type Team = RecordOf<typeof TeamSchema>;

/**
 * Match summary. `gameEndTimestamp` falls back to start + duration when the
 * payload has none (or 0); `gameDurationSeconds` reads `gameDuration` as
 * milliseconds when it is above 10000.
 */
export const MatchInfoSchema = defineRecord(
  'MatchInfo',
  {
    gameCreation: num(),
    gameDuration: num(),
    gameEndTimestamp: optional(num(), 0),
    gameId: num(),
    gameMode: str(),
    gameName: str(),
    gameStartTimestamp: num(),
    gameType: str(),
    gameVersion: str(),
    mapId: num(),
    participants: list(nested(ParticipantSchema)),
    platformId: str(),
    queueId: num(),
    teams: list(nested(TeamSchema)),
    tournamentCode: optional(str()),
  },
  (values) => ({
    gameEndTimestamp: values.gameEndTimestamp || values.gameStartTimestamp + values.gameDuration,
    gameDurationSeconds: durationInSeconds(values.gameDuration),
  })
);
export type MatchInfo = RecordOf<typeof MatchInfoSchema>;

export const MatchSchema = defineRecord('Match', {
  metadata: nested(MatchMetadataSchema),
  info: nested(MatchInfoSchema),
});
export type Match = RecordOf<typeof MatchSchema>;

// ============================================================================
// match-v5 timeline
// ============================================================================

export const TimelinePositionSchema = defineRecord('TimelinePosition', {
  x: num(),
  y: num(),
});
export type TimelinePosition = RecordOf<typeof TimelinePositionSchema>;

export const TimelineDamageSchema = defineRecord('TimelineDamage', {
  basic: bool(),
  magicDamage: num(),
  name: str(),
  participantId: num(),
  physicalDamage: num(),
  spellName: str(),
  spellSlot: num(),
  trueDamage: num(),
  type: str(),
});
export type TimelineDamage = RecordOf<typeof TimelineDamageSchema>;

/** Every event type shares this record; fields an event type does not carry are null. */
export const TimelineEventSchema = defineRecord('TimelineEvent', {
  timestamp: num(),
  type: str(),
  levelUpType: optional(str()),
  participantId: optional(num()),
  skillSlot: optional(num()),
  realTimestamp: optional(num()),
  itemId: optional(num()),
  afterId: optional(num()),
  beforeId: optional(num()),
  goldGain: optional(num()),
  creatorId: optional(num()),
  wardType: optional(str()),
  assistingParticipantIds: optional(numList()),
  bounty: optional(num()),
  killStreakLength: optional(num()),
  killerId: optional(num()),
  position: optional(nested(TimelinePositionSchema)),
  victimDamageDealt: optional(list(nested(TimelineDamageSchema))),
  victimDamageReceived: optional(list(nested(TimelineDamageSchema))),
  victimId: optional(num()),
  killType: optional(str()),
  level: optional(num()),
  multiKillLength: optional(num()),
  laneType: optional(str()),
  teamId: optional(num()),
  killerTeamId: optional(num()),
  monsterSubType: optional(str()),
  monsterType: optional(str()),
  buildingType: optional(str()),
  towerType: optional(str()),
  name: optional(str()),
  gameId: optional(num()),
  winningTeam: optional(num()),
});
export type TimelineEvent = RecordOf<typeof TimelineEventSchema>;

export const TimelineChampionStatsSchema = defineRecord('TimelineChampionStats', {
  abilityHaste: num(),
  abilityPower: num(),
  armor: num(),
  armorPen: num(),
  armorPenPercent: num(),
  attackDamage: num(),
  attackSpeed: num(),
  bonusArmorPenPercent: num(),
  bonusMagicPenPercent: num(),
  ccReduction: num(),
  cooldownReduction: num(),
  health: num(),
  healthMax: num(),
  healthRegen: num(),
  lifesteal: num(),
  magicPen: num(),
  magicPenPercent: num(),
  magicResist: num(),
  movementSpeed: num(),
  omnivamp: num(),
  physicalVamp: num(),
  power: num(),
  powerMax: num(),
  powerRegen: num(),
  spellVamp: num(),
});
export type TimelineChampionStats = RecordOf<typeof TimelineChampionStatsSchema>;

export const TimelineDamageStatsSchema = defineRecord('TimelineDamageStats', {
  magicDamageDone: num(),
  magicDamageDoneToChampions: num(),
  magicDamageTaken: num(),
  physicalDamageDone: num(),
  physicalDamageDoneToChampions: num(),
  physicalDamageTaken: num(),
  totalDamageDone: num(),
  totalDamageDoneToChampions: num(),
  totalDamageTaken: num(),
  trueDamageDone: num(),
  trueDamageDoneToChampions: num(),
  trueDamageTaken: num(),
});
export type TimelineDamageStats = RecordOf<typeof TimelineDamageStatsSchema>;

export const ParticipantFrameSchema = defineRecord('ParticipantFrame', {
  championStats: nested(TimelineChampionStatsSchema),
  currentGold: num(),
  damageStats: nested(TimelineDamageStatsSchema),
  goldPerSecond: num(),
  jungleMinionsKilled: num(),
  level: num(),
  minionsKilled: num(),
  participantId: num(),
  position: nested(TimelinePositionSchema),
  timeEnemySpentControlled: num(),
  totalGold: num(),
  xp: num(),
});
export type ParticipantFrame = RecordOf<typeof ParticipantFrameSchema>;

/** Frames keyed "1".."10" by participant, exposed as `slot1`..`slot10`. */
export const ParticipantFramesSchema = slots('ParticipantFrames', ParticipantFrameSchema, 10);
export type ParticipantFrames = RecordOf<typeof ParticipantFramesSchema>;

export const TimelineFrameSchema = defineRecord('TimelineFrame', {
  events: list(nested(TimelineEventSchema)),
  participantFrames: nested(ParticipantFramesSchema),
  timestamp: num(),
});
export type TimelineFrame = RecordOf<typeof TimelineFrameSchema>;

export const TimelineParticipantSchema = defineRecord('TimelineParticipant', {
  participantId: num(),
  puuid: str(),
});
export type TimelineParticipant = RecordOf<typeof TimelineParticipantSchema>;

export const TimelineInfoSchema = defineRecord('TimelineInfo', {
  frameInterval: num(),
  frames: list(nested(TimelineFrameSchema)),
  gameId: num(),
  participants: list(nested(TimelineParticipantSchema)),
});
export type TimelineInfo = RecordOf<typeof TimelineInfoSchema>;

export const MatchTimelineSchema = defineRecord('MatchTimeline', {
  metadata: nested(MatchMetadataSchema),
  info: nested(TimelineInfoSchema),
});
export type MatchTimeline = RecordOf<typeof MatchTimelineSchema>;

// ============================================================================
// spectator-v4
// ============================================================================

export const BannedChampionSchema = defineRecord('BannedChampion', {
  championId: num(),
  teamId: num(),
  pickTurn: num(),
});
export type BannedChampion = RecordOf<typeof BannedChampionSchema>;

export const ObserverSchema = defineRecord('Observer', {
  encryptionKey: str(),
});
export type Observer = RecordOf<typeof ObserverSchema>;

export const SpectatorPerksSchema = defineRecord('SpectatorPerks', {
  perkIds: numList(),
  perkStyle: num(),
  perkSubStyle: num(),
});
export type SpectatorPerks = RecordOf<typeof SpectatorPerksSchema>;

export const GameCustomizationObjectSchema = defineRecord('GameCustomizationObject', {
  category: str(),
  content: str(),
});
export type GameCustomizationObject = RecordOf<typeof GameCustomizationObjectSchema>;

export const CurrentGameParticipantSchema = defineRecord('CurrentGameParticipant', {
  championId: num(),
  perks: nested(SpectatorPerksSchema),
  profileIconId: num(),
  bot: bool(),
  teamId: num(),
  summonerName: str(),
  summonerId: str(),
  spell1Id: num(),
  spell2Id: num(),
  gameCustomizationObjects: list(nested(GameCustomizationObjectSchema)),
});
export type CurrentGameParticipant = RecordOf<typeof CurrentGameParticipantSchema>;

export const CurrentGameInfoSchema = defineRecord('CurrentGameInfo', {
  gameId: num(),
  gameType: str(),
  gameStartTime: num(),
  mapId: num(),
  gameLength: num(),
  platformId: str(),
  gameMode: str(),
  bannedChampions: list(nested(BannedChampionSchema)),
  gameQueueConfigId: num(),
  observers: nested(ObserverSchema),
  participants: list(nested(CurrentGameParticipantSchema)),
});
export type CurrentGameInfo = RecordOf<typeof CurrentGameInfoSchema>;

export const SpectatorParticipantSchema = defineRecord('SpectatorParticipant', {
  teamId: num(),
  spell1Id: num(),
  spell2Id: num(),
  championId: num(),
  profileIconId: num(),
  summonerName: str(),
  bot: bool(),
});
export type SpectatorParticipant = RecordOf<typeof SpectatorParticipantSchema>;

export const FeaturedGameInfoSchema = defineRecord('FeaturedGameInfo', {
  gameMode: str(),
  gameLength: num(),
  mapId: num(),
  gameType: str(),
  bannedChampions: list(nested(BannedChampionSchema)),
  gameId: num(),
  observers: nested(ObserverSchema),
  gameQueueConfigId: num(),
  gameStartTime: num(),
  participants: list(nested(SpectatorParticipantSchema)),
  platformId: str(),
});
export type FeaturedGameInfo = RecordOf<typeof FeaturedGameInfoSchema>;

export const FeaturedGamesSchema = defineRecord('FeaturedGames', {
  gameList: list(nested(FeaturedGameInfoSchema)),
  clientRefreshInterval: num(),
});
export type FeaturedGames = RecordOf<typeof FeaturedGamesSchema>;

// ============================================================================
// summoner-v4
// ============================================================================

export const SummonerSchema = defineRecord('Summoner', {
  accountId: str(),
  profileIconId: num(),
  revisionDate: num(),
  name: str(),
  id: str(),
  puuid: str(),
  summonerLevel: num(),
});
export type Summoner = RecordOf<typeof SummonerSchema>;
