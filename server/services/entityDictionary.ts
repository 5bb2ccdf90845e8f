import type {
  AvailabilityStatus,
  FPLBootstrap,
  FPLFixture,
  FPLPlayer,
  FPLTeam,
  Fixture,
  GroupEntity,
  PersonEntity,
  Position,
} from '@shared/schema';
import { SnapshotIntegrityError } from './errors';
import { normalizeName, tokenizeName } from './nameMatcher';
import { getTeamAliasTable } from './referenceData';

export interface PersonNameForms {
  display: string;
  full: string;
  first: string;
  second: string;
  fullTokens: string[];
}

export interface TeamAliasEntry {
  alias: string;
  groupId: number;
}

export interface EntityDictionary {
  personsById: ReadonlyMap<number, PersonEntity>;
  groupsById: ReadonlyMap<number, GroupEntity>;
  nameForms: ReadonlyMap<number, PersonNameForms>;
  /** Every team alias, longest first. */
  teamAliases: readonly TeamAliasEntry[];
}

export interface DatasetSnapshot {
  readonly generationId: number;
  readonly fetchedAt: Date;
  readonly currentGameweek: number | null;
  readonly persons: readonly PersonEntity[];
  readonly groups: readonly GroupEntity[];
  readonly fixtures: readonly Fixture[];
  readonly dictionary: EntityDictionary;
}

export interface SnapshotSource {
  bootstrap: FPLBootstrap;
  fixtures: FPLFixture[];
  generationId: number;
  fetchedAt?: Date;
  aliasTable?: Record<string, string[]>;
}

const POSITIONS: Record<number, Position> = {
  1: 'Keeper',
  2: 'Defender',
  3: 'Midfielder',
  4: 'Forward',
};

export function mapAvailability(code: string): AvailabilityStatus {
  switch (code) {
    case 'a':
    case 'd':
      return 'Active';
    case 'i':
      return 'Injured';
    case 'n':
      return 'OnLoan';
    default:
      return 'Unavailable';
  }
}

function toPerson(player: FPLPlayer, position: Position): PersonEntity {
  const firstName = player.first_name.trim();
  const secondName = player.second_name.trim();
  return Object.freeze({
    id: player.id,
    displayName: player.web_name.trim(),
    fullName: `${firstName} ${secondName}`.trim(),
    firstName,
    secondName,
    teamId: player.team,
    position,
    price: player.now_cost,
    stats: Object.freeze({
      points: player.total_points,
      goals: player.goals_scored,
      assists: player.assists,
      minutes: player.minutes,
      form: player.form,
      ownershipPercent: player.selected_by_percent,
      expectedGoals: player.expected_goals,
    }),
    status: mapAvailability(player.status),
    statusNote: player.news ?? '',
  });
}

function toGroup(team: FPLTeam, aliasTable: Record<string, string[]>): GroupEntity {
  const aliases: string[] = [];
  for (const alias of [team.name, ...(aliasTable[team.short_name] ?? [])]) {
    const normalized = normalizeName(alias);
    if (normalized && !aliases.includes(normalized)) {
      aliases.push(normalized);
    }
  }
  return Object.freeze({
    id: team.id,
    canonicalName: team.name,
    shortName: team.short_name,
    aliases: Object.freeze(aliases),
  });
}

function toFixture(fixture: FPLFixture): Fixture {
  return Object.freeze({
    id: fixture.id,
    gameweek: fixture.event,
    homeTeamId: fixture.team_h,
    awayTeamId: fixture.team_a,
    kickoffTime: fixture.kickoff_time,
    finished: fixture.finished,
    homeDifficulty: fixture.team_h_difficulty,
    awayDifficulty: fixture.team_a_difficulty,
  });
}

function nameFormsFor(person: PersonEntity): PersonNameForms {
  const full = normalizeName(person.fullName);
  return {
    display: normalizeName(person.displayName),
    full,
    first: normalizeName(person.firstName),
    second: normalizeName(person.secondName),
    fullTokens: tokenizeName(full),
  };
}

/**
 * Builds an immutable snapshot from upstream payloads. Throws
 * SnapshotIntegrityError when a person or fixture references a team that is
 * not part of the same payload.
 */
export function buildSnapshot(source: SnapshotSource): DatasetSnapshot {
  const aliasTable = source.aliasTable ?? getTeamAliasTable();
  const violations: string[] = [];

  const groups = source.bootstrap.teams.map(team => toGroup(team, aliasTable));
  const groupsById = new Map<number, GroupEntity>();
  for (const group of groups) {
    if (groupsById.has(group.id)) {
      violations.push(`duplicate team id ${group.id}`);
    }
    groupsById.set(group.id, group);
  }

  const persons: PersonEntity[] = [];
  const personsById = new Map<number, PersonEntity>();
  const nameForms = new Map<number, PersonNameForms>();
  let skipped = 0;

  for (const player of source.bootstrap.elements) {
    const position = POSITIONS[player.element_type];
    if (!position) {
      skipped += 1;
      continue;
    }
    if (!groupsById.has(player.team)) {
      violations.push(`player ${player.id} references unknown team ${player.team}`);
      continue;
    }
    if (personsById.has(player.id)) {
      violations.push(`duplicate player id ${player.id}`);
      continue;
    }
    const person = toPerson(player, position);
    persons.push(person);
    personsById.set(person.id, person);
    nameForms.set(person.id, nameFormsFor(person));
  }

  const fixtures = source.fixtures.map(toFixture);
  for (const fixture of fixtures) {
    for (const teamId of [fixture.homeTeamId, fixture.awayTeamId]) {
      if (!groupsById.has(teamId)) {
        violations.push(`fixture ${fixture.id} references unknown team ${teamId}`);
      }
    }
  }

  if (violations.length > 0) {
    throw new SnapshotIntegrityError(
      `Dataset failed integrity checks (${violations.length} violation${violations.length === 1 ? '' : 's'})`,
      violations,
    );
  }

  if (skipped > 0) {
    console.log(`[dictionary] Skipped ${skipped} element(s) without a playing position`);
  }

  const teamAliases: TeamAliasEntry[] = [];
  const claimed = new Set<string>();
  for (const group of groups) {
    for (const alias of group.aliases) {
      if (claimed.has(alias)) {
        console.warn(`[dictionary] Alias "${alias}" already claimed; ignoring for ${group.canonicalName}`);
        continue;
      }
      claimed.add(alias);
      teamAliases.push({ alias, groupId: group.id });
    }
  }
  teamAliases.sort((a, b) => b.alias.length - a.alias.length || a.alias.localeCompare(b.alias));

  const current = source.bootstrap.events.find(event => event.is_current);

  return Object.freeze({
    generationId: source.generationId,
    fetchedAt: source.fetchedAt ?? new Date(),
    currentGameweek: current?.id ?? null,
    persons: Object.freeze(persons),
    groups: Object.freeze(groups),
    fixtures: Object.freeze(fixtures),
    dictionary: Object.freeze({
      personsById,
      groupsById,
      nameForms,
      teamAliases: Object.freeze(teamAliases),
    }),
  });
}

export function teamName(snapshot: DatasetSnapshot, teamId: number): string {
  return snapshot.dictionary.groupsById.get(teamId)?.canonicalName ?? `Team ${teamId}`;
}
