/**
 * Represented groups: which query genomes each representative stands for
 *
 * @module representatives/grouping
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { RepresentativeGenome } from "./rep-genome";
import type { RepresentativeGenomeIndex } from "./rep-genome-index";
import { DEFAULT_COMMON_ROLE_PERCENT, DEFAULT_MIN_GROUP_SIZE } from "./constants";

/**
 * A representative plus the genomes it represents, with their scores
 */
export interface RepresentedGroup {
  readonly representativeId: string;
  /** Insertion-ordered: member genome ID -> score */
  readonly members: Map<string, number>;
}

export interface QueryGenome {
  readonly id: string;
  readonly sequence: string;
}

export interface BuildGroupsOptions {
  /** Called with the ID of every query that cleared no representative */
  onUnrepresented?: (queryId: string) => void;
}

export interface CommonRoleOptions {
  /** Percent of members that must carry a role (default 97) */
  minPercent?: number;
  /** Groups smaller than this are excluded (default 100) */
  minGroupSize?: number;
  /** Count a role only for members holding exactly one copy */
  singleCopyOnly?: boolean;
}

export interface GroupSize {
  readonly genomeId: string;
  readonly name: string;
  /** Number of represented genomes, excluding the representative */
  readonly count: number;
  readonly proteinLength: number;
}

export interface GroupSummary {
  /** Threshold of the index */
  readonly similarity: number;
  /** Representatives plus represented genomes */
  readonly genomes: number;
  readonly groups: number;
  readonly singles: number;
  /** Genomes in groups of 100 or more */
  readonly ge100: number;
  readonly largest: number;
  /** Mean size excluding singletons and the largest group, to 0.01 */
  readonly meanSize: number;
}

export interface GroupStatistics {
  /** Per representative, largest group first */
  readonly sizes: GroupSize[];
  readonly summary: GroupSummary;
}

const CommonRoleOptionsSchema = type({
  "minPercent?": "0<=number<=100",
  "minGroupSize?": "number.integer>=1",
  "singleCopyOnly?": "boolean",
});

/**
 * Partition query genomes into represented groups
 *
 * A query joins every group whose representative it scores at least
 * `minScore` against. Groups appear in the order they receive their first
 * member; members appear in query order.
 */
function buildGroups(
  index: RepresentativeGenomeIndex,
  queries: Iterable<QueryGenome>,
  minScore: number = index.minScore,
  options: BuildGroupsOptions = {}
): Map<string, RepresentedGroup> {
  const groups = new Map<string, RepresentedGroup>();

  for (const query of queries) {
    const matches = index.matchesAbove(query.sequence, minScore);
    if (matches.size === 0) {
      options.onUnrepresented?.(query.id);
      continue;
    }
    for (const [repId, score] of matches) {
      let group = groups.get(repId);
      if (group === undefined) {
        group = { representativeId: repId, members: new Map() };
        groups.set(repId, group);
      }
      group.members.set(query.id, score);
    }
  }

  return groups;
}

/**
 * The group a representative has accumulated through connections
 */
function groupOf(index: RepresentativeGenomeIndex, representativeId: string): RepresentedGroup {
  const members = new Map<string, number>();
  for (const { genomeId, score } of index.representedList(representativeId)) {
    members.set(genomeId, score);
  }
  return { representativeId, members };
}

/**
 * Roles carried by at least `minPercent` of a group's members
 *
 * The representative counts as a member. Returns undefined for groups below
 * `minGroupSize`; otherwise the qualifying role IDs, sorted.
 */
function commonRoles(
  group: RepresentedGroup,
  roleCountsPerGenome: ReadonlyMap<string, ReadonlyMap<string, number>>,
  options: CommonRoleOptions = {}
): string[] | undefined {
  const validated = CommonRoleOptionsSchema(options);
  if (validated instanceof type.errors) {
    throw new ValidationError(`Invalid common-role options: ${validated.summary}`);
  }
  const minPercent = validated.minPercent ?? DEFAULT_COMMON_ROLE_PERCENT;
  const minGroupSize = validated.minGroupSize ?? DEFAULT_MIN_GROUP_SIZE;
  const singleCopyOnly = validated.singleCopyOnly ?? false;

  const members = new Set<string>([group.representativeId, ...group.members.keys()]);
  if (members.size < minGroupSize) return undefined;

  const counts = new Map<string, number>();
  for (const member of members) {
    const roles = roleCountsPerGenome.get(member);
    if (roles === undefined) continue;
    for (const [role, occurrences] of roles) {
      const counted = singleCopyOnly ? occurrences === 1 : occurrences >= 1;
      if (counted) counts.set(role, (counts.get(role) ?? 0) + 1);
    }
  }

  const limit = Math.ceil((minPercent * members.size) / 100);
  return [...counts]
    .filter(([, count]) => count >= limit)
    .map(([role]) => role)
    .sort();
}

function groupSize(genome: RepresentativeGenome): GroupSize {
  return {
    genomeId: genome.genomeId,
    name: genome.name,
    count: genome.representedCount,
    proteinLength: genome.sequence.length,
  };
}

/**
 * Group sizes and summary statistics for a whole index
 */
function groupStatistics(index: RepresentativeGenomeIndex): GroupStatistics {
  const sizes = Array.from(index, groupSize).sort((a, b) => b.count - a.count);

  let genomes = 0;
  let singles = 0;
  let ge100 = 0;
  let largest = 1;
  let interiorTotal = 0;
  let interiorGroups = 0;

  for (const { count } of sizes) {
    const members = count + 1;
    genomes += members;
    if (members === 1) {
      singles++;
      continue;
    }
    interiorGroups++;
    interiorTotal += members;
    if (members > largest) largest = members;
    if (members >= 100) ge100 += members;
  }

  let meanSize = 1;
  if (largest > 1) {
    interiorTotal -= largest;
    interiorGroups--;
    if (interiorGroups > 0) {
      meanSize = Math.round((interiorTotal / interiorGroups) * 100) / 100;
    }
  }

  return {
    sizes,
    summary: {
      similarity: index.minScore,
      genomes,
      groups: sizes.length,
      singles,
      ge100,
      largest,
      meanSize,
    },
  };
}

export { buildGroups, commonRoles, groupOf, groupStatistics };
