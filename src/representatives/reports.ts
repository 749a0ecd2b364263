/**
 * Query reports over a representative-genome index
 *
 * Generators yield one row at a time so callers can stream large query sets
 * straight to output.
 *
 * @module representatives/reports
 */

import { TsvWriter } from "../formats/tsv";
import {
  DEFAULT_NEIGHBOR_SCORE,
  DEFAULT_VSS_MIN_SCORE,
  DEFAULT_VSS_TAIL_LENGTH,
  NO_REPRESENTATIVE,
} from "./constants";
import { normalizeQueryId } from "./genome-ids";
import type { QueryGenome } from "./grouping";
import type { RepresentativeGenome } from "./rep-genome";
import type { RepresentativeGenomeIndex } from "./rep-genome-index";

type QuerySource = Iterable<QueryGenome> | AsyncIterable<QueryGenome>;

export interface Classification {
  readonly queryId: string;
  /** `<none>` when the query matched nothing */
  readonly representativeId: string;
  readonly representativeName: string;
  readonly score: number;
  /** Whether the score clears the threshold */
  readonly represented: boolean;
}

export interface QueryCount {
  readonly queryId: string;
  readonly count: number;
}

export interface PairScore {
  readonly genome1: string;
  readonly genome2: string;
  readonly score: number;
}

export interface NeighborList {
  readonly genomeId: string;
  /** Neighbor IDs, closest first */
  readonly neighbors: string[];
}

export interface VssOptions {
  /** Length of the C-terminal tail used to bucket markers (default 12) */
  tailLength?: number;
  /** Minimum score for joining a set (default 200) */
  minScore?: number;
}

/**
 * Best representative of each query
 *
 * @example
 * ```typescript
 * for await (const row of classifyQueries(index, queries)) {
 *   console.log(row.queryId, row.representativeId, row.score);
 * }
 * ```
 */
async function* classifyQueries(
  index: RepresentativeGenomeIndex,
  queries: QuerySource,
  minScore: number = index.minScore
): AsyncIterable<Classification> {
  for await (const query of queries) {
    const match = index.bestMatch(query.sequence);
    const representative = match === undefined ? undefined : index.get(match.genomeId);
    const score = match?.score ?? 0;
    yield {
      queryId: query.id,
      representativeId: representative?.genomeId ?? NO_REPRESENTATIVE,
      representativeName: representative?.name ?? "",
      score,
      represented: match !== undefined && score >= minScore,
    };
  }
}

/**
 * Number of representatives each query clears the threshold against
 */
async function* countQueries(
  index: RepresentativeGenomeIndex,
  queries: QuerySource,
  minScore: number = index.minScore
): AsyncIterable<QueryCount> {
  for await (const query of queries) {
    yield { queryId: query.id, count: index.countAbove(query.sequence, minScore) };
  }
}

/**
 * Scores between each non-representative query genome and every
 * representative it clears the threshold against
 */
async function* queryDistances(
  index: RepresentativeGenomeIndex,
  queries: QuerySource,
  minScore: number = index.minScore
): AsyncIterable<PairScore> {
  for await (const query of queries) {
    const genomeId = normalizeQueryId(query.id);
    if (index.isRepresentative(genomeId)) continue;
    for (const [repId, score] of index.matchesAbove(query.sequence, minScore)) {
      yield { genome1: genomeId, genome2: repId, score };
    }
  }
}

/**
 * The top `n` representatives of each query
 */
async function* closestRepresentatives(
  index: RepresentativeGenomeIndex,
  queries: QuerySource,
  n: number,
  minScore = 0
): AsyncIterable<{ queryId: string; matches: PairScore[] }> {
  for await (const query of queries) {
    const matches = index
      .bestMatches(query.sequence, n, minScore)
      .map(({ genomeId, score }) => ({ genome1: query.id, genome2: genomeId, score }));
    yield { queryId: query.id, matches };
  }
}

/**
 * Scores for each unordered pair of representatives, in insertion order
 */
function* representativeMatrix(index: RepresentativeGenomeIndex, minScore = 0): Iterable<PairScore> {
  const genomes = [...index];
  for (let i = 0; i < genomes.length; i++) {
    const first = genomes[i];
    if (first === undefined) continue;
    for (let j = i + 1; j < genomes.length; j++) {
      const second = genomes[j];
      if (second === undefined) continue;
      const score = index.scorer.score(first.kmers, second.kmers);
      if (score >= minScore) {
        yield { genome1: first.genomeId, genome2: second.genomeId, score };
      }
    }
  }
}

/**
 * Other representatives close to each representative, closest first
 */
function* neighborLists(
  index: RepresentativeGenomeIndex,
  minScore: number = DEFAULT_NEIGHBOR_SCORE
): Iterable<NeighborList> {
  for (const genome of index) {
    const neighbors = [...index.matchesAbove(genome.kmers, minScore)]
      .filter(([id]) => id !== genome.genomeId)
      .sort((a, b) => b[1] - a[1])
      .map(([id]) => id);
    yield { genomeId: genome.genomeId, neighbors };
  }
}

/**
 * Sets of very similar representatives
 *
 * Representatives are bucketed by the last `tailLength` residues of their
 * marker. Within each bucket of two or more, the longest marker (the later one
 * on equal length) seeds a set of every unassigned representative scoring at
 * least `minScore` against it. Sets are sorted; singleton sets are dropped.
 */
function verySimilarSets(index: RepresentativeGenomeIndex, options: VssOptions = {}): string[][] {
  const tailLength = options.tailLength ?? DEFAULT_VSS_TAIL_LENGTH;
  const minScore = options.minScore ?? DEFAULT_VSS_MIN_SCORE;

  const tails = new Map<string, RepresentativeGenome[]>();
  for (const genome of index) {
    const tail = genome.sequence.slice(-tailLength).toLowerCase();
    const bucket = tails.get(tail);
    if (bucket === undefined) tails.set(tail, [genome]);
    else bucket.push(genome);
  }

  const seen = new Set<string>();
  const sets: string[][] = [];
  for (const bucket of tails.values()) {
    if (bucket.length < 2) continue;

    const seed = longest(bucket);
    if (seen.has(seed.genomeId)) continue;

    const members = [seed.genomeId];
    for (const other of index) {
      if (other.genomeId === seed.genomeId || seen.has(other.genomeId)) continue;
      if (index.scorer.score(seed.kmers, other.kmers) >= minScore) {
        members.push(other.genomeId);
      }
    }

    if (members.length > 1) {
      members.sort();
      for (const id of members) seen.add(id);
      sets.push(members);
    }
  }
  return sets;
}

function longest(bucket: readonly RepresentativeGenome[]): RepresentativeGenome {
  return bucket.reduce((best, genome) =>
    genome.sequence.length >= best.sequence.length ? genome : best
  );
}

// =============================================================================
// FORMATTING
// =============================================================================

/**
 * Classification rows with a header; rows that are not represented follow
 * after a blank line
 */
function formatClassifications(rows: Iterable<Classification>): string {
  const writer = new TsvWriter(["id", "rep_id", "genome_name", "similarity"]);
  const represented: Classification[] = [];
  const outliers: Classification[] = [];
  for (const row of rows) {
    (row.represented ? represented : outliers).push(row);
  }

  const toFields = (row: Classification): (string | number)[] => [
    row.queryId,
    row.representativeId,
    row.representativeName,
    row.score,
  ];
  let output = writer.formatRows(represented.map(toFields));
  if (outliers.length > 0) {
    output += `\n${new TsvWriter().formatRows(outliers.map(toFields))}`;
  }
  return output;
}

/**
 * One line per representative: its ID followed by its neighbors
 */
function formatNeighborLists(lists: Iterable<NeighborList>): string {
  const rows: string[][] = [];
  for (const { genomeId, neighbors } of lists) {
    rows.push([genomeId, ...neighbors]);
  }
  return new TsvWriter().formatRows(rows);
}

/**
 * One genome ID per line, each set terminated by `//`
 */
function formatVerySimilarSets(sets: Iterable<readonly string[]>): string {
  let output = "";
  for (const set of sets) {
    output += `${set.join("\n")}\n//\n`;
  }
  return output;
}

export {
  classifyQueries,
  closestRepresentatives,
  countQueries,
  formatClassifications,
  formatNeighborLists,
  formatVerySimilarSets,
  neighborLists,
  queryDistances,
  representativeMatrix,
  verySimilarSets,
};
