/**
 * Genome and feature identifiers
 *
 * Genome IDs look like `83333.1` (taxon ID, dot, sequence number). Feature IDs
 * embed one: `fig|83333.1.peg.42` or `83333.1.peg.42`.
 */

const GENOME_ID = /^\d+\.\d+$/;
const FEATURE_ID = /^(?:fig\|)?(\d+\.\d+)\.[a-z]+\.\d+$/;

export function isGenomeId(id: string): boolean {
  return GENOME_ID.test(id);
}

/**
 * The genome ID of a genome or feature ID, or undefined when the ID embeds none
 *
 * @example
 * ```typescript
 * genomeIdFromFeature("fig|83333.1.peg.42"); // "83333.1"
 * genomeIdFromFeature("83333.1");            // "83333.1"
 * genomeIdFromFeature("seq7");               // undefined
 * ```
 */
export function genomeIdFromFeature(id: string): string | undefined {
  if (GENOME_ID.test(id)) return id;
  return FEATURE_ID.exec(id)?.[1];
}

/**
 * Normalize a query ID: the embedded genome ID when there is one, else the ID
 */
export function normalizeQueryId(id: string): string {
  return genomeIdFromFeature(id) ?? id;
}
