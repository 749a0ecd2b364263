/**
 * Connecting one representative set's genomes to another
 *
 * Each source representative is matched against the target index and
 * connected to its best target representative when the score clears the
 * target's threshold.
 *
 * @module representatives/merge
 */

import type { RepresentativeGenomeIndex } from "./rep-genome-index";

export interface MergeOptions {
  /**
   * Reconsider genomes the target already has connections for. Load the
   * target with `unconnected: true` (or call `clearConnections`) to start
   * from an empty connection table.
   */
  clear?: boolean;
  /** Called every 100 processed genomes */
  onProgress?: (message: string) => void;
}

export interface UnrepresentableGenome {
  readonly genomeId: string;
  readonly name: string;
  /** Best score found in the target, 0 when the marker had no usable k-mers */
  readonly bestScore: number;
}

export interface MergeResult {
  processed: number;
  connected: number;
  alreadyRepresentative: number;
  alreadyRepresented: number;
  unrepresentable: UnrepresentableGenome[];
}

/**
 * Connect every source representative to its closest target representative
 */
export function mergeInto(
  source: RepresentativeGenomeIndex,
  target: RepresentativeGenomeIndex,
  options: MergeOptions = {}
): MergeResult {
  const result: MergeResult = {
    processed: 0,
    connected: 0,
    alreadyRepresentative: 0,
    alreadyRepresented: 0,
    unrepresentable: [],
  };

  for (const genome of source) {
    result.processed++;

    if (target.isRepresentative(genome.genomeId)) {
      result.alreadyRepresentative++;
    } else if (options.clear !== true && target.checkRepresented(genome.genomeId) !== undefined) {
      result.alreadyRepresented++;
    } else {
      const match = target.bestMatch(genome.sequence);
      if (match !== undefined && match.score >= target.minScore) {
        target.connect(match.genomeId, genome.genomeId, match.score);
        result.connected++;
      } else {
        result.unrepresentable.push({
          genomeId: genome.genomeId,
          name: genome.name,
          bestScore: match?.score ?? 0,
        });
      }
    }

    if (result.processed % 100 === 0) {
      options.onProgress?.(
        `${result.processed} genomes processed, ${result.connected} representatives found.`
      );
    }
  }

  return result;
}
