/**
 * Maintenance CLI Commands: build and update representative directories
 *
 * @module cli/commands/maintenance
 */

import { type } from "arktype";
import type { Command } from "commander";
import { FastaParser } from "../../formats/fasta";
import { DEFAULT_KMER_SIZE, DEFAULT_MIN_SCORE } from "../../representatives/constants";
import { mergeInto } from "../../representatives/merge";
import { markerGenomeId, readGenomeNames, saveIndex } from "../../representatives/persistence";
import { RepresentativeGenomeIndex } from "../../representatives/rep-genome-index";
import type { MarkerRecord } from "../../types";
import { parseNonNegativeInt, parsePositiveInt } from "../options";
import { loadForCommand, validOptions, type Runner } from "./helpers";

const BuildOptions = type({ kmer: "number.integer>0", score: "number.integer>=0" });
const UpdateOptions = type({ "clear?": "boolean" });

export function registerMaintenanceCommands(program: Command, run: Runner): void {
  program
    .command("build <fasta> <names> <outDir>")
    .description("Create a representative directory from marker proteins and genome names")
    .option("-k, --kmer <n>", "kmer size", parsePositiveInt, DEFAULT_KMER_SIZE)
    .option("-s, --score <n>", "minimum similarity score", parseNonNegativeInt, DEFAULT_MIN_SCORE)
    .action(async (fasta: string, names: string, outDir: string, raw: unknown) =>
      run(async (runtime) => {
        const opts = validOptions(BuildOptions(raw));
        const warn = (file: string) => (warning: string, lineNumber?: number) =>
          runtime.logger.warn(lineNumber === undefined ? `${file}: ${warning}` : `${file} line ${lineNumber}: ${warning}`);

        const genomeNames = await readGenomeNames(names, warn(names));
        const records: MarkerRecord[] = [];
        const parser = new FastaParser({ onError: warn(fasta), onWarning: warn(fasta) });
        for await (const record of parser.parseFile(fasta)) {
          const genomeId = markerGenomeId(record);
          const name = genomeNames.get(genomeId);
          if (name === undefined) {
            runtime.logger.warn(`Genome ${genomeId} has no name in ${names}; skipped.`);
            continue;
          }
          records.push({ genomeId, name, sequence: record.sequence });
        }

        const index = new RepresentativeGenomeIndex({ kmerSize: opts.kmer, minScore: opts.score });
        const { inserted, skipped } = index.insertBatch(records, {
          onError: (error) => runtime.logger.warn(error.message),
        });
        await saveIndex(index, outDir);
        runtime.logger.info(`${inserted} representatives written to ${outDir}, ${skipped} skipped.`);
      })
    );

  program
    .command("update <sourceDir> <targetDir>")
    .description("Connect the genomes of one representative set to the representatives of another")
    .option("--clear", "discard the target's existing connections first")
    .action(async (sourceDir: string, targetDir: string, raw: unknown) =>
      run(async (runtime) => {
        const opts = validOptions(UpdateOptions(raw));
        const clear = opts.clear === true;
        const source = await loadForCommand(sourceDir, runtime.logger, { unconnected: true });
        const target = await loadForCommand(targetDir, runtime.logger, { unconnected: clear });

        const result = mergeInto(source, target, {
          clear,
          onProgress: (message) => runtime.logger.debug(message),
        });
        for (const { genomeId, name } of result.unrepresentable) {
          runtime.logger.info(`${genomeId} (${name}) has no representatives.`);
        }
        await saveIndex(target, targetDir);

        runtime.logger.info(
          `${result.processed} genomes processed: ${result.connected} connected, ` +
            `${result.alreadyRepresentative} already representatives, ` +
            `${result.alreadyRepresented} already represented, ` +
            `${result.unrepresentable.length} without a representative.`
        );
      })
    );
}
