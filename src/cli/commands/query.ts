/**
 * Query CLI Commands: score FASTA queries against a representative set
 *
 * @module cli/commands/query
 */

import { type } from "arktype";
import type { Command } from "commander";
import { TsvWriter } from "../../formats/tsv";
import {
  classifyQueries,
  closestRepresentatives,
  countQueries,
  formatClassifications,
  queryDistances,
  representativeMatrix,
} from "../../representatives/reports";
import type { Classification } from "../../representatives/reports";
import { parseNonNegativeInt, parsePositiveInt } from "../options";
import { loadForCommand, parseScoreArgument, readQueries, validOptions, type Runner } from "./helpers";

const DistanceOptions = type({ "matrix?": "boolean" });
const ClosestOptions = type({ count: "number.integer>0", "minScore?": "number.integer>=0" });

export function registerQueryCommands(program: Command, run: Runner): void {
  program
    .command("list-reps <repDir> <score> [input]")
    .description("Find the closest representative of each FASTA query")
    .action(async (repDir: string, score: string, input: string | undefined) =>
      run(async (runtime) => {
        const minScore = parseScoreArgument(score);
        const index = await loadForCommand(repDir, runtime.logger);

        const rows: Classification[] = [];
        for await (const row of classifyQueries(index, readQueries(input, runtime), minScore)) {
          rows.push(row);
        }
        runtime.io.stdout(formatClassifications(rows));
      })
    );

  program
    .command("count-reps <repDir> <score> [input]")
    .description("Count the representatives each FASTA query is close to")
    .action(async (repDir: string, score: string, input: string | undefined) =>
      run(async (runtime) => {
        const minScore = parseScoreArgument(score);
        const index = await loadForCommand(repDir, runtime.logger);

        const rows: (string | number)[][] = [];
        for await (const { queryId, count } of countQueries(index, readQueries(input, runtime), minScore)) {
          rows.push([queryId, count]);
        }
        runtime.io.stdout(new TsvWriter(["id", "count"]).formatRows(rows));
      })
    );

  program
    .command("distances <repDir> [input]")
    .description("Scores between query genomes and the representatives they are close to")
    .option("-X, --matrix", "also output scores between all pairs of representatives")
    .action(async (repDir: string, input: string | undefined, raw: unknown) =>
      run(async (runtime) => {
        const opts = validOptions(DistanceOptions(raw));
        const index = await loadForCommand(repDir, runtime.logger);

        const rows: (string | number)[][] = [];
        let count = 0;
        for await (const { genome1, genome2, score } of queryDistances(index, readQueries(input, runtime))) {
          rows.push([genome1, genome2, score]);
          count++;
        }
        runtime.logger.debug(`${count} query distances computed.`);

        if (opts.matrix === true) {
          for (const { genome1, genome2, score } of representativeMatrix(index)) {
            rows.push([genome1, genome2, score]);
          }
        }
        runtime.io.stdout(new TsvWriter(["genome1", "genome2", "score"]).formatRows(rows));
      })
    );

  program
    .command("closest <repDir> [input]")
    .description("The closest representatives of each FASTA query")
    .option("-n, --count <n>", "number of representatives per query", parsePositiveInt, 5)
    .option("-m, --min-score <n>", "minimum score to report", parseNonNegativeInt)
    .action(async (repDir: string, input: string | undefined, raw: unknown) =>
      run(async (runtime) => {
        const opts = validOptions(ClosestOptions(raw));
        const index = await loadForCommand(repDir, runtime.logger);

        const rows: (string | number)[][] = [];
        const queries = readQueries(input, runtime);
        for await (const { matches } of closestRepresentatives(index, queries, opts.count, opts.minScore)) {
          for (const { genome1, genome2, score } of matches) {
            rows.push([genome1, genome2, score]);
          }
        }
        runtime.io.stdout(new TsvWriter(["id", "rep_id", "score"]).formatRows(rows));
      })
    );
}
