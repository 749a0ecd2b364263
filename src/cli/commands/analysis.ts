/**
 * Analysis CLI Commands: relationships inside representative sets
 *
 * @module cli/commands/analysis
 */

import * as path from "node:path";
import { type } from "arktype";
import type { Command } from "commander";
import { TsvParser, TsvWriter } from "../../formats/tsv";
import { writeString } from "../../io/file-writer";
import {
  DEFAULT_COMMON_ROLE_PERCENT,
  DEFAULT_MIN_GROUP_SIZE,
  DEFAULT_NEIGHBOR_SCORE,
  DEFAULT_VSS_MIN_SCORE,
  DEFAULT_VSS_TAIL_LENGTH,
  NEIGHBOR_LISTS_FILE,
  VSS_FILE,
} from "../../representatives/constants";
import { commonRoles, groupOf, groupStatistics } from "../../representatives/grouping";
import {
  formatNeighborLists,
  formatVerySimilarSets,
  neighborLists,
  representativeMatrix,
  verySimilarSets,
} from "../../representatives/reports";
import { parseNonNegativeInt, parsePositiveInt } from "../options";
import { loadForCommand, validOptions, type Runner } from "./helpers";

const MinScoreOptions = type({ minScore: "number.integer>=0" });
const GroupOptions = type({ "sep?": "boolean" });
const StatsOptions = type({ "sizes?": "boolean" });
const VssOptions = type({ tail: "number.integer>0", minScore: "number.integer>=0" });
const RoleOptions = type({
  percent: "0<=number<=100",
  size: "number.integer>0",
  "singleCopy?": "boolean",
});

/**
 * Read `genomeID<TAB>roleID<TAB>count` rows into per-genome role tables
 */
async function readRoleCounts(
  file: string,
  onWarning: (warning: string, lineNumber?: number) => void
): Promise<Map<string, Map<string, number>>> {
  const roleCounts = new Map<string, Map<string, number>>();
  const parser = new TsvParser({ minColumns: 3, commentPrefix: "#", onWarning });
  for await (const { fields, lineNumber } of parser.parseFile(file)) {
    const [genomeId = "", role = "", countField = ""] = fields;
    const count = Number(countField);
    if (!Number.isInteger(count) || count < 0) {
      onWarning(`Invalid role count '${countField}'`, lineNumber);
      continue;
    }
    let roles = roleCounts.get(genomeId);
    if (roles === undefined) {
      roles = new Map();
      roleCounts.set(genomeId, roles);
    }
    roles.set(role, (roles.get(role) ?? 0) + count);
  }
  return roleCounts;
}

export function registerAnalysisCommands(program: Command, run: Runner): void {
  program
    .command("matrix <repDir>")
    .description("Scores between every pair of representatives")
    .option("-m, --min-score <n>", "minimum score to report", parseNonNegativeInt, 0)
    .action(async (repDir: string, raw: unknown) =>
      run(async (runtime) => {
        const opts = validOptions(MinScoreOptions(raw));
        const index = await loadForCommand(repDir, runtime.logger, { unconnected: true });

        const rows: (string | number)[][] = [];
        for (const { genome1, genome2, score } of representativeMatrix(index, opts.minScore)) {
          rows.push([genome1, genome2, score]);
        }
        runtime.io.stdout(new TsvWriter(["genome1", "genome2", "score"]).formatRows(rows));
      })
    );

  program
    .command("neighbors <repDir>")
    .description(`Write each representative's close representatives to ${NEIGHBOR_LISTS_FILE}`)
    .option("-m, --min-score <n>", "minimum similarity score", parseNonNegativeInt, DEFAULT_NEIGHBOR_SCORE)
    .action(async (repDir: string, raw: unknown) =>
      run(async (runtime) => {
        const opts = validOptions(MinScoreOptions(raw));
        const index = await loadForCommand(repDir, runtime.logger, { unconnected: true });
        runtime.logger.info(`${index.size} representative genomes to process.`);

        let found = 0;
        const lists = [...neighborLists(index, opts.minScore)];
        for (const list of lists) found += list.neighbors.length;

        await writeString(path.join(repDir, NEIGHBOR_LISTS_FILE), formatNeighborLists(lists));
        runtime.logger.info(`${found} neighbors written to ${NEIGHBOR_LISTS_FILE}.`);
      })
    );

  program
    .command("groups <repDir>")
    .description("List the genomes connected to each representative")
    .option("--sep", "end each group with a // line")
    .action(async (repDir: string, raw: unknown) =>
      run(async (runtime) => {
        const opts = validOptions(GroupOptions(raw));
        const index = await loadForCommand(repDir, runtime.logger);
        const writer = new TsvWriter();

        let output = writer.formatRow(["rep_id", "rep_name", "genome_id", "score"]) + "\n";
        for (const genome of index) {
          const group = groupOf(index, genome.genomeId);
          if (group.members.size === 0) continue;
          for (const [genomeId, score] of group.members) {
            output += writer.formatRow([genome.genomeId, genome.name, genomeId, score]) + "\n";
          }
          if (opts.sep === true) output += "//\n";
        }
        runtime.io.stdout(output);
      })
    );

  program
    .command("stats <repDirs...>")
    .description("Group statistics for one or more representative sets")
    .option("--sizes", "also list the group size of every representative")
    .action(async (repDirs: string[], raw: unknown) =>
      run(async (runtime) => {
        const opts = validOptions(StatsOptions(raw));
        const summaryRows: (string | number)[][] = [];
        const sizeRows: (string | number)[][] = [];

        for (const repDir of repDirs) {
          const index = await loadForCommand(repDir, runtime.logger);
          const { sizes, summary } = groupStatistics(index);
          runtime.logger.debug(
            `${summary.singles} singleton groups found out of ${summary.groups} covering ${summary.genomes} genomes.`
          );
          summaryRows.push([
            repDir,
            summary.similarity,
            summary.genomes,
            summary.groups,
            summary.singles,
            summary.ge100,
            summary.largest,
            summary.meanSize,
          ]);
          for (const size of sizes) {
            sizeRows.push([repDir, size.genomeId, size.count, size.proteinLength, size.name]);
          }
        }

        let output = new TsvWriter([
          "name",
          "similarity",
          "genomes",
          "groups",
          "singles",
          "ge100",
          "largest",
          "mean_size",
        ]).formatRows(summaryRows);
        if (opts.sizes === true) {
          output += "\n" + new TsvWriter(["dir", "id", "count", "protLen", "name"]).formatRows(sizeRows);
        }
        runtime.io.stdout(output);
      })
    );

  program
    .command("vss <repDir>")
    .description(`Write sets of very similar representatives to ${VSS_FILE}`)
    .option("-t, --tail <n>", "marker tail length used for bucketing", parsePositiveInt, DEFAULT_VSS_TAIL_LENGTH)
    .option("-m, --min-score <n>", "minimum score to join a set", parseNonNegativeInt, DEFAULT_VSS_MIN_SCORE)
    .action(async (repDir: string, raw: unknown) =>
      run(async (runtime) => {
        const opts = validOptions(VssOptions(raw));
        const index = await loadForCommand(repDir, runtime.logger, { unconnected: true });

        const sets = verySimilarSets(index, { tailLength: opts.tail, minScore: opts.minScore });
        await writeString(path.join(repDir, VSS_FILE), formatVerySimilarSets(sets));
        runtime.logger.info(`${sets.length} sets written to ${VSS_FILE}.`);
      })
    );

  program
    .command("common-roles <repDir> <roleTable>")
    .description("Roles common to the members of each large group (role table: genome, role, count)")
    .option("-p, --percent <n>", "percent of members that must carry a role", parseNonNegativeInt, DEFAULT_COMMON_ROLE_PERCENT)
    .option("-S, --size <n>", "minimum group size", parsePositiveInt, DEFAULT_MIN_GROUP_SIZE)
    .option("--single-copy", "count only roles occurring exactly once in a genome")
    .action(async (repDir: string, roleTable: string, raw: unknown) =>
      run(async (runtime) => {
        const opts = validOptions(RoleOptions(raw));
        const index = await loadForCommand(repDir, runtime.logger);
        const roleCounts = await readRoleCounts(roleTable, (warning, lineNumber) =>
          runtime.logger.warn(`${roleTable} line ${lineNumber}: ${warning}`)
        );

        let output = "";
        for (const genome of index) {
          const roles = commonRoles(groupOf(index, genome.genomeId), roleCounts, {
            minPercent: opts.percent,
            minGroupSize: opts.size,
            singleCopyOnly: opts.singleCopy === true,
          });
          if (roles === undefined) {
            runtime.logger.debug(`Skipping small group ${genome.genomeId}: ${genome.name}.`);
            continue;
          }
          output += `${genome.genomeId}\t${genome.name}\n`;
          for (const role of roles) output += `\t${role}\n`;
        }
        runtime.io.stdout(output);
      })
    );
}
