/**
 * Loading and saving representative-genome directories
 *
 * A directory holds:
 * - `6.1.1.20.fasta`: one marker protein per representative
 * - `complete.genomes`: `genomeID<TAB>name`, no header
 * - `K`: kmer size on line 1, minimum score on line 2 (optional), alphabet on
 *   line 3 (written only for DNA indexes)
 * - `rep_db.tbl`: `genomeID<TAB>representativeID<TAB>score` (optional)
 *
 * @module representatives/persistence
 */

import * as path from "node:path";
import { type } from "arktype";
import {
  DuplicateGenomeError,
  MalformedDirectoryError,
  ParseError,
  SequenceTooShortError,
  UnknownRepresentativeError,
  ValidationError,
} from "../errors";
import { FastaParser, FastaWriter } from "../formats/fasta";
import { TsvParser, TsvWriter } from "../formats/tsv";
import { exists, isDirectory, readToString } from "../io/file-reader";
import { ensureDirectory, writeString } from "../io/file-writer";
import {
  IndexParametersSchema,
  LoadIndexOptionsSchema,
  type FastaSequence,
  type IndexParameters,
  type LoadIndexOptions,
} from "../types";
import {
  DEFAULT_KMER_SIZE,
  DEFAULT_MIN_SCORE,
  GENOME_NAMES_FILE,
  MARKER_FASTA_FILE,
  PARAMETERS_FILE,
  REP_DB_FILE,
} from "./constants";
import { genomeIdFromFeature } from "./genome-ids";
import { RepresentativeGenomeIndex } from "./rep-genome-index";

type WarningHandler = (warning: string, lineNumber?: number) => void;

const defaultWarning =
  (file: string): WarningHandler =>
  (warning, lineNumber) => {
    console.warn(
      lineNumber === undefined
        ? `${file} Warning: ${warning}`
        : `${file} Warning (line ${lineNumber}): ${warning}`
    );
  };

/**
 * Parse the contents of a `K` file
 *
 * The first integer on each of the first two lines is taken; a missing second
 * line leaves the default minimum score. A third line, when present, names the
 * alphabet.
 *
 * @throws {ParseError} When line 1 carries no kmer size or line 3 no known alphabet
 */
function parseParameters(content: string): IndexParameters {
  const lines = content.split(/\r?\n/).filter((line) => line.trim() !== "");
  const firstInteger = (line: string | undefined): string | undefined =>
    line === undefined ? undefined : /(\d+)/.exec(line)?.[1];

  const k = firstInteger(lines[0]);
  const score = firstInteger(lines[1]);
  const alphabet = lines[2]?.trim().toLowerCase();
  if (k === undefined) {
    throw new ParseError("Parameter file has no kmer size on line 1", PARAMETERS_FILE, 1);
  }

  const parameters = IndexParametersSchema({
    kmerSize: Number(k),
    minScore: score === undefined ? DEFAULT_MIN_SCORE : Number(score),
    ...(alphabet !== undefined ? { alphabet } : {}),
  });
  if (parameters instanceof type.errors) {
    throw new ParseError(`Invalid parameters: ${parameters.summary}`, PARAMETERS_FILE);
  }
  return parameters;
}

/**
 * Read a directory's parameters, defaulting to K=8 and score 100 when the
 * `K` file is absent or empty
 */
async function readParameters(directory: string): Promise<IndexParameters> {
  const file = path.join(directory, PARAMETERS_FILE);
  if (!(await exists(file))) {
    return { kmerSize: DEFAULT_KMER_SIZE, minScore: DEFAULT_MIN_SCORE };
  }
  const content = await readToString(file);
  if (content.trim() === "") {
    return { kmerSize: DEFAULT_KMER_SIZE, minScore: DEFAULT_MIN_SCORE };
  }
  return parseParameters(content);
}

async function readGenomeNames(file: string, onWarning: WarningHandler): Promise<Map<string, string>> {
  const names = new Map<string, string>();
  const parser = new TsvParser({ minColumns: 2, onWarning });
  for await (const { fields, lineNumber } of parser.parseFile(file)) {
    const [genomeId = "", ...rest] = fields;
    const name = rest.join(" ").trim();
    if (genomeId.trim() === "" || name === "") {
      onWarning("Row without a genome ID and name", lineNumber);
      continue;
    }
    names.set(genomeId.trim(), name);
  }
  return names;
}

/**
 * Genome ID of a marker record: the record ID when it is or embeds a genome
 * ID, else the first token of the comment, else the record ID itself
 */
function markerGenomeId(record: FastaSequence): string {
  const fromId = genomeIdFromFeature(record.id);
  if (fromId !== undefined) return fromId;
  const commentToken = record.description?.split(/\s+/)[0];
  return commentToken !== undefined && commentToken !== "" ? commentToken : record.id;
}

/**
 * Load a representative-genome index from a directory
 *
 * Marker records with an invalid line, records whose genome has no name,
 * records that cannot be inserted, and connections naming an unknown
 * representative are reported through `onWarning` and skipped. An alphabet
 * named in the `K` file takes precedence over `options.alphabet`.
 *
 * @throws {MalformedDirectoryError} When the directory or a required file is missing
 * @throws {FileError} When a file cannot be read
 */
async function loadIndex(
  directory: string,
  options: LoadIndexOptions = {}
): Promise<RepresentativeGenomeIndex> {
  const validated = LoadIndexOptionsSchema(options);
  if (validated instanceof type.errors) {
    throw new ValidationError(`Invalid load options: ${validated.summary}`);
  }
  const onProgress = options.onProgress ?? ((): void => {});

  if (!(await isDirectory(directory))) {
    throw new MalformedDirectoryError(directory, [directory]);
  }
  const fastaFile = path.join(directory, MARKER_FASTA_FILE);
  const namesFile = path.join(directory, GENOME_NAMES_FILE);
  const missing: string[] = [];
  if (!(await exists(fastaFile))) missing.push(MARKER_FASTA_FILE);
  if (!(await exists(namesFile))) missing.push(GENOME_NAMES_FILE);
  if (missing.length > 0) {
    throw new MalformedDirectoryError(directory, missing);
  }

  const parameters = await readParameters(directory);
  const alphabet = parameters.alphabet ?? validated.alphabet;
  const index = new RepresentativeGenomeIndex({
    kmerSize: parameters.kmerSize,
    minScore: parameters.minScore,
    ...(alphabet !== undefined ? { alphabet } : {}),
    ...(validated.scoring !== undefined ? { scoring: validated.scoring } : {}),
  });

  onProgress(`Reading genome names from ${namesFile}.`);
  const names = await readGenomeNames(
    namesFile,
    options.onWarning ?? defaultWarning(GENOME_NAMES_FILE)
  );

  onProgress(`Reading marker proteins from ${fastaFile}.`);
  const fastaWarning = options.onWarning ?? defaultWarning(MARKER_FASTA_FILE);
  const parser = new FastaParser({ onError: fastaWarning, onWarning: fastaWarning });
  for await (const record of parser.parseFile(fastaFile)) {
    const genomeId = markerGenomeId(record);
    const name = names.get(genomeId);
    if (name === undefined) {
      fastaWarning(`Genome ${genomeId} has no name in ${GENOME_NAMES_FILE}; skipped`, record.lineNumber);
      continue;
    }
    try {
      index.insert(genomeId, name, record.sequence);
    } catch (error) {
      if (error instanceof DuplicateGenomeError || error instanceof SequenceTooShortError) {
        fastaWarning(error.message, record.lineNumber);
      } else {
        throw error;
      }
    }
  }
  onProgress(`${index.size} representatives loaded.`);

  const repDbFile = path.join(directory, REP_DB_FILE);
  if (options.unconnected !== true && (await exists(repDbFile))) {
    onProgress(`Reading represented-genomes list from ${repDbFile}.`);
    await readConnections(index, repDbFile, options.onWarning ?? defaultWarning(REP_DB_FILE));
  }

  return index;
}

async function readConnections(
  index: RepresentativeGenomeIndex,
  file: string,
  onWarning: WarningHandler
): Promise<void> {
  const parser = new TsvParser({ minColumns: 3, onWarning });
  for await (const { fields, lineNumber } of parser.parseFile(file)) {
    const [genomeId = "", representativeId = "", scoreField = ""] = fields;
    const score = Number(scoreField);
    if (scoreField.trim() === "" || !Number.isFinite(score)) {
      onWarning(`Invalid score '${scoreField}'`, lineNumber);
      continue;
    }
    try {
      index.connect(representativeId, genomeId, score);
    } catch (error) {
      if (error instanceof UnknownRepresentativeError) {
        onWarning(error.message, lineNumber);
      } else {
        throw error;
      }
    }
  }
}

/**
 * Write an index to a directory in insertion order
 *
 * Creates the directory when needed. Saving the same index twice produces
 * identical files.
 *
 * @throws {FileError}
 */
async function saveIndex(index: RepresentativeGenomeIndex, directory: string): Promise<void> {
  await ensureDirectory(directory);

  const parameterLines = [index.kmerSize, index.minScore];
  await writeString(
    path.join(directory, PARAMETERS_FILE),
    (index.alphabet === "dna" ? [...parameterLines, index.alphabet] : parameterLines).join("\n") + "\n"
  );

  const genomes = [...index];
  await new TsvWriter().writeFile(
    path.join(directory, GENOME_NAMES_FILE),
    genomes.map((genome) => [genome.genomeId, genome.name])
  );

  const fasta = new FastaWriter({ lineWidth: 0 }).formatSequences(
    genomes.map((genome) => ({ id: genome.genomeId, sequence: genome.sequence }))
  );
  await writeString(path.join(directory, MARKER_FASTA_FILE), fasta);

  await new TsvWriter().writeFile(
    path.join(directory, REP_DB_FILE),
    genomes.flatMap((genome) =>
      genome.representedList().map(({ genomeId, score }) => [genomeId, genome.genomeId, score])
    )
  );
}

export {
  loadIndex,
  markerGenomeId,
  parseParameters,
  readGenomeNames,
  readParameters,
  saveIndex,
};
