/**
 * acromatch command definitions
 *
 * Commands:
 *   match  - Rank the rows of a candidate file against a query
 *   score  - Show every scorer's value for one pair of strings
 *   expand - List the acronym variations of a string
 */

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import ora from 'ora';

import { expandAcronyms, type AcronymDictionary } from './acronyms.js';
import { DEFAULT_CONFIG, type ScorerName } from './config.js';
import { loadAcronymDictionary, loadCandidates } from './parser.js';
import { matchCandidates } from './matcher.js';
import { topMatches } from './ranker.js';
import { soundex } from './soundex.js';
import { createTable, type CandidateTable } from './table.js';

// ============================================================================
// VERSION
// ============================================================================

export const VERSION = '0.1.0';

// ============================================================================
// OUTPUT FORMATTERS
// ============================================================================

function escapeCSV(str: string): string {
  if (str.includes(',') || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

function formatCell(value: unknown): string {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value.toString() : value.toFixed(3);
  }
  if (value === null || value === undefined) return '';
  return String(value);
}

export function formatOutput(table: CandidateTable, format: string): string {
  switch (format) {
    case 'json':
      return JSON.stringify(table.rows, null, 2);

    case 'csv': {
      const rows = table.rows.map(row =>
        table.columns.map(column => {
          const value = row[column];
          return escapeCSV(value === null || value === undefined ? '' : String(value));
        }).join(',')
      );
      return [table.columns.map(escapeCSV).join(','), ...rows].join('\n');
    }

    case 'table': {
      const widths = table.columns.map(column =>
        Math.min(40, Math.max(column.length, ...table.rows.map(row => formatCell(row[column]).length)))
      );
      const header = table.columns.map((column, i) => column.padEnd(widths[i])).join(' | ');
      const separator = '-'.repeat(header.length);
      const rows = table.rows.map(row =>
        table.columns
          .map((column, i) => formatCell(row[column]).slice(0, widths[i]).padEnd(widths[i]))
          .join(' | ')
          .trimEnd()
      );
      return [header.trimEnd(), separator, ...rows].join('\n');
    }

    default:
      throw new Error(`Unknown output format: ${format} (expected json, csv or table)`);
  }
}

function fail(message: string): void {
  console.error(message);
  process.exitCode = 1;
}

async function readDictionary(file: string | undefined): Promise<AcronymDictionary> {
  return file ? loadAcronymDictionary(path.resolve(file)) : {};
}

// ============================================================================
// MATCH COMMAND
// ============================================================================

interface MatchCommandOptions {
  column: string;
  acronyms?: string;
  top: string;
  method: string;
  format: string;
  output?: string;
  quiet?: boolean;
}

export function createMatchCommand(): Command {
  return new Command('match')
    .description('Rank candidates from a CSV or JSON file against a query')
    .argument('<query>', 'Text to match')
    .argument('<file>', 'Candidate file (CSV, TSV or JSON array of objects)')
    .option('-c, --column <name>', 'Column holding the candidate text', 'name')
    .option('-a, --acronyms <file>', 'JSON file mapping acronyms to expansions')
    .option('-n, --top <count>', 'Number of results', String(DEFAULT_CONFIG.TOP_N))
    .option('-m, --method <method>', 'Method: hybrid, ngram, phonetic, levenshtein', DEFAULT_CONFIG.METHOD)
    .option('-f, --format <format>', 'Output format: json, csv, table', 'table')
    .option('-o, --output <file>', 'Output file (defaults to stdout)')
    .option('-q, --quiet', 'Suppress progress output')
    .action(async (query: string, file: string, options: MatchCommandOptions) => {
      const spinner = options.quiet ? null : ora('Loading candidates...').start();

      try {
        const loaded = await loadCandidates(path.resolve(file));
        if (!loaded.success) {
          if (spinner) spinner.fail(`Failed to load ${loaded.fileName}`);
          fail(loaded.error || 'Unknown error');
          return;
        }

        const dictionary = await readDictionary(options.acronyms);

        if (spinner) spinner.text = `Matching ${loaded.table.rows.length} candidates...`;

        const result = topMatches(query, loaded.table, options.column, {
          dictionary,
          topN: Number(options.top),
          method: options.method,
        });

        if (spinner) {
          spinner.succeed(`${result.rows.length} of ${loaded.table.rows.length} candidates matched (${options.method})`);
        }

        const output = formatOutput(result, options.format);

        if (options.output) {
          fs.writeFileSync(options.output, output);
          if (!options.quiet) {
            console.log(`Output written to ${options.output}`);
          }
        } else {
          console.log(output);
        }
      } catch (error) {
        if (spinner) spinner.fail('Match failed');
        fail(error instanceof Error ? error.message : String(error));
      }
    });
}

// ============================================================================
// SCORE COMMAND
// ============================================================================

interface ScoreCommandOptions {
  acronyms?: string;
}

const SCORER_ORDER: ScorerName[] = ['ngram', 'phonetic', 'levenshtein'];

const SCORER_LABELS: Record<ScorerName, string> = {
  ngram: 'N-gram (trigram)',
  phonetic: 'Phonetic (Soundex)',
  levenshtein: 'Edit distance',
};

export function createScoreCommand(): Command {
  return new Command('score')
    .description('Compare two strings with every scorer')
    .argument('<query>', 'Query text')
    .argument('<candidate>', 'Candidate text')
    .option('-a, --acronyms <file>', 'JSON file mapping acronyms in the candidate to expansions')
    .action(async (query: string, candidate: string, options: ScoreCommandOptions) => {
      try {
        const dictionary = await readDictionary(options.acronyms);
        const table = createTable([{ candidate }]);

        console.log('\n=== Similarity Scores ===\n');
        for (const name of SCORER_ORDER) {
          const [record] = matchCandidates(query, table, 'candidate', name, { dictionary });
          const form = record.bestForm === candidate ? '' : `  (as "${record.bestForm}")`;
          console.log(`${SCORER_LABELS[name].padEnd(20)} ${record.score.toFixed(3)}${form}`);
        }

        console.log('\n=== Soundex ===\n');
        console.log(`Query:     ${soundex(query)}`);
        console.log(`Candidate: ${soundex(candidate)}`);
        console.log('');
      } catch (error) {
        fail(error instanceof Error ? error.message : String(error));
      }
    });
}

// ============================================================================
// EXPAND COMMAND
// ============================================================================

interface ExpandCommandOptions {
  acronyms: string;
}

export function createExpandCommand(): Command {
  return new Command('expand')
    .description('List the acronym variations of a text')
    .argument('<text>', 'Text to expand')
    .requiredOption('-a, --acronyms <file>', 'JSON file mapping acronyms to expansions')
    .action(async (text: string, options: ExpandCommandOptions) => {
      try {
        const dictionary = await readDictionary(options.acronyms);
        for (const variation of expandAcronyms(text, dictionary)) {
          console.log(variation);
        }
      } catch (error) {
        fail(error instanceof Error ? error.message : String(error));
      }
    });
}

// ============================================================================
// MAIN PROGRAM
// ============================================================================

export function createProgram(): Command {
  const program = new Command()
    .name('acromatch')
    .description('Acronym-aware fuzzy matching of names against a candidate list')
    .version(VERSION);

  program.addCommand(createMatchCommand());
  program.addCommand(createScoreCommand());
  program.addCommand(createExpandCommand());

  return program;
}
