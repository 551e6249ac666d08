#!/usr/bin/env node
/**
 * acromatch CLI
 *
 * Acronym-aware fuzzy matching of names against a candidate list.
 *
 * Commands:
 *   match  - Rank candidates from a CSV or JSON file against a query
 *   score  - Compare two strings with every scorer
 *   expand - List the acronym variations of a text
 */

import { createProgram } from './program.js';

const program = createProgram();

// Show help if no command
if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
