/**
 * Candidate File Parser
 *
 * Loads candidate tables from delimited text (CSV, TSV) or JSON files, and
 * acronym dictionaries from JSON files.
 */

import * as fsPromises from 'fs/promises';
import * as path from 'path';
import type { AcronymDictionary } from './acronyms.js';
import { DictionaryFormatError } from './errors.js';
import { createTable, type CandidateRow, type CandidateTable } from './table.js';

// ============================================================================
// TYPES
// ============================================================================

export interface ParsedCandidateResult {
  success: boolean;
  table: CandidateTable;
  fileType: SupportedFormat;
  fileName: string;
  error?: string;
}

export type SupportedFormat = 'csv' | 'json' | 'unknown';

const EMPTY_TABLE: CandidateTable = { columns: [], rows: [] };

// ============================================================================
// FILE TYPE DETECTION
// ============================================================================

/**
 * Detect file type from extension
 */
export function getFileType(filePath: string): SupportedFormat {
  const ext = path.extname(filePath).toLowerCase();
  switch (ext) {
    case '.csv':
    case '.tsv':
    case '.txt': return 'csv';
    case '.json': return 'json';
    default: return 'unknown';
  }
}

/**
 * Get list of supported file extensions
 */
export function getSupportedExtensions(): string[] {
  return ['.csv', '.tsv', '.txt', '.json'];
}

// ============================================================================
// CSV PARSING
// ============================================================================

/**
 * Detect CSV delimiter from the header line
 */
export function detectDelimiter(firstLine: string): string {
  const delimiters = [',', '\t', ';', '|'];
  let maxCount = 0;
  let detected = ',';

  for (const delim of delimiters) {
    const count = firstLine.split(delim).length - 1;
    if (count > maxCount) {
      maxCount = count;
      detected = delim;
    }
  }

  return detected;
}

/**
 * Split one line into fields. Fields may be wrapped in double quotes, with
 * "" standing for a literal quote inside them.
 */
export function splitLine(line: string, delimiter: string): string[] {
  const fields: string[] = [];
  let field = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (inQuotes) {
      if (char === '"' && line[i + 1] === '"') {
        field += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        field += char;
      }
    } else if (char === '"' && field.trim() === '') {
      field = '';
      inQuotes = true;
    } else if (char === delimiter) {
      fields.push(field.trim());
      field = '';
    } else {
      field += char;
    }
  }

  fields.push(inQuotes ? field : field.trim());
  return fields;
}

/**
 * Split content into records on line breaks outside double quotes. A quoted
 * field keeps its line breaks.
 */
export function splitRecords(content: string): string[] {
  const records: string[] = [];
  let record = '';
  let inQuotes = false;

  for (const char of content) {
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === '\n' && !inQuotes) {
      records.push(record.endsWith('\r') ? record.slice(0, -1) : record);
      record = '';
      continue;
    }
    record += char;
  }

  records.push(record.endsWith('\r') ? record.slice(0, -1) : record);
  return records;
}

/**
 * Parse CSV content into a table. The header line names the columns; rows
 * shorter than the header get empty strings for the missing fields.
 */
export function parseCSV(content: string): CandidateTable<Record<string, string>> {
  const lines = splitRecords(content.replace(/^\uFEFF/, '')).filter(line => line.trim());

  if (lines.length === 0) return createTable<Record<string, string>>([], []);

  const delimiter = detectDelimiter(lines[0]);
  const headers = splitLine(lines[0], delimiter);

  const rows = lines.slice(1).map(line => {
    const values = splitLine(line, delimiter);
    const row: Record<string, string> = {};
    headers.forEach((header, j) => {
      row[header] = values[j] ?? '';
    });
    return row;
  });

  return createTable(rows, headers);
}

// ============================================================================
// JSON PARSING
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON array of objects into a table
 */
export function parseJSONCandidates(content: string): CandidateTable<CandidateRow> {
  const data: unknown = JSON.parse(content);

  if (!Array.isArray(data)) {
    throw new Error('Expected a JSON array of candidate objects');
  }

  const rows = data.map((item: unknown, i) => {
    if (!isRecord(item)) {
      throw new Error(`Candidate at index ${i} is not an object`);
    }
    return item;
  });

  return createTable(rows);
}

// ============================================================================
// MAIN LOAD FUNCTIONS
// ============================================================================

/**
 * Load a candidate table from a file
 */
export async function loadCandidates(filePath: string): Promise<ParsedCandidateResult> {
  const fileType = getFileType(filePath);
  const fileName = path.basename(filePath);

  if (fileType === 'unknown') {
    return {
      success: false,
      table: EMPTY_TABLE,
      fileType,
      fileName,
      error: `Unsupported file type: ${path.extname(filePath)}`
    };
  }

  try {
    const content = await fsPromises.readFile(filePath, 'utf-8');
    const table = fileType === 'csv' ? parseCSV(content) : parseJSONCandidates(content);

    return {
      success: true,
      table,
      fileType,
      fileName
    };
  } catch (error) {
    return {
      success: false,
      table: EMPTY_TABLE,
      fileType,
      fileName,
      error: error instanceof Error ? error.message : String(error)
    };
  }
}

/**
 * Parse an acronym dictionary: a JSON object mapping acronym to expansion
 */
export function parseAcronymDictionary(content: string, source: string = 'input'): AcronymDictionary {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new DictionaryFormatError(source, error instanceof Error ? error.message : String(error));
  }

  if (!isRecord(data)) {
    throw new DictionaryFormatError(source, 'expected a JSON object');
  }

  const entries: [string, string][] = [];
  for (const [acronym, expansion] of Object.entries(data)) {
    if (typeof expansion !== 'string') {
      throw new DictionaryFormatError(source, `expansion for '${acronym}' is not a string`);
    }
    entries.push([acronym, expansion]);
  }

  return Object.fromEntries(entries);
}

/**
 * Load an acronym dictionary from a JSON file
 */
export async function loadAcronymDictionary(filePath: string): Promise<AcronymDictionary> {
  const content = await fsPromises.readFile(filePath, 'utf-8');
  return parseAcronymDictionary(content, path.basename(filePath));
}
