/**
 * Human score loading from tabular files.
 */

import { readFile } from "node:fs/promises";
import path from "node:path";

import { parse as parseCsv } from "csv-parse/sync";
import { z } from "zod";

import { DataLoadError, toError } from "../errors.js";

import type { LoadedRow } from "../types/index.js";

/**
 * Source of human-scored rows.
 */
export interface DataLoader {
  load(source: string): Promise<LoadedRow[]>;
}

/**
 * Column mapping for CSV sources.
 */
export interface CsvColumns {
  input: string;
  response: string;
  human_score: string;
}

/**
 * CSV loader options.
 */
export interface CsvDataLoaderOptions {
  columns?: Partial<CsvColumns>;
  /** Columns copied into each item's metadata */
  metadataColumns?: readonly string[];
  /** Column with pre-computed judge scores; blank cells load as null */
  judgeScoreColumn?: string | undefined;
}

const DEFAULT_COLUMNS: CsvColumns = {
  input: "question",
  response: "response",
  human_score: "human_score",
};

const CsvRecordsSchema = z.array(z.array(z.string()));

/**
 * Loads rows from a CSV file with a header row.
 *
 * @example
 * ```typescript
 * const loader = new CsvDataLoader({ columns: { input: "prompt" } });
 * const rows = await loader.load("./scores.csv");
 * ```
 */
export class CsvDataLoader implements DataLoader {
  private readonly columns: CsvColumns;
  private readonly metadataColumns: readonly string[];
  private readonly judgeScoreColumn: string | undefined;

  constructor(options: CsvDataLoaderOptions = {}) {
    this.columns = { ...DEFAULT_COLUMNS, ...options.columns };
    this.metadataColumns = options.metadataColumns ?? [];
    this.judgeScoreColumn = options.judgeScoreColumn;
  }

  /**
   * Read and parse a CSV file.
   *
   * @param source - File path
   * @returns Rows in file order
   * @throws DataLoadError if the file is unreadable or a row is invalid
   */
  async load(source: string): Promise<LoadedRow[]> {
    const filePath = path.resolve(source);

    let content: string;
    try {
      content = await readFile(filePath, "utf-8");
    } catch (err) {
      throw new DataLoadError(
        `Failed to read data file: ${filePath}`,
        source,
        null,
        toError(err),
      );
    }

    return this.parse(content, source);
  }

  /**
   * Parse CSV text.
   *
   * @param content - CSV text including the header row
   * @param source - Name used in error messages
   * @returns Rows in file order
   * @throws DataLoadError on malformed CSV, missing columns, empty text or bad scores
   */
  parse(content: string, source = "<inline>"): LoadedRow[] {
    let parsed: unknown;
    try {
      parsed = parseCsv(content, {
        bom: true,
        trim: true,
        skip_empty_lines: true,
      });
    } catch (err) {
      const cause = toError(err);
      throw new DataLoadError(
        `Malformed CSV in ${source}: ${cause.message}`,
        source,
        null,
        cause,
      );
    }

    const records = CsvRecordsSchema.parse(parsed);
    const [header, ...rows] = records;
    if (!header) {
      throw new DataLoadError(`Data file ${source} is empty`, source);
    }

    const indexOf = (column: string): number => {
      const index = header.indexOf(column);
      if (index === -1) {
        throw new DataLoadError(
          `Data file ${source} is missing required column "${column}" (found: ${header.join(", ")})`,
          source,
        );
      }
      return index;
    };

    const inputIndex = indexOf(this.columns.input);
    const responseIndex = indexOf(this.columns.response);
    const scoreIndex = indexOf(this.columns.human_score);
    const judgeIndex =
      this.judgeScoreColumn === undefined ? undefined : indexOf(this.judgeScoreColumn);
    const metadataIndexes = this.metadataColumns.map(
      (column) => [column, indexOf(column)] as const,
    );

    return rows.map((row, i) => {
      const rowNumber = i + 1;
      const cell = (index: number): string => row[index] ?? "";

      for (const [column, index] of [
        [this.columns.input, inputIndex],
        [this.columns.response, responseIndex],
      ] as const) {
        if (cell(index).trim() === "") {
          throw new DataLoadError(
            `Row ${String(rowNumber)} of ${source} has no ${column} value`,
            source,
            rowNumber,
          );
        }
      }

      const humanCell = cell(scoreIndex);
      if (humanCell === "") {
        throw new DataLoadError(
          `Row ${String(rowNumber)} of ${source} has no ${this.columns.human_score} value`,
          source,
          rowNumber,
        );
      }
      const humanScore = parseNumber(humanCell);
      if (humanScore === null) {
        throw new DataLoadError(
          `Row ${String(rowNumber)} of ${source} has a non-numeric ${this.columns.human_score}: "${humanCell}"`,
          source,
          rowNumber,
        );
      }

      const loaded: LoadedRow = {
        input_text: cell(inputIndex),
        response_text: cell(responseIndex),
        human_score: humanScore,
        metadata: Object.fromEntries(
          metadataIndexes.map(([column, index]) => [column, cell(index)]),
        ),
      };

      if (judgeIndex !== undefined) {
        const judgeCell = cell(judgeIndex);
        const judgeScore = judgeCell === "" ? null : parseNumber(judgeCell);
        if (judgeCell !== "" && judgeScore === null) {
          throw new DataLoadError(
            `Row ${String(rowNumber)} of ${source} has a non-numeric ${this.judgeScoreColumn ?? "judge score"}: "${judgeCell}"`,
            source,
            rowNumber,
          );
        }
        loaded.judge_score = judgeScore;
      }

      return loaded;
    });
  }
}

function parseNumber(text: string): number | null {
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}
