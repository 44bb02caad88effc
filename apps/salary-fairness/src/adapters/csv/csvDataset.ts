/**
 * @fileoverview CSV Dataset Adapter
 *
 * Reads tabular data (one header row, then one record per line) into
 * rows keyed by column name, ready for the naive Bayes builder and the
 * fairness analysis.
 *
 * Format handled:
 * - Comma separated, optional UTF-8 byte order mark
 * - Double-quoted fields, with `""` for a literal quote
 * - LF or CRLF line endings; blank lines are skipped
 * - Headers and cells are trimmed
 *
 * @module adapters/csv/csvDataset
 */

import { readFileSync, existsSync } from "fs";

/**
 * A data row: column name -> cell value.
 */
export type DatasetRow = Readonly<Record<string, string>>;

/**
 * Parsed dataset.
 */
export interface Dataset {
    /** Column names in file order */
    readonly headers: readonly string[];

    /** Data rows in file order */
    readonly rows: readonly DatasetRow[];
}

interface RawRecord {
    /** 1-based line the record starts on */
    readonly line: number;
    readonly cells: string[];
}

function splitRecords(content: string): RawRecord[] {
    const records: RawRecord[] = [];
    let cells: string[] = [];
    let cell = "";
    let quoted = false;
    let line = 1;
    let recordLine = 1;

    const endRecord = () => {
        cells.push(cell);
        records.push({ line: recordLine, cells });
        cells = [];
        cell = "";
    };

    for (let i = 0; i < content.length; i++) {
        const char = content[i];

        if (quoted) {
            if (char === "\"" && content[i + 1] === "\"") {
                cell += "\"";
                i++;
            }
            else if (char === "\"") {
                quoted = false;
            }
            else {
                if (char === "\n") {
                    line++;
                }
                cell += char;
            }
            continue;
        }

        if (char === "\"") {
            quoted = true;
        }
        else if (char === ",") {
            cells.push(cell);
            cell = "";
        }
        else if (char === "\n") {
            endRecord();
            line++;
            recordLine = line;
        }
        else if (char !== "\r") {
            cell += char;
        }
    }

    if (quoted) {
        throw new Error(`Unterminated quoted field starting on line ${recordLine}`);
    }

    if (cell !== "" || cells.length > 0) {
        endRecord();
    }

    return records.filter((record) => !(record.cells.length === 1 && record.cells[0].trim() === ""));
}

/**
 * Parse CSV text into a dataset.
 *
 * @param content - File contents
 * @returns Headers and rows
 * @throws Error if there is no header row, a header repeats, or a record
 *         has a different number of cells than the header
 *
 * @example
 * ```typescript
 * parseCsv("Work,Salary\nPrivate,<50K\n");
 * // => { headers: ["Work", "Salary"], rows: [{ Work: "Private", Salary: "<50K" }] }
 * ```
 */
export function parseCsv(content: string): Dataset {
    const text = content.startsWith("\uFEFF") ? content.slice(1) : content;
    const [header, ...records] = splitRecords(text);

    if (!header) {
        throw new Error("CSV has no header row");
    }

    const headers = header.cells.map((name) => name.trim());
    const seen = new Set<string>();
    for (const name of headers) {
        if (name === "" || seen.has(name)) {
            throw new Error(`CSV header has an empty or repeated column name: "${name}"`);
        }
        seen.add(name);
    }

    const rows = records.map(({ line, cells }) => {
        if (cells.length !== headers.length) {
            throw new Error(
                `CSV line ${line} has ${cells.length} cells, expected ${headers.length}`
            );
        }

        const row: Record<string, string> = {};
        headers.forEach((name, i) => {
            row[name] = cells[i].trim();
        });
        return row;
    });

    return { headers, rows };
}

/**
 * Read and parse a CSV file.
 *
 * @param filePath - Path to the CSV file
 * @returns Headers and rows
 * @throws Error if the file does not exist or cannot be parsed
 */
export function loadDataset(filePath: string): Dataset {
    if (!existsSync(filePath)) {
        throw new Error(`Dataset file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    try {
        return parseCsv(content);
    }
    catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to parse ${filePath}: ${reason}`);
    }
}
