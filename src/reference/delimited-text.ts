/**
 * @fileoverview Delimited Text Parser
 *
 * Reads small header-first tables published as plain text. The delimiter is
 * taken from the header line: tab, then comma, otherwise runs of whitespace.
 * With whitespace, the last column absorbs the remaining tokens so names such
 * as "Salt Lake City" survive.
 */

export type Delimiter = 'tab' | 'comma' | 'whitespace';

export type TableRow = Record<string, string>;

export interface ParseOptions {
    /** Rows whose first cell in `column` is one of `values` are dropped before their width is checked. */
    skip?: { column: string; values: ReadonlySet<string> };
}

export class DelimitedTextError extends Error {
    constructor(message: string, readonly line?: number) {
        super(line === undefined ? message : `line ${line}: ${message}`);
        this.name = 'DelimitedTextError';
    }
}

export function detectDelimiter(headerLine: string): Delimiter {
    if (headerLine.includes('\t')) return 'tab';
    if (headerLine.includes(',')) return 'comma';
    return 'whitespace';
}

function splitComma(line: string): string[] {
    const cells: string[] = [];
    let current = '';
    let quoted = false;

    for (let i = 0; i < line.length; i++) {
        const char = line[i];
        if (quoted) {
            if (char === '"' && line[i + 1] === '"') {
                current += '"';
                i++;
            } else if (char === '"') {
                quoted = false;
            } else {
                current += char;
            }
        } else if (char === '"') {
            quoted = true;
        } else if (char === ',') {
            cells.push(current);
            current = '';
        } else {
            current += char;
        }
    }
    cells.push(current);
    return cells;
}

function splitLine(line: string, delimiter: Delimiter, width?: number): string[] {
    switch (delimiter) {
        case 'tab':
            return line.split('\t').map((cell) => cell.trim());
        case 'comma':
            return splitComma(line).map((cell) => cell.trim());
        case 'whitespace': {
            const tokens = line.trim().split(/\s+/);
            if (width === undefined || tokens.length <= width) return tokens;
            return [...tokens.slice(0, width - 1), tokens.slice(width - 1).join(' ')];
        }
    }
}

/**
 * Parses a header-first table into rows keyed by lower-cased column name.
 *
 * Blank lines and `#` comments are skipped. Every required column must be in
 * the header, and every row that is not skipped must fill every header column.
 */
export function parseDelimitedTable(
    text: string,
    requiredColumns: readonly string[],
    options: ParseOptions = {},
): TableRow[] {
    const lines = text
        .split(/\r?\n/)
        .map((raw, index) => ({ raw, number: index + 1 }))
        .filter(({ raw }) => raw.trim().length > 0 && !raw.trim().startsWith('#'));

    const header = lines.shift();
    if (!header) {
        throw new DelimitedTextError('table is empty');
    }

    const delimiter = detectDelimiter(header.raw);
    const columns = splitLine(header.raw, delimiter).map((column) => column.toLowerCase());

    const missing = requiredColumns.filter((column) => !columns.includes(column));
    if (missing.length > 0) {
        throw new DelimitedTextError(`missing column(s): ${missing.join(', ')}`, header.number);
    }

    const skipIndex = options.skip ? columns.indexOf(options.skip.column.toLowerCase()) : -1;

    const rows: TableRow[] = [];
    for (const { raw, number } of lines) {
        const cells = splitLine(raw, delimiter, columns.length);
        if (options.skip && skipIndex >= 0 && options.skip.values.has((cells[skipIndex] ?? '').trim())) {
            continue;
        }
        if (cells.length !== columns.length) {
            throw new DelimitedTextError(`expected ${columns.length} cells, found ${cells.length}`, number);
        }

        const row: TableRow = {};
        columns.forEach((column, index) => {
            row[column] = cells[index];
        });
        rows.push(row);
    }
    return rows;
}
