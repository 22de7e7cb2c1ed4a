/**
 * src/utils/csvTable.ts
 *
 * Minimal RFC 4180 codec: comma separator, CRLF-or-LF rows, fields quoted
 * when they contain a comma, quote or newline, quotes doubled inside.
 */

function escapeCell(cell: string): string {
    return /[",\r\n]/.test(cell) ? `"${cell.replace(/"/g, '""')}"` : cell;
}

export function toCsv(header: readonly string[], rows: readonly (readonly string[])[]): string {
    return [header, ...rows].map((row) => row.map(escapeCell).join(',')).join('\n') + '\n';
}

/** Parses CSV text into rows of cells. Blank lines are skipped. */
export function parseCsv(content: string): string[][] {
    const rows: string[][] = [];
    let row: string[] = [];
    let cell = '';
    let inQuotes = false;

    const endRow = (): void => {
        row.push(cell);
        if (row.length > 1 || row[0] !== '') {
            rows.push(row);
        }
        row = [];
        cell = '';
    };

    for (let i = 0; i < content.length; i++) {
        const ch = content[i];

        if (inQuotes) {
            if (ch === '"' && content[i + 1] === '"') {
                cell += '"';
                i++;
            } else if (ch === '"') {
                inQuotes = false;
            } else {
                cell += ch;
            }
            continue;
        }

        if (ch === '"') {
            inQuotes = true;
        } else if (ch === ',') {
            row.push(cell);
            cell = '';
        } else if (ch === '\n') {
            endRow();
        } else if (ch !== '\r') {
            cell += ch;
        }
    }

    if (cell !== '' || row.length > 0) {
        endRow();
    }

    return rows;
}
