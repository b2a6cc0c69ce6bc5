/**
 * Splits one CSV record into cells. Double-quoted cells may contain commas and
 * doubled quotes (`""`); a stray quote inside an unquoted cell is kept as-is.
 */
export function parseCsvLine(line: string): string[] {
    if (line.length === 0) {
        return [];
    }
    const cells: string[] = [];
    let cell = '';
    let quoted = false;
    let atCellStart = true;

    for (let i = 0; i < line.length; i += 1) {
        const ch = line[i];
        if (quoted) {
            if (ch === '"') {
                if (line[i + 1] === '"') {
                    cell += '"';
                    i += 1;
                } else {
                    quoted = false;
                }
            } else {
                cell += ch;
            }
            continue;
        }
        if (ch === ',') {
            cells.push(cell);
            cell = '';
            atCellStart = true;
            continue;
        }
        if (ch === '"' && atCellStart) {
            quoted = true;
            atCellStart = false;
            continue;
        }
        cell += ch;
        atCellStart = false;
    }
    cells.push(cell);
    return cells;
}

export function stripLineEnding(line: string): string {
    return line.endsWith('\r') ? line.slice(0, -1) : line;
}
