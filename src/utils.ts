import _ from 'lodash';

export type CsvRow = Record<string, string>;

export function escapeCsvValue(value: unknown): string {
  if (_.isNil(value)) return '';
  const str = String(value);
  return str.includes(',') || str.includes('"') || str.includes('\n') || str.includes('\r')
    ? `"${str.replace(/"/g, '""')}"`
    : str;
}

export function toCsvLine(values: readonly unknown[]): string {
  return values.map(escapeCsvValue).join(',');
}

export function toCsv<T extends object>(rows: readonly T[], columns: readonly (keyof T & string)[]): string {
  const header = toCsvLine(columns);
  const lines = rows.map((row) => toCsvLine(columns.map((key) => row[key])));
  return [header, ...lines].join('\n');
}

/**
 * Splits CSV text into records of cells. Handles quoted cells with embedded
 * commas, doubled quotes and line breaks; accepts `\n` and `\r\n` endings.
 */
export function parseCsvCells(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let cell = '';
  let inQuotes = false;
  let quoted = false;

  const endRecord = () => {
    record.push(cell);
    // Blank lines carry no data; a quoted empty cell does.
    if (record.length > 1 || cell !== '' || quoted) records.push(record);
    record = [];
    cell = '';
    quoted = false;
  };

  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          cell += '"';
          i += 1;
        } else {
          inQuotes = false;
        }
      } else {
        cell += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
      quoted = true;
    } else if (ch === ',') {
      record.push(cell);
      cell = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i += 1;
      endRecord();
    } else {
      cell += ch;
    }
  }

  if (cell !== '' || record.length > 0 || quoted) {
    endRecord();
  }

  return records;
}

export function parseCsv(text: string): { columns: string[]; rows: CsvRow[] } {
  const [header, ...body] = parseCsvCells(text);
  if (!header) return { columns: [], rows: [] };
  const rows = body.map((cells) =>
    _.zipObject(
      header,
      header.map((_column, idx) => cells[idx] ?? ''),
    ),
  );
  return { columns: header, rows };
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

// Local clock, second precision: 2024-03-09 14:05:07
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function formatElapsed(ms: number): string {
  const totalSeconds = ms / 1000;
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${hours}:${pad2(minutes)}:${seconds.toFixed(3).padStart(6, '0')}`;
}
