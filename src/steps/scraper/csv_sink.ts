import fs from 'node:fs';
import path from 'node:path';
import { toCsvLine } from '../../utils';
import { describeCause, FilesystemError } from './errors';
import { RecordSink, TEAM_RECORD_COLUMNS, TeamRecord, TeamRecordColumn } from './types';

export class CsvSink implements RecordSink {
  private fd: number | null;
  private headerWritten = false;
  private rowCount = 0;

  private constructor(
    public readonly filePath: string,
    private readonly columns: readonly TeamRecordColumn[],
    fd: number,
  ) {
    this.fd = fd;
  }

  /**
   * Creates the parent directory and truncates whatever is at `filePath`.
   */
  static open(filePath: string, columns: readonly TeamRecordColumn[] = TEAM_RECORD_COLUMNS): CsvSink {
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
    } catch (error) {
      throw new FilesystemError(
        `Unable to create directory ${path.dirname(filePath)}: ${describeCause(error)}`,
        filePath,
        error,
      );
    }

    try {
      return new CsvSink(filePath, columns, fs.openSync(filePath, 'w'));
    } catch (error) {
      throw new FilesystemError(`Unable to open ${filePath} for writing: ${describeCause(error)}`, filePath, error);
    }
  }

  get recordsWritten(): number {
    return this.rowCount;
  }

  writeHeader(): void {
    if (this.headerWritten) {
      throw new Error(`Header already written to ${this.filePath}`);
    }
    this.append(toCsvLine(this.columns));
    this.headerWritten = true;
  }

  writeRecords(records: readonly TeamRecord[]): void {
    if (!this.headerWritten) {
      throw new Error(`Header must be written to ${this.filePath} before any records`);
    }
    if (records.length === 0) return;
    const lines = records.map((record) => toCsvLine(this.columns.map((column) => record[column])));
    this.append(lines.join('\n'));
    this.rowCount += records.length;
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    fs.closeSync(fd);
  }

  private append(text: string): void {
    if (this.fd === null) {
      throw new Error(`CSV sink for ${this.filePath} is closed`);
    }
    try {
      fs.writeSync(this.fd, `${text}\n`, null, 'utf-8');
    } catch (error) {
      throw new FilesystemError(`Unable to write to ${this.filePath}: ${describeCause(error)}`, this.filePath, error);
    }
  }
}

/**
 * Opens the sink, writes the header, runs `action` and closes the file on every exit path.
 */
export async function withCsvSink<T>(
  filePath: string,
  action: (sink: CsvSink) => Promise<T>,
  columns: readonly TeamRecordColumn[] = TEAM_RECORD_COLUMNS,
): Promise<T> {
  const sink = CsvSink.open(filePath, columns);
  try {
    sink.writeHeader();
    return await action(sink);
  } finally {
    sink.close();
  }
}
