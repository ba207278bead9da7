import { mkdir, rename, rm, stat, writeFile } from 'fs/promises';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import { Logger } from '../utils/logger';
import { OutputWriteError, describeError } from '../utils/errors';

export type Cell = string | number | null;

export interface Column<T> {
  header: string;
  value: (row: T) => Cell;
}

export interface TableSpec<T> {
  file: string;
  columns: Column<T>[];
}

export interface RenderedTable {
  file: string;
  rowCount: number;
  content: string;
}

/**
 * Numbers keep their shortest round-trip representation; absent values are empty cells.
 * Anything that cannot be represented faithfully fails the whole report.
 */
export function formatCell(file: string, header: string, value: Cell): string {
  if (value === null) return '';
  if (typeof value === 'string') return value;
  if (!Number.isFinite(value)) {
    throw new OutputWriteError(file, `column '${header}' holds a non-finite number (${value})`);
  }
  return Object.is(value, -0) ? '0' : String(value);
}

export function renderTable<T>(table: TableSpec<T>, rows: T[]): RenderedTable {
  const headers = table.columns.map(c => c.header);
  const records = rows.map(row => {
    const record: Record<string, string> = {};
    for (const column of table.columns) {
      record[column.header] = formatCell(table.file, column.header, column.value(row));
    }
    return record;
  });

  try {
    const content = stringify(records, { header: true, columns: headers });
    // csv-stringify emits nothing at all for zero records; keep the header row.
    return { file: table.file, rowCount: rows.length, content: content || stringify([headers]) };
  } catch (err) {
    throw new OutputWriteError(table.file, describeError(err));
  }
}

async function discard(paths: string[]) {
  await Promise.all(paths.map(p => rm(p, { force: true })));
}

const hasCode = (err: unknown, code: string) => err instanceof Error && 'code' in err && err.code === code;

async function existingKind(target: string): Promise<'absent' | 'file' | 'other'> {
  try {
    return (await stat(target)).isFile() ? 'file' : 'other';
  } catch (err) {
    if (hasCode(err, 'ENOENT')) return 'absent';
    throw err;
  }
}

interface StagedTable {
  file: string;
  target: string;
  tmp: string;
  backup: string;
  replaces: boolean;
  backedUp: boolean;
  installed: boolean;
}

// Undo in reverse: pull out what was installed, put the previous report back.
async function rollBack(staged: StagedTable[]) {
  for (const entry of [...staged].reverse()) {
    if (entry.installed) await rm(entry.target, { force: true });
    if (entry.backedUp) await rename(entry.backup, entry.target);
  }
  await discard(staged.map(s => s.tmp));
}

/**
 * Writes every table to a temporary sibling, moves the tables of the previous run aside and
 * only then renames the new ones into place. If any step fails the previous report is
 * restored, so the directory never mixes tables of two runs.
 */
export async function writeTables(outputDir: string, tables: RenderedTable[]): Promise<string[]> {
  try {
    await mkdir(outputDir, { recursive: true });
  } catch (err) {
    throw new OutputWriteError(outputDir, `cannot create output directory: ${describeError(err)}`);
  }

  const staged: StagedTable[] = [];
  let current = outputDir;
  try {
    for (const table of tables) {
      current = table.file;
      const target = path.join(outputDir, table.file);
      const kind = await existingKind(target);
      if (kind === 'other') throw new Error(`${target} exists and is not a regular file`);

      const entry: StagedTable = {
        file: table.file,
        target,
        tmp: path.join(outputDir, `.${table.file}.${process.pid}.tmp`),
        backup: path.join(outputDir, `.${table.file}.${process.pid}.bak`),
        replaces: kind === 'file',
        backedUp: false,
        installed: false,
      };
      staged.push(entry);
      await writeFile(entry.tmp, table.content, 'utf-8');
    }

    for (const entry of staged.filter(s => s.replaces)) {
      current = entry.file;
      await rename(entry.target, entry.backup);
      entry.backedUp = true;
    }

    for (const entry of staged) {
      current = entry.file;
      await rename(entry.tmp, entry.target);
      entry.installed = true;
    }
  } catch (err) {
    const reason = describeError(err);
    try {
      await rollBack(staged);
    } catch (restoreErr) {
      throw new OutputWriteError(current, `${reason}; restoring the previous report failed: ${describeError(restoreErr)}`);
    }
    throw new OutputWriteError(current, reason);
  }

  const backups = staged.filter(s => s.backedUp).map(s => s.backup);
  try {
    await discard(backups);
  } catch (err) {
    Logger.warn(`[REPORT] Could not remove backups of the previous report: ${describeError(err)}`);
  }

  for (const table of tables) {
    Logger.info(`[REPORT] Saved ${table.rowCount} rows to ${path.join(outputDir, table.file)}`);
  }
  return staged.map(s => s.target);
}
