// src/core/batch/audit.ts
import * as path from 'path';
import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import { stringify } from 'csv-stringify/sync';
import { ErrorCode, SitewatchError, errorMessage } from '../errors.js';

export const SUCCESS_COLUMNS = ['name', 'url', 'path', 'folder_path', 'publish_time', 'time'] as const;
export const FAILURE_COLUMNS = ['name', 'url', 'reason', 'time'] as const;

export type SuccessRecord = Record<(typeof SUCCESS_COLUMNS)[number], string>;
export type FailureRecord = Record<(typeof FAILURE_COLUMNS)[number], string>;

/**
 * Append-only CSV log. The header is written when the file is created.
 */
export class AuditLog<Row extends Record<string, string>> {
  constructor(
    private readonly filePath: string,
    private readonly columns: readonly (keyof Row & string)[]
  ) {}

  get path(): string {
    return this.filePath;
  }

  async append(row: Row): Promise<void> {
    const isNew = !existsSync(this.filePath);
    const text = stringify([row], { header: isNew, columns: [...this.columns] });
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.appendFile(this.filePath, text, 'utf-8');
    } catch (error) {
      throw new SitewatchError(
        ErrorCode.WRITE_FAILED,
        `Failed to append to ${this.filePath}: ${errorMessage(error)}`
      );
    }
  }
}

export function createSuccessLog(filePath: string): AuditLog<SuccessRecord> {
  return new AuditLog<SuccessRecord>(filePath, SUCCESS_COLUMNS);
}

export function createFailureLog(filePath: string): AuditLog<FailureRecord> {
  return new AuditLog<FailureRecord>(filePath, FAILURE_COLUMNS);
}
