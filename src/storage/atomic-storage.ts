/**
 * Atomic Storage Module
 *
 * Crash-safe JSON files for the ledger node's on-disk state.
 * Write-to-temp + fsync + rename, so after a crash either the old file
 * or the new file is intact. Each file carries a SHA-256 checksum of
 * its payload and the previous generation is kept as a backup.
 */

import * as fs from 'fs';
import * as path from 'path';
import { sha256 } from '../crypto';
import { logger as defaultLogger, StructuredLogger } from '../scaling/structured-logger';

/**
 * File wrapper with checksum for corruption detection
 */
export interface ChecksummedFile<T> {
  version: number;
  checksum: string;
  data: T;
  writtenAt: number;
}

export type ReadResult<T> =
  | { success: true; data: T; recoveredFromBackup: boolean }
  | { success: false; error: string };

/** Narrows parsed JSON to the caller's shape. */
export type Guard<T> = (value: unknown) => value is T;

const CURRENT_VERSION = 1;
const TEMP_SUFFIX = '.tmp';
const BACKUP_SUFFIX = '.bak';

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export class AtomicStorage {
  constructor(private readonly log: StructuredLogger = defaultLogger) {}

  /**
   * 1. Serialize data with checksum
   * 2. Write to a temporary file and fsync it
   * 3. Move the current file aside as backup
   * 4. Rename temp -> target (atomic at the OS level)
   */
  write<T>(filePath: string, data: T): void {
    const tempPath = filePath + TEMP_SUFFIX;
    const backupPath = filePath + BACKUP_SUFFIX;

    const wrapper: ChecksummedFile<T> = {
      version: CURRENT_VERSION,
      checksum: sha256(JSON.stringify(data)),
      data,
      writtenAt: Date.now(),
    };

    fs.mkdirSync(path.dirname(filePath), { recursive: true });

    const fd = fs.openSync(tempPath, 'w');
    try {
      fs.writeSync(fd, JSON.stringify(wrapper, null, 2));
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }

    if (fs.existsSync(filePath)) {
      fs.rmSync(backupPath, { force: true });
      fs.renameSync(filePath, backupPath);
    }

    fs.renameSync(tempPath, filePath);
  }

  /**
   * Read with checksum verification, falling back to the backup generation
   * (and restoring it) when the main file is missing or corrupt.
   */
  read<T>(filePath: string, guard: Guard<T>): ReadResult<T> {
    const main = this.tryRead(filePath, guard);
    if (main.success) return main;

    const backup = this.tryRead(filePath + BACKUP_SUFFIX, guard);
    if (!backup.success) {
      return { success: false, error: `Main file and backup unreadable: ${main.error}` };
    }

    this.log.warn('storage', 'Recovered from backup', { filePath, reason: main.error });
    this.write(filePath, backup.data);
    return { success: true, data: backup.data, recoveredFromBackup: true };
  }

  exists(filePath: string): boolean {
    return fs.existsSync(filePath) || fs.existsSync(filePath + BACKUP_SUFFIX);
  }

  /**
   * Remove temp files left behind by interrupted writes.
   */
  cleanupTempFiles(directory: string): number {
    if (!fs.existsSync(directory)) return 0;

    let cleaned = 0;
    for (const file of fs.readdirSync(directory)) {
      if (!file.endsWith(TEMP_SUFFIX)) continue;
      fs.rmSync(path.join(directory, file), { force: true });
      cleaned++;
    }
    if (cleaned > 0) {
      this.log.info('storage', 'Removed orphaned temp files', { directory, cleaned });
    }
    return cleaned;
  }

  private tryRead<T>(filePath: string, guard: Guard<T>): ReadResult<T> {
    if (!fs.existsSync(filePath)) {
      return { success: false, error: 'File does not exist' };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch {
      return { success: false, error: 'Invalid JSON' };
    }

    if (!isObject(parsed) || typeof parsed.checksum !== 'string' || !('data' in parsed)) {
      return { success: false, error: 'Missing checksum wrapper' };
    }

    const calculated = sha256(JSON.stringify(parsed.data));
    if (calculated !== parsed.checksum) {
      return { success: false, error: `Checksum mismatch: expected ${parsed.checksum}, got ${calculated}` };
    }

    if (!guard(parsed.data)) {
      return { success: false, error: 'Unexpected data shape' };
    }

    return { success: true, data: parsed.data, recoveredFromBackup: false };
  }
}
