/**
 * Pre-migration backups through pg_dump
 *
 * The tenant-isolation migration has no step-wise rollback, so the runner
 * refuses to migrate without a fresh dump. The restore command is reported
 * with every backup so an operator has it at hand when a migration fails.
 */

import { spawn } from 'node:child_process';
import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import { BackupError } from '../errors.js';
import { logger } from '../utils/logger.js';

export interface BackupResult {
  path: string;
  /** Shell command that restores this backup; credentials are redacted */
  restoreCommand: string;
}

export interface BackupService {
  createBackup(label: string): Promise<BackupResult>;
}

export interface CommandResult {
  code: number | null;
  stderr: string;
}

export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

export interface PgDumpBackupOptions {
  connectionString: string;
  backupDir: string;
  pgDumpPath?: string;
  runCommand?: CommandRunner;
  now?: () => Date;
}

const REDACTED = '***';

/**
 * Hide the password of a URL or key=value connection string
 */
export function redactConnectionString(connectionString: string): string {
  try {
    const url = new URL(connectionString);
    if (url.password) {
      url.password = REDACTED;
    }
    return url.toString();
  } catch {
    return connectionString.replace(/password=\S+/gi, `password=${REDACTED}`);
  }
}

export function buildPgDumpArgs(connectionString: string, file: string): string[] {
  return ['--format=custom', '--no-password', `--file=${file}`, `--dbname=${connectionString}`];
}

export function restoreCommandFor(connectionString: string, file: string): string {
  return `pg_restore --clean --if-exists --dbname="${redactConnectionString(connectionString)}" "${file}"`;
}

export function backupFileName(label: string, at: Date): string {
  const stamp = at.toISOString().replace(/[:.]/g, '-');
  return `${label}-${stamp}.dump`;
}

const spawnCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'ignore', 'pipe'] });
    let stderr = '';

    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    child.on('error', reject);
    child.on('close', (code) => resolve({ code, stderr }));
  });

export class PgDumpBackupService implements BackupService {
  private readonly pgDumpPath: string;
  private readonly runCommand: CommandRunner;
  private readonly now: () => Date;

  constructor(private readonly options: PgDumpBackupOptions) {
    this.pgDumpPath = options.pgDumpPath ?? 'pg_dump';
    this.runCommand = options.runCommand ?? spawnCommand;
    this.now = options.now ?? (() => new Date());
  }

  async createBackup(label: string): Promise<BackupResult> {
    const { connectionString, backupDir } = this.options;
    const file = path.resolve(backupDir, backupFileName(label, this.now()));

    let result: CommandResult;
    try {
      await mkdir(backupDir, { recursive: true });
      result = await this.runCommand(this.pgDumpPath, buildPgDumpArgs(connectionString, file));
    } catch (error) {
      throw new BackupError(`Could not run ${this.pgDumpPath}: ${error instanceof Error ? error.message : String(error)}`, {
        file,
      });
    }

    if (result.code !== 0) {
      throw new BackupError(`${this.pgDumpPath} exited with code ${String(result.code)}: ${result.stderr.trim()}`, {
        file,
        exitCode: result.code,
      });
    }

    const backup = { path: file, restoreCommand: restoreCommandFor(connectionString, file) };
    logger.info('Pre-migration backup written', backup);
    return backup;
  }
}
