/**
 * Build information for /version: the git commit the bot runs from and
 * when the process started. Never throws; an unreadable commit is "unknown".
 */
import { execFile } from 'node:child_process';
import { createLogger } from './logger.js';

const log = createLogger('build-info');

export interface BuildInfo {
  commitHash: string;
  startedAt: string;
}

const GIT_TIMEOUT_MS = 5_000;
const COMMIT_PATTERN = /^[0-9a-f]{7,64}$/i;

export function readCommitHash(cwd: string = process.cwd()): Promise<string> {
  return new Promise<string>((resolve) => {
    execFile(
      'git',
      ['rev-parse', 'HEAD'],
      { cwd, timeout: GIT_TIMEOUT_MS, windowsHide: true },
      (error, stdout) => {
        const hash = String(stdout).trim();
        if (error || !COMMIT_PATTERN.test(hash)) {
          log.warn({ cwd, reason: error ? error.message : 'unexpected output' }, 'Could not read commit hash');
          resolve('unknown');
          return;
        }
        resolve(hash);
      },
    );
  });
}

export async function collectBuildInfo(cwd?: string, now: Date = new Date()): Promise<BuildInfo> {
  return {
    commitHash: await readCommitHash(cwd),
    startedAt: now.toISOString(),
  };
}
