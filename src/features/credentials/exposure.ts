/**
 * @fileoverview Checks that a local .env file is kept out of version control
 * @module features/credentials/exposure
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

const ENV_FILE = '.env';

/** .gitignore patterns that cover a top-level `.env`, after any leading `**\/` is dropped */
const COVERING_PATTERNS = new Set(['.env', '/.env', '.env*', '/.env*', '*.env', '*']);

function coversEnvFile(pattern: string): boolean {
  return COVERING_PATTERNS.has(pattern.replace(/^(\*\*\/)+/, ''));
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readOptional(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Whether the given .gitignore content ignores a top-level `.env` file.
 *
 * Later lines win, so a negation such as `!.env` after `.env*` un-ignores it.
 */
export function isEnvFileIgnored(gitignore: string): boolean {
  let ignored = false;
  for (const rawLine of gitignore.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#')) {
      continue;
    }
    if (line.startsWith('!')) {
      if (coversEnvFile(line.slice(1))) {
        ignored = false;
      }
    } else if (coversEnvFile(line)) {
      ignored = true;
    }
  }
  return ignored;
}

/**
 * Warns when a `.env` file in the workspace is not ignored by git.
 *
 * @returns A warning, or undefined when there is no `.env` file or it is ignored
 */
export async function checkEnvFileExposure(workspaceRoot: string): Promise<string | undefined> {
  const envPath = path.join(workspaceRoot, ENV_FILE);
  const envContent = await readOptional(envPath);
  if (envContent === undefined) {
    return undefined;
  }

  const gitignore = await readOptional(path.join(workspaceRoot, '.gitignore'));
  if (gitignore !== undefined && isEnvFileIgnored(gitignore)) {
    return undefined;
  }

  return `${envPath} is not listed in .gitignore; add ".env" so the API key is never committed`;
}
