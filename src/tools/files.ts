/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { dirname, join } from 'node:path';
import { parseJson, stringifyJson } from '../core/json.js';
import type { JsonValue } from '../core/types.js';

export const ensureDirectory = async (dirPath: string): Promise<void> => {
  await fs.mkdir(dirPath, { recursive: true });
};

/**
 * Removes `dirPath` and everything below it, then creates it empty.
 */
export const resetDirectory = async (dirPath: string): Promise<void> => {
  await fs.rm(dirPath, { recursive: true, force: true });
  await ensureDirectory(dirPath);
};

/**
 * Copies a file or directory tree. Symlinks are replaced by what they point at
 * and timestamps are preserved; the source must exist.
 */
export const copyPath = async (source: string, destination: string): Promise<void> => {
  await fs.cp(source, destination, {
    recursive: true,
    dereference: true,
    preserveTimestamps: true,
    errorOnExist: true,
    force: false,
  });
};

export const touchFile = async (filePath: string): Promise<void> => {
  await fs.writeFile(filePath, '', 'utf8');
};

export const writeJsonFile = async (filePath: string, data: JsonValue): Promise<void> => {
  await ensureDirectory(dirname(filePath));
  await fs.writeFile(filePath, stringifyJson(data), 'utf8');
};

export const readJsonFile = async (filePath: string): Promise<JsonValue> => {
  const buffer = await fs.readFile(filePath, 'utf8');
  return parseJson(buffer);
};

/**
 * `*.json` files directly inside `dirPath`, sorted by name. Symlinks count
 * when they resolve to a file.
 */
export const listJsonFiles = async (
  dirPath: string,
  exclude: ReadonlySet<string> = new Set(),
): Promise<string[]> => {
  const entries = await fs.readdir(dirPath, { withFileTypes: true });
  const names: string[] = [];
  for (const entry of entries) {
    if (!entry.name.endsWith('.json') || exclude.has(entry.name)) {
      continue;
    }
    if (entry.isFile()) {
      names.push(entry.name);
    } else if (entry.isSymbolicLink()) {
      const target = await fs.stat(join(dirPath, entry.name));
      if (target.isFile()) {
        names.push(entry.name);
      }
    }
  }
  return names.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
};

export const fileExists = async (filePath: string): Promise<boolean> => {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
};
