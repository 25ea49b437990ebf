/**
 * Product Database
 * Loads the KMS product database (JSON or YAML) as an untyped tree.
 */

import { readFile } from 'fs/promises';
import { extname } from 'path';
import { parse as parseYaml } from 'yaml';
import { DatabaseLoadError, errorMessage, systemErrorCode } from './errors.js';

export type ProductDatabaseLoader = () => Promise<unknown>;

export async function loadProductDatabase(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    const reason = systemErrorCode(error) === 'ENOENT' ? 'file not found' : errorMessage(error);
    throw new DatabaseLoadError(path, reason, error);
  }

  const ext = extname(path).toLowerCase();
  const format = ext === '.yaml' || ext === '.yml' ? 'YAML' : 'JSON';
  try {
    return format === 'YAML' ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new DatabaseLoadError(path, `invalid ${format}: ${errorMessage(error)}`, error);
  }
}

export function createFileDatabaseLoader(path: string): ProductDatabaseLoader {
  return () => loadProductDatabase(path);
}
