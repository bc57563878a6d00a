import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { ResourceError } from '../../domain/index.js';

export function readTextFile(path: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    throw new ResourceError(path, 'read', err);
  }
}

/** Replaces the file, creating its directory when needed. */
export function writeTextFile(path: string, content: string): void {
  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content, 'utf-8');
  } catch (err: unknown) {
    throw new ResourceError(path, 'write', err);
  }
}
