import path from 'path';
import { outputFile } from 'fs-extra';
import { vi } from 'vitest';
import { Logger } from '../src/utils/logger';

/**
 * Scratch directory for one test suite
 */
export function testDir(suite: string): string {
  return path.join(process.cwd(), 'test-output', suite);
}

export async function writeFixture(root: string, relativePath: string, content: string): Promise<string> {
  const filePath = path.join(root, relativePath);
  await outputFile(filePath, content, 'utf-8');
  return filePath;
}

/**
 * Logger whose output is swallowed; spy on its methods to assert calls
 */
export function quietLogger(verbose = false): Logger {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  return new Logger(false, verbose);
}

export const FIXED_NOW = (): Date => new Date(2026, 0, 15);
