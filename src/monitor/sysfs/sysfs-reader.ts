/**
 * sysfs file access
 *
 * The data sources read through this interface so that missing or unreadable
 * nodes surface as `undefined` / empty listings instead of exceptions.
 */

import { readFileSync, readdirSync } from 'node:fs';

export interface SysfsReader {
  /** Trimmed file content, or undefined when the file cannot be read */
  readText(path: string): string | undefined;
  /** Directory entry names in natural order, or [] when the directory cannot be read */
  listEntries(dir: string): string[];
}

const collator = new Intl.Collator('en', { numeric: true });

export function sortEntries(names: readonly string[]): string[] {
  return [...names].sort(collator.compare);
}

export const nodeSysfsReader: SysfsReader = {
  readText(path) {
    try {
      return readFileSync(path, 'utf8').trim();
    } catch {
      return undefined;
    }
  },
  listEntries(dir) {
    try {
      return sortEntries(readdirSync(dir));
    } catch {
      return [];
    }
  },
};

/**
 * Parses a whole decimal number as sysfs prints it. Anything else yields undefined.
 */
export function parseInteger(text: string | undefined): number | undefined {
  if (text === undefined || !/^[+-]?\d+$/.test(text)) {
    return undefined;
  }
  return Number.parseInt(text, 10);
}
