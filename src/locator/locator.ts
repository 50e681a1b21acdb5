import { stat } from 'fs/promises';
import { basename, dirname } from 'path';
import fastGlob from 'fast-glob';
import { logger } from '../utils/logger.js';
import { parseIndexFromDirName } from './index-parser.js';

export interface IndexedMeasurement {
  index: number;
  sourcePath: string;
}

export interface LocatorOptions {
  measurementPrefix?: string;
  indexDelimiter?: string;
}

/**
 * Finds measurement files under a dataset root and tags each one with the
 * index carried by its parent directory's name.
 */
export class Locator {
  private measurementPrefix: string;
  private indexDelimiter: string;
  private log = logger.child('locator');

  constructor(options: LocatorOptions = {}) {
    this.measurementPrefix = options.measurementPrefix ?? 'measurement';
    this.indexDelimiter = options.indexDelimiter ?? 'th';
  }

  isMeasurement(entryPath: string): boolean {
    return basename(entryPath).startsWith(this.measurementPrefix);
  }

  indexFor(entryPath: string): number {
    return parseIndexFromDirName(basename(dirname(entryPath)), this.indexDelimiter);
  }

  async locate(root: string): Promise<IndexedMeasurement[]> {
    if (!(await this.isDirectory(root))) {
      this.log.warn(`Dataset root ${root} is not a readable directory, nothing to locate`);
      return [];
    }

    this.log.debug(`Scanning ${root}...`);

    // Directories count as entries too; unreadable subtrees are skipped.
    const entries = await fastGlob(`**/${fastGlob.escapePath(this.measurementPrefix)}*`, {
      cwd: root,
      absolute: true,
      onlyFiles: false,
      dot: true,
      followSymbolicLinks: false,
      suppressErrors: true,
      caseSensitiveMatch: true,
    });

    const measurements: IndexedMeasurement[] = [];
    for (const entry of entries) {
      if (!this.isMeasurement(entry)) {
        continue;
      }
      measurements.push({ index: this.indexFor(entry), sourcePath: entry });
    }

    // Array#sort is stable, so equal indices keep discovery order
    measurements.sort((a, b) => a.index - b.index);

    this.log.info(`Located ${measurements.length} measurement(s) under ${root}`);
    return measurements;
  }

  private async isDirectory(path: string): Promise<boolean> {
    try {
      return (await stat(path)).isDirectory();
    } catch {
      return false;
    }
  }
}
