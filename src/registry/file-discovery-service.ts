import type { Stats } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { errorMessage } from '../utils/errors';
import { createComponentLogger } from '../utils/logger';

const logger = createComponentLogger('file-discovery-service');

/** Directories never descended into: vendored code, test data, hidden dirs */
export const DEFAULT_SKIP_DIRECTORIES: readonly string[] = ['vendor', 'testdata'];

export type FileFilter = (filePath: string) => boolean;

export interface DiscoveryOptions {
  /** Skip vendor, testdata and hidden directories (default true) */
  pruneDirectories?: boolean;
}

/**
 * File Discovery Service
 *
 * Walks a tree depth first, visiting directory entries in lexical order so
 * that every run sees files in the same sequence. Directory symlinks are not
 * followed.
 */
export class FileDiscoveryService {
  constructor(private readonly skipDirectories: readonly string[] = DEFAULT_SKIP_DIRECTORIES) {}

  /**
   * Discover files under `rootPath` accepted by `filter`, in walk order
   */
  async discoverFiles(
    rootPath: string,
    filter: FileFilter,
    options: DiscoveryOptions = {}
  ): Promise<string[]> {
    const pruneDirectories = options.pruneDirectories ?? true;
    const files: string[] = [];

    const traverse = async (currentPath: string, isRoot: boolean): Promise<void> => {
      let stats: Stats;
      try {
        stats = await fs.lstat(currentPath);
      } catch (error) {
        throw new Error(`error walking ${currentPath}: ${errorMessage(error)}`, { cause: error });
      }

      if (stats.isDirectory()) {
        if (pruneDirectories && !isRoot && this.shouldSkipDirectory(path.basename(currentPath))) {
          logger.debug('Skipping directory', { path: currentPath });
          return;
        }

        const entries = (await fs.readdir(currentPath)).sort();
        for (const entry of entries) {
          await traverse(path.join(currentPath, entry), false);
        }
        return;
      }

      if (stats.isSymbolicLink()) {
        try {
          if ((await fs.stat(currentPath)).isDirectory()) return;
        } catch {
          logger.debug('Skipping broken symlink', { path: currentPath });
          return;
        }
      }

      if (filter(currentPath)) {
        files.push(currentPath);
      }
    };

    await traverse(rootPath, true);

    logger.debug('File discovery completed', { rootPath, totalFiles: files.length });
    return files;
  }

  shouldSkipDirectory(dirName: string): boolean {
    return this.skipDirectories.includes(dirName) || dirName.startsWith('.');
  }
}
