/**
 * @fileoverview Data directory setup and initialization utilities
 *
 * Ensures the data directory exists and is writable before the server starts.
 * The data directory stores:
 * - config.json: Application configuration
 * - catalog.json: Providers, printers, tables and label templates
 */

import * as fs from 'fs';
import * as path from 'path';
import { logInfo, logError } from './logging';

export const CONFIG_FILE_NAME = 'config.json';
export const CATALOG_FILE_NAME = 'catalog.json';

/**
 * Get the data directory path
 * Can be overridden by DATA_DIR environment variable
 *
 * @returns Absolute path to data directory
 */
export function getDataPath(): string {
  const customPath = process.env.DATA_DIR;
  if (customPath) {
    return path.resolve(customPath);
  }
  return path.join(process.cwd(), 'data');
}

export function getConfigFilePath(): string {
  return path.join(getDataPath(), CONFIG_FILE_NAME);
}

export function getCatalogFilePath(): string {
  return path.join(getDataPath(), CATALOG_FILE_NAME);
}

/**
 * Ensure the data directory exists, creating it when missing
 */
export function ensureDataDirectory(): string {
  const dataPath = getDataPath();

  if (!fs.existsSync(dataPath)) {
    logInfo('Setup', `Creating data directory: ${dataPath}`);
    fs.mkdirSync(dataPath, { recursive: true });
  }

  return dataPath;
}

/**
 * Check if the data directory is writable
 */
export function isDataDirectoryWritable(): boolean {
  try {
    const dataPath = ensureDataDirectory();
    const testFile = path.join(dataPath, '.write-test');

    fs.writeFileSync(testFile, 'test');
    fs.unlinkSync(testFile);

    return true;
  } catch (error) {
    logError('Setup', 'Data directory is not writable:', error);
    return false;
  }
}

/**
 * Initialize the data directory on application startup
 *
 * @throws Error if data directory cannot be created or is not writable
 */
export function initializeDataDirectory(): void {
  const dataPath = ensureDataDirectory();

  if (!isDataDirectoryWritable()) {
    throw new Error(`Data directory is not writable: ${dataPath}`);
  }

  logInfo('Setup', `Data directory initialized: ${dataPath}`);
}
