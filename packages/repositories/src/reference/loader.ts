// Reference data loader - reads the world and catalog documents at startup
//
// Reference data is read once and is immutable afterwards. A document that
// fails validation stops startup; warnings are logged and loading continues.

import type { Catalog, Logger, ParseResult, ReferenceValidationError, World } from '@parley/protocol';
import { parseCatalog, parseWorld } from '@parley/protocol';
import type { FileStore } from '../interfaces/file-store.js';

/**
 * Error when a reference document cannot be read, parsed, or validated
 */
export class ReferenceDataLoadError extends Error {
  readonly code = 'REFERENCE_DATA_LOAD_ERROR';
  readonly filePath: string;
  readonly errors: ReferenceValidationError[];

  constructor(filePath: string, message: string, errors: ReferenceValidationError[] = []) {
    super(`Failed to load reference data from ${filePath}: ${message}`);
    this.name = 'ReferenceDataLoadError';
    this.filePath = filePath;
    this.errors = errors;
  }
}

export type LoadReferenceOptions = {
  files: FileStore;
  logger: Logger;
};

async function loadDocument<T>(
  filePath: string,
  parse: (input: unknown) => ParseResult<T>,
  options: LoadReferenceOptions
): Promise<T> {
  const { files, logger } = options;

  let content: string;
  try {
    content = await files.readFile(filePath);
  } catch (error) {
    throw new ReferenceDataLoadError(
      filePath,
      error instanceof Error ? error.message : String(error)
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ReferenceDataLoadError(
      filePath,
      `invalid JSON (${error instanceof Error ? error.message : String(error)})`
    );
  }

  const result = parse(raw);
  for (const warning of result.warnings) {
    logger.warn(warning.message, { filePath, path: warning.path, code: warning.code });
  }

  if (!result.valid) {
    const summary = result.errors.map((e) => `${e.path}: ${e.message}`).join('; ');
    throw new ReferenceDataLoadError(filePath, summary, result.errors);
  }

  return result.value;
}

/**
 * Load and validate a world document.
 */
export async function loadWorld(filePath: string, options: LoadReferenceOptions): Promise<World> {
  const world = await loadDocument(filePath, parseWorld, options);
  options.logger.info('World loaded', {
    filePath,
    title: world.title,
    scenes: Object.keys(world.scenes).length,
  });
  return world;
}

/**
 * Load and validate a catalog document.
 */
export async function loadCatalog(filePath: string, options: LoadReferenceOptions): Promise<Catalog> {
  const catalog = await loadDocument(filePath, parseCatalog, options);
  options.logger.info('Catalog loaded', { filePath, products: catalog.products.length });
  return catalog;
}
