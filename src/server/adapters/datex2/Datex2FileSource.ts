import { readFile } from 'fs/promises';
import path from 'path';
import { DocumentSourceError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Read a complete DATEX2 payload from disk
 *
 * @throws DocumentSourceError when the file cannot be read
 */
export async function loadDatex2File(filePath: string): Promise<Buffer> {
  const resolvedPath = path.resolve(filePath);

  try {
    const content = await readFile(resolvedPath);
    logger.debug({ path: resolvedPath, bytes: content.length }, 'Loaded DATEX2 file');
    return content;
  } catch (error) {
    const code = error && typeof error === 'object' && 'code' in error ? error.code : undefined;
    logger.error({ error, path: resolvedPath }, 'Failed to read DATEX2 file');
    throw new DocumentSourceError(
      resolvedPath,
      code === 'ENOENT' ? 'file not found' : error instanceof Error ? error.message : String(error),
      { code }
    );
  }
}
