import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import { type SourceConfig, sourceConfigSchema } from '~/crawl-archive/models/source';
import type { SourceId } from '~/models/common';
import { ConfigError, describeCause } from '~/models/errors';

const sourcesFileSchema = z.union([
  z.array(sourceConfigSchema),
  z.object({ sources: z.array(sourceConfigSchema) }).transform(({ sources }) => sources),
]);

/**
 * Read source configurations from a JSON file, either a bare array or `{ "sources": [...] }`.
 * @param only Keep these sources, in file order. Every id must exist.
 */
export async function readSources(path: string, only: SourceId[] = []): Promise<SourceConfig[]> {
  let json: unknown;
  try {
    json = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Could not read sources file ${path}: ${describeCause(error)}`);
  }

  const parsed = sourcesFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid sources file ${path}`,
      parsed.error.issues.map(({ path: at, message }) => `${at.join('.')}: ${message}`),
    );
  }

  if (only.length === 0) {
    return parsed.data;
  }

  const known = new Set(parsed.data.map(({ sourceId }) => sourceId));
  const unknown = only.filter((sourceId) => !known.has(sourceId));
  if (unknown.length > 0) {
    throw new ConfigError('Unknown source ids', unknown);
  }
  return parsed.data.filter(({ sourceId }) => only.includes(sourceId));
}
