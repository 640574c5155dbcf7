import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import {
  DensityClass,
  DensityTable,
  DensityTableSource,
  RegionDescriptor,
} from './interfaces/coverage.interface';

const DensityFileSchema = z.object({
  region: z.string(),
  label: z.string().optional(),
  entries: z.array(
    z.object({
      id: z.string().min(1),
      label: z.string().optional(),
      density: z.nativeEnum(DensityClass),
      expected: z.number().int().nonnegative(),
    }),
  ),
});

const REGION_KEY = /^[a-z0-9][a-z0-9-]*$/;

export const DEFAULT_DENSITY_DIR = join(__dirname, '..', '..', 'data', 'density');

/**
 * Reads `<dir>/<region-key>.json`. A missing file yields an empty table so the
 * planner reports the region as invalid.
 */
@Injectable()
export class JsonDensityTableSource implements DensityTableSource {
  private readonly logger = new Logger(JsonDensityTableSource.name);
  private readonly cache = new Map<string, DensityTable>();

  constructor(private readonly directory: string = DEFAULT_DENSITY_DIR) {}

  async lookup(region: RegionDescriptor): Promise<DensityTable> {
    const key = region.key.trim().toLowerCase();
    if (!REGION_KEY.test(key)) {
      return [];
    }

    const cached = this.cache.get(key);
    if (cached) return cached;

    let raw: string;
    try {
      raw = await readFile(join(this.directory, `${key}.json`), 'utf8');
    } catch (error: unknown) {
      if (isMissingFile(error)) {
        this.logger.warn(`No density table for region ${key}`);
        return [];
      }
      throw error;
    }

    const file = DensityFileSchema.parse(JSON.parse(raw));
    const table: DensityTable = file.entries.map((entry) => ({
      subRegionId: entry.id,
      label: entry.label,
      densityClass: entry.density,
      expectedCount: entry.expected,
    }));
    this.cache.set(key, table);
    return table;
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
