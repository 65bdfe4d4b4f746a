import * as fs from 'fs-extra';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';
import { CANONICAL_FIELDS, METRICS } from './types';

export const DEFAULT_CONFIG_FILE = 'dashboard.config.json';

const CanonicalFieldSchema = z.enum(CANONICAL_FIELDS);

export const ColumnMappingSchema = z.object({
  fields: z.record(CanonicalFieldSchema, z.array(z.string().min(1)).min(1)),
  defaultDisasterType: z.string().min(1).optional(),
  sectionMarker: z.string().min(1).optional(),
  headerSearchRows: z.number().int().positive().optional(),
});

export const SourceSchema = z.object({
  year: z.number().int().min(1900).max(2100),
  file: z.string().min(1),
  sheet: z.string().min(1).optional(),
  mapping: ColumnMappingSchema.optional(),
});

export const DashboardConfigSchema = z.object({
  inputDir: z.string().min(1).default('xlsx'),
  outputDir: z.string().min(1).default('data'),
  policy: z.enum(['clamp', 'reject']).default('clamp'),
  topN: z.number().int().positive().default(10),
  metric: z.enum(METRICS).default('incident_count'),
  sources: z
    .array(SourceSchema)
    .min(1)
    .default(() => [
      { year: 2023, file: 'Data_2023.xlsx' },
      { year: 2024, file: 'Data_2024.xlsx' },
    ])
    .refine((sources) => new Set(sources.map((s) => s.year)).size === sources.length, {
      message: 'each year may appear only once',
    }),
});

export type SourceConfig = z.infer<typeof SourceSchema>;
export type DashboardConfig = z.infer<typeof DashboardConfigSchema>;

export function parseConfig(input: unknown, file = '<inline>'): DashboardConfig {
  const result = DashboardConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      file,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}

/**
 * Load the config file. Without an explicit path a missing default file
 * means built-in defaults; an explicit path must exist.
 */
export async function loadConfig(file?: string, cwd = process.cwd()): Promise<DashboardConfig> {
  const target = path.resolve(cwd, file ?? DEFAULT_CONFIG_FILE);
  if (!(await fs.pathExists(target))) {
    if (file) throw new ConfigError(target, ['file not found']);
    return parseConfig({}, target);
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(target);
  } catch (err) {
    throw new ConfigError(target, [err instanceof Error ? err.message : String(err)]);
  }
  return parseConfig(raw, target);
}
