import { Command, InvalidArgumentError } from 'commander';
import * as fs from 'fs-extra';
import * as path from 'path';
import { loadConfig } from './config';
import type { DashboardConfig } from './config';
import { createLogger } from './logger';
import { loadTable } from './pipeline/load';
import type { LoadedTable } from './pipeline/load';
import { previewRecords, summarize } from './pipeline/summarize';
import { formatCleaningReport, formatPreview, formatSummary } from './report';
import { isMetric } from './types';
import type { CoercionPolicy, FilterState, Metric } from './types';

type GlobalOptions = {
  config?: string;
  cwd: string;
  verbose?: boolean;
};

interface FilterOptions {
  year?: number[];
  province?: string[];
}

interface SummaryOptions extends FilterOptions {
  metric?: Metric;
  top?: number;
  json?: boolean;
  out?: string;
}

interface PreviewOptions extends FilterOptions {
  limit?: number;
}

interface IngestOptions {
  policy?: CoercionPolicy;
}

function collectYear(value: string, previous: number[] = []): number[] {
  const year = Number(value);
  if (!Number.isInteger(year)) throw new InvalidArgumentError(`"${value}" is not a year.`);
  return [...previous, year];
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function parsePositive(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError(`"${value}" is not a positive integer.`);
  return n;
}

function parseMetric(value: string): Metric {
  if (!isMetric(value)) throw new InvalidArgumentError(`unknown metric "${value}".`);
  return value;
}

function parsePolicy(value: string): CoercionPolicy {
  if (value !== 'clamp' && value !== 'reject') throw new InvalidArgumentError('policy must be "clamp" or "reject".');
  return value;
}

function filterFrom(options: FilterOptions): FilterState {
  return { years: options.year, provinces: options.province };
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('bencana-dashboard')
    .description('Clean and summarize the 2023–2024 Indonesian disaster recap spreadsheets')
    .option('-c, --config <file>', 'config file (default: dashboard.config.json)')
    .option('-C, --cwd <dir>', 'working directory for relative paths', process.cwd())
    .option('-v, --verbose', 'debug logging');

  const setup = async (overrides: Partial<DashboardConfig> = {}): Promise<{ config: DashboardConfig; loaded: LoadedTable; cwd: string }> => {
    const globals = program.opts<GlobalOptions>();
    const logger = createLogger(globals.verbose ? { level: 'debug' } : {});
    const config = { ...(await loadConfig(globals.config, globals.cwd)), ...overrides };
    const loaded = await loadTable(config, { cwd: globals.cwd, logger });
    return { config, loaded, cwd: globals.cwd };
  };

  program
    .command('ingest')
    .description('load, clean and merge every source; write cleaned JSON')
    .option('--policy <policy>', 'clamp or reject rows with bad numbers', parsePolicy)
    .action(async (options: IngestOptions) => {
      const { config, loaded, cwd } = await setup(options.policy ? { policy: options.policy } : {});
      const outputDir = path.resolve(cwd, config.outputDir);
      await fs.ensureDir(outputDir);

      for (const dataset of loaded.datasets) {
        console.log(`\n🚜 Processing: ${dataset.source}`);
        console.log(formatCleaningReport(dataset.report));
        const target = path.join(outputDir, `${path.parse(dataset.source).name}.json`);
        await fs.writeJson(target, dataset.records, { spaces: 2 });
        console.log(`  ✅ Extracted ${dataset.records.length} records.`);
      }

      await fs.writeJson(
        path.join(outputDir, 'cleaning-report.json'),
        loaded.datasets.map((dataset) => dataset.report),
        { spaces: 2 },
      );
      console.log(`\n📦 ${loaded.table.records.length} records across ${loaded.table.years.join(', ')}`);
    });

  program
    .command('summary')
    .description('KPIs, top-N ranking and year comparison for a filter')
    .option('-y, --year <year>', 'year to include (repeatable)', collectYear)
    .option('-p, --province <name>', 'province to include (repeatable)', collect)
    .option('-m, --metric <metric>', 'metric for ranking and comparison', parseMetric)
    .option('-t, --top <n>', 'number of provinces to rank', parsePositive)
    .option('--json', 'print the summary as JSON')
    .option('-o, --out <file>', 'also write the summary JSON to a file')
    .action(async (options: SummaryOptions) => {
      const { config, loaded, cwd } = await setup();
      const view = summarize(loaded.table, filterFrom(options), {
        metric: options.metric ?? config.metric,
        topN: options.top ?? config.topN,
      });

      if (options.out) {
        const target = path.resolve(cwd, options.out);
        await fs.outputJson(target, view, { spaces: 2 });
      }
      console.log(options.json ? JSON.stringify(view, null, 2) : formatSummary(view));
    });

  program
    .command('provinces')
    .description('list the years and provinces available for filtering')
    .action(async () => {
      const { loaded } = await setup();
      console.log(`Tahun: ${loaded.table.years.join(', ')}`);
      for (const province of loaded.table.provinces) console.log(`  ${province}`);
    });

  program
    .command('preview')
    .description('cleaned rows, sorted by year and province')
    .option('-y, --year <year>', 'year to include (repeatable)', collectYear)
    .option('-p, --province <name>', 'province to include (repeatable)', collect)
    .option('-l, --limit <n>', 'maximum rows to print', parsePositive)
    .action(async (options: PreviewOptions) => {
      const { loaded } = await setup();
      const records = previewRecords(loaded.table, filterFrom(options));
      console.log(formatPreview(options.limit ? records.slice(0, options.limit) : records));
    });

  return program;
}
