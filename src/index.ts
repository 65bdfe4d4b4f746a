#!/usr/bin/env node
import { createProgram } from './cli';
import { DashboardError } from './errors';

async function main() {
  await createProgram().parseAsync(process.argv);
}

main().catch((err: unknown) => {
  if (err instanceof DashboardError) {
    console.error(`❌ ${err.message}`);
  } else {
    console.error(err);
  }
  process.exitCode = 1;
});
