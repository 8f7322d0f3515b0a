#!/usr/bin/env node

import process from 'process';
import { parseArgs } from 'node:util';
import { runMediaSorter } from './index';
import { InterruptedError } from './helpers/errors';
import Log from './helpers/logger';

const { positionals, values } = parseArgs({
  args: process.argv.slice(2),
  allowPositionals: true,
  options: {
    help: { type: 'boolean', short: 'h' },
    'input-folder': { type: 'string', short: 'i' },
    'output-folder': { type: 'string', short: 'o' },
    workers: { type: 'string', short: 'w' },
    'no-cache': { type: 'boolean' },
    debug: { type: 'boolean', short: 'd' },
    types: { type: 'string', short: 't' },
    'no-day': { type: 'boolean' },
    geocoder: { type: 'string', short: 'g' },
  },
});

const sourceDir = values['input-folder'] ?? positionals[0];
const targetDir = values['output-folder'] ?? positionals[1];

// Show help if no arguments or --help is passed
if ((!sourceDir && !targetDir) || values.help) {
  console.log(`
Usage:
  npx media-sorter <inputFolder> <outputFolder> [options]
  npx media-sorter --input-folder <dir> --output-folder <dir> [options]

Options:
  -h, --help              Show this help message
  -w, --workers <n>       Parallel workers (default: CPU count * 2, max 32)
      --no-cache          Do not read or write the geocoding cache
  -d, --debug             Verbose logging, no progress bar
  -t, --types <list>      Only these extensions, e.g. jpg,heic,mov
      --no-day            Omit the day folder (year/month/place)
  -g, --geocoder <name>   google (needs GOOGLE_MAPS_API_KEY) or nominatim

Example:
  GOOGLE_MAPS_API_KEY=... npx media-sorter ~/Pictures ~/PicturesSorted -w 8
`);
  process.exit(0);
}

if (!sourceDir || !targetDir) {
  console.error('❌ Missing arguments. Use --help for usage.');
  process.exit(1);
}

let workers: number | undefined;
if (values.workers !== undefined) {
  workers = Number(values.workers);
  if (!Number.isInteger(workers) || workers < 1) {
    console.error(`❌ --workers must be a positive integer, got "${values.workers}".`);
    process.exit(1);
  }
}

const debug = Boolean(values.debug);
if (debug) {
  Log.setLogLevel('debug');
}

const controller = new AbortController();
process.once('SIGINT', () => {
  Log.warn('Interrupted, waiting for running files to finish...');
  controller.abort();
});

runMediaSorter(
  {
    sourceDir,
    targetDir,
    workers,
    useCache: !values['no-cache'],
    debug,
    types: values.types ? values.types.split(',') : undefined,
    includeDay: !values['no-day'],
    geocoder: values.geocoder,
  },
  controller.signal,
).catch((err) => {
  if (err instanceof InterruptedError) {
    Log.info('Process interrupted by user');
  } else {
    console.error('❌ Fatal:', err instanceof Error ? err.message : err);
    if (debug) {
      console.error(err);
    }
  }
  process.exit(1);
});
