#!/usr/bin/env tsx
/**
 * csv2png entry point
 * Usage:
 *  csv2png report.csv
 *  csv2png january.csv february.csv
 */

import { run } from './cli';

run(process.argv.slice(2))
  .then((status) => {
    process.exitCode = status;
  })
  .catch((error) => {
    console.error('csv2png failed:', error);
    process.exit(1);
  });
