/**
 * Command line surface: `csv2png <in-file> [<in-file> ...]`
 */

import { loadConfig } from './services/config';
import { convertFiles, convertOptionsFromConfig } from './services/convert';
import type { ConvertOptions } from './services/convert';
import type { TableRasterizer } from './services/table';
import { createLogger, setLogLevel } from './utils/logger';

export const USAGE = `Usage: csv2png <in-file> [<in-file> ...]

Renders each CSV file as a formatted table image written next to it
(report.csv -> report.png).

Options:
  -h, --help  Show this help
`;

export type CliCommand = { kind: 'help' } | { kind: 'convert'; files: string[] };

const HELP_FLAGS = new Set(['-h', '--help']);

/**
 * Interpret the arguments after the program name
 */
export function parseArgs(args: string[]): CliCommand {
  if (args.length === 0 || HELP_FLAGS.has(args[0])) {
    return { kind: 'help' };
  }
  return { kind: 'convert', files: [...args] };
}

export interface CliIo {
  out: (text: string) => void;
  rasterizer?: TableRasterizer;
}

const logger = createLogger('csv2png');

/**
 * Run the command line and return the process exit status
 */
export async function run(args: string[], io: CliIo = { out: text => console.log(text) }): Promise<number> {
  const command = parseArgs(args);
  if (command.kind === 'help') {
    io.out(USAGE);
    return 0;
  }

  let options: ConvertOptions;
  try {
    const config = loadConfig();
    setLogLevel(config.logging.level);
    options = convertOptionsFromConfig(config, io.rasterizer);
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    return 1;
  }

  const result = await convertFiles(command.files, options);
  if (result.failed.length > 0) {
    logger.error(`${result.failed.length} of ${command.files.length} file(s) failed`);
    return 1;
  }
  return 0;
}
