/**
 * Conversion Driver
 * Runs load -> normalize -> render -> write for each input file
 */

import type { BatchResult, ConversionResult, ColumnPolicyReport } from '@csv2png/shared';
import type { AppConfig } from './config';
import { ConversionError, RenderError, describeError } from './errors';
import {
  SharpRasterizer,
  loadTable,
  normalizeTable,
  policyDigits,
  renderTable,
} from './table';
import type {
  LoadOptions,
  NormalizeOptions,
  RenderedTable,
  TableRasterizer,
  TableStyle,
} from './table';
import { createLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';

export interface ConvertOptions {
  load: LoadOptions;
  normalize: NormalizeOptions;
  style: TableStyle;
  /** Suffix replaced in input names, e.g. `.csv` */
  inputSuffix: string;
  /** Suffix of the written images, e.g. `.png` */
  outputSuffix: string;
  rasterizer: TableRasterizer;
  logger?: Logger;
}

const defaultLogger = createLogger('Convert');

/**
 * Derive the image path: a trailing input suffix is replaced, otherwise the output suffix is appended
 */
export function outputPathFor(inputPath: string, inputSuffix = '.csv', outputSuffix = '.png'): string {
  const stem =
    inputSuffix.length > 0 && inputPath.endsWith(inputSuffix)
      ? inputPath.slice(0, -inputSuffix.length)
      : inputPath;
  return stem + outputSuffix;
}

/**
 * Build conversion options from the application config
 */
export function convertOptionsFromConfig(config: AppConfig, rasterizer?: TableRasterizer): ConvertOptions {
  return {
    load: {
      delimiter: config.input.delimiter,
      quoteChar: config.input.quoteChar,
      naValues: config.input.naValues,
    },
    normalize: {
      identifierColumns: config.normalization.identifierColumns,
      identifierWidth: config.normalization.identifierWidth,
      nullPlaceholder: config.normalization.nullPlaceholder,
      locale: config.normalization.locale,
    },
    style: config.style,
    inputSuffix: config.input.suffix,
    outputSuffix: config.output.suffix,
    rasterizer: rasterizer ?? new SharpRasterizer({ density: config.output.density }),
  };
}

/**
 * Convert one CSV file into a table image
 *
 * @throws ConversionError describing the failed step
 */
export async function convertFile(inputPath: string, options: ConvertOptions): Promise<ConversionResult> {
  const logger = options.logger ?? defaultLogger;
  const outputPath = outputPathFor(inputPath, options.inputSuffix, options.outputSuffix);

  const table = await loadTable(inputPath, options.load);
  logger.debug(`Loaded ${inputPath}: ${table.schema.columns.length} columns, ${table.rows.length} rows`);

  const policies: ColumnPolicyReport[] = [];
  const display = normalizeTable(table, options.normalize, report => {
    policies.push(report);
    logger.info(`${report.column}: ${policyDigits(report.policy)} decimals`);
  });

  let rendered: RenderedTable;
  try {
    rendered = renderTable(display, options.style);
  } catch (error) {
    throw new RenderError(outputPath, describeError(error), error);
  }

  try {
    await options.rasterizer.rasterize(rendered, outputPath);
  } catch (error) {
    if (error instanceof ConversionError) throw error;
    throw new RenderError(outputPath, describeError(error), error);
  }

  logger.info(`Wrote ${outputPath}`);
  return { input: inputPath, output: outputPath, policies };
}

/**
 * Convert files in order. A failed file is reported and the next one is still attempted.
 */
export async function convertFiles(inputPaths: string[], options: ConvertOptions): Promise<BatchResult> {
  const logger = options.logger ?? defaultLogger;
  const result: BatchResult = { converted: [], failed: [] };

  for (const inputPath of inputPaths) {
    try {
      result.converted.push(await convertFile(inputPath, options));
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      logger.error(`Failed to convert ${inputPath}: ${failure.message}`);
      result.failed.push({ input: inputPath, error: failure });
    }
  }

  return result;
}
