/**
 * Conversion Driver Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import path from 'path';
import fs from 'fs/promises';
import os from 'os';
import sharp from 'sharp';
import {
  convertFile,
  convertFiles,
  convertOptionsFromConfig,
  outputPathFor,
} from '../../apps/cli/src/services/convert';
import type { ConvertOptions } from '../../apps/cli/src/services/convert';
import { MAX_SVG_PIXELS, SharpRasterizer, bandOffsets } from '../../apps/cli/src/services/table';
import type { RenderedTable, TableRasterizer, TableStyle } from '../../apps/cli/src/services/table';
import { clearConfigCache, loadConfig } from '../../apps/cli/src/services/config';
import { InputReadError, RenderError } from '../../apps/cli/src/services/errors';
import type { Logger } from '../../apps/cli/src/utils/logger';

const style: TableStyle = {
  fontFamily: 'monospace',
  fontSize: 10,
  charWidth: 0.5,
  paddingX: 2,
  paddingY: 1,
  textColor: '#000000',
  background: '#ffffff',
  headerBackground: '#eeeeee',
  stripeBackground: '#f5f5f5',
  borderColor: '#cccccc',
};

class RecordingRasterizer implements TableRasterizer {
  readonly calls: { svg: string; outputPath: string }[] = [];

  async rasterize(table: RenderedTable, outputPath: string): Promise<void> {
    this.calls.push({ svg: table.svg, outputPath });
  }
}

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function makeOptions(rasterizer: TableRasterizer, logger: Logger): ConvertOptions {
  return {
    load: { delimiter: ',', quoteChar: '"', naValues: ['', 'NA'] },
    normalize: {
      identifierColumns: ['SESSION_ID'],
      identifierWidth: 18,
      nullPlaceholder: '&empty;',
      locale: 'en-US',
    },
    style,
    inputSuffix: '.csv',
    outputSuffix: '.png',
    rasterizer,
    logger,
  };
}

describe('outputPathFor', () => {
  it('replaces a trailing .csv', () => {
    expect(outputPathFor('data/report.csv')).toBe('data/report.png');
  });

  it('appends when the suffix is absent', () => {
    expect(outputPathFor('report')).toBe('report.png');
    expect(outputPathFor('report.CSV')).toBe('report.CSV.png');
    expect(outputPathFor('report.csv.bak')).toBe('report.csv.bak.png');
  });

  it('uses configured suffixes', () => {
    expect(outputPathFor('sheet.tsv', '.tsv', '.img.png')).toBe('sheet.img.png');
  });
});

describe('bandOffsets', () => {
  it('cuts a drawing into bands no taller than the limit', () => {
    expect(bandOffsets(32033, 16383)).toEqual([
      { top: 0, height: 16383 },
      { top: 16383, height: 15650 },
    ]);
  });

  it('keeps a short drawing whole', () => {
    expect(bandOffsets(100, 16383)).toEqual([{ top: 0, height: 100 }]);
  });
});

describe('SharpRasterizer.densityFor', () => {
  const rasterizer = new SharpRasterizer({ density: 144 });

  it('keeps the configured density when the table fits', () => {
    expect(rasterizer.densityFor({ width: 1000 })).toBe(144);
  });

  it('lowers the density for very wide tables', () => {
    expect(rasterizer.densityFor({ width: MAX_SVG_PIXELS - 1 })).toBe(72);
  });
});

describe('Conversion Driver', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await fs.mkdtemp(path.join(os.tmpdir(), 'csv2png-convert-'));
  });

  afterEach(async () => {
    await fs.rm(workspace, { recursive: true, force: true });
  });

  async function writeCsv(name: string, content: string): Promise<string> {
    const file = path.join(workspace, name);
    await fs.writeFile(file, content);
    return file;
  }

  it('converts a file end to end', async () => {
    const input = await writeCsv('report.csv', 'NAME,AMOUNT,SESSION_ID\nAlice,1234.5,987654321\n');
    const rasterizer = new RecordingRasterizer();
    const logger = silentLogger();

    const result = await convertFile(input, makeOptions(rasterizer, logger));

    expect(result.output).toBe(path.join(workspace, 'report.png'));
    expect(result.policies).toEqual([
      { column: 'NAME', policy: { kind: 'numeric', precision: 0 } },
      { column: 'AMOUNT', policy: { kind: 'numeric', precision: 1 } },
      { column: 'SESSION_ID', policy: { kind: 'identifier', width: 18 } },
    ]);

    expect(rasterizer.calls).toHaveLength(1);
    const { svg, outputPath } = rasterizer.calls[0];
    expect(outputPath).toBe(result.output);
    expect(svg).toContain('>Alice</text>');
    expect(svg).toContain('>1,234.5</text>');
    expect(svg).toContain(`>${' '.repeat(9)}987654321</text>`);
  });

  it('logs each column policy', async () => {
    const input = await writeCsv('report.csv', 'NAME,AMOUNT,SESSION_ID\nAlice,1234.5,987654321\n');
    const logger = silentLogger();

    await convertFile(input, makeOptions(new RecordingRasterizer(), logger));

    expect(logger.info).toHaveBeenCalledWith('NAME: 0 decimals');
    expect(logger.info).toHaveBeenCalledWith('AMOUNT: 1 decimals');
    expect(logger.info).toHaveBeenCalledWith('SESSION_ID: -18 decimals');
  });

  it('wraps rasterizer failures as render errors', async () => {
    const input = await writeCsv('report.csv', 'A\n1\n');
    const failing: TableRasterizer = {
      rasterize: vi.fn().mockRejectedValue(new Error('no backend')),
    };

    const error = await convertFile(input, makeOptions(failing, silentLogger())).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RenderError);
    if (error instanceof RenderError) {
      expect(error.outputPath).toBe(path.join(workspace, 'report.png'));
      expect(error.message).toBe(`Cannot render "${path.join(workspace, 'report.png')}": no backend`);
    }
  });

  it('keeps going after a failed file', async () => {
    const missing = path.join(workspace, 'missing.csv');
    const good = await writeCsv('good.csv', 'A,B\n1,2.5\n');
    const rasterizer = new RecordingRasterizer();
    const logger = silentLogger();

    const result = await convertFiles([missing, good], makeOptions(rasterizer, logger));

    expect(result.converted.map(entry => entry.input)).toEqual([good]);
    expect(result.failed).toHaveLength(1);
    expect(result.failed[0].input).toBe(missing);
    expect(result.failed[0].error).toBeInstanceOf(InputReadError);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(rasterizer.calls.map(call => call.outputPath)).toEqual([path.join(workspace, 'good.png')]);
  });

  it('processes files in the given order', async () => {
    const first = await writeCsv('b.csv', 'A\n1\n');
    const second = await writeCsv('a.csv', 'A\n2\n');
    const rasterizer = new RecordingRasterizer();

    await convertFiles([first, second], makeOptions(rasterizer, silentLogger()));

    expect(rasterizer.calls.map(call => path.basename(call.outputPath))).toEqual(['b.png', 'a.png']);
  });

  it('writes a PNG through sharp', async () => {
    const input = await writeCsv('table.csv', 'NAME,AMOUNT\nAlice,1234.5\nBob,\n');

    const result = await convertFile(
      input,
      makeOptions(new SharpRasterizer({ density: 72 }), silentLogger())
    );

    const metadata = await sharp(result.output).metadata();
    expect(metadata.format).toBe('png');
    expect((await fs.readdir(workspace)).sort()).toEqual(['table.csv', 'table.png']);
  });

  it('leaves no image behind when sharp fails', async () => {
    const rasterizer = new SharpRasterizer({ density: 72 });
    const outputPath = path.join(workspace, 'broken.png');

    const broken: RenderedTable = {
      svg: 'not an image',
      width: 10,
      height: 10,
      band: () => 'not an image',
    };

    await expect(rasterizer.rasterize(broken, outputPath)).rejects.toThrow(RenderError);
    expect(await fs.readdir(workspace)).toEqual([]);
  });

  it('draws cells holding control characters', async () => {
    const input = await writeCsv('control.csv', 'A\n"a\u0001b"\n');

    const result = await convertFile(
      input,
      makeOptions(new SharpRasterizer({ density: 72 }), silentLogger())
    );

    expect((await sharp(result.output).metadata()).format).toBe('png');
  });

  it('renders a 1000-row table at the default density', async () => {
    const lines = ['A,B'];
    for (let i = 1; i <= 1000; i++) lines.push(`${i},x`);
    const input = await writeCsv('tall.csv', lines.join('\n') + '\n');

    clearConfigCache();
    const options = { ...convertOptionsFromConfig(loadConfig()), logger: silentLogger() };
    clearConfigCache();

    const result = await convertFile(input, options);

    // 1001 rows of 32 units plus the closing line, at 144 DPI
    const metadata = await sharp(result.output).metadata();
    expect(metadata.format).toBe('png');
    expect(metadata.height).toBe(64066);
    expect((await fs.readdir(workspace)).sort()).toEqual(['tall.csv', 'tall.png']);
  });
});
