/**
 * PNG rasterizer backed by sharp (librsvg).
 *
 * librsvg refuses to draw an SVG larger than 32767px on either side, so a
 * tall table is drawn in horizontal bands that are stacked into one image.
 * The image is written to a temporary file beside the target and renamed
 * into place, so a failed render never leaves a partial image.
 */

import { promises as fs } from 'fs';
import path from 'path';
import sharp from 'sharp';
import { RenderError, describeError } from '../errors';
import type { RenderedTable, TableRasterizer } from './types';

/** Largest width or height librsvg draws, in pixels */
export const MAX_SVG_PIXELS = 32767;

export interface SharpRasterizerOptions {
  /** DPI the SVG is rasterized at (72 renders 1px per SVG unit) */
  density: number;
}

interface Band {
  data: Buffer;
  width: number;
  height: number;
  channels: number;
}

/**
 * Split a drawing `height` units tall into bands of at most `maxBand` units
 */
export function bandOffsets(height: number, maxBand: number): Array<{ top: number; height: number }> {
  const bands: Array<{ top: number; height: number }> = [];
  for (let top = 0; top < height; top += maxBand) {
    bands.push({ top, height: Math.min(maxBand, height - top) });
  }
  return bands;
}

export class SharpRasterizer implements TableRasterizer {
  constructor(private readonly options: SharpRasterizerOptions) {}

  /**
   * Density actually used: the configured one, lowered only when the table
   * is too wide to be drawn at it
   */
  densityFor(table: Pick<RenderedTable, 'width'>): number {
    const widest = ((MAX_SVG_PIXELS - 1) * 72) / table.width;
    return Math.min(this.options.density, widest);
  }

  async rasterize(table: RenderedTable, outputPath: string): Promise<void> {
    const dir = path.dirname(outputPath);
    const tempPath = path.join(
      dir,
      `.${path.basename(outputPath)}.${process.pid}.tmp${path.extname(outputPath)}`
    );

    try {
      const density = this.densityFor(table);
      const maxBand = Math.max(1, Math.floor(((MAX_SVG_PIXELS - 1) * 72) / density));

      if (table.height <= maxBand) {
        await sharp(Buffer.from(table.svg, 'utf-8'), { density, limitInputPixels: false })
          .png()
          .toFile(tempPath);
      } else {
        await this.writeBands(table, density, maxBand, tempPath);
      }
      await fs.rename(tempPath, outputPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new RenderError(outputPath, describeError(error), error);
    }
  }

  private async writeBands(
    table: RenderedTable,
    density: number,
    maxBand: number,
    tempPath: string
  ): Promise<void> {
    const bands: Band[] = [];
    for (const offset of bandOffsets(table.height, maxBand)) {
      const { data, info } = await sharp(Buffer.from(table.band(offset.top, offset.height), 'utf-8'), {
        density,
        limitInputPixels: false,
      })
        .ensureAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });
      bands.push({ data, width: info.width, height: info.height, channels: info.channels });
    }

    const [first] = bands;
    if (bands.some(band => band.width !== first.width || band.channels !== 4)) {
      throw new Error('table bands rasterized to different shapes');
    }

    // Raw rows of equal width stack by concatenation
    await sharp(Buffer.concat(bands.map(band => band.data)), {
      raw: {
        width: first.width,
        height: bands.reduce((sum, band) => sum + band.height, 0),
        channels: 4,
      },
      limitInputPixels: false,
    })
      .png()
      .toFile(tempPath);
  }
}
