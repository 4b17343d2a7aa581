/**
 * HTML character references in cell text
 *
 * Cell strings are HTML text (the default null placeholder is `&empty;`),
 * so references are decoded to characters before layout.
 */

import fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const ENTITY_TABLE_PATH = fileURLToPath(new URL('./html-entities.json', import.meta.url));

const CHARACTER_REFERENCE = /&(#[xX][0-9a-fA-F]+|#\d+|[A-Za-z][A-Za-z0-9]*);/g;

let namedEntities: Record<string, string> | null = null;

function getNamedEntities(): Record<string, string> {
  if (!namedEntities) {
    const raw: unknown = JSON.parse(fs.readFileSync(ENTITY_TABLE_PATH, 'utf-8'));
    namedEntities = z.record(z.string()).parse(raw);
  }
  return namedEntities;
}

function fromCodePoint(codePoint: number): string | null {
  if (!Number.isInteger(codePoint) || codePoint <= 0 || codePoint > 0x10ffff) {
    return null;
  }
  return String.fromCodePoint(codePoint);
}

/**
 * Replace numeric and known named character references; unknown ones stay literal
 */
export function decodeHtmlEntities(text: string): string {
  if (!text.includes('&')) {
    return text;
  }

  const named = getNamedEntities();
  return text.replace(CHARACTER_REFERENCE, (reference: string, body: string) => {
    if (body.startsWith('#x') || body.startsWith('#X')) {
      return fromCodePoint(parseInt(body.slice(2), 16)) ?? reference;
    }
    if (body.startsWith('#')) {
      return fromCodePoint(parseInt(body.slice(1), 10)) ?? reference;
    }
    return Object.prototype.hasOwnProperty.call(named, body) ? named[body] : reference;
  });
}
