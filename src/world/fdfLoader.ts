/**
 * Loader for `.fdf` wireframe height files.
 *
 * One text line per grid row, whitespace-separated values. A value is
 * either `height` or `height,0xRRGGBB`. Blank lines are skipped. When any
 * value carries a color, values without one default to white; otherwise
 * the grid has no colors and the active color scheme applies.
 */

import { createLogger } from '../core/logger';
import { err, ok, type Result } from '../types';
import { heightGridFromRows, type HeightGrid } from './heightGrid';

const log = createLogger('fdf');

const DEFAULT_COLOR = 0xffffff;
const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const HEX_PATTERN = /^[0-9a-fA-F]{1,8}$/;

export type FdfError =
  | { kind: 'parse'; line: number; message: string }
  | { kind: 'inconsistent_row'; row: number; actual: number; expected: number }
  | { kind: 'empty' }
  | { kind: 'fetch'; url: string; message: string };

export function formatFdfError(error: FdfError): string {
  switch (error.kind) {
    case 'parse':
      return `Parse error at line ${error.line}: ${error.message}`;
    case 'inconsistent_row':
      return `Row ${error.row} has ${error.actual} values, expected ${error.expected}`;
    case 'empty':
      return 'File is empty';
    case 'fetch':
      return `Cannot load ${error.url}: ${error.message}`;
  }
}

interface ParsedValue {
  height: number;
  color: number | null;
}

function parseValue(token: string, line: number): Result<ParsedValue, FdfError> {
  const comma = token.indexOf(',');
  const heightText = comma === -1 ? token : token.slice(0, comma);

  if (!NUMBER_PATTERN.test(heightText)) {
    return err({ kind: 'parse', line, message: `expected number, got '${heightText}'` });
  }
  const height = Number(heightText);
  // Samples are stored as f32.
  if (!Number.isFinite(Math.fround(height))) {
    return err({ kind: 'parse', line, message: `height '${heightText}' is out of range` });
  }
  if (comma === -1) return ok({ height, color: null });

  const colorText = token.slice(comma + 1).replace(/^0[xX]/, '');
  if (!HEX_PATTERN.test(colorText)) {
    return err({ kind: 'parse', line, message: `invalid color format '${colorText}'` });
  }
  return ok({ height, color: parseInt(colorText, 16) & 0xffffff });
}

/** Parse `.fdf` text into a validated grid. Line numbers in errors are 1-based. */
export function parseFdf(content: string): Result<HeightGrid, FdfError> {
  const rows: number[][] = [];
  const colorRows: number[][] = [];
  let hasAnyColor = false;
  let expectedWidth: number | null = null;

  const lines = content.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const trimmed = (lines[i] ?? '').trim();
    if (trimmed.length === 0) continue;

    const heights: number[] = [];
    const colors: number[] = [];
    for (const token of trimmed.split(/\s+/)) {
      const parsed = parseValue(token, i + 1);
      if (!parsed.ok) return parsed;
      heights.push(parsed.value.height);
      colors.push(parsed.value.color ?? DEFAULT_COLOR);
      if (parsed.value.color !== null) hasAnyColor = true;
    }

    if (expectedWidth === null) {
      expectedWidth = heights.length;
    } else if (heights.length !== expectedWidth) {
      return err({ kind: 'inconsistent_row', row: i + 1, actual: heights.length, expected: expectedWidth });
    }

    rows.push(heights);
    colorRows.push(colors);
  }

  if (rows.length === 0) return err({ kind: 'empty' });

  const grid = heightGridFromRows(rows, hasAnyColor ? colorRows : null);
  log.debug(`Parsed ${grid.width}x${grid.height} grid${hasAnyColor ? ' with colors' : ''}`);
  return ok(grid);
}

/** Fetch and parse an `.fdf` file. Network failures become `fetch` errors. */
export async function fetchFdf(
  url: string,
  fetchImpl: typeof fetch = fetch,
): Promise<Result<HeightGrid, FdfError>> {
  let text: string;
  try {
    const response = await fetchImpl(url);
    if (!response.ok) {
      return err({ kind: 'fetch', url, message: `HTTP ${response.status}` });
    }
    text = await response.text();
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return err({ kind: 'fetch', url, message });
  }

  const result = parseFdf(text);
  if (result.ok) {
    log.info(`Loaded ${url}: ${result.value.width}x${result.value.height}`);
  } else {
    log.warn(`Failed to parse ${url}: ${formatFdfError(result.error)}`);
  }
  return result;
}
