import { readFile } from 'fs/promises';
import path from 'path';
import { BarSource } from '../BarSource';
import { Bar, Timeframe } from '../../types/market';
import { DataError } from '../../core/errors';
import { logger } from '../../utils/logger';

type Column = 'timestamp' | 'open' | 'high' | 'low' | 'close' | 'volume';

// Epoch milliseconds or anything Date.parse understands (ISO 8601)
const parseTimestamp = (value: string): number => (/^\d+$/.test(value) ? Number(value) : Date.parse(value));

/**
 * Parses `timestamp,open,high,low,close,volume` text. Columns are matched by header name.
 */
export const parseCsvBars = (text: string, source: string = 'csv'): Bar[] => {
  const lines = text.split(/\r?\n/);
  const headerLine = lines.findIndex((line) => line.trim() !== '');
  if (headerLine === -1) {
    throw new DataError(`${source}: file is empty`);
  }

  const header = lines[headerLine].split(',').map((h) => h.trim().toLowerCase());
  const columnIndex = (column: Column): number => {
    const at = header.indexOf(column);
    if (at === -1) throw new DataError(`${source}: missing '${column}' column`);
    return at;
  };
  const positions: Record<Column, number> = {
    timestamp: columnIndex('timestamp'),
    open: columnIndex('open'),
    high: columnIndex('high'),
    low: columnIndex('low'),
    close: columnIndex('close'),
    volume: columnIndex('volume'),
  };

  const bars: Bar[] = [];
  for (let i = headerLine + 1; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === '') continue;

    const cells = line.split(',').map((c) => c.trim());
    const lineNo = i + 1;
    const timestamp = parseTimestamp(cells[positions.timestamp] ?? '');
    if (!Number.isFinite(timestamp)) {
      throw new DataError(`${source}:${lineNo}: invalid timestamp '${cells[positions.timestamp]}'`);
    }

    const numberAt = (column: Exclude<Column, 'timestamp'>): number => {
      const cell = cells[positions[column]] ?? '';
      const value = Number(cell);
      if (cell === '' || Number.isNaN(value)) {
        throw new DataError(`${source}:${lineNo}: invalid ${column} '${cell}'`);
      }
      return value;
    };

    bars.push({
      timestamp,
      open: numberAt('open'),
      high: numberAt('high'),
      low: numberAt('low'),
      close: numberAt('close'),
      volume: numberAt('volume'),
    });
  }
  return bars;
};

export const loadCsvFile = async (filePath: string): Promise<Bar[]> => {
  try {
    const text = await readFile(filePath, 'utf8');
    return parseCsvBars(text, path.basename(filePath));
  } catch (error) {
    logger.error({ error, filePath }, 'Error loading bars from CSV');
    throw error;
  }
};

/**
 * Serves `<SYMBOL>_<timeframe>.csv` files from one directory.
 */
export class CsvAdapter implements BarSource {
  public name = 'CSV';
  private readonly directory: string;

  constructor(directory: string) {
    this.directory = directory;
  }

  public fileFor(symbol: string, timeframe: Timeframe): string {
    return path.join(this.directory, `${symbol.toUpperCase()}_${timeframe}.csv`);
  }

  public async fetchBars(symbol: string, timeframe: Timeframe, limit?: number): Promise<Bar[]> {
    const bars = await loadCsvFile(this.fileFor(symbol, timeframe));
    bars.sort((a, b) => a.timestamp - b.timestamp);
    return limit === undefined ? bars : bars.slice(-limit);
  }
}
