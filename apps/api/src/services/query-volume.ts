import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { UpstreamUnavailableError, describeError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import type { UsageAggregate, UsageAggregator } from './sources';

const SOURCE = 'query-volume';
const MS_PER_DAY = 24 * 60 * 60 * 1000;

function requireColumn(header: string[], column: string, file: string): number {
  const index = header.indexOf(column);
  if (index === -1) {
    throw new UpstreamUnavailableError(SOURCE, `${file} is missing column ${column}`);
  }
  return index;
}

/**
 * Split one CSV record into fields. Handles double-quoted fields and "" escapes;
 * records never span lines in the exported query volume files.
 */
export function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (quoted) {
      if (char === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      fields.push(current);
      current = '';
    } else {
      current += char;
    }
  }

  fields.push(current);
  return fields;
}

function parseNumber(value: string, context: string): number {
  const trimmed = value.trim();
  if (trimmed === '') {
    return 0;
  }
  const parsed = Number(trimmed);
  if (!Number.isFinite(parsed)) {
    throw new UpstreamUnavailableError(SOURCE, `${context}: "${value}" is not a number`);
  }
  return parsed;
}

/**
 * Aggregates hourly query volume exports (one or more CSV files in a directory)
 * into per-deployment totals over a trailing window.
 */
export class CsvQueryVolumeAggregator implements UsageAggregator {
  constructor(
    private readonly directory: string,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  async aggregate(windowDays: number): Promise<UsageAggregate> {
    const cutoff = this.now().getTime() - windowDays * MS_PER_DAY;

    let files: string[];
    try {
      files = (await readdir(this.directory)).filter((file) => file.endsWith('.csv')).sort();
    } catch (error) {
      throw new UpstreamUnavailableError(SOURCE, `cannot read ${this.directory}: ${describeError(error)}`, error);
    }

    const queryCounts = new Map<string, number>();
    const queryFees = new Map<string, number>();

    for (const file of files) {
      const filePath = path.join(this.directory, file);
      let content: string;
      try {
        content = await readFile(filePath, 'utf8');
      } catch (error) {
        throw new UpstreamUnavailableError(SOURCE, `cannot read ${filePath}: ${describeError(error)}`, error);
      }

      const rows = this.aggregateFile(content, file, cutoff);
      for (const [id, totals] of rows) {
        queryCounts.set(id, (queryCounts.get(id) ?? 0) + totals.count);
        queryFees.set(id, (queryFees.get(id) ?? 0) + totals.fees);
      }
    }

    this.logger.info(
      { directory: this.directory, files: files.length, deployments: queryCounts.size, windowDays },
      'Aggregated query volume'
    );

    return { queryCounts, queryFees };
  }

  private aggregateFile(
    content: string,
    file: string,
    cutoff: number
  ): Map<string, { count: number; fees: number }> {
    const lines = content.split(/\r?\n/).filter((line) => line.trim() !== '');
    const totals = new Map<string, { count: number; fees: number }>();
    if (lines.length === 0) {
      return totals;
    }

    const header = parseCsvLine(lines[0]).map((name) => name.trim());
    const endEpochIndex = requireColumn(header, 'end_epoch', file);
    const idIndex = requireColumn(header, 'subgraph_deployment_ipfs_hash', file);
    const countIndex = requireColumn(header, 'query_count', file);
    const feesIndex = requireColumn(header, 'total_query_fees', file);

    for (let lineNumber = 1; lineNumber < lines.length; lineNumber++) {
      const fields = parseCsvLine(lines[lineNumber]);
      const context = `${file}:${lineNumber + 1}`;

      const endEpoch = Date.parse(fields[endEpochIndex] ?? '');
      if (Number.isNaN(endEpoch)) {
        throw new UpstreamUnavailableError(SOURCE, `${context}: invalid end_epoch`);
      }
      if (endEpoch <= cutoff) {
        continue;
      }

      const id = (fields[idIndex] ?? '').trim();
      if (id === '') {
        continue;
      }

      const count = parseNumber(fields[countIndex] ?? '', context);
      const fees = parseNumber(fields[feesIndex] ?? '', context);
      const current = totals.get(id) ?? { count: 0, fees: 0 };
      totals.set(id, { count: current.count + count, fees: current.fees + fees });
    }

    return totals;
  }
}
