import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { Alert, AnalysisRun } from '../types.js';
import {
  StoreFileSchema,
  StoredAlertSchema,
  StoredRunSchema,
  type StoredAlert,
  type StoredRun,
} from '../schemas/results.js';
import { logger } from '../logger.js';

/**
 * Append-only store of analysis runs and their alerts.
 * "Latest" is the run with the greatest runTimestamp per country; on equal
 * timestamps the later insert wins.
 */
export interface ResultStore {
  persist(run: AnalysisRun, alerts: readonly Alert[]): Promise<void>;
  latest(country: string): Promise<StoredRun | null>;
  latestAll(countries: readonly string[]): Promise<Record<string, StoredRun>>;
  /** Newest first. */
  history(country: string, limit?: number): Promise<StoredRun[]>;
  /** Newest first. */
  alerts(country: string, limit?: number): Promise<StoredAlert[]>;
}

function byNewest<T extends { runTimestamp: string }>(rows: readonly T[]): T[] {
  // rows are in insertion order; reverse first so equal timestamps keep the later insert ahead
  return rows
    .slice()
    .reverse()
    .sort((a, b) => Date.parse(b.runTimestamp) - Date.parse(a.runTimestamp));
}

export class MemoryResultStore implements ResultStore {
  protected runs: StoredRun[] = [];
  protected alertRows: StoredAlert[] = [];

  async persist(run: AnalysisRun, alerts: readonly Alert[]): Promise<void> {
    const next = this.withRun(run, alerts);
    this.runs = next.runs;
    this.alertRows = next.alertRows;
  }

  /** Row arrays as they would be after persisting `run`; the current ones are left untouched. */
  protected withRun(run: AnalysisRun, alerts: readonly Alert[]): { runs: StoredRun[]; alertRows: StoredAlert[] } {
    return {
      runs: [...this.runs, StoredRunSchema.parse(run)],
      alertRows: [...this.alertRows, ...alerts.map((alert) => StoredAlertSchema.parse(alert))],
    };
  }

  async latest(country: string): Promise<StoredRun | null> {
    const [newest] = await this.history(country, 1);
    return newest ?? null;
  }

  async latestAll(countries: readonly string[]): Promise<Record<string, StoredRun>> {
    const out: Record<string, StoredRun> = {};
    for (const country of countries) {
      const run = await this.latest(country);
      if (run) out[country] = run;
    }
    return out;
  }

  async history(country: string, limit?: number): Promise<StoredRun[]> {
    const rows = byNewest(this.runs.filter((r) => r.country === country));
    return (limit === undefined ? rows : rows.slice(0, limit)).map((r) => StoredRunSchema.parse(r));
  }

  async alerts(country: string, limit?: number): Promise<StoredAlert[]> {
    const rows = byNewest(this.alertRows.filter((a) => a.country === country));
    return (limit === undefined ? rows : rows.slice(0, limit)).map((a) => ({ ...a }));
  }
}

/**
 * File-backed store: one JSON document, rewritten through a temp file on every persist.
 * Rows that no longer match the stored schema are skipped on load.
 */
export class JsonFileResultStore extends MemoryResultStore {
  private loading?: Promise<void>;
  private writes: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {
    super();
  }

  static inDataDir(dataDir: string): JsonFileResultStore {
    return new JsonFileResultStore(path.resolve(dataDir, 'results.json'));
  }

  /** Writes are serialized; memory only changes once the file has been replaced. */
  override async persist(run: AnalysisRun, alerts: readonly Alert[]): Promise<void> {
    await this.ensureLoaded();
    const write = this.writes.then(() => this.commit(run, alerts));
    this.writes = write.catch(() => undefined);
    return write;
  }

  override async history(country: string, limit?: number): Promise<StoredRun[]> {
    await this.ensureLoaded();
    return super.history(country, limit);
  }

  override async alerts(country: string, limit?: number): Promise<StoredAlert[]> {
    await this.ensureLoaded();
    return super.alerts(country, limit);
  }

  private async commit(run: AnalysisRun, alerts: readonly Alert[]): Promise<void> {
    const next = this.withRun(run, alerts);
    await this.save(next.runs, next.alertRows);
    this.runs = next.runs;
    this.alertRows = next.alertRows;
  }

  private ensureLoaded(): Promise<void> {
    // a failed load is retried on the next call
    this.loading ??= this.load().catch((err: unknown) => {
      this.loading = undefined;
      throw err;
    });
    return this.loading;
  }

  private async load(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err: unknown) {
      if (isNotFound(err)) return;
      throw err;
    }

    const doc = StoreFileSchema.parse(JSON.parse(raw));
    this.runs = parseRows(doc.runs, (row) => StoredRunSchema.safeParse(row), 'run');
    this.alertRows = parseRows(doc.alerts, (row) => StoredAlertSchema.safeParse(row), 'alert');
  }

  private async save(runs: readonly StoredRun[], alertRows: readonly StoredAlert[]): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    const serialized = JSON.stringify({ runs, alerts: alertRows }, null, 2);
    await fs.writeFile(tmp, serialized, 'utf-8');
    await fs.rename(tmp, this.filePath);
  }
}

function parseRows<T>(
  rows: readonly unknown[],
  parse: (row: unknown) => { success: true; data: T } | { success: false },
  kind: string,
): T[] {
  const out: T[] = [];
  let skipped = 0;
  for (const row of rows) {
    const result = parse(row);
    if (result.success) out.push(result.data);
    else skipped += 1;
  }
  if (skipped) {
    logger.warn({ kind, skipped }, 'Skipped stored rows that failed validation');
  }
  return out;
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
