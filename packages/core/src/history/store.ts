/**
 * History store: id-keyed report storage that doubles as the engine's cache.
 *
 * The store never computes fingerprints or ids; it keeps whatever reports it
 * is given. Writing a report whose id already exists replaces it.
 */

import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  renameSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import { join } from 'node:path';
import { freezeReport, summarizeReport } from '../verification/reporter.js';
import type { Report, ReportSummary } from '../verification/types.js';
import { HistoryIndexSchema, ReportSchema } from './schema.js';

export type LookupResult =
  | { found: true; report: Report }
  | { found: false; id: string };

/**
 * Report ids derive from the checked text and mode, so a re-check after the
 * cache ttl lands on the same id and replaces the earlier report. History
 * holds only the latest run for each input and mode.
 */
export interface HistoryStore {
  /** Store a report, replacing any earlier one with the same id. */
  put(report: Report): void;
  get(id: string): LookupResult;
  /** Summaries, newest first. */
  list(): ReportSummary[];
  /** Remove every stored report. */
  clear(): void;
}

function byNewest(a: ReportSummary, b: ReportSummary): number {
  return b.generatedAt.localeCompare(a.generatedAt);
}

// ---------------------------------------------------------------------------
// In-memory
// ---------------------------------------------------------------------------

export class MemoryHistoryStore implements HistoryStore {
  private readonly reports = new Map<string, Report>();

  put(report: Report): void {
    this.reports.set(report.id, report);
  }

  get(id: string): LookupResult {
    const report = this.reports.get(id);
    return report ? { found: true, report } : { found: false, id };
  }

  list(): ReportSummary[] {
    return [...this.reports.values()].map(summarizeReport).sort(byNewest);
  }

  clear(): void {
    this.reports.clear();
  }
}

// ---------------------------------------------------------------------------
// File-backed
// ---------------------------------------------------------------------------

const ID_PATTERN = /^[A-Za-z0-9_-]+$/;
const INDEX_FILE = 'index.json';
const REPORTS_DIR = 'reports';

/**
 * One JSON file per report under `<dir>/reports/`, plus `<dir>/index.json`
 * holding the summaries so listing never reads report bodies. Every file is
 * written to a temporary path and renamed into place, so a reader sees
 * either the old or the new report, never a mix.
 */
export class FileHistoryStore implements HistoryStore {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  put(report: Report): void {
    if (!ID_PATTERN.test(report.id)) {
      throw new Error(`Invalid report id: ${report.id}`);
    }

    const reportsDir = this.ensureReportsDir();
    writeAtomic(join(reportsDir, `${report.id}.json`), JSON.stringify(report, null, 2));

    const summaries = this.list().filter(s => s.id !== report.id);
    summaries.push(summarizeReport(report));
    this.writeIndex(summaries);
  }

  get(id: string): LookupResult {
    if (!ID_PATTERN.test(id)) return { found: false, id };

    const report = this.readReport(join(this.dir, REPORTS_DIR, `${id}.json`));
    return report && report.id === id ? { found: true, report } : { found: false, id };
  }

  list(): ReportSummary[] {
    const indexPath = join(this.dir, INDEX_FILE);
    if (existsSync(indexPath)) {
      const parsed = HistoryIndexSchema.safeParse(readJson(indexPath));
      if (parsed.success) return parsed.data.reports.sort(byNewest);
    }
    return this.rebuildIndex();
  }

  clear(): void {
    rmSync(join(this.dir, REPORTS_DIR), { recursive: true, force: true });
    rmSync(join(this.dir, INDEX_FILE), { force: true });
  }

  /** Recreate index.json from the report files (missing or corrupt index). */
  rebuildIndex(): ReportSummary[] {
    const reportsDir = join(this.dir, REPORTS_DIR);
    if (!existsSync(reportsDir)) return [];

    const summaries: ReportSummary[] = [];
    for (const file of readdirSync(reportsDir).filter(f => f.endsWith('.json'))) {
      const report = this.readReport(join(reportsDir, file));
      if (report) summaries.push(summarizeReport(report));
    }

    this.writeIndex(summaries);
    return summaries.sort(byNewest);
  }

  private readReport(path: string): Report | null {
    if (!existsSync(path)) return null;
    const parsed = ReportSchema.safeParse(readJson(path));
    return parsed.success ? freezeReport(parsed.data) : null;
  }

  private writeIndex(summaries: ReportSummary[]): void {
    if (!existsSync(this.dir)) {
      mkdirSync(this.dir, { recursive: true });
    }
    const index = { version: 1, reports: [...summaries].sort(byNewest) };
    writeAtomic(join(this.dir, INDEX_FILE), JSON.stringify(index, null, 2));
  }

  private ensureReportsDir(): string {
    const dir = join(this.dir, REPORTS_DIR);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    return dir;
  }
}

function writeAtomic(path: string, content: string): void {
  const tmpPath = `${path}.${process.pid}.tmp`;
  writeFileSync(tmpPath, content, 'utf-8');
  renameSync(tmpPath, path);
}

/** Parsed JSON, or null for unreadable or corrupt files. */
function readJson(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch {
    return null;
  }
}
