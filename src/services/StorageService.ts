/** Storage service for run results */
import fs from 'fs/promises';
import path from 'path';
import type { FetchMode, ResultRecord, WorkItem } from '../types.js';
import { identityOf } from '../types.js';

export interface SavedRun {
  outputFile: string;
  failedFile?: string;
}

export class StorageService {
  constructor(private outputDir: string, private now: () => Date = () => new Date()) {}

  private getDate = () => this.now().toISOString().split('T')[0];
  private getStamp = () => this.now().toISOString().replace(/[:.]/g, '-');

  getRunDir(mode: FetchMode): string {
    return path.join(this.outputDir, mode, this.getDate());
  }

  async saveJson(data: unknown, filePath: string): Promise<string> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(data, null, 2), 'utf-8');
    return filePath;
  }

  /**
   * Writes every record, plus the original items of the failed records so they
   * can be fed straight back in as a new run.
   */
  async saveRun(mode: FetchMode, items: readonly WorkItem[], results: readonly ResultRecord[]): Promise<SavedRun> {
    const dir = this.getRunDir(mode);
    const stamp = this.getStamp();
    const outputFile = await this.saveJson(results, path.join(dir, `results_${stamp}.json`));

    const failed = collectFailedItems(items, results);
    if (failed.length === 0) return { outputFile };

    const failedFile = await this.saveJson(failed, path.join(dir, `failed_${stamp}.json`));
    return { outputFile, failedFile };
  }
}

export function collectFailedItems(items: readonly WorkItem[], results: readonly ResultRecord[]): WorkItem[] {
  const failed = new Set(results.filter(r => r.status === 'error').map(r => r.identity));
  return items.filter(item => failed.has(identityOf(item)));
}
