import { mkdir, readdir, readFile, unlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { sanitizeError } from '@spo-admin/utils';
import { Injectable, Logger } from '@nestjs/common';
import type { z } from 'zod';
import type { ReportResult, SiteResultBase } from '../reports/report-result';
import { isMissingFileError } from '../storage/json-data.store';
import { JsonDataStoreFactory } from '../storage/json-data-store.factory';
import { formatResultFileTimestamp } from '../utils/date-format.util';

export const ResultKind = {
  AdHocUsers: 'adhocusers',
  DocumentReport: 'docreport',
} as const;

export type ResultKind = (typeof ResultKind)[keyof typeof ResultKind];

/**
 * One JSON file per run under `{dataDir}/results`, named
 * `{kind}_{taskId}_{yyyyMMdd_HHmmss_SSS}.json` so that file names sort by execution time.
 */
@Injectable()
export class TaskResultStore {
  private readonly logger = new Logger(this.constructor.name);

  public constructor(private readonly storeFactory: JsonDataStoreFactory) {}

  public get resultsDirectory(): string {
    return join(this.storeFactory.dataDirectory, 'results');
  }

  public async save(kind: ResultKind, result: ReportResult<SiteResultBase>): Promise<string> {
    await mkdir(this.resultsDirectory, { recursive: true });
    const fileName = `${kind}_${result.taskId}_${formatResultFileTimestamp(result.executedAt)}.json`;
    const filePath = join(this.resultsDirectory, fileName);
    await writeFile(filePath, `${JSON.stringify(result, null, 2)}\n`, 'utf-8');
    return filePath;
  }

  public async findLatest<T>(
    kind: ResultKind,
    taskId: string,
    schema: z.ZodType<T>,
  ): Promise<T | undefined> {
    const prefix = `${kind}_${taskId}_`;
    const candidates = (await this.listFiles())
      .filter((fileName) => fileName.startsWith(prefix) && fileName.endsWith('.json'))
      .sort()
      .reverse();

    for (const fileName of candidates) {
      const result = await this.readResult(join(this.resultsDirectory, fileName), schema);
      if (result !== undefined) return result;
    }
    return undefined;
  }

  /** Deletes the results of every kind for the task and returns how many files went. */
  public async deleteForTask(taskId: string): Promise<number> {
    const marker = `_${taskId}_`;
    const files = (await this.listFiles()).filter((fileName) => fileName.includes(marker));
    for (const fileName of files) {
      await unlink(join(this.resultsDirectory, fileName));
    }
    return files.length;
  }

  private async listFiles(): Promise<string[]> {
    try {
      return await readdir(this.resultsDirectory);
    } catch (error) {
      if (isMissingFileError(error)) return [];
      throw error;
    }
  }

  private async readResult<T>(filePath: string, schema: z.ZodType<T>): Promise<T | undefined> {
    try {
      const parsed: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
      const result = schema.safeParse(parsed);
      if (result.success) return result.data;

      this.logger.warn({
        msg: 'Skipping result file that does not match the expected shape',
        filePath,
        issues: result.error.issues.slice(0, 5),
      });
    } catch (error) {
      this.logger.warn({ msg: 'Skipping unreadable result file', filePath, error: sanitizeError(error) });
    }
    return undefined;
  }
}
