import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { sanitizeError } from '@spo-admin/utils';
import { Logger } from '@nestjs/common';
import { z } from 'zod';

export interface Identifiable {
  id: string;
}

/**
 * Keeps a collection of records in one JSON file. Every read-modify-write cycle runs exclusively,
 * so concurrent saves from different screens never lose each other's changes.
 */
export class JsonDataStore<T extends Identifiable> {
  private readonly logger = new Logger(JsonDataStore.name);
  private tail: Promise<void> = Promise.resolve();

  public constructor(
    private readonly filePath: string,
    private readonly itemSchema: z.ZodType<T>,
  ) {}

  public async getAll(): Promise<T[]> {
    return this.exclusive(() => this.read());
  }

  public async getById(id: string): Promise<T | undefined> {
    const items = await this.getAll();
    return items.find((item) => item.id === id);
  }

  public async save(item: T): Promise<void> {
    await this.exclusive(async () => {
      const items = await this.read();
      const index = items.findIndex((existing) => existing.id === item.id);
      if (index >= 0) {
        items[index] = item;
      } else {
        items.push(item);
      }
      await this.write(items);
    });
  }

  public async delete(id: string): Promise<boolean> {
    return this.exclusive(async () => {
      const items = await this.read();
      const remaining = items.filter((item) => item.id !== id);
      if (remaining.length === items.length) return false;

      await this.write(remaining);
      return true;
    });
  }

  private exclusive<R>(work: () => Promise<R>): Promise<R> {
    const run = this.tail.then(work);
    // The caller sees a failure through `run`; the queue itself keeps going.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async read(): Promise<T[]> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFileError(error)) return [];
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      this.logger.warn({
        msg: 'Data file is not valid JSON, treating it as empty',
        filePath: this.filePath,
        error: sanitizeError(error),
      });
      return [];
    }

    const result = z.array(this.itemSchema).safeParse(parsed);
    if (!result.success) {
      this.logger.warn({
        msg: 'Data file does not match the expected shape, treating it as empty',
        filePath: this.filePath,
        issues: result.error.issues.slice(0, 5),
      });
      return [];
    }
    return result.data;
  }

  private async write(items: T[]): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const temporaryPath = `${this.filePath}.tmp`;
    await writeFile(temporaryPath, `${JSON.stringify(items, null, 2)}\n`, 'utf-8');
    await rename(temporaryPath, this.filePath);
  }
}

export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
