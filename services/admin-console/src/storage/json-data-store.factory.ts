import { join } from 'node:path';
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { z } from 'zod';
import type { Config } from '../config';
import { type Identifiable, JsonDataStore } from './json-data.store';

@Injectable()
export class JsonDataStoreFactory {
  public constructor(private readonly configService: ConfigService<Config, true>) {}

  public get dataDirectory(): string {
    return this.configService.get('storage.dataDirectory', { infer: true });
  }

  public create<T extends Identifiable>(fileName: string, itemSchema: z.ZodType<T>): JsonDataStore<T> {
    return new JsonDataStore(join(this.dataDirectory, fileName), itemSchema);
  }
}
