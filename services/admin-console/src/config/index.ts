import type { AppConfig } from './app.config';
import type { SharepointConfig } from './sharepoint.config';
import type { StorageConfig } from './storage.config';

export { appConfig } from './app.config';
export { sharepointConfig } from './sharepoint.config';
export { DEFAULT_DATA_DIRECTORY, storageConfig } from './storage.config';
export type { AppConfig, SharepointConfig, StorageConfig };

export type Config = AppConfig & StorageConfig & SharepointConfig;
