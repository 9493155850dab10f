import type { Connection } from './connection';

export const CONNECTION_MANAGER = Symbol('CONNECTION_MANAGER');

export interface IConnectionManager {
  /** Most recently used first. */
  getAllConnections(): Promise<Connection[]>;
  getConnection(id: string): Promise<Connection | undefined>;
  saveConnection(connection: Connection): Promise<void>;
  deleteConnection(id: string): Promise<void>;
  updateLastConnected(id: string): Promise<void>;
  hasStoredCredentials(connection: Connection): Promise<boolean>;
  clearCredentials(connection: Connection): Promise<void>;
}
