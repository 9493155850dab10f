import { Inject, Injectable, Logger } from '@nestjs/common';
import { sortBy } from 'remeda';
import {
  AUTHENTICATION_SERVICE,
  type IAuthenticationService,
} from '../auth/authentication-service.interface';
import { JsonDataStoreFactory } from '../storage/json-data-store.factory';
import type { JsonDataStore } from '../storage/json-data.store';
import { type Connection, ConnectionSchema, cookieDomain } from './connection';
import type { IConnectionManager } from './connection-manager.interface';

export const CONNECTIONS_FILE_NAME = 'connections.json';

@Injectable()
export class ConnectionManagerService implements IConnectionManager {
  private readonly logger = new Logger(this.constructor.name);
  private readonly store: JsonDataStore<Connection>;

  public constructor(
    storeFactory: JsonDataStoreFactory,
    @Inject(AUTHENTICATION_SERVICE) private readonly authenticationService: IAuthenticationService,
  ) {
    this.store = storeFactory.create(CONNECTIONS_FILE_NAME, ConnectionSchema);
  }

  public async getAllConnections(): Promise<Connection[]> {
    const connections = await this.store.getAll();
    return sortBy(connections, [
      (connection) => connection.lastConnectedAt ?? connection.createdAt,
      'desc',
    ]);
  }

  public async getConnection(id: string): Promise<Connection | undefined> {
    return this.store.getById(id);
  }

  public async saveConnection(connection: Connection): Promise<void> {
    await this.store.save(connection);
  }

  public async deleteConnection(id: string): Promise<void> {
    const connection = await this.store.getById(id);
    if (!connection) return;

    await this.authenticationService.clearCredentials(cookieDomain(connection));
    await this.store.delete(id);
    this.logger.log({ msg: 'Deleted connection', connectionId: id });
  }

  public async updateLastConnected(id: string): Promise<void> {
    const connection = await this.store.getById(id);
    if (!connection) return;

    await this.store.save({ ...connection, lastConnectedAt: new Date().toISOString() });
  }

  public async hasStoredCredentials(connection: Connection): Promise<boolean> {
    return this.authenticationService.hasStoredCredentials(cookieDomain(connection));
  }

  public async clearCredentials(connection: Connection): Promise<void> {
    await this.authenticationService.clearCredentials(cookieDomain(connection));
  }
}
