import { randomUUID } from 'node:crypto';
import { z } from 'zod';

export const ConnectionType = {
  Admin: 'Admin',
  SiteCollection: 'SiteCollection',
} as const;

export type ConnectionType = (typeof ConnectionType)[keyof typeof ConnectionType];

export const ConnectionSchema = z.object({
  id: z.string().nonempty(),
  name: z.string(),
  type: z.enum([ConnectionType.Admin, ConnectionType.SiteCollection]),
  tenantName: z.string().nonempty(),
  siteUrl: z.string().optional(),
  createdAt: z.iso.datetime(),
  lastConnectedAt: z.iso.datetime().optional(),
});

export type Connection = z.infer<typeof ConnectionSchema>;

export function adminUrl(connection: Pick<Connection, 'tenantName'>): string {
  return `https://${connection.tenantName}-admin.sharepoint.com`;
}

export function tenantUrl(connection: Pick<Connection, 'tenantName'>): string {
  return `https://${connection.tenantName}.sharepoint.com`;
}

export function primaryUrl(connection: Connection): string {
  return connection.type === ConnectionType.Admin
    ? adminUrl(connection)
    : (connection.siteUrl ?? tenantUrl(connection));
}

export function cookieDomain(connection: Connection): string {
  return new URL(primaryUrl(connection)).host;
}

export function connectionDisplayName(connection: Pick<Connection, 'name' | 'tenantName'>): string {
  return `${connection.name} (${connection.tenantName})`;
}

export interface NewConnectionInput {
  name: string;
  type: ConnectionType;
  tenantName: string;
  siteUrl?: string;
}

export function createConnection(input: NewConnectionInput, now = new Date()): Connection {
  return {
    id: randomUUID(),
    name: input.name.trim(),
    type: input.type,
    tenantName: input.tenantName.trim().toLowerCase(),
    siteUrl: input.siteUrl,
    createdAt: now.toISOString(),
  };
}
