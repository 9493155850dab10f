import { randomUUID } from 'node:crypto';
import { z } from 'zod';

export const TaskType = {
  AdHocUsersReport: 'AdHocUsersReport',
  DocumentReport: 'DocumentReport',
} as const;

export type TaskType = (typeof TaskType)[keyof typeof TaskType];

export const TaskStatus = {
  Pending: 'Pending',
  Running: 'Running',
  Completed: 'Completed',
  Failed: 'Failed',
  Cancelled: 'Cancelled',
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

export interface TaskDefinition {
  id: string;
  name: string;
  type: TaskType;
  connectionId: string;
  targetSiteUrls: string[];
  /** Report specific configuration, serialized as camelCase JSON. */
  configurationJson?: string;
  status: TaskStatus;
  createdAt: string;
  lastRunAt?: string;
  completedAt?: string;
  lastError?: string;
}

export const TaskDefinitionSchema: z.ZodType<TaskDefinition> = z.object({
  id: z.string(),
  name: z.string(),
  type: z.enum(TaskType),
  connectionId: z.string(),
  targetSiteUrls: z.array(z.string()),
  configurationJson: z.string().optional(),
  status: z.enum(TaskStatus),
  createdAt: z.iso.datetime(),
  lastRunAt: z.iso.datetime().optional(),
  completedAt: z.iso.datetime().optional(),
  lastError: z.string().optional(),
});

const TASK_TYPE_DESCRIPTIONS: Record<TaskType, string> = {
  [TaskType.AdHocUsersReport]: 'Ad Hoc Users Report',
  [TaskType.DocumentReport]: 'Document Report',
};

export function describeTaskType(type: TaskType): string {
  return TASK_TYPE_DESCRIPTIONS[type];
}

// Status values are already human readable
export function describeTaskStatus(status: TaskStatus): string {
  return status;
}

export function totalSites(task: Pick<TaskDefinition, 'targetSiteUrls'>): number {
  return task.targetSiteUrls.length;
}

export interface NewTaskInput {
  name: string;
  type: TaskType;
  connectionId: string;
  targetSiteUrls: string[];
  configurationJson?: string;
}

export function createTaskDefinition(input: NewTaskInput, now = new Date()): TaskDefinition {
  return {
    id: randomUUID(),
    name: input.name.trim(),
    type: input.type,
    connectionId: input.connectionId,
    targetSiteUrls: [...input.targetSiteUrls],
    configurationJson: input.configurationJson,
    status: TaskStatus.Pending,
    createdAt: now.toISOString(),
  };
}
