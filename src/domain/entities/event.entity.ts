import type { JsonObject } from '../../utils/serialize.js';

export const EVENT_TYPES = [
  'vm_create',
  'vm_start',
  'vm_stop',
  'vm_delete',
  'vm_status_update',
  'credential_create',
  'credential_update',
  'credential_delete',
  'credential_validate',
  'provision_apply',
  'provision_destroy',
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

export const EVENT_STATUSES = ['pending', 'in_progress', 'provisioning', 'success', 'failed'] as const;

export type EventStatus = (typeof EVENT_STATUSES)[number];

export const TERMINAL_STATUSES: readonly EventStatus[] = ['success', 'failed'];

/** Position in the lifecycle; an event never moves to a lower rank */
export const STATUS_RANK: Record<EventStatus, number> = {
  pending: 0,
  in_progress: 1,
  provisioning: 1,
  success: 2,
  failed: 2,
};

export interface Event {
  id: number;
  eventType: EventType;
  status: EventStatus;
  timestamp: Date;
  userId: string;
  vmId: number | null;
  credentialId: number | null;
  parameters: JsonObject | null;
  result: JsonObject | null;
  errorMessage: string | null;
  /** Seconds from creation to finalization */
  duration: number | null;
}

export interface CreateEventInput {
  eventType: EventType;
  userId: string;
  vmId?: number | null;
  credentialId?: number | null;
  parameters?: JsonObject | null;
  status?: EventStatus;
}

export interface UpdateEventInput {
  status?: EventStatus;
  vmId?: number | null;
  credentialId?: number | null;
  result?: JsonObject | null;
  errorMessage?: string | null;
  duration?: number | null;
}

export interface EventFilters {
  userId?: string;
  vmId?: number;
  credentialId?: number;
  eventType?: EventType;
  status?: EventStatus;
  startDate?: Date;
  endDate?: Date;
}

export interface Pagination {
  limit: number;
  offset: number;
}

export interface StatusSummary {
  total: number;
  success: number;
  failed: number;
  pending: number;
  inProgress: number;
  provisioning: number;
  /** Percentages of the total, 0 when there are no events */
  successRatio: number;
  failedRatio: number;
  pendingRatio: number;
  inProgressRatio: number;
  provisioningRatio: number;
}

export interface DailyStat {
  /** UTC calendar day, YYYY-MM-DD */
  date: string;
  total: number;
  success: number;
  failed: number;
  successRatio: number;
}
