import type Database from 'better-sqlite3';
import { getDb } from '../sqlite.adapter.js';
import { ConflictError, NotFoundError, ValidationError } from '../../../lib/errors.js';
import { eventStatusSchema, eventTypeSchema, listEventsSchema, eventFiltersSchema } from '../../../schemas/event.schema.js';
import { parseJsonObject } from '../../../utils/serialize.js';
import type { IEventStore } from '../../../domain/ports/event-store.port.js';
import {
  STATUS_RANK,
  TERMINAL_STATUSES,
  type CreateEventInput,
  type DailyStat,
  type Event,
  type EventFilters,
  type EventType,
  type Pagination,
  type StatusSummary,
  type UpdateEventInput,
} from '../../../domain/entities/event.entity.js';

interface EventRow {
  id: number;
  event_type: string;
  status: string;
  timestamp: string;
  user_id: string;
  vm_id: number | null;
  credential_id: number | null;
  parameters: string | null;
  result: string | null;
  error_message: string | null;
  duration: number | null;
}

interface WhereClause {
  sql: string;
  params: Array<string | number>;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function ratio(part: number, total: number): number {
  return total > 0 ? Math.round((part / total) * 10000) / 100 : 0;
}

function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export class EventRepository implements IEventStore {
  constructor(
    private readonly db: Database.Database = getDb(),
    private readonly now: () => Date = () => new Date()
  ) {}

  create(input: CreateEventInput): Event {
    const result = this.db.prepare(`
      INSERT INTO events (event_type, status, timestamp, user_id, vm_id, credential_id, parameters)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(
      eventTypeSchema.parse(input.eventType),
      eventStatusSchema.parse(input.status ?? 'pending'),
      this.now().toISOString(),
      input.userId,
      input.vmId ?? null,
      input.credentialId ?? null,
      input.parameters ? JSON.stringify(input.parameters) : null
    );

    return this.require(Number(result.lastInsertRowid));
  }

  update(id: number, input: UpdateEventInput): Event {
    const existing = this.require(id);

    const sets: string[] = [];
    const values: Array<string | number | null> = [];

    if (input.status !== undefined) {
      if (TERMINAL_STATUSES.includes(existing.status) && input.status !== existing.status) {
        throw new ConflictError(`Event ${id} is already ${existing.status}`, { eventId: id, status: existing.status });
      }
      if (STATUS_RANK[input.status] < STATUS_RANK[existing.status]) {
        throw new ConflictError(`Event ${id} cannot move from ${existing.status} back to ${input.status}`, {
          eventId: id,
          status: existing.status,
        });
      }
      sets.push('status = ?');
      values.push(input.status);
    }
    if (input.vmId !== undefined) {
      sets.push('vm_id = ?');
      values.push(input.vmId);
    }
    if (input.credentialId !== undefined) {
      sets.push('credential_id = ?');
      values.push(input.credentialId);
    }
    if (input.result !== undefined) {
      sets.push('result = ?');
      values.push(input.result === null ? null : JSON.stringify(input.result));
    }
    if (input.errorMessage !== undefined) {
      sets.push('error_message = ?');
      values.push(input.errorMessage);
    }
    if (input.duration !== undefined) {
      sets.push('duration = ?');
      values.push(input.duration);
    }

    if (sets.length === 0) {
      return existing;
    }

    this.db.prepare(`UPDATE events SET ${sets.join(', ')} WHERE id = ?`).run(...values, id);
    return this.require(id);
  }

  get(id: number): Event | null {
    const row = this.db.prepare<[number], EventRow>('SELECT * FROM events WHERE id = ?').get(id);
    return row ? this.mapRow(row) : null;
  }

  list(filters: EventFilters = {}, pagination: Partial<Pagination> = {}): Event[] {
    const parsed = listEventsSchema.safeParse({ ...filters, ...pagination });
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, 'event query');
    }
    const { limit, offset } = parsed.data;
    const where = this.buildWhere(filters);

    const rows = this.db
      .prepare<Array<string | number>, EventRow>(`
        SELECT * FROM events
        ${where.sql}
        ORDER BY timestamp DESC, id DESC
        LIMIT ? OFFSET ?
      `)
      .all(...where.params, limit, offset);
    return rows.map((row) => this.mapRow(row));
  }

  count(filters: EventFilters = {}): number {
    const where = this.buildWhere(this.validateFilters(filters));
    const row = this.db
      .prepare<Array<string | number>, { count: number }>(`SELECT COUNT(*) AS count FROM events ${where.sql}`)
      .get(...where.params);
    return row?.count ?? 0;
  }

  countByType(filters: EventFilters = {}): Partial<Record<EventType, number>> {
    const where = this.buildWhere(this.validateFilters(filters));
    const rows = this.db
      .prepare<Array<string | number>, { event_type: string; count: number }>(`
        SELECT event_type, COUNT(*) AS count FROM events
        ${where.sql}
        GROUP BY event_type
      `)
      .all(...where.params);

    const counts: Partial<Record<EventType, number>> = {};
    for (const row of rows) {
      counts[eventTypeSchema.parse(row.event_type)] = row.count;
    }
    return counts;
  }

  statusSummary(filters: EventFilters = {}): StatusSummary {
    const where = this.buildWhere(this.validateFilters(filters));
    const rows = this.db
      .prepare<Array<string | number>, { status: string; count: number }>(`
        SELECT status, COUNT(*) AS count FROM events
        ${where.sql}
        GROUP BY status
      `)
      .all(...where.params);

    const byStatus = new Map(rows.map((row) => [row.status, row.count]));
    const total = rows.reduce((sum, row) => sum + row.count, 0);
    const success = byStatus.get('success') ?? 0;
    const failed = byStatus.get('failed') ?? 0;
    const pending = byStatus.get('pending') ?? 0;
    const inProgress = byStatus.get('in_progress') ?? 0;
    const provisioning = byStatus.get('provisioning') ?? 0;

    return {
      total,
      success,
      failed,
      pending,
      inProgress,
      provisioning,
      successRatio: ratio(success, total),
      failedRatio: ratio(failed, total),
      pendingRatio: ratio(pending, total),
      inProgressRatio: ratio(inProgress, total),
      provisioningRatio: ratio(provisioning, total),
    };
  }

  averageDurations(filters: EventFilters = {}): Partial<Record<EventType, number>> {
    const where = this.buildWhere(
      { ...this.validateFilters(filters), status: 'success' },
      ['duration IS NOT NULL']
    );
    const rows = this.db
      .prepare<Array<string | number>, { event_type: string; avg: number }>(`
        SELECT event_type, AVG(duration) AS avg FROM events
        ${where.sql}
        GROUP BY event_type
      `)
      .all(...where.params);

    const averages: Partial<Record<EventType, number>> = {};
    for (const row of rows) {
      averages[eventTypeSchema.parse(row.event_type)] = row.avg;
    }
    return averages;
  }

  dailyStats(startDate: Date, endDate: Date, filters: EventFilters = {}): DailyStat[] {
    const first = startOfUtcDay(startDate);
    const last = startOfUtcDay(endDate);
    if (last.getTime() < first.getTime()) {
      throw new ValidationError('endDate must not be before startDate');
    }

    const where = this.buildWhere({
      ...this.validateFilters(filters),
      startDate: first,
      endDate: new Date(last.getTime() + DAY_MS - 1),
    });
    const rows = this.db
      .prepare<Array<string | number>, { day: string; total: number; success: number; failed: number }>(`
        SELECT substr(timestamp, 1, 10) AS day,
               COUNT(*) AS total,
               SUM(CASE WHEN status = 'success' THEN 1 ELSE 0 END) AS success,
               SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END) AS failed
        FROM events
        ${where.sql}
        GROUP BY day
      `)
      .all(...where.params);
    const byDay = new Map(rows.map((row) => [row.day, row]));

    const stats: DailyStat[] = [];
    for (let t = first.getTime(); t <= last.getTime(); t += DAY_MS) {
      const date = new Date(t).toISOString().slice(0, 10);
      const row = byDay.get(date);
      const total = row?.total ?? 0;
      const success = row?.success ?? 0;
      stats.push({ date, total, success, failed: row?.failed ?? 0, successRatio: ratio(success, total) });
    }
    return stats;
  }

  averageDuration(eventType: EventType, filters: EventFilters = {}): number {
    const where = this.buildWhere(
      { ...this.validateFilters(filters), eventType, status: 'success' },
      ['duration IS NOT NULL']
    );
    const row = this.db
      .prepare<Array<string | number>, { avg: number | null }>(`SELECT AVG(duration) AS avg FROM events ${where.sql}`)
      .get(...where.params);
    return row?.avg ?? 0;
  }

  private require(id: number): Event {
    const event = this.get(id);
    if (!event) {
      throw new NotFoundError('Event', id);
    }
    return event;
  }

  private validateFilters(filters: EventFilters): EventFilters {
    const parsed = eventFiltersSchema.safeParse(filters);
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, 'event filters');
    }
    return parsed.data;
  }

  private buildWhere(filters: EventFilters, extra: string[] = []): WhereClause {
    const conditions = [...extra];
    const params: Array<string | number> = [];

    if (filters.userId !== undefined) {
      conditions.push('user_id = ?');
      params.push(filters.userId);
    }
    if (filters.vmId !== undefined) {
      conditions.push('vm_id = ?');
      params.push(filters.vmId);
    }
    if (filters.credentialId !== undefined) {
      conditions.push('credential_id = ?');
      params.push(filters.credentialId);
    }
    if (filters.eventType !== undefined) {
      conditions.push('event_type = ?');
      params.push(filters.eventType);
    }
    if (filters.status !== undefined) {
      conditions.push('status = ?');
      params.push(filters.status);
    }
    if (filters.startDate !== undefined) {
      conditions.push('timestamp >= ?');
      params.push(filters.startDate.toISOString());
    }
    if (filters.endDate !== undefined) {
      conditions.push('timestamp <= ?');
      params.push(filters.endDate.toISOString());
    }

    return {
      sql: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
      params,
    };
  }

  private mapRow(row: EventRow): Event {
    return {
      id: row.id,
      eventType: eventTypeSchema.parse(row.event_type),
      status: eventStatusSchema.parse(row.status),
      timestamp: new Date(row.timestamp),
      userId: row.user_id,
      vmId: row.vm_id,
      credentialId: row.credential_id,
      parameters: parseJsonObject(row.parameters),
      result: parseJsonObject(row.result),
      errorMessage: row.error_message,
      duration: row.duration,
    };
  }
}
