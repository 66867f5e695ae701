import { z } from 'zod';
import { ForbiddenError, NotFoundError, ValidationError } from '../../lib/errors.js';
import {
  dailyStatsDaysSchema,
  deploymentPeriodSchema,
  eventTypeSchema,
  listEventsSchema,
  summaryPeriodSchema,
  type DeploymentPeriod,
  type SummaryPeriod,
} from '../../schemas/event.schema.js';
import type { DailyStat, Event, EventFilters, EventType, StatusSummary } from '../entities/event.entity.js';
import type { VmStatus } from '../entities/vm.entity.js';
import { canAccess, type Viewer } from '../entities/viewer.entity.js';
import type { IEventStore } from '../ports/event-store.port.js';

const DAY_MS = 24 * 60 * 60 * 1000;

const PERIOD_DAYS: Record<Exclude<SummaryPeriod, 'day'>, number> = {
  week: 7,
  month: 30,
  year: 365,
};

/** VM counts the summary reports alongside event statistics */
export interface VmStatsSource {
  count(userId?: string): number;
  countByStatus(userId?: string): Partial<Record<VmStatus, number>>;
}

export interface EventPage {
  events: Event[];
  total: number;
  limit: number;
  offset: number;
}

export interface HistorySummary {
  period: SummaryPeriod;
  startDate: Date;
  endDate: Date;
  eventCounts: Partial<Record<EventType, number>>;
  successRatio: StatusSummary;
  averageDurations: Partial<Record<EventType, number>>;
  vmStats: {
    active: number;
    total: number;
    activePercentage: number;
  };
}

export interface DeploymentTimes {
  period: DeploymentPeriod;
  startDate: Date;
  endDate: Date;
  vmCreateTime: number;
  vmDeleteTime: number;
  credentialCreateTime: number;
  credentialDeleteTime: number;
}

function isMidnight(date: Date): boolean {
  return (
    date.getUTCHours() === 0 &&
    date.getUTCMinutes() === 0 &&
    date.getUTCSeconds() === 0 &&
    date.getUTCMilliseconds() === 0
  );
}

/**
 * Read side of the operation history. Non-admin viewers only ever see their
 * own events.
 */
export class HistoryService {
  constructor(
    private readonly events: IEventStore,
    private readonly vms: VmStatsSource,
    private readonly now: () => Date = () => new Date()
  ) {}

  listEvents(viewer: Viewer, query: unknown = {}): EventPage {
    const parsed = listEventsSchema.safeParse(query);
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, 'event query');
    }
    const { limit, offset, ...filters } = parsed.data;

    if (!viewer.isAdmin) {
      filters.userId = viewer.userId;
    }
    if (filters.endDate && isMidnight(filters.endDate)) {
      // a bare date means the whole day
      filters.endDate = new Date(filters.endDate.getTime() + DAY_MS - 1);
    }
    if (filters.startDate && filters.endDate && filters.startDate > filters.endDate) {
      throw new ValidationError('startDate must not be after endDate');
    }

    return {
      events: this.events.list(filters, { limit, offset }),
      total: this.events.count(filters),
      limit,
      offset,
    };
  }

  getEvent(viewer: Viewer, id: number): Event {
    const event = this.events.get(id);
    if (!event) {
      throw new NotFoundError('Event', id);
    }
    if (!canAccess(viewer, event.userId)) {
      throw new ForbiddenError(`Event ${id} belongs to another user`);
    }
    return event;
  }

  getSummary(viewer: Viewer, period: unknown = 'week'): HistorySummary {
    const parsedPeriod = this.parse(summaryPeriodSchema, period, 'period');
    const endDate = this.now();
    const startDate =
      parsedPeriod === 'day'
        ? new Date(Date.UTC(endDate.getUTCFullYear(), endDate.getUTCMonth(), endDate.getUTCDate()))
        : new Date(endDate.getTime() - PERIOD_DAYS[parsedPeriod] * DAY_MS);

    const filters = this.scoped(viewer, { startDate });
    const userId = viewer.isAdmin ? undefined : viewer.userId;
    const active = this.vms.countByStatus(userId).running ?? 0;
    const total = this.vms.count(userId);

    return {
      period: parsedPeriod,
      startDate,
      endDate,
      eventCounts: this.events.countByType(filters),
      successRatio: this.events.statusSummary(filters),
      averageDurations: this.events.averageDurations(filters),
      vmStats: {
        active,
        total,
        activePercentage: total > 0 ? (active / total) * 100 : 0,
      },
    };
  }

  getDailyStats(viewer: Viewer, days: unknown = 30, eventType?: unknown): DailyStat[] {
    const parsedDays = this.parse(dailyStatsDaysSchema, days, 'days');
    const parsedType = eventType === undefined ? undefined : this.parse(eventTypeSchema, eventType, 'eventType');
    const endDate = this.now();
    const startDate = new Date(endDate.getTime() - (parsedDays - 1) * DAY_MS);

    return this.events.dailyStats(startDate, endDate, this.scoped(viewer, { eventType: parsedType }));
  }

  getDeploymentTimes(viewer: Viewer, period: unknown = 'month'): DeploymentTimes {
    const parsedPeriod = this.parse(deploymentPeriodSchema, period, 'period');
    const endDate = this.now();
    const startDate = new Date(endDate.getTime() - PERIOD_DAYS[parsedPeriod] * DAY_MS);
    const filters = this.scoped(viewer, { startDate });

    return {
      period: parsedPeriod,
      startDate,
      endDate,
      vmCreateTime: this.events.averageDuration('vm_create', filters),
      vmDeleteTime: this.events.averageDuration('vm_delete', filters),
      credentialCreateTime: this.events.averageDuration('credential_create', filters),
      credentialDeleteTime: this.events.averageDuration('credential_delete', filters),
    };
  }

  private scoped(viewer: Viewer, filters: EventFilters): EventFilters {
    return viewer.isAdmin ? filters : { ...filters, userId: viewer.userId };
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, name: string): T {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw ValidationError.fromZod(result.error, name);
    }
    return result.data;
  }
}
