import type {
  CreateEventInput,
  DailyStat,
  Event,
  EventFilters,
  EventType,
  Pagination,
  StatusSummary,
  UpdateEventInput,
} from '../entities/event.entity.js';

/**
 * Append/update store for operation history. Each call is a single atomic
 * write; nothing spans an external process run.
 */
export interface IEventStore {
  create(input: CreateEventInput): Event;
  update(id: number, input: UpdateEventInput): Event;
  get(id: number): Event | null;
  list(filters?: EventFilters, pagination?: Partial<Pagination>): Event[];
  count(filters?: EventFilters): number;

  countByType(filters?: EventFilters): Partial<Record<EventType, number>>;
  statusSummary(filters?: EventFilters): StatusSummary;
  averageDurations(filters?: EventFilters): Partial<Record<EventType, number>>;
  dailyStats(startDate: Date, endDate: Date, filters?: EventFilters): DailyStat[];
  averageDuration(eventType: EventType, filters?: EventFilters): number;
}
