import { z } from 'zod';
import { EVENT_STATUSES, EVENT_TYPES } from '../domain/entities/event.entity.js';

export const eventTypeSchema = z.enum(EVENT_TYPES);
export const eventStatusSchema = z.enum(EVENT_STATUSES);

export const paginationSchema = z.object({
  limit: z.number().int().min(1).max(1000).default(100),
  offset: z.number().int().min(0).default(0),
});

export const eventFiltersSchema = z.object({
  userId: z.string().min(1).optional(),
  vmId: z.number().int().positive().optional(),
  credentialId: z.number().int().positive().optional(),
  eventType: eventTypeSchema.optional(),
  status: eventStatusSchema.optional(),
  startDate: z.coerce.date().optional(),
  endDate: z.coerce.date().optional(),
});

export const listEventsSchema = eventFiltersSchema.merge(paginationSchema);

export const summaryPeriodSchema = z.enum(['day', 'week', 'month', 'year']);
export const deploymentPeriodSchema = z.enum(['week', 'month', 'year']);
export const dailyStatsDaysSchema = z.number().int().min(1).max(365).default(30);

export type PaginationInput = z.input<typeof paginationSchema>;
export type ListEventsInput = z.input<typeof listEventsSchema>;
export type SummaryPeriod = z.infer<typeof summaryPeriodSchema>;
export type DeploymentPeriod = z.infer<typeof deploymentPeriodSchema>;
