import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { EVENT_STATUSES, EVENT_TYPES } from '../domain/entities/event.entity.js';
import type { HistoryService } from '../domain/services/history.service.js';
import { respond, type ViewerResolver } from './tool-response.js';

export interface HistoryToolDeps {
  history: HistoryService;
  viewerFor: ViewerResolver;
}

const userIdParam = z.string().min(1).describe('User on whose behalf the request runs');

export function registerHistoryTools(server: McpServer, deps: HistoryToolDeps): void {
  const { history, viewerFor } = deps;

  server.tool(
    'history_list',
    'List recorded operations, newest first. Non-admin users only see their own events.',
    {
      userId: userIdParam,
      filterUserId: z.string().optional().describe('Admins only: restrict to one user'),
      vmId: z.number().int().positive().optional(),
      credentialId: z.number().int().positive().optional(),
      eventType: z.enum(EVENT_TYPES).optional(),
      status: z.enum(EVENT_STATUSES).optional(),
      startDate: z.string().optional().describe('ISO-8601 date or timestamp, inclusive'),
      endDate: z.string().optional().describe('ISO-8601 date or timestamp, inclusive; a bare date covers the whole day'),
      limit: z.number().int().optional().describe('1..1000, default 100'),
      offset: z.number().int().optional().describe('Default 0'),
    },
    async ({ userId, filterUserId, ...query }) =>
      respond(() => {
        const page = history.listEvents(viewerFor(userId), { ...query, userId: filterUserId });
        return { ...page };
      })
  );

  server.tool(
    'history_get',
    'Get one recorded operation by id',
    {
      userId: userIdParam,
      eventId: z.number().int().positive(),
    },
    async ({ userId, eventId }) => respond(() => ({ event: history.getEvent(viewerFor(userId), eventId) }))
  );

  server.tool(
    'history_summary',
    'Event counts, success ratio, average durations and VM stats for a period',
    {
      userId: userIdParam,
      period: z.enum(['day', 'week', 'month', 'year']).default('week'),
    },
    async ({ userId, period }) => respond(() => ({ summary: history.getSummary(viewerFor(userId), period) }))
  );

  server.tool(
    'history_daily_stats',
    'Per-day event counts and success ratios for the last N days',
    {
      userId: userIdParam,
      days: z.number().int().min(1).max(365).default(30),
      eventType: z.enum(EVENT_TYPES).optional(),
    },
    async ({ userId, days, eventType }) =>
      respond(() => ({ stats: history.getDailyStats(viewerFor(userId), days, eventType) }))
  );

  server.tool(
    'history_deployment_times',
    'Average durations of VM and credential create/delete operations',
    {
      userId: userIdParam,
      period: z.enum(['week', 'month', 'year']).default('month'),
    },
    async ({ userId, period }) =>
      respond(() => ({ deploymentTimes: history.getDeploymentTimes(viewerFor(userId), period) }))
  );
}
