import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { getDb, initializeDatabase, SqliteAdapter } from '../../sqlite.adapter.js';
import { EventRepository } from '../event.repository.js';
import { ConflictError, NotFoundError, ValidationError } from '../../../../lib/errors.js';

describe('EventRepository', () => {
  let now: Date;
  let events: EventRepository;

  beforeEach(() => {
    initializeDatabase(':memory:');
    now = new Date('2024-03-10T12:00:00.000Z');
    events = new EventRepository(getDb(), () => now);
  });

  afterEach(() => {
    SqliteAdapter.resetInstance();
  });

  describe('create', () => {
    it('stores a pending event with its parameters', () => {
      const event = events.create({
        eventType: 'vm_create',
        userId: 'alice',
        parameters: { name: 'web', region: 'us-east-1' },
      });

      expect(event).toEqual({
        id: 1,
        eventType: 'vm_create',
        status: 'pending',
        timestamp: new Date('2024-03-10T12:00:00.000Z'),
        userId: 'alice',
        vmId: null,
        credentialId: null,
        parameters: { name: 'web', region: 'us-east-1' },
        result: null,
        errorMessage: null,
        duration: null,
      });
    });

    it('accepts references to records that do not exist', () => {
      const event = events.create({ eventType: 'vm_delete', userId: 'alice', vmId: 999, credentialId: 42 });
      expect(event.vmId).toBe(999);
      expect(event.credentialId).toBe(42);
    });
  });

  describe('update', () => {
    it('changes only the given fields', () => {
      const event = events.create({ eventType: 'vm_create', userId: 'alice', parameters: { name: 'web' } });

      events.update(event.id, { status: 'in_progress' });
      const updated = events.update(event.id, { status: 'success', result: { instanceId: 'i-1' }, duration: 2.5 });

      expect(updated.status).toBe('success');
      expect(updated.result).toEqual({ instanceId: 'i-1' });
      expect(updated.duration).toBe(2.5);
      expect(updated.parameters).toEqual({ name: 'web' });
      expect(updated.errorMessage).toBeNull();
    });

    it('refuses to move an event out of a terminal status', () => {
      const event = events.create({ eventType: 'vm_start', userId: 'alice' });
      events.update(event.id, { status: 'failed', errorMessage: 'boom' });

      expect(() => events.update(event.id, { status: 'success' })).toThrow(ConflictError);
      expect(events.get(event.id)?.status).toBe('failed');
    });

    it('refuses to move an event back to an earlier status', () => {
      const event = events.create({ eventType: 'provision_apply', userId: 'alice' });
      events.update(event.id, { status: 'provisioning' });

      expect(() => events.update(event.id, { status: 'pending' })).toThrow(
        `Event ${event.id} cannot move from provisioning back to pending`
      );
      expect(events.get(event.id)?.status).toBe('provisioning');
    });

    it('moves forward through the lifecycle', () => {
      const event = events.create({ eventType: 'vm_create', userId: 'alice' });

      expect(events.update(event.id, { status: 'pending' }).status).toBe('pending');
      expect(events.update(event.id, { status: 'in_progress' }).status).toBe('in_progress');
      expect(events.update(event.id, { status: 'provisioning' }).status).toBe('provisioning');
      expect(events.update(event.id, { status: 'failed' }).status).toBe('failed');
    });

    it('allows non-status updates on terminal events', () => {
      const event = events.create({ eventType: 'vm_create', userId: 'alice' });
      events.update(event.id, { status: 'success' });

      expect(events.update(event.id, { vmId: 7 }).vmId).toBe(7);
    });

    it('throws NotFoundError for unknown ids', () => {
      expect(() => events.update(404, { status: 'success' })).toThrow(NotFoundError);
    });
  });

  describe('list', () => {
    it('returns newest first with id as tie-breaker', () => {
      events.create({ eventType: 'vm_create', userId: 'alice' });
      events.create({ eventType: 'vm_start', userId: 'alice' });
      now = new Date('2024-03-09T12:00:00.000Z');
      events.create({ eventType: 'vm_stop', userId: 'alice' });

      expect(events.list().map((event) => event.id)).toEqual([2, 1, 3]);
    });

    it('applies filters conjunctively', () => {
      events.create({ eventType: 'vm_create', userId: 'alice', vmId: 1 });
      events.create({ eventType: 'vm_create', userId: 'bob', vmId: 2 });
      const failed = events.create({ eventType: 'vm_create', userId: 'alice', vmId: 1 });
      events.update(failed.id, { status: 'failed' });

      expect(events.list({ userId: 'alice', status: 'failed' }).map((event) => event.id)).toEqual([3]);
      expect(events.list({ vmId: 2 }).map((event) => event.userId)).toEqual(['bob']);
      expect(events.count({ userId: 'alice' })).toBe(2);
    });

    it('treats date bounds as inclusive', () => {
      events.create({ eventType: 'vm_create', userId: 'alice' });

      expect(events.list({ startDate: now, endDate: now })).toHaveLength(1);
      expect(events.list({ startDate: new Date('2024-03-10T12:00:00.001Z') })).toHaveLength(0);
    });

    it('paginates', () => {
      for (let i = 0; i < 5; i++) {
        events.create({ eventType: 'vm_create', userId: 'alice' });
      }

      expect(events.list({}, { limit: 2, offset: 1 }).map((event) => event.id)).toEqual([4, 3]);
    });

    it('rejects out-of-range pagination', () => {
      expect(() => events.list({}, { limit: 0 })).toThrow(ValidationError);
      expect(() => events.list({}, { limit: 1001 })).toThrow(ValidationError);
      expect(() => events.list({}, { offset: -1 })).toThrow(ValidationError);
    });
  });

  describe('statistics', () => {
    function seed(eventType: 'vm_create' | 'vm_delete', status: 'success' | 'failed' | 'pending', duration?: number) {
      const event = events.create({ eventType, userId: 'alice' });
      if (status !== 'pending') {
        events.update(event.id, { status, duration: duration ?? null });
      }
    }

    it('summarises statuses with rounded ratios', () => {
      seed('vm_create', 'success', 10);
      seed('vm_create', 'success', 20);
      seed('vm_delete', 'failed', 5);

      expect(events.statusSummary()).toEqual({
        total: 3,
        success: 2,
        failed: 1,
        pending: 0,
        inProgress: 0,
        provisioning: 0,
        successRatio: 66.67,
        failedRatio: 33.33,
        pendingRatio: 0,
        inProgressRatio: 0,
        provisioningRatio: 0,
      });
    });

    it('reports a failed ratio for failures alone', () => {
      seed('vm_create', 'failed');

      expect(events.statusSummary()).toMatchObject({ total: 1, failed: 1, successRatio: 0, failedRatio: 100 });
    });

    it('reports open events by status', () => {
      seed('vm_create', 'pending');
      const provisioning = events.create({ eventType: 'provision_apply', userId: 'alice' });
      events.update(provisioning.id, { status: 'provisioning' });
      const running = events.create({ eventType: 'vm_start', userId: 'alice' });
      events.update(running.id, { status: 'in_progress' });
      seed('vm_delete', 'success', 1);

      expect(events.statusSummary()).toMatchObject({
        total: 4,
        pendingRatio: 25,
        provisioningRatio: 25,
        inProgressRatio: 25,
        successRatio: 25,
        failedRatio: 0,
      });
    });

    it('reports zero ratios when there are no events', () => {
      expect(events.statusSummary()).toEqual({
        total: 0,
        success: 0,
        failed: 0,
        pending: 0,
        inProgress: 0,
        provisioning: 0,
        successRatio: 0,
        failedRatio: 0,
        pendingRatio: 0,
        inProgressRatio: 0,
        provisioningRatio: 0,
      });
    });

    it('counts events by type', () => {
      seed('vm_create', 'success', 10);
      seed('vm_create', 'pending');
      seed('vm_delete', 'failed', 5);

      expect(events.countByType()).toEqual({ vm_create: 2, vm_delete: 1 });
    });

    it('averages durations of successful events only', () => {
      seed('vm_create', 'success', 10);
      seed('vm_create', 'success', 20);
      seed('vm_create', 'failed', 100);
      seed('vm_delete', 'pending');

      expect(events.averageDurations()).toEqual({ vm_create: 15 });
      expect(events.averageDuration('vm_create')).toBe(15);
      expect(events.averageDuration('vm_delete')).toBe(0);
    });

    it('fills every day of the range', () => {
      now = new Date('2024-03-08T09:00:00.000Z');
      seed('vm_create', 'success', 1);
      seed('vm_create', 'failed', 1);
      now = new Date('2024-03-10T23:59:59.000Z');
      seed('vm_create', 'success', 1);

      const stats = events.dailyStats(new Date('2024-03-07T15:00:00.000Z'), new Date('2024-03-10T01:00:00.000Z'));

      expect(stats).toEqual([
        { date: '2024-03-07', total: 0, success: 0, failed: 0, successRatio: 0 },
        { date: '2024-03-08', total: 2, success: 1, failed: 1, successRatio: 50 },
        { date: '2024-03-09', total: 0, success: 0, failed: 0, successRatio: 0 },
        { date: '2024-03-10', total: 1, success: 1, failed: 0, successRatio: 100 },
      ]);
    });

    it('rejects a reversed day range', () => {
      expect(() => events.dailyStats(new Date('2024-03-10'), new Date('2024-03-01'))).toThrow(ValidationError);
    });
  });
});
