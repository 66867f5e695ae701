import type { Logger } from 'pino';
import { AppError, errorMessage } from '../../lib/errors.js';
import { createComponentLogger } from '../../lib/logger.js';
import { maskSensitive } from '../../utils/mask.js';
import { toJsonObject, type JsonObject } from '../../utils/serialize.js';
import type { Event, EventStatus, EventType, UpdateEventInput } from '../entities/event.entity.js';
import type { IEventStore } from '../ports/event-store.port.js';

export const SYSTEM_USER = 'system';

type Extractor<P> = (params: P) => number | null | undefined;

export interface TrackSpec<P extends Record<string, unknown>> {
  eventType: EventType;
  /** Named inputs of the operation, snapshotted into the event */
  params: P;
  userId: (params: P) => string | null | undefined;
  vmId?: Extractor<P>;
  credentialId?: Extractor<P>;
  /** Parameter names that never reach storage */
  excludeParams?: readonly string[];
  initialStatus?: EventStatus;
  /** Set right after creation, before the work runs */
  intermediateStatus?: EventStatus | null;
  successStatus?: EventStatus;
  failureStatus?: EventStatus;
}

export interface TrackContext {
  /** Id of the event recording this attempt, null when the event could not be created */
  readonly eventId: number | null;
  /** Associate the event with records created by the work itself */
  link(ids: { vmId?: number | null; credentialId?: number | null }): void;
}

/**
 * Wraps a unit of work with history recording: creates the event, runs the
 * work, then finalizes the event with the outcome and the elapsed time.
 * The work's own result or error always reaches the caller unchanged.
 */
export class OperationTracker {
  private readonly log: Logger;

  constructor(
    private readonly events: IEventStore,
    log: Logger = createComponentLogger('tracker')
  ) {
    this.log = log;
  }

  async track<P extends Record<string, unknown>, T>(
    spec: TrackSpec<P>,
    work: (ctx: TrackContext) => Promise<T> | T
  ): Promise<T> {
    const parameters = this.snapshot(spec.params, spec.excludeParams ?? []);
    const event = this.open(spec, parameters);
    const startedAt = Date.now();

    if (event && spec.intermediateStatus) {
      this.finalize(event.id, { status: spec.intermediateStatus });
    }

    const links: Pick<UpdateEventInput, 'vmId' | 'credentialId'> = {};
    const ctx: TrackContext = {
      eventId: event?.id ?? null,
      link: (ids) => {
        if (ids.vmId !== undefined) links.vmId = ids.vmId;
        if (ids.credentialId !== undefined) links.credentialId = ids.credentialId;
      },
    };

    let result: T;
    try {
      result = await work(ctx);
    } catch (error) {
      const duration = (Date.now() - startedAt) / 1000;
      this.log.warn(
        { eventType: spec.eventType, eventId: ctx.eventId, duration, err: errorMessage(error) },
        'Operation failed'
      );
      if (event) {
        this.finalize(event.id, {
          ...links,
          status: spec.failureStatus ?? 'failed',
          errorMessage: errorMessage(error),
          duration,
          ...(error instanceof AppError && error.details ? { result: this.sanitize(error.details) } : {}),
        });
      }
      throw error;
    }

    const duration = (Date.now() - startedAt) / 1000;
    this.log.info({ eventType: spec.eventType, eventId: ctx.eventId, duration }, 'Operation succeeded');
    if (event) {
      this.finalize(event.id, {
        ...links,
        status: spec.successStatus ?? 'success',
        result: this.sanitize(result),
        duration,
      });
    }
    return result;
  }

  /**
   * Variant for operations that drive the provisioning tool: the event moves
   * to `provisioning` before the work starts.
   */
  trackProvisioning<P extends Record<string, unknown>, T>(
    spec: TrackSpec<P>,
    work: (ctx: TrackContext) => Promise<T> | T
  ): Promise<T> {
    return this.track({ ...spec, intermediateStatus: spec.intermediateStatus ?? 'provisioning' }, work);
  }

  private snapshot<P extends Record<string, unknown>>(params: P, exclude: readonly string[]): JsonObject {
    const json = toJsonObject(params);
    for (const name of exclude) {
      delete json[name];
    }
    return maskSensitive(json);
  }

  private sanitize(value: unknown): JsonObject {
    return maskSensitive(toJsonObject(value));
  }

  private open<P extends Record<string, unknown>>(spec: TrackSpec<P>, parameters: JsonObject): Event | null {
    try {
      const event = this.events.create({
        eventType: spec.eventType,
        userId: spec.userId(spec.params) ?? SYSTEM_USER,
        vmId: spec.vmId?.(spec.params) ?? null,
        credentialId: spec.credentialId?.(spec.params) ?? null,
        parameters,
        status: spec.initialStatus ?? 'pending',
      });
      this.log.info({ eventType: spec.eventType, eventId: event.id, parameters }, 'Operation started');
      return event;
    } catch (error) {
      // history is best effort; the operation still runs
      this.log.error({ eventType: spec.eventType, err: errorMessage(error) }, 'Failed to record operation start');
      return null;
    }
  }

  private finalize(eventId: number, update: UpdateEventInput): void {
    try {
      this.events.update(eventId, update);
    } catch (error) {
      this.log.error({ eventId, status: update.status, err: errorMessage(error) }, 'Failed to update event');
    }
  }
}
