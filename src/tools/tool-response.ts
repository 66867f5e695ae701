import { AppError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { maskSensitive } from '../utils/mask.js';
import { toJsonObject } from '../utils/serialize.js';
import type { Viewer } from '../domain/entities/viewer.entity.js';

export type ViewerResolver = (userId: string) => Viewer;

export function createViewerResolver(adminUserIds: readonly string[]): ViewerResolver {
  const admins = new Set(adminUserIds);
  return (userId) => ({ userId, isAdmin: admins.has(userId) });
}

/**
 * Helper function to create a success response
 */
export function successResponse(data: Record<string, unknown>) {
  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify({ success: true, ...data }),
      },
    ],
  };
}

/**
 * Helper function to create an error response. Known errors keep their code
 * and masked details; anything else is reported as INTERNAL_ERROR.
 */
export function errorResponse(error: unknown) {
  const body =
    error instanceof AppError
      ? {
          success: false,
          error: error.message,
          code: error.code,
          ...(error.details ? { details: maskSensitive(toJsonObject(error.details)) } : {}),
        }
      : {
          success: false,
          error: error instanceof Error ? error.message : String(error),
          code: 'INTERNAL_ERROR',
        };

  if (!(error instanceof AppError)) {
    logger.error({ err: body.error }, 'Unhandled tool error');
  }

  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify(body),
      },
    ],
    isError: true,
  };
}

/**
 * Run a tool body, turning thrown errors into error responses.
 */
export async function respond(work: () => Promise<Record<string, unknown>> | Record<string, unknown>) {
  try {
    return successResponse(await work());
  } catch (error) {
    return errorResponse(error);
  }
}
