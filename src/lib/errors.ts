import { ZodError } from 'zod';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'FORBIDDEN'
  | 'CONFLICT'
  | 'DECRYPTION_FAILED'
  | 'PROVISIONING_FAILED'
  | 'TEMPLATE_MISSING'
  | 'WORKSPACE_NOT_FOUND'
  | 'PROCESS_FAILURE'
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'PROVIDER_API_ERROR'
  | 'INTERNAL_ERROR';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, 400, details);
    this.name = 'ValidationError';
  }

  static fromZod(error: ZodError, subject = 'input'): ValidationError {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ');
    return new ValidationError(`Invalid ${subject}: ${summary}`, { issues });
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: string | number) {
    super('NOT_FOUND', `${resource} not found: ${id}`, 404);
    this.name = 'NotFoundError';
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Forbidden') {
    super('FORBIDDEN', message, 403);
    this.name = 'ForbiddenError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFLICT', message, 409, details);
    this.name = 'ConflictError';
  }
}

export class DecryptionFailedError extends AppError {
  constructor(reason: string) {
    super('DECRYPTION_FAILED', `Failed to decrypt credentials: ${reason}`, 500);
    this.name = 'DecryptionFailedError';
  }
}

export class ProviderApiError extends AppError {
  constructor(provider: string, message: string, public readonly status?: number) {
    super('PROVIDER_API_ERROR', `${provider} API error: ${message}`, 502, status ? { status } : undefined);
    this.name = 'ProviderApiError';
  }
}

// =============================================================================
// Provisioning failures
// =============================================================================

export class ProvisioningFailedError extends AppError {
  constructor(
    message: string,
    public readonly stderr: string | null = null,
    details?: Record<string, unknown>,
    code: ErrorCode = 'PROVISIONING_FAILED',
    statusCode = 502
  ) {
    super(code, message, statusCode, details);
    this.name = 'ProvisioningFailedError';
  }
}

export class TemplateMissingError extends ProvisioningFailedError {
  constructor(public readonly provider: string, templateDir: string) {
    super(`No templates for provider "${provider}" at ${templateDir}`, null, { provider }, 'TEMPLATE_MISSING', 500);
    this.name = 'TemplateMissingError';
  }
}

export class WorkspaceNotFoundError extends ProvisioningFailedError {
  constructor(public readonly workspace: string) {
    super(`Workspace ${workspace} not found`, null, { workspace }, 'WORKSPACE_NOT_FOUND', 404);
    this.name = 'WorkspaceNotFoundError';
  }
}

export class ProcessFailureError extends ProvisioningFailedError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number,
    stderr: string,
    details?: Record<string, unknown>
  ) {
    super(stderr.trim() || `terraform ${command} exited with code ${exitCode}`, stderr, details, 'PROCESS_FAILURE', 502);
    this.name = 'ProcessFailureError';
  }
}

export class TimeoutError extends ProvisioningFailedError {
  constructor(public readonly command: string, public readonly timeoutMs: number, stderr: string | null = null) {
    super(`terraform ${command} timed out after ${timeoutMs}ms`, stderr, { command, timeoutMs }, 'TIMEOUT', 504);
    this.name = 'TimeoutError';
  }
}

export class CancelledError extends ProvisioningFailedError {
  constructor(public readonly command: string, public readonly started: boolean, stderr: string | null = null) {
    super(`terraform ${command} was cancelled`, stderr, { command, started }, 'CANCELLED', 499);
    this.name = 'CancelledError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
