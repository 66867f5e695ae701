import path from 'path';
import { ValidationError } from './lib/errors.js';
import { LOG_LEVELS, isLogLevel } from './lib/logger.js';
import { getBundledTemplatesDir, getDataDir } from './adapters/storage/paths.js';

/**
 * Runtime configuration loaded from environment variables.
 */
export interface AppConfig {
  // Storage
  dataDir: string;
  databasePath: string;
  encryptionKeyFile: string;

  // Provisioning
  templatesDir: string;
  workspacesDir: string;
  terraformBinary: string;
  commandTimeoutMs: number;
  killGraceMs: number;
  retainWorkspaces: boolean;

  // Access
  adminUserIds: string[];

  logLevel: string;
}

function positiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = parseInt(raw, 10);
  if (!/^\d+$/.test(raw) || value <= 0) {
    throw new ValidationError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function text(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

function logLevel(env: NodeJS.ProcessEnv): string {
  const level = text(env, 'VMLEDGER_LOG_LEVEL') ?? 'info';
  if (!isLogLevel(level)) {
    throw new ValidationError(`VMLEDGER_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${level}"`);
  }
  return level;
}

/**
 * Load configuration from environment variables, falling back to defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = getDataDir(env);

  return {
    // Storage
    dataDir,
    databasePath: text(env, 'VMLEDGER_DB_PATH') ?? path.join(dataDir, 'vmledger.db'),
    encryptionKeyFile: text(env, 'VMLEDGER_KEY_FILE') ?? path.join(dataDir, '.secret-key'),

    // Provisioning
    templatesDir: text(env, 'VMLEDGER_TEMPLATES_DIR') ?? getBundledTemplatesDir(),
    workspacesDir: text(env, 'VMLEDGER_WORKSPACES_DIR') ?? path.join(dataDir, 'workspaces'),
    terraformBinary: text(env, 'VMLEDGER_TERRAFORM_BIN') ?? 'terraform',
    commandTimeoutMs: positiveInt(env, 'VMLEDGER_COMMAND_TIMEOUT_MS', 30 * 60 * 1000),
    killGraceMs: positiveInt(env, 'VMLEDGER_KILL_GRACE_MS', 10_000),
    retainWorkspaces: env.VMLEDGER_RETAIN_WORKSPACES?.trim() !== 'false',

    // Access
    adminUserIds: (env.VMLEDGER_ADMIN_USERS ?? '')
      .split(',')
      .map((id) => id.trim())
      .filter((id) => id.length > 0),

    logLevel: logLevel(env),
  };
}
