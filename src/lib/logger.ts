import pino from 'pino';
import type { Logger } from 'pino';

const SENSITIVE_KEYS = [
  'password',
  'secret',
  'key',
  'token',
  'private_key',
  'access_key',
  'secret_key',
  'aws_secret_access_key',
  'credentials',
];

export const LOG_LEVELS: readonly string[] = [...Object.keys(pino.levels.values), 'silent'];

export function isLogLevel(value: string): boolean {
  return LOG_LEVELS.includes(value);
}

const envLevel = process.env.VMLEDGER_LOG_LEVEL?.trim();

// stdout carries the MCP protocol, so log lines go to stderr
export const logger = pino(
  {
    level: envLevel && isLogLevel(envLevel) ? envLevel : 'info',
    base: { service: 'vmledger' },
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: [...SENSITIVE_KEYS, ...SENSITIVE_KEYS.map((key) => `*.${key}`)],
      censor: '[REDACTED]',
    },
  },
  pino.destination(2)
);

export type LogComponent = 'tracker' | 'orchestrator' | 'executor' | 'workspace' | 'db' | 'vm' | 'credential';

export function createComponentLogger(component: LogComponent): Logger {
  return logger.child({ component });
}

export type { Logger };
