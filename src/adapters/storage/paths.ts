import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Storage directory for the database, workspaces and the encryption key.
 * Priority:
 * 1) VMLEDGER_DATA_DIR override
 * 2) ~/.vmledger default
 */
export function getDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const envOverride = env.VMLEDGER_DATA_DIR?.trim();
  if (envOverride) {
    return envOverride;
  }

  return path.join(os.homedir(), '.vmledger');
}

/**
 * Terraform templates shipped with the package (one directory per provider).
 */
export function getBundledTemplatesDir(): string {
  return path.resolve(__dirname, '../../../templates');
}
