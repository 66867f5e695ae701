import type { CloudProvider, VmStatus } from '../entities/vm.entity.js';

const AWS_STATES: Record<string, VmStatus> = {
  pending: 'creating',
  running: 'running',
  stopping: 'stopped',
  stopped: 'stopped',
  'shutting-down': 'terminated',
  terminated: 'terminated',
};

const GCP_STATES: Record<string, VmStatus> = {
  PROVISIONING: 'creating',
  STAGING: 'creating',
  RUNNING: 'running',
  STOPPING: 'stopped',
  SUSPENDING: 'stopped',
  SUSPENDED: 'stopped',
  TERMINATED: 'stopped',
};

/**
 * Map a provider-reported instance state onto the common VM status set.
 */
export function normalizeVmStatus(provider: CloudProvider, state: string | null | undefined): VmStatus {
  if (!state) {
    return 'failed';
  }
  const table = provider === 'aws' ? AWS_STATES : GCP_STATES;
  const key = provider === 'aws' ? state.trim().toLowerCase() : state.trim().toUpperCase();
  return Object.hasOwn(table, key) ? table[key] : 'failed';
}
