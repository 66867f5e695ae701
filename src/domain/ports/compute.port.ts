import type { CloudProvider } from '../entities/vm.entity.js';

export interface InstanceLocator {
  instanceId: string;
  region: string;
  /** GCE zone; defaults to `<region>-a` */
  zone?: string | null;
}

export interface InstanceDescription {
  instanceId: string;
  /** Provider vocabulary, e.g. `running` (EC2) or `RUNNING` (GCE) */
  state: string;
  publicIp: string | null;
  privateIp: string | null;
}

export interface VerifyResult {
  success: boolean;
  error?: string;
  account?: string;
}

/**
 * Direct cloud API access for status refresh and power operations.
 * Provisioning itself goes through the orchestrator, not this port.
 */
export interface IComputeAdapter {
  readonly provider: CloudProvider;

  verify(): Promise<VerifyResult>;
  describeInstance(locator: InstanceLocator): Promise<InstanceDescription>;
  startInstance(locator: InstanceLocator): Promise<void>;
  stopInstance(locator: InstanceLocator): Promise<void>;
  terminateInstance(locator: InstanceLocator): Promise<void>;
}

export type ComputeAdapterFactory = (provider: CloudProvider, credentials: Record<string, string>) => IComputeAdapter;
