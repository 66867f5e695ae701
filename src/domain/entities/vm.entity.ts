export type CloudProvider = 'aws' | 'gcp';

export type VmStatus = 'creating' | 'running' | 'stopped' | 'terminated' | 'failed';

export interface Vm {
  id: number;
  name: string;
  provider: CloudProvider;
  status: VmStatus;
  instanceId: string | null;
  instanceType: string;
  region: string;
  zone: string | null;
  publicIp: string | null;
  privateIp: string | null;
  credentialId: number;
  userId: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateVmRecordInput {
  name: string;
  provider: CloudProvider;
  instanceType: string;
  region: string;
  zone?: string | null;
  credentialId: number;
  userId: string;
  status?: VmStatus;
}

export interface UpdateVmRecordInput {
  status?: VmStatus;
  instanceId?: string | null;
  publicIp?: string | null;
  privateIp?: string | null;
}
