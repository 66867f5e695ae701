import type { CloudProvider } from './vm.entity.js';

export interface Credential {
  id: number;
  name: string;
  provider: CloudProvider;
  encryptedData: string;
  userId: string;
  createdAt: Date;
  updatedAt: Date;
}

/** Credential without its ciphertext, safe to return to callers */
export type CredentialSummary = Omit<Credential, 'encryptedData'>;

export interface CreateCredentialRecordInput {
  name: string;
  provider: CloudProvider;
  encryptedData: string;
  userId: string;
}

export interface UpdateCredentialRecordInput {
  name?: string;
  encryptedData?: string;
}

export interface AwsCredentials {
  access_key: string;
  secret_key: string;
  region: string;
}

export interface GcpCredentials {
  project_id: string;
  private_key_id: string;
  private_key: string;
  client_email: string;
  client_id: string;
  auth_uri: string;
  token_uri: string;
}
