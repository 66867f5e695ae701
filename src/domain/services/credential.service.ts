import type { Logger } from 'pino';
import { ConflictError, ForbiddenError, NotFoundError, ValidationError } from '../../lib/errors.js';
import { createComponentLogger } from '../../lib/logger.js';
import {
  awsCredentialsSchema,
  createCredentialSchema,
  gcpCredentialsSchema,
  updateCredentialSchema,
} from '../../schemas/credential.schema.js';
import type { CredentialRepository } from '../../adapters/db/repositories/credential.repository.js';
import type { VmRepository } from '../../adapters/db/repositories/vm.repository.js';
import type { SecretStore } from '../../adapters/secrets/secret-store.js';
import type { Credential, CredentialSummary } from '../entities/credential.entity.js';
import type { CloudProvider } from '../entities/vm.entity.js';
import { canAccess, type Viewer } from '../entities/viewer.entity.js';
import type { ComputeAdapterFactory, VerifyResult } from '../ports/compute.port.js';
import type { OperationTracker } from './operation-tracker.js';

export interface CredentialServiceDeps {
  credentials: CredentialRepository;
  vms: VmRepository;
  secrets: SecretStore;
  tracker: OperationTracker;
  compute: ComputeAdapterFactory;
  log?: Logger;
}

export function toSummary(credential: Credential): CredentialSummary {
  const { encryptedData: _encryptedData, ...summary } = credential;
  return summary;
}

function parseProviderCredentials(provider: CloudProvider, raw: unknown): Record<string, string> {
  const schema = provider === 'aws' ? awsCredentialsSchema : gcpCredentialsSchema;
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw ValidationError.fromZod(parsed.error, `${provider.toUpperCase()} credentials`);
  }
  return parsed.data;
}

export class CredentialService {
  private readonly log: Logger;

  constructor(private readonly deps: CredentialServiceDeps) {
    this.log = deps.log ?? createComponentLogger('credential');
  }

  async createCredential(viewer: Viewer, input: unknown): Promise<CredentialSummary> {
    const parsed = createCredentialSchema.safeParse(input);
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, 'credential');
    }
    const { name, provider, credentials } = parsed.data;

    return this.deps.tracker.track(
      {
        eventType: 'credential_create',
        params: { userId: viewer.userId, name, provider, credentials },
        excludeParams: ['credentials'],
        userId: (p) => p.userId,
      },
      (ctx) => {
        const created = this.deps.credentials.create({
          name,
          provider,
          encryptedData: this.deps.secrets.encryptObject(credentials),
          userId: viewer.userId,
        });
        ctx.link({ credentialId: created.id });
        this.log.info({ credentialId: created.id, provider }, 'Credential created');
        return toSummary(created);
      }
    );
  }

  listCredentials(viewer: Viewer): CredentialSummary[] {
    return this.deps.credentials.findAll(viewer.isAdmin ? undefined : viewer.userId).map(toSummary);
  }

  getCredential(viewer: Viewer, id: number): CredentialSummary {
    return toSummary(this.requireAccessible(viewer, id));
  }

  async updateCredential(viewer: Viewer, id: number, input: unknown): Promise<CredentialSummary> {
    const parsed = updateCredentialSchema.safeParse(input);
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, 'credential update');
    }
    const existing = this.requireAccessible(viewer, id);
    const replacement = parsed.data.credentials
      ? parseProviderCredentials(existing.provider, parsed.data.credentials)
      : undefined;

    return this.deps.tracker.track(
      {
        eventType: 'credential_update',
        params: { userId: viewer.userId, credentialId: id, name: parsed.data.name, credentials: replacement },
        excludeParams: ['credentials'],
        userId: (p) => p.userId,
        credentialId: (p) => p.credentialId,
      },
      () => {
        const updated = this.deps.credentials.update(id, {
          name: parsed.data.name,
          encryptedData: replacement ? this.deps.secrets.encryptObject(replacement) : undefined,
        });
        return toSummary(updated);
      }
    );
  }

  async deleteCredential(viewer: Viewer, id: number): Promise<{ deleted: true; credentialId: number }> {
    this.requireAccessible(viewer, id);

    return this.deps.tracker.track(
      {
        eventType: 'credential_delete',
        params: { userId: viewer.userId, credentialId: id },
        userId: (p) => p.userId,
        credentialId: (p) => p.credentialId,
      },
      () => {
        const inUse = this.deps.vms.countByCredential(id);
        if (inUse > 0) {
          throw new ConflictError(`Credential ${id} is used by ${inUse} VM(s)`, { credentialId: id, vms: inUse });
        }
        this.deps.credentials.delete(id);
        this.log.info({ credentialId: id }, 'Credential deleted');
        return { deleted: true as const, credentialId: id };
      }
    );
  }

  async validateCredential(viewer: Viewer, id: number): Promise<VerifyResult> {
    const credential = this.requireAccessible(viewer, id);
    const decrypted = this.decrypt(credential);

    return this.deps.tracker.track(
      {
        eventType: 'credential_validate',
        params: { userId: viewer.userId, credentialId: id, provider: credential.provider },
        userId: (p) => p.userId,
        credentialId: (p) => p.credentialId,
      },
      () => this.deps.compute(credential.provider, decrypted).verify()
    );
  }

  /**
   * Load a credential the viewer may use.
   */
  requireAccessible(viewer: Viewer, id: number): Credential {
    const credential = this.deps.credentials.findById(id);
    if (!credential) {
      throw new NotFoundError('Credential', id);
    }
    if (!canAccess(viewer, credential.userId)) {
      throw new ForbiddenError(`Credential ${id} belongs to another user`);
    }
    return credential;
  }

  decrypt(credential: Credential): Record<string, string> {
    return this.deps.secrets.decryptObject(credential.encryptedData);
  }
}
