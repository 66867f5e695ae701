import { z } from 'zod';
import { ValidationError } from '../../lib/errors.js';
import type { CloudProvider } from '../entities/vm.entity.js';
import type { IComputeAdapter } from '../ports/compute.port.js';

export interface ComputeProviderMetadata {
  provider: CloudProvider;
  displayName: string;
  credentialsSchema: z.ZodTypeAny;
}

export interface RegisteredComputeProvider {
  metadata: ComputeProviderMetadata;
  factory: (credentials: unknown) => IComputeAdapter;
}

/**
 * Registry of compute adapters, one per cloud provider.
 * Adapters self-register at module load time.
 */
export class ComputeRegistry {
  private providers = new Map<CloudProvider, RegisteredComputeProvider>();

  register(provider: RegisteredComputeProvider): void {
    this.providers.set(provider.metadata.provider, provider);
  }

  names(): CloudProvider[] {
    return [...this.providers.keys()];
  }

  /**
   * Create an adapter instance for a provider
   */
  createAdapter(provider: CloudProvider, creds: unknown): IComputeAdapter {
    const registered = this.providers.get(provider);
    if (!registered) {
      throw new ValidationError(`Unknown provider: ${provider}. Available providers: ${this.names().join(', ')}`);
    }
    const parsed = registered.metadata.credentialsSchema.safeParse(creds);
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, `${registered.metadata.displayName} credentials`);
    }
    return registered.factory(parsed.data);
  }
}

export const computeRegistry = new ComputeRegistry();
