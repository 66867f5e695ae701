import { createSign } from 'crypto';
import { z } from 'zod';
import { NotFoundError, ProviderApiError } from '../../../lib/errors.js';
import { gcpCredentialsSchema } from '../../../schemas/credential.schema.js';
import { computeRegistry } from '../../../domain/registry/compute.registry.js';
import type { GcpCredentials } from '../../../domain/entities/credential.entity.js';
import type {
  IComputeAdapter,
  InstanceDescription,
  InstanceLocator,
  VerifyResult,
} from '../../../domain/ports/compute.port.js';

const COMPUTE_API = 'https://compute.googleapis.com/compute/v1';
const COMPUTE_SCOPE = 'https://www.googleapis.com/auth/compute';

type Fetch = typeof fetch;

const tokenResponseSchema = z.object({
  access_token: z.string(),
  expires_in: z.number(),
});

const instanceSchema = z.object({
  name: z.string(),
  status: z.string(),
  networkInterfaces: z
    .array(
      z.object({
        networkIP: z.string().optional(),
        accessConfigs: z.array(z.object({ natIP: z.string().optional() })).optional(),
      })
    )
    .optional(),
});

function base64UrlEncode(data: string | Buffer): string {
  return Buffer.from(data).toString('base64url');
}

/**
 * Compute Engine REST client authenticated with a service-account JWT.
 */
export class ComputeEngineAdapter implements IComputeAdapter {
  readonly provider = 'gcp' as const;

  private accessToken: string | null = null;
  private tokenExpiry: Date | null = null;

  constructor(
    private readonly credentials: GcpCredentials,
    private readonly fetchFn: Fetch = fetch
  ) {}

  async verify(): Promise<VerifyResult> {
    try {
      await this.computeRequest('GET', `/projects/${this.credentials.project_id}`);
      return { success: true, account: this.credentials.client_email };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { success: false, error: message };
    }
  }

  async describeInstance(locator: InstanceLocator): Promise<InstanceDescription> {
    const body = await this.computeRequest('GET', this.instancePath(locator));
    const parsed = instanceSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderApiError('GCP', `Unexpected instance payload for ${locator.instanceId}`);
    }

    const nic = parsed.data.networkInterfaces?.[0];
    return {
      instanceId: parsed.data.name,
      state: parsed.data.status,
      publicIp: nic?.accessConfigs?.[0]?.natIP ?? null,
      privateIp: nic?.networkIP ?? null,
    };
  }

  async startInstance(locator: InstanceLocator): Promise<void> {
    await this.computeRequest('POST', `${this.instancePath(locator)}/start`);
  }

  async stopInstance(locator: InstanceLocator): Promise<void> {
    await this.computeRequest('POST', `${this.instancePath(locator)}/stop`);
  }

  async terminateInstance(locator: InstanceLocator): Promise<void> {
    await this.computeRequest('DELETE', this.instancePath(locator));
  }

  private instancePath(locator: InstanceLocator): string {
    const zone = locator.zone ?? `${locator.region}-a`;
    return `/projects/${this.credentials.project_id}/zones/${zone}/instances/${locator.instanceId}`;
  }

  private async computeRequest(method: 'GET' | 'POST' | 'DELETE', path: string): Promise<unknown> {
    const token = await this.getAccessToken();
    const response = await this.fetchFn(`${COMPUTE_API}${path}`, {
      method,
      headers: { Authorization: `Bearer ${token}` },
    });

    if (response.status === 404) {
      throw new NotFoundError('GCP resource', path);
    }
    if (!response.ok) {
      const text = await response.text();
      throw new ProviderApiError('GCP', `${response.status} ${text.slice(0, 500)}`, response.status);
    }
    return response.json();
  }

  private async getAccessToken(): Promise<string> {
    if (this.accessToken && this.tokenExpiry && new Date() < this.tokenExpiry) {
      return this.accessToken;
    }

    const now = Math.floor(Date.now() / 1000);
    const jwt = this.createJwt(
      { alg: 'RS256', typ: 'JWT', kid: this.credentials.private_key_id },
      {
        iss: this.credentials.client_email,
        sub: this.credentials.client_email,
        aud: this.credentials.token_uri,
        iat: now,
        exp: now + 3600,
        scope: COMPUTE_SCOPE,
      }
    );

    // Exchange JWT for access token
    const response = await this.fetchFn(this.credentials.token_uri, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        grant_type: 'urn:ietf:params:oauth:grant-type:jwt-bearer',
        assertion: jwt,
      }),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new ProviderApiError('GCP', `Token exchange failed: ${response.status} ${text.slice(0, 500)}`, response.status);
    }

    const parsed = tokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderApiError('GCP', 'Token exchange returned an unexpected payload');
    }
    this.accessToken = parsed.data.access_token;
    this.tokenExpiry = new Date(Date.now() + (parsed.data.expires_in - 60) * 1000);

    return parsed.data.access_token;
  }

  private createJwt(header: Record<string, string>, payload: Record<string, unknown>): string {
    const unsignedToken = `${base64UrlEncode(JSON.stringify(header))}.${base64UrlEncode(JSON.stringify(payload))}`;
    const signer = createSign('RSA-SHA256');
    signer.update(unsignedToken);
    const signature = signer.sign(this.credentials.private_key.replace(/\\n/g, '\n'));
    return `${unsignedToken}.${base64UrlEncode(signature)}`;
  }
}

// Self-register with compute registry
computeRegistry.register({
  metadata: {
    provider: 'gcp',
    displayName: 'Google Compute Engine',
    credentialsSchema: gcpCredentialsSchema,
  },
  factory: (credentials) => new ComputeEngineAdapter(gcpCredentialsSchema.parse(credentials)),
});
