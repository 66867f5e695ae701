import { createHash, createHmac } from 'crypto';
import { NotFoundError, ProviderApiError } from '../../../lib/errors.js';
import { awsCredentialsSchema } from '../../../schemas/credential.schema.js';
import { computeRegistry } from '../../../domain/registry/compute.registry.js';
import type { AwsCredentials } from '../../../domain/entities/credential.entity.js';
import type {
  IComputeAdapter,
  InstanceDescription,
  InstanceLocator,
  VerifyResult,
} from '../../../domain/ports/compute.port.js';

const EC2_API_VERSION = '2016-11-15';

type Fetch = typeof fetch;

function xmlValue(xml: string, tag: string): string | null {
  const match = new RegExp(`<${tag}>([^<]*)</${tag}>`).exec(xml);
  return match ? match[1] : null;
}

/**
 * EC2 Query API client, signed with AWS Signature Version 4.
 */
export class Ec2Adapter implements IComputeAdapter {
  readonly provider = 'aws' as const;

  constructor(
    private readonly credentials: AwsCredentials,
    private readonly fetchFn: Fetch = fetch,
    private readonly now: () => Date = () => new Date()
  ) {}

  async verify(): Promise<VerifyResult> {
    try {
      await this.ec2Request('DescribeRegions', {}, this.credentials.region);
      return { success: true, account: `AWS (${this.credentials.region})` };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { success: false, error: message };
    }
  }

  async describeInstance(locator: InstanceLocator): Promise<InstanceDescription> {
    const xml = await this.ec2Request('DescribeInstances', { 'InstanceId.1': locator.instanceId }, locator.region);

    const item = /<instancesSet>\s*<item>([\s\S]*?)<\/item>\s*<\/instancesSet>/.exec(xml);
    const instanceXml = item ? item[1] : '';
    const instanceId = xmlValue(instanceXml, 'instanceId');
    if (!instanceId) {
      throw new NotFoundError('Instance', locator.instanceId);
    }

    const stateBlock = /<instanceState>([\s\S]*?)<\/instanceState>/.exec(instanceXml);
    return {
      instanceId,
      state: (stateBlock && xmlValue(stateBlock[1], 'name')) ?? 'unknown',
      publicIp: xmlValue(instanceXml, 'ipAddress'),
      privateIp: xmlValue(instanceXml, 'privateIpAddress'),
    };
  }

  async startInstance(locator: InstanceLocator): Promise<void> {
    await this.ec2Request('StartInstances', { 'InstanceId.1': locator.instanceId }, locator.region);
  }

  async stopInstance(locator: InstanceLocator): Promise<void> {
    await this.ec2Request('StopInstances', { 'InstanceId.1': locator.instanceId }, locator.region);
  }

  async terminateInstance(locator: InstanceLocator): Promise<void> {
    await this.ec2Request('TerminateInstances', { 'InstanceId.1': locator.instanceId }, locator.region);
  }

  private async ec2Request(action: string, params: Record<string, string>, region: string): Promise<string> {
    const host = `ec2.${region}.amazonaws.com`;
    const body = new URLSearchParams({ Action: action, Version: EC2_API_VERSION, ...params }).toString();

    const headers = this.signRequest({
      method: 'POST',
      host,
      path: '/',
      service: 'ec2',
      region,
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded; charset=utf-8',
      },
      body,
      date: this.now(),
    });

    const response = await this.fetchFn(`https://${host}/`, {
      method: 'POST',
      headers,
      body,
    });

    const text = await response.text();
    if (!response.ok) {
      const message = xmlValue(text, 'Message') ?? text.slice(0, 500);
      const code = xmlValue(text, 'Code');
      throw new ProviderApiError('AWS', code ? `${code}: ${message}` : message, response.status);
    }
    return text;
  }

  signRequest(opts: {
    method: string;
    host: string;
    path: string;
    service: string;
    region: string;
    headers: Record<string, string>;
    body: string;
    date: Date;
  }): Record<string, string> {
    const amzDate = opts.date.toISOString().replace(/[:-]|\.\d{3}/g, '');
    const dateStamp = amzDate.substring(0, 8);

    const headers: Record<string, string> = {
      ...opts.headers,
      Host: opts.host,
      'X-Amz-Date': amzDate,
    };

    const signedHeaders = Object.keys(headers)
      .map((k) => k.toLowerCase())
      .sort()
      .join(';');

    const canonicalHeaders = Object.entries(headers)
      .map(([k, v]) => `${k.toLowerCase()}:${v.trim()}`)
      .sort()
      .join('\n');

    const canonicalRequest = [
      opts.method,
      opts.path,
      '', // query string
      canonicalHeaders + '\n',
      signedHeaders,
      sha256Hex(opts.body),
    ].join('\n');

    const algorithm = 'AWS4-HMAC-SHA256';
    const credentialScope = `${dateStamp}/${opts.region}/${opts.service}/aws4_request`;
    const stringToSign = [algorithm, amzDate, credentialScope, sha256Hex(canonicalRequest)].join('\n');

    const kDate = hmac(`AWS4${this.credentials.secret_key}`, dateStamp);
    const kRegion = hmac(kDate, opts.region);
    const kService = hmac(kRegion, opts.service);
    const kSigning = hmac(kService, 'aws4_request');
    const signature = createHmac('sha256', kSigning).update(stringToSign).digest('hex');

    headers['Authorization'] = [
      `${algorithm} Credential=${this.credentials.access_key}/${credentialScope}`,
      `SignedHeaders=${signedHeaders}`,
      `Signature=${signature}`,
    ].join(', ');

    return headers;
  }
}

function sha256Hex(data: string): string {
  return createHash('sha256').update(data).digest('hex');
}

function hmac(key: string | Buffer, data: string): Buffer {
  return createHmac('sha256', key).update(data).digest();
}

// Self-register with compute registry
computeRegistry.register({
  metadata: {
    provider: 'aws',
    displayName: 'AWS EC2',
    credentialsSchema: awsCredentialsSchema,
  },
  factory: (credentials) => new Ec2Adapter(awsCredentialsSchema.parse(credentials)),
});
