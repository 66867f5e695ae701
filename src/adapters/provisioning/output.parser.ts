import type { CloudProvider } from '../../domain/entities/vm.entity.js';

export interface ParsedApplyOutput {
  createdResources: string[];
  outputs: Record<string, string>;
  instanceId: string | null;
  publicIp: string | null;
  privateIp: string | null;
  /** Provider-reported instance state, when an output carries one */
  instanceState: string | null;
}

export interface ParsedDestroyOutput {
  destroyedResources: string[];
}

// eslint-disable-next-line no-control-regex
const ANSI_ESCAPE = /\u001b\[[0-9;]*[A-Za-z]/g;
const RESOURCE_ADDRESS = String.raw`([\w.\-\[\]"]+)`;
const CREATION_COMPLETE = new RegExp(String.raw`${RESOURCE_ADDRESS}:\s+Creation complete(?:[^\n\[]*\[id=([^\]\n]+)\])?`, 'g');
const DESTRUCTION_COMPLETE = new RegExp(String.raw`${RESOURCE_ADDRESS}:\s+Destruction complete`, 'g');
const OUTPUT_LINE = /^\s*([A-Za-z_][\w-]*)\s*=\s*(.*)$/;
const IPV4 = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

const INSTANCE_ID_KEYS = ['instance_id', 'id'];
const STATE_KEYS = ['instance_state', 'status', 'state'];
export const PUBLIC_IP_KEYS = ['public_ip', 'external_ip', 'nat_ip', 'instance_public_ip'];
export const PRIVATE_IP_KEYS = ['private_ip', 'internal_ip', 'network_ip', 'instance_private_ip'];

const INSTANCE_ID_SHAPES: Record<CloudProvider, RegExp> = {
  aws: /^i-[0-9a-f]+$/,
  gcp: /^[a-z0-9]([-a-z0-9]{0,61}[a-z0-9])?$/,
};

const INSTANCE_RESOURCE_TYPES: Record<CloudProvider, string> = {
  aws: 'aws_instance',
  gcp: 'google_compute_instance',
};

export function stripAnsi(text: string): string {
  return text.replace(ANSI_ESCAPE, '');
}

function unique(items: string[]): string[] {
  return [...new Set(items)];
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1);
  }
  return value;
}

function bracketDelta(text: string): number {
  let delta = 0;
  let inString = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '"' && text[i - 1] !== '\\') inString = !inString;
    if (inString) continue;
    if (ch === '[' || ch === '{' || ch === '(') delta++;
    if (ch === ']' || ch === '}' || ch === ')') delta--;
  }
  return delta;
}

export function isIpv4(value: string): boolean {
  const match = IPV4.exec(value);
  return match !== null && match.slice(1).every((octet) => Number(octet) <= 255);
}

/**
 * Key/value pairs from the last `Outputs:` block. Values stay opaque strings;
 * values spanning several lines (lists, maps) are joined with newlines.
 */
export function parseOutputs(stdout: string): Record<string, string> {
  const lines = stripAnsi(stdout).split(/\r?\n/);
  let start = -1;
  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i].trim() === 'Outputs:') {
      start = i + 1;
      break;
    }
  }
  if (start < 0) {
    return {};
  }

  while (start < lines.length && lines[start].trim() === '') {
    start++;
  }

  const outputs: Record<string, string> = {};
  let currentKey: string | null = null;
  let depth = 0;

  for (let i = start; i < lines.length; i++) {
    const line = lines[i];
    if (line.trim() === '' && depth === 0) break;

    const match = depth === 0 ? OUTPUT_LINE.exec(line) : null;
    if (match) {
      currentKey = match[1];
      const raw = match[2].trim();
      outputs[currentKey] = unquote(raw);
      depth = Math.max(0, bracketDelta(raw));
    } else if (currentKey !== null) {
      outputs[currentKey] = `${outputs[currentKey]}\n${line.trim()}`;
      depth = Math.max(0, depth + bracketDelta(line));
    }
  }

  return outputs;
}

export function parseCreatedResources(stdout: string): string[] {
  return unique([...stripAnsi(stdout).matchAll(CREATION_COMPLETE)].map((match) => match[1]));
}

export function parseDestroyedResources(stdout: string): string[] {
  return unique([...stripAnsi(stdout).matchAll(DESTRUCTION_COMPLETE)].map((match) => match[1]));
}

function matchesInstanceShape(value: string, provider?: CloudProvider): boolean {
  if (provider) {
    return INSTANCE_ID_SHAPES[provider].test(value);
  }
  return INSTANCE_ID_SHAPES.aws.test(value) || INSTANCE_ID_SHAPES.gcp.test(value);
}

function instanceIdFromCreation(stdout: string, provider?: CloudProvider): string | null {
  const providers: CloudProvider[] = provider ? [provider] : ['aws', 'gcp'];
  for (const match of stripAnsi(stdout).matchAll(CREATION_COMPLETE)) {
    const [, address, id] = match;
    if (!id) continue;
    for (const candidate of providers) {
      if (!address.split('.').includes(INSTANCE_RESOURCE_TYPES[candidate])) continue;
      // GCE reports projects/<p>/zones/<z>/instances/<name>
      const value = id.split('/').pop() ?? id;
      if (INSTANCE_ID_SHAPES[candidate].test(value)) {
        return value;
      }
    }
  }
  return null;
}

export function parseInstanceId(
  stdout: string,
  outputs: Record<string, string> = parseOutputs(stdout),
  provider?: CloudProvider
): string | null {
  for (const key of INSTANCE_ID_KEYS) {
    const value = outputs[key];
    if (value !== undefined && matchesInstanceShape(value, provider)) {
      return value;
    }
  }

  if (provider !== 'gcp') {
    const loose = /instance_id\s*=\s*"?(i-[0-9a-f]+)/.exec(stripAnsi(stdout));
    if (loose) {
      return loose[1];
    }
  }

  return instanceIdFromCreation(stdout, provider);
}

function findIp(stdout: string, outputs: Record<string, string>, keys: string[]): string | null {
  for (const key of keys) {
    const value = outputs[key];
    if (value !== undefined && isIpv4(value)) {
      return value;
    }
  }

  const text = stripAnsi(stdout);
  for (const key of keys) {
    const match = new RegExp(String.raw`\b${key}\s*=\s*"?(\d{1,3}(?:\.\d{1,3}){3})\b`).exec(text);
    if (match && isIpv4(match[1])) {
      return match[1];
    }
  }
  return null;
}

/**
 * Best-effort extraction of facts from `terraform apply` output. Missing
 * tokens yield null fields; malformed output never throws.
 */
export function parseApplyOutput(stdout: string, provider?: CloudProvider): ParsedApplyOutput {
  const outputs = parseOutputs(stdout);
  const stateKey = STATE_KEYS.find((key) => outputs[key] !== undefined);

  return {
    createdResources: parseCreatedResources(stdout),
    outputs,
    instanceId: parseInstanceId(stdout, outputs, provider),
    publicIp: findIp(stdout, outputs, PUBLIC_IP_KEYS),
    privateIp: findIp(stdout, outputs, PRIVATE_IP_KEYS),
    instanceState: stateKey ? outputs[stateKey] : null,
  };
}

export function parseDestroyOutput(stdout: string): ParsedDestroyOutput {
  return { destroyedResources: parseDestroyedResources(stdout) };
}
