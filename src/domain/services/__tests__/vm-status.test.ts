import { describe, it, expect } from 'vitest';
import { normalizeVmStatus } from '../vm-status.js';

describe('normalizeVmStatus', () => {
  it('maps EC2 states', () => {
    expect(normalizeVmStatus('aws', 'pending')).toBe('creating');
    expect(normalizeVmStatus('aws', 'running')).toBe('running');
    expect(normalizeVmStatus('aws', 'stopping')).toBe('stopped');
    expect(normalizeVmStatus('aws', 'shutting-down')).toBe('terminated');
    expect(normalizeVmStatus('aws', 'RUNNING')).toBe('running');
  });

  it('maps GCE states', () => {
    expect(normalizeVmStatus('gcp', 'STAGING')).toBe('creating');
    expect(normalizeVmStatus('gcp', 'running')).toBe('running');
    expect(normalizeVmStatus('gcp', 'TERMINATED')).toBe('stopped');
  });

  it('treats unknown or missing states as failed', () => {
    expect(normalizeVmStatus('aws', 'rebooting')).toBe('failed');
    expect(normalizeVmStatus('gcp', null)).toBe('failed');
    expect(normalizeVmStatus('aws', 'constructor')).toBe('failed');
  });
});
