import { z } from 'zod';

export const cloudProviderSchema = z.enum(['aws', 'gcp']);
export const vmStatusSchema = z.enum(['creating', 'running', 'stopped', 'terminated', 'failed']);

export const createVmSchema = z.object({
  name: z
    .string()
    .min(1)
    .max(63)
    .regex(/^[a-z]([-a-z0-9]*[a-z0-9])?$/, 'Use lowercase letters, digits and hyphens, starting with a letter'),
  provider: cloudProviderSchema,
  instanceType: z.string().min(1),
  region: z.string().min(1),
  credentialId: z.number().int().positive(),
  zone: z.string().min(1).optional(),
  amiId: z.string().regex(/^ami-[0-9a-f]+$/).optional(),
  keyName: z.string().min(1).optional(),
  securityGroupIds: z.array(z.string().min(1)).optional(),
  image: z.string().min(1).optional(),
});

export type CreateVmInput = z.infer<typeof createVmSchema>;
