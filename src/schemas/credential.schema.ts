import { z } from 'zod';

export const awsCredentialsSchema = z.object({
  access_key: z.string().min(1),
  secret_key: z.string().min(1),
  region: z.string().min(1).default('us-east-1'),
});

export const gcpCredentialsSchema = z.object({
  project_id: z.string().min(1),
  private_key_id: z.string().min(1),
  private_key: z.string().min(1),
  client_email: z.string().email(),
  client_id: z.string().min(1),
  auth_uri: z.string().url().default('https://accounts.google.com/o/oauth2/auth'),
  token_uri: z.string().url().default('https://oauth2.googleapis.com/token'),
});

const credentialNameSchema = z.string().min(1).max(100);

export const createCredentialSchema = z.discriminatedUnion('provider', [
  z.object({
    name: credentialNameSchema,
    provider: z.literal('aws'),
    credentials: awsCredentialsSchema,
  }),
  z.object({
    name: credentialNameSchema,
    provider: z.literal('gcp'),
    credentials: gcpCredentialsSchema,
  }),
]);

export const updateCredentialSchema = z.object({
  name: credentialNameSchema.optional(),
  credentials: z.record(z.unknown()).optional(),
});

export type CreateCredentialInput = z.input<typeof createCredentialSchema>;
export type UpdateCredentialInput = z.infer<typeof updateCredentialSchema>;
