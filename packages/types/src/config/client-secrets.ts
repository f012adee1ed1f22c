import { z } from 'zod';

const ClientSecretsEntrySchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  auth_uri: z.string().url().optional(),
  token_uri: z.string().url().optional(),
  redirect_uris: z.array(z.string()).optional(),
});

/**
 * The `credentials.json` file Google Cloud Console hands out.
 * Desktop clients nest their fields under `installed`, web clients under `web`.
 */
export const ClientSecretsFileSchema = z
  .object({
    installed: ClientSecretsEntrySchema.optional(),
    web: ClientSecretsEntrySchema.optional(),
  })
  .refine((file) => file.installed !== undefined || file.web !== undefined, {
    message: 'Expected an "installed" or "web" client entry',
  });

export type ClientSecretsEntry = z.infer<typeof ClientSecretsEntrySchema>;
export type ClientSecretsFile = z.infer<typeof ClientSecretsFileSchema>;
