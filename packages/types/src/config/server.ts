import { z } from 'zod';

/**
 * HTTP server hosting the OAuth callback and the JSON API
 */
export const ServerConfigSchema = z.object({
  host: z.string().default('0.0.0.0'),
  port: z.number().int().min(1).max(65535).default(7860),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
