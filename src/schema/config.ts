import { z } from 'zod';

/**
 * Config schema - HTTP listener settings and the webhook credentials
 */

// Sizes the bytes package behind body-parser accepts, e.g. "1024", "512b", "32kb", "1.5mb"
const BODY_LIMIT = /^\d+(?:\.\d+)? *(?:b|kb|mb|gb)?$/i;

export const ServerSettingsSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(8000).describe('Port to listen on'),
  host: z.string().min(1).default('127.0.0.1').describe('Address to bind'),
  bodyLimit: z.coerce.string()
    .regex(BODY_LIMIT, 'Expected a size such as 32kb')
    .default('32kb')
    .describe('Maximum raw body size, in body-parser notation'),
  rateLimitPerMinute: z.coerce.number().int().min(0).default(60).describe('Webhook requests per IP per minute (0 disables)'),
  trustProxy: z.coerce.number().int().min(0).default(0).describe('Number of reverse proxy hops to trust'),
});

export const WebhookSettingsSchema = z.object({
  secret: z.string({ required_error: 'WEBHOOK_SECRET is not set' }).min(1, 'WEBHOOK_SECRET is empty'),
  scriptPath: z.string({ required_error: 'WEBHOOK_SCRIPT is not set' }).min(1, 'WEBHOOK_SCRIPT is empty'),
  interpreter: z.string().min(1).optional().describe('Program used to run the script, e.g. "bash"'),
});

export const ConfigFileSchema = z.object({
  server: z.record(z.unknown()).default({}),
  webhook: z.record(z.unknown()).default({}),
}).default({});

export type ServerSettings = z.infer<typeof ServerSettingsSchema>;
export type WebhookSettings = z.infer<typeof WebhookSettingsSchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;
