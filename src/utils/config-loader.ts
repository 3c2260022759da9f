import { readFile } from 'fs/promises';
import * as yaml from 'js-yaml';
import { ZodError } from 'zod';
import {
  ConfigFile,
  ConfigFileSchema,
  ServerSettings,
  ServerSettingsSchema,
  WebhookSettings,
  WebhookSettingsSchema,
} from '../schema/index.js';

export interface LoadConfigOptions {
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Optional YAML file; environment variables take precedence over it */
  configFile?: string;
}

export interface ConfigLoadResult {
  server: ServerSettings;
  /** null when the secret or script path could not be resolved */
  webhook: WebhookSettings | null;
  errors: string[];
}

const SERVER_ENV_VARS = {
  port: 'PORT',
  host: 'HOST',
  bodyLimit: 'WEBHOOK_BODY_LIMIT',
  rateLimitPerMinute: 'WEBHOOK_RATE_LIMIT',
  trustProxy: 'WEBHOOK_TRUST_PROXY',
} as const;

const WEBHOOK_ENV_VARS = {
  secret: 'WEBHOOK_SECRET',
  scriptPath: 'WEBHOOK_SCRIPT',
  interpreter: 'WEBHOOK_INTERPRETER',
} as const;

function readEnv(env: NodeJS.ProcessEnv, variables: Record<string, string>): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [setting, variable] of Object.entries(variables)) {
    const value = env[variable];
    if (value !== undefined) {
      values[setting] = value;
    }
  }
  return values;
}

function formatIssues(section: string, error: ZodError): string[] {
  return error.issues.map(issue => `${[section, ...issue.path].join('.')}: ${issue.message}`);
}

async function loadYamlFile<T>(filePath: string, schema: { parse: (data: unknown) => T }): Promise<T> {
  const content = await readFile(filePath, 'utf-8');
  const data = yaml.load(content);
  return schema.parse(data);
}

/**
 * Resolve settings from an optional YAML file and the environment.
 *
 * Broken server settings throw, since nothing can listen without them. Missing
 * webhook settings are returned as errors so the server can still come up and
 * report a configuration fault on each request.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ConfigLoadResult> {
  const env = options.env ?? process.env;
  const errors: string[] = [];

  let file: ConfigFile = { server: {}, webhook: {} };
  if (options.configFile) {
    try {
      file = await loadYamlFile(options.configFile, ConfigFileSchema);
    } catch (err) {
      throw new Error(`Failed to load config file: ${err instanceof Error ? err.message : err}`);
    }
  }

  const serverResult = ServerSettingsSchema.safeParse({ ...file.server, ...readEnv(env, SERVER_ENV_VARS) });
  if (!serverResult.success) {
    throw new Error(`Invalid server settings: ${formatIssues('server', serverResult.error).join('; ')}`);
  }

  const webhookResult = WebhookSettingsSchema.safeParse({ ...file.webhook, ...readEnv(env, WEBHOOK_ENV_VARS) });
  if (!webhookResult.success) {
    errors.push(...formatIssues('webhook', webhookResult.error));
  }

  return {
    server: serverResult.data,
    webhook: webhookResult.success ? webhookResult.data : null,
    errors,
  };
}
