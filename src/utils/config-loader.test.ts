import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig } from './config-loader.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'webhook-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('applies defaults when only the webhook variables are set', async () => {
    const result = await loadConfig({
      env: { WEBHOOK_SECRET: 'test-secret', WEBHOOK_SCRIPT: '/opt/hooks/deploy.sh' },
    });

    expect(result).toEqual({
      server: { port: 8000, host: '127.0.0.1', bodyLimit: '32kb', rateLimitPerMinute: 60, trustProxy: 0 },
      webhook: { secret: 'test-secret', scriptPath: '/opt/hooks/deploy.sh' },
      errors: [],
    });
  });

  it('reports each missing webhook variable by name', async () => {
    const result = await loadConfig({ env: {} });

    expect(result.webhook).toBeNull();
    expect(result.errors).toEqual([
      'webhook.secret: WEBHOOK_SECRET is not set',
      'webhook.scriptPath: WEBHOOK_SCRIPT is not set',
    ]);
  });

  it('reports a missing script path on its own', async () => {
    const result = await loadConfig({ env: { WEBHOOK_SECRET: 'test-secret' } });

    expect(result.webhook).toBeNull();
    expect(result.errors).toEqual(['webhook.scriptPath: WEBHOOK_SCRIPT is not set']);
  });

  it('treats an empty secret as missing', async () => {
    const result = await loadConfig({ env: { WEBHOOK_SECRET: '', WEBHOOK_SCRIPT: '/opt/hooks/deploy.sh' } });

    expect(result.webhook).toBeNull();
    expect(result.errors).toEqual(['webhook.secret: WEBHOOK_SECRET is empty']);
  });

  it('coerces numeric settings from the environment', async () => {
    const result = await loadConfig({
      env: { PORT: '8080', HOST: '0.0.0.0', WEBHOOK_RATE_LIMIT: '0', WEBHOOK_TRUST_PROXY: '1', WEBHOOK_BODY_LIMIT: '64kb' },
    });

    expect(result.server).toEqual({ port: 8080, host: '0.0.0.0', bodyLimit: '64kb', rateLimitPerMinute: 0, trustProxy: 1 });
  });

  it('throws on a body limit that is not a size', async () => {
    await expect(loadConfig({ env: { WEBHOOK_BODY_LIMIT: 'lots' } })).rejects.toThrow(
      'Invalid server settings: server.bodyLimit: Expected a size such as 32kb'
    );
  });

  it('accepts a numeric body limit from the config file', async () => {
    const configFile = join(dir, 'limit.yaml');
    await writeFile(configFile, 'server:\n  bodyLimit: 1024\n');

    const result = await loadConfig({ configFile, env: {} });
    expect(result.server.bodyLimit).toBe('1024');
  });

  it('throws on an invalid port', async () => {
    await expect(loadConfig({ env: { PORT: 'eighty' } })).rejects.toThrow(/^Invalid server settings: server\.port:/);
  });

  it('reads a YAML file and lets the environment override it', async () => {
    const configFile = join(dir, 'webhook.yaml');
    await writeFile(configFile, [
      'server:',
      '  port: 9000',
      '  bodyLimit: 16kb',
      'webhook:',
      '  secret: file-secret',
      '  scriptPath: /srv/hook.sh',
      '  interpreter: bash',
      '',
    ].join('\n'));

    const result = await loadConfig({ configFile, env: { PORT: '9100', WEBHOOK_SECRET: 'env-secret' } });

    expect(result.server.port).toBe(9100);
    expect(result.server.bodyLimit).toBe('16kb');
    expect(result.webhook).toEqual({ secret: 'env-secret', scriptPath: '/srv/hook.sh', interpreter: 'bash' });
    expect(result.errors).toEqual([]);
  });

  it('accepts an empty config file', async () => {
    const configFile = join(dir, 'empty.yaml');
    await writeFile(configFile, '');

    const result = await loadConfig({ configFile, env: {} });
    expect(result.server.port).toBe(8000);
    expect(result.webhook).toBeNull();
  });

  it('fails when the config file cannot be read', async () => {
    await expect(loadConfig({ configFile: join(dir, 'nope.yaml'), env: {} })).rejects.toThrow(
      /^Failed to load config file: ENOENT/
    );
  });
});
