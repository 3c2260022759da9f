#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { readFile } from 'fs/promises';
import type { Server } from 'http';
import { loadConfig } from '../utils/config-loader.js';
import { startServer } from '../server/http.js';
import { computeSignature, verifySignature } from '../server/webhooks/verify-signature.js';

interface ServeOptions {
  config?: string;
  port?: string;
  host?: string;
}

interface PayloadOptions {
  file?: string;
  secret?: string;
}

interface VerifyOptions extends PayloadOptions {
  signature: string;
}

const program = new Command();

program
  .name('webhook-runner')
  .description('Run a local action when a signed webhook arrives')
  .version('0.1.0');

async function readPayload(text: string | undefined, options: PayloadOptions): Promise<Buffer> {
  // Files are read as raw bytes so the signature matches what would be sent
  if (options.file) {
    return readFile(options.file);
  }
  if (text === undefined) {
    console.error(chalk.red('Error: No payload provided. Use argument or --file'));
    process.exit(1);
  }
  return Buffer.from(text, 'utf-8');
}

function resolveSecret(options: PayloadOptions): string {
  const secret = options.secret ?? process.env.WEBHOOK_SECRET ?? '';
  if (!secret) {
    console.error(chalk.red('Error: No secret provided. Use --secret or set WEBHOOK_SECRET'));
    process.exit(1);
  }
  return secret;
}

function closeOnSignal(server: Server): void {
  const shutdown = (signal: NodeJS.Signals): void => {
    console.log(chalk.dim(`Received ${signal}, shutting down`));
    server.close(error => {
      if (error) {
        console.error(chalk.red('Error while closing server:'), error.message);
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

/**
 * Serve command - start the webhook listener
 */
program
  .command('serve')
  .description('Start the webhook HTTP server')
  .option('-c, --config <path>', 'YAML config file (environment variables take precedence)')
  .option('-p, --port <port>', 'Port to listen on (overrides PORT)')
  .option('-H, --host <address>', 'Address to bind (overrides HOST)')
  .action(async (options: ServeOptions) => {
    try {
      const env = { ...process.env };
      if (options.port) env.PORT = options.port;
      if (options.host) env.HOST = options.host;

      const { server, webhook, errors } = await loadConfig({ env, configFile: options.config });

      if (errors.length > 0) {
        console.error(chalk.yellow('Webhook configuration incomplete:'), errors.join(', '));
      }

      const httpServer = await startServer({ server, webhook, configErrors: errors });
      closeOnSignal(httpServer);
    } catch (error) {
      console.error(chalk.red('Error:'), error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

/**
 * Sign command - print the signature header for a payload
 */
program
  .command('sign')
  .description('Print the X-Hub-Signature-256 value for a payload')
  .argument('[payload]', 'Payload text (or use --file)')
  .option('-f, --file <path>', 'Read payload from file')
  .option('-s, --secret <secret>', 'Shared secret (defaults to WEBHOOK_SECRET)')
  .action(async (text: string | undefined, options: PayloadOptions) => {
    try {
      const payload = await readPayload(text, options);
      console.log(computeSignature(resolveSecret(options), payload));
    } catch (error) {
      console.error(chalk.red('Error:'), error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

/**
 * Verify command - check a signature the way the server does
 */
program
  .command('verify')
  .description('Check an X-Hub-Signature-256 value against a payload')
  .argument('[payload]', 'Payload text (or use --file)')
  .requiredOption('--signature <value>', 'Signature header value, e.g. sha256=<hex>')
  .option('-f, --file <path>', 'Read payload from file')
  .option('-s, --secret <secret>', 'Shared secret (defaults to WEBHOOK_SECRET)')
  .action(async (text: string | undefined, options: VerifyOptions) => {
    try {
      const payload = await readPayload(text, options);
      const result = verifySignature(resolveSecret(options), payload, options.signature);

      if (result.valid) {
        console.log(`${chalk.green('✓')} Signature matches payload`);
        process.exit(0);
      }

      console.log(`${chalk.red('✗')} ${result.error.message} ${chalk.dim(`(${result.error.code})`)}`);
      process.exit(1);
    } catch (error) {
      console.error(chalk.red('Error:'), error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

await program.parseAsync();
