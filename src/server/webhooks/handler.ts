import { Request, Response } from 'express';
import { WebhookSettings } from '../../schema/index.js';
import { ActionLauncher } from '../action-launcher.js';
import { extractSignatureHeader, SIGNATURE_HEADER } from './signature-header.js';
import { verifySignature } from './verify-signature.js';

export interface WebhookHandlerOptions {
  /** null when the secret or script path is missing */
  webhook: WebhookSettings | null;
  /** Why webhook is null, for the logs */
  configErrors?: string[];
  launcher: ActionLauncher;
}

function singleHeader(req: Request, name: string): string | undefined {
  const value = req.get(name);
  return value ? value : undefined;
}

/**
 * POST handler: configuration gate, signature header, HMAC check, then launch.
 *
 * Every verification failure gets the same 401 body so callers cannot tell
 * which step rejected them. The specific reason only goes to the log.
 */
export function createWebhookHandler(options: WebhookHandlerOptions) {
  const { webhook, launcher } = options;
  const configErrors = options.configErrors ?? [];

  return async (req: Request, res: Response): Promise<void> => {
    if (!webhook) {
      console.error(`[webhook-runner] Webhook settings unavailable: ${configErrors.join('; ') || 'not configured'}`);
      res.status(500).json({ error: 'Server configuration error' });
      return;
    }

    const signatureHeader = extractSignatureHeader(req.headers);
    if (signatureHeader === null) {
      console.warn(`[webhook-runner] Rejected request without ${SIGNATURE_HEADER} header`);
      res.status(400).json({ error: `Missing ${SIGNATURE_HEADER} header` });
      return;
    }

    // express.raw leaves {} when the request carried no body
    const payload = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
    const deliveryId = singleHeader(req, 'X-GitHub-Delivery');
    const event = singleHeader(req, 'X-GitHub-Event');

    const result = verifySignature(webhook.secret, payload, signatureHeader);
    if (!result.valid) {
      console.warn(`[webhook-runner] Signature rejected (${result.error.code}): ${result.error.message}`, {
        deliveryId,
      });
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }

    try {
      const action = await launcher.launch({
        scriptPath: webhook.scriptPath,
        interpreter: webhook.interpreter,
        event,
        deliveryId,
      });
      console.log(`[webhook-runner] Launched ${webhook.scriptPath} (pid ${action.pid ?? 'unknown'})`, { event, deliveryId });

      void action.exited.then(code => {
        const log = code === 0 ? console.log : console.warn;
        log(`[webhook-runner] Action ${webhook.scriptPath} exited with code ${code ?? 'null'}`, { deliveryId });
      });

      res.status(200).json({ received: true });
    } catch (error) {
      console.error('[webhook-runner] Failed to launch action:', error);
      res.status(500).json({ error: 'Failed to launch action' });
    }
  };
}
