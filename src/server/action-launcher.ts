import { spawn } from 'child_process';
import { ActionLaunchError } from './webhooks/errors.js';

export interface ActionRequest {
  scriptPath: string;
  /** Run the script through this program instead of executing it directly */
  interpreter?: string;
  /** X-GitHub-Event of the triggering delivery */
  event?: string;
  /** X-GitHub-Delivery of the triggering delivery */
  deliveryId?: string;
}

export interface LaunchedAction {
  pid: number | undefined;
  /** Exit code once the action finishes (null when killed by a signal). Never rejects. */
  exited: Promise<number | null>;
}

export interface ActionLauncher {
  launch(request: ActionRequest): Promise<LaunchedAction>;
}

function errorCode(error: Error): string {
  return 'code' in error && typeof error.code === 'string' ? error.code : 'UNKNOWN';
}

/**
 * Launches the action as a detached child process. Resolves as soon as the
 * process has started; the caller never waits for it to finish.
 */
export class SpawnActionLauncher implements ActionLauncher {
  constructor(private readonly baseEnv: NodeJS.ProcessEnv = process.env) {}

  launch(request: ActionRequest): Promise<LaunchedAction> {
    const command = request.interpreter ?? request.scriptPath;
    const args = request.interpreter ? [request.scriptPath] : [];

    const env: NodeJS.ProcessEnv = { ...this.baseEnv };
    if (request.event) env.WEBHOOK_EVENT = request.event;
    if (request.deliveryId) env.WEBHOOK_DELIVERY = request.deliveryId;

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { detached: true, stdio: 'ignore', env });

      const exited = new Promise<number | null>(resolveExit => {
        child.once('exit', code => resolveExit(code));
      });

      const onLaunchError = (error: Error): void => {
        reject(new ActionLaunchError(command, errorCode(error), error.message));
      };
      child.once('error', onLaunchError);

      child.once('spawn', () => {
        child.off('error', onLaunchError);
        // Errors after launch (e.g. a failed kill) say nothing about the webhook
        child.on('error', error => {
          console.warn(`[webhook-runner] Action ${command} reported an error: ${error.message}`);
        });
        child.unref();
        resolve({ pid: child.pid, exited });
      });
    });
  }
}
