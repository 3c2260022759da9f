export * from './schema/index.js';
export { loadConfig } from './utils/config-loader.js';
export type { LoadConfigOptions, ConfigLoadResult } from './utils/config-loader.js';
export { createApp, startServer } from './server/http.js';
export type { AppOptions } from './server/http.js';
export { SpawnActionLauncher } from './server/action-launcher.js';
export type { ActionLauncher, ActionRequest, LaunchedAction } from './server/action-launcher.js';
export { extractSignatureHeader, SIGNATURE_HEADER } from './server/webhooks/signature-header.js';
export { computeSignature, verifySignature, SIGNATURE_PREFIX } from './server/webhooks/verify-signature.js';
export type { VerificationResult } from './server/webhooks/verify-signature.js';
export { SignatureVerificationError, ActionLaunchError } from './server/webhooks/errors.js';
export type { SignatureErrorCode } from './server/webhooks/errors.js';
