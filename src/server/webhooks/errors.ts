export type SignatureErrorCode =
  | 'MALFORMED_SIGNATURE_ENCODING'
  | 'INVALID_HEX_ENCODING'
  | 'DIGEST_MISMATCH';

/**
 * Why a claimed signature was rejected. Only for server-side logs: every code
 * maps to the same 401 response.
 */
export class SignatureVerificationError extends Error {
  readonly code: SignatureErrorCode;

  constructor(code: SignatureErrorCode, message: string) {
    super(message);
    this.name = 'SignatureVerificationError';
    this.code = code;
  }
}

export class ActionLaunchError extends Error {
  /** System error code from spawn, e.g. ENOENT or EACCES */
  readonly code: string;
  readonly command: string;

  constructor(command: string, code: string, message: string) {
    super(`Could not launch ${command}: ${message}`);
    this.name = 'ActionLaunchError';
    this.code = code;
    this.command = command;
  }
}
