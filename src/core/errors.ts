// ═══════════════════════════════════════════════════════════════
// Warden :: Error Taxonomy
// Every error carries a code so callers can switch exhaustively
// ═══════════════════════════════════════════════════════════════

export type WardenErrorCode =
  | 'POLICY_VIOLATION'       // Key not authorized for the tool or the API
  | 'UNKNOWN_TOOL'           // Worker named a tool that is not registered
  | 'UNKNOWN_AGENT'          // Allowlist lookup for an unregistered agent
  | 'UNKNOWN_KEY'            // Revocation of a key that does not exist
  | 'DUPLICATE_NAME'         // Agent or key registered twice
  | 'DUPLICATE_CORRELATION'  // Two turns began with the same correlation id
  | 'ALREADY_SEALED'         // Mutation of a sealed turn
  | 'CORRELATION_MISMATCH'   // Tool call recorded against the wrong turn
  | 'TIMEOUT'                // Operation exceeded its time limit
  | 'TRANSPORT'              // Non-timeout network failure
  | 'OVERSIZED_RESPONSE'     // Agent body exceeded its read limit
  | 'UPSTREAM'               // Worker model call failed
  | 'INVALID_POLICY';        // Policy document failed validation

export class WardenError extends Error {
  readonly code: WardenErrorCode;

  constructor(code: WardenErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class PolicyError extends WardenError {
  constructor(message: string, readonly keyId?: string, readonly toolName?: string) {
    super('POLICY_VIOLATION', message);
  }
}

export class UnknownToolError extends WardenError {
  constructor(readonly toolName: string) {
    super('UNKNOWN_TOOL', `Unknown tool: ${toolName}`);
  }
}

export class UnknownAgentError extends WardenError {
  constructor(readonly agentName: string) {
    super('UNKNOWN_AGENT', `Unknown agent: ${agentName}`);
  }
}

export class UnknownKeyError extends WardenError {
  constructor(readonly keyId: string) {
    super('UNKNOWN_KEY', `Unknown API key: ${keyId}`);
  }
}

export class DuplicateNameError extends WardenError {
  constructor(kind: 'agent' | 'api key', readonly duplicateName: string) {
    super('DUPLICATE_NAME', `Duplicate ${kind}: ${duplicateName}`);
  }
}

export class DuplicateCorrelationError extends WardenError {
  constructor(readonly correlationId: string) {
    super('DUPLICATE_CORRELATION', `Correlation id already in use: ${correlationId}`);
  }
}

export class AlreadySealedError extends WardenError {
  constructor(readonly correlationId: string) {
    super('ALREADY_SEALED', `Turn ${correlationId} is already sealed`);
  }
}

export class CorrelationMismatchError extends WardenError {
  constructor(readonly expected: string, readonly actual: string) {
    super('CORRELATION_MISMATCH', `Tool call for ${actual} recorded against turn ${expected}`);
  }
}

export class TimeoutError extends WardenError {
  constructor(readonly operation: string, readonly timeoutMs: number) {
    super('TIMEOUT', `${operation} timed out after ${timeoutMs}ms`);
  }
}

export class TransportError extends WardenError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSPORT', message, options);
  }
}

export class OversizedResponseError extends WardenError {
  constructor(readonly limitBytes: number) {
    super('OVERSIZED_RESPONSE', `response body exceeded ${limitBytes} bytes`);
  }
}

export class UpstreamError extends WardenError {
  constructor(readonly correlationId: string, message: string, options?: { cause?: unknown }) {
    super('UPSTREAM', message, options);
  }
}

export class InvalidPolicyError extends WardenError {
  constructor(readonly issues: string[]) {
    super('INVALID_POLICY', `Policy invalid: ${issues.join('; ')}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
