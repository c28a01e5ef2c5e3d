export type ErrorCode =
  | 'COLLISION'
  | 'NOT_FOUND'
  | 'SCHEMA_VIOLATION'
  | 'DUPLICATE_PLAN_ID'
  | 'DEPTH_VIOLATION'
  | 'SIGNATURE_INVALID'
  | 'STALE_EVIDENCE'
  | 'TOOL_MISSING'
  | 'BUCKET_EXHAUSTED'
  | 'CONFIG_ERROR';

export class PhaseGateError extends Error {
  readonly code: ErrorCode;
  readonly remediation?: string;

  constructor(code: ErrorCode, message: string, remediation?: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.remediation = remediation;
  }

  toJSON() {
    return { code: this.code, message: this.message, remediation: this.remediation };
  }
}

export class CollisionError extends PhaseGateError {
  constructor(readonly id: string) {
    super('COLLISION', `Task namespace already exists: ${id}`);
  }
}

export class NotFoundError extends PhaseGateError {
  constructor(readonly kind: 'task' | 'evidence' | 'mapping' | 'snapshot' | 'invocation', readonly id: string, detail?: string) {
    super(
      'NOT_FOUND',
      `Unknown ${kind}: ${id}${detail ? ` (${detail})` : ''}`,
      kind === 'evidence' ? 'Append the evidence record first and reference the id it returns' : undefined
    );
  }
}

export class SchemaViolation extends PhaseGateError {
  constructor(readonly field: string, detail: string, readonly evidenceType?: string) {
    super(
      'SCHEMA_VIOLATION',
      `Missing or invalid field '${field}'${evidenceType ? ` for ${evidenceType}` : ''}: ${detail}`,
      `Provide a non-empty, well-typed value for '${field}'`
    );
  }
}

export class DuplicatePlanId extends PhaseGateError {
  constructor(readonly planItemId: string, readonly boundTo: string[]) {
    super(
      'DUPLICATE_PLAN_ID',
      `Plan item ${planItemId} is already bound to [${boundTo.join(', ')}]`,
      'Use a new plan item id, or rebind through an explicit mapping edit'
    );
  }
}

export class DepthViolation extends PhaseGateError {
  constructor(readonly depth: number) {
    super(
      'DEPTH_VIOLATION',
      `Agent invocation depth ${depth} is not allowed (maximum 1)`,
      'Dispatched agents must not dispatch further agents; return the work to the orchestrator'
    );
  }
}

export class SignatureInvalid extends PhaseGateError {
  constructor(detail: string) {
    super('SIGNATURE_INVALID', `Invocation signature rejected: ${detail}`, 'Record invocations from the orchestrating process, which holds the signing key');
  }
}

export class StaleEvidence extends PhaseGateError {
  constructor(readonly evidenceId: string, readonly ageSeconds: number, readonly windowSeconds: number) {
    super(
      'STALE_EVIDENCE',
      `Evidence ${evidenceId} is ${ageSeconds}s old (window ${windowSeconds}s)`,
      'Re-run the check and append a fresh evidence record'
    );
  }
}

export class ToolMissing extends PhaseGateError {
  constructor(readonly tool: string, readonly check: string) {
    super('TOOL_MISSING', `${tool} is unavailable; ${check} ran in degraded mode`, `Install ${tool} to enable the full check`);
  }
}

export class BucketExhausted extends PhaseGateError {
  constructor(readonly bucket: string) {
    super('BUCKET_EXHAUSTED', `Evidence bucket ${bucket} has no sequence numbers left`);
  }
}

export class ConfigError extends PhaseGateError {
  constructor(readonly key: string, detail: string) {
    super('CONFIG_ERROR', `Invalid policy at '${key}': ${detail}`);
  }
}

export function isPhaseGateError(err: unknown): err is PhaseGateError {
  return err instanceof PhaseGateError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
