import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import type { LedgerDb } from '../infra/db.js';
import { systemClock, type Clock } from './clock.js';
import { DepthViolation, NotFoundError, SchemaViolation, SignatureInvalid } from './errors.js';
import { hmacHex, safeEqualHex } from './signing.js';
import type { TaskNamespace } from './tasks.js';
import type { AgentInvocation, EventSink, InvocationStatus } from './types.js';

export const MAX_DEPTH = 1;

interface InvocationRow {
  id: string;
  task_id: string;
  agent_name: string;
  depth: number;
  invoked_at: number;
  completed_at: number | null;
  status: InvocationStatus | null;
  signature: string;
}

interface CountRow {
  n: number;
}

export interface InvocationPayload {
  taskId: string;
  agentName: string;
  depth: number;
  invokedAt: number;
}

function payloadString(p: InvocationPayload): string {
  return [p.taskId, p.agentName, String(p.depth), String(p.invokedAt)].join('|');
}

/** Orchestrator side. Dispatched agents never see the key, so they cannot produce this. */
export function signInvocation(key: string, payload: InvocationPayload): string {
  return hmacHex(key, payloadString(payload));
}

function fromRow(r: InvocationRow): AgentInvocation {
  return {
    id: r.id,
    taskId: r.task_id,
    agentName: r.agent_name,
    depth: r.depth,
    invokedAt: r.invoked_at,
    completedAt: r.completed_at,
    status: r.status,
    signature: r.signature
  };
}

export interface AgentTrackerOptions {
  tasks: TaskNamespace;
  log: Logger;
  signingKey?: string;
  now?: Clock;
  onEvent?: EventSink;
}

export class AgentTracker {
  private now: Clock;

  constructor(private db: LedgerDb, private opts: AgentTrackerOptions) {
    this.now = opts.now ?? systemClock;
  }

  /**
   * Depth and signature are checked before anything is written; a rejected
   * invocation leaves no trace in the ledger.
   */
  async record(
    taskId: string,
    input: { agentName: string; depth: number; invokedAt?: number; signature: string }
  ): Promise<AgentInvocation> {
    if (!Number.isInteger(input.depth) || input.depth < 0 || input.depth > MAX_DEPTH) {
      const violation = new DepthViolation(input.depth);
      this.opts.log.warn({ taskId, agentName: input.agentName, depth: input.depth }, violation.message);
      throw violation;
    }
    const agentName = input.agentName.trim();
    if (!agentName) throw new SchemaViolation('agent_name', 'must be a non-empty string');

    const payload: InvocationPayload = { taskId, agentName, depth: input.depth, invokedAt: input.invokedAt ?? this.now() };
    if (!this.opts.signingKey) throw new SignatureInvalid('no orchestrator signing key is configured');
    const expected = signInvocation(this.opts.signingKey, payload);
    if (!safeEqualHex(input.signature, expected)) {
      this.opts.log.warn({ taskId, agentName }, 'agent.signature_rejected');
      throw new SignatureInvalid('signature does not match the invocation');
    }

    await this.opts.tasks.resolve(taskId);

    const invocation: AgentInvocation = {
      id: nanoid(12),
      taskId,
      agentName,
      depth: payload.depth,
      invokedAt: payload.invokedAt,
      completedAt: null,
      status: null,
      signature: input.signature
    };
    this.db
      .prepare(
        'INSERT INTO agent_invocations (id, task_id, agent_name, depth, invoked_at, completed_at, status, signature) VALUES (?, ?, ?, ?, ?, NULL, NULL, ?)'
      )
      .run(invocation.id, taskId, agentName, invocation.depth, invocation.invokedAt, invocation.signature);

    if (invocation.depth === MAX_DEPTH) await this.opts.tasks.addInvokedAgent(taskId, agentName);

    this.opts.log.info({ taskId, agentName, depth: invocation.depth, invocationId: invocation.id }, 'agent.recorded');
    this.opts.onEvent?.({ type: 'agent.recorded', taskId, agentName, depth: invocation.depth, ts: this.now() });
    return invocation;
  }

  /** Fills completion time and status once. */
  complete(invocationId: string, status: InvocationStatus): AgentInvocation {
    const res = this.db
      .prepare('UPDATE agent_invocations SET completed_at = ?, status = ? WHERE id = ? AND completed_at IS NULL')
      .run(this.now(), status, invocationId);
    const row = this.get(invocationId);
    if (!row) throw new NotFoundError('invocation', invocationId);
    if (res.changes === 0) throw new SchemaViolation('status', `invocation ${invocationId} already completed as ${row.status ?? 'unknown'}`);
    return row;
  }

  get(invocationId: string): AgentInvocation | null {
    const row = this.db
      .prepare('SELECT id, task_id, agent_name, depth, invoked_at, completed_at, status, signature FROM agent_invocations WHERE id = ?')
      .get(invocationId) as InvocationRow | undefined;
    return row ? fromRow(row) : null;
  }

  list(taskId: string): AgentInvocation[] {
    const rows = this.db
      .prepare(
        'SELECT id, task_id, agent_name, depth, invoked_at, completed_at, status, signature FROM agent_invocations WHERE task_id = ? ORDER BY invoked_at ASC, id ASC'
      )
      .all(taskId) as InvocationRow[];
    return rows.map(fromRow);
  }

  /** Distinct dispatched agents that have not failed or timed out. */
  count(taskId: string): number {
    const row = this.db
      .prepare(
        "SELECT COUNT(DISTINCT agent_name) AS n FROM agent_invocations WHERE task_id = ? AND depth = 1 AND (status IS NULL OR status = 'success')"
      )
      .get(taskId) as CountRow | undefined;
    return row?.n ?? 0;
  }
}
