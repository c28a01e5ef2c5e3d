import { z } from 'zod';
import type { Engine } from '../core/engine.js';
import { errorMessage, isPhaseGateError } from '../core/errors.js';
import { EVIDENCE_TYPES, EvidenceTypeSchema } from '../core/evidence-schema.js';
import { nextPhase, PHASES } from '../core/phases.js';
import { currentPhase } from '../core/tasks.js';

export type ToolResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: { type: 'object'; properties: Record<string, unknown>; required: string[] };
};

const TaskIdInput = z.object({
  taskId: z.string().min(1).describe('Task ID')
});

const TaskCreateInput = z.object({
  slug: z.string().min(1).max(120).describe('Short kebab-case name of the work'),
  lane: z.enum(['fast', 'full']).default('full').optional()
});

const EvidenceAppendInput = z.object({
  taskId: z.string().min(1),
  evidence: z.record(z.unknown()).describe('Evidence record without id and task_id')
});

const EvidenceGetInput = z.object({
  evidenceId: z.string().min(1)
});

const BindInput = z.object({
  taskId: z.string().min(1),
  planItemId: z.string().min(1),
  checklistItemIds: z.array(z.string().min(1)).min(1),
  requiredEvidenceType: EvidenceTypeSchema,
  planSection: z.string().optional(),
  planText: z.string().optional(),
  keywords: z.array(z.string().min(1)).optional()
});

const SearchInput = z.object({
  taskId: z.string().min(1),
  query: z.string().min(1).max(500)
});

const AuditInput = z.object({
  taskId: z.string().min(1),
  checklist: z.string().optional()
});

const AdvanceInput = z.object({
  taskId: z.string().min(1),
  to: z.enum(PHASES).optional()
});

const AgentRecordInput = z.object({
  taskId: z.string().min(1),
  agentName: z.string().min(1).max(120),
  depth: z.number().int(),
  invokedAt: z.number().int().positive(),
  signature: z.string().min(1)
});

const AutoFixInput = z.object({
  errorSignature: z.string().min(1).max(20000),
  confidence: z.number().min(0).max(1),
  confirmed: z.boolean().optional(),
  verify: z.array(z.string().min(1)).min(1).optional()
});

const KpiInput = z.object({
  since: z.number().int().min(0).optional(),
  until: z.number().int().positive().optional()
});

const GateInput = z.object({
  event: z.record(z.unknown())
});

const taskIdProp = { taskId: { type: 'string', description: 'Task ID' } };

export const TOOLS: ToolDefinition[] = [
  {
    name: 'phasegate_status',
    description: 'Engine status: enforcement mode, active tasks and their current phases.',
    inputSchema: { type: 'object', properties: {}, required: [] }
  },
  {
    name: 'phasegate_task_create',
    description:
      'Create a task. Every mutation must happen inside a task; the task starts in the discovery phase. Returns the task with its ID.',
    inputSchema: {
      type: 'object',
      properties: {
        slug: { type: 'string', description: 'Short kebab-case name of the work' },
        lane: { type: 'string', enum: ['fast', 'full'], description: 'fast = small changes, no agent minimum; full = default' }
      },
      required: ['slug']
    }
  },
  {
    name: 'phasegate_task_get',
    description: 'Get a task with its phase history, agent invocations and evidence index.',
    inputSchema: { type: 'object', properties: taskIdProp, required: ['taskId'] }
  },
  {
    name: 'phasegate_evidence_append',
    description:
      `Append an evidence record for a task. Types: ${EVIDENCE_TYPES.join(', ')}. ` +
      'Returns the record with its EVID id; reference it in the checklist with <!-- evidence: EVID-... --> within 5 lines of the item.',
    inputSchema: {
      type: 'object',
      properties: {
        ...taskIdProp,
        evidence: {
          type: 'object',
          description:
            'e.g. { "type": "test_result", "checklist_item": "CL-1", "tests": { "passed": 12, "failed": 0 }, "artifact": { "kind": "command", "command": "npm test", "exit_code": 0, "output_sample": "12 passed" } }'
        }
      },
      required: ['taskId', 'evidence']
    }
  },
  {
    name: 'phasegate_evidence_get',
    description: 'Look up an evidence record by id, with its freshness.',
    inputSchema: { type: 'object', properties: { evidenceId: { type: 'string' } }, required: ['evidenceId'] }
  },
  {
    name: 'phasegate_bind',
    description: 'Bind a plan item id to checklist item ids and the evidence type they require. Idempotent.',
    inputSchema: {
      type: 'object',
      properties: {
        ...taskIdProp,
        planItemId: { type: 'string' },
        checklistItemIds: { type: 'array', items: { type: 'string' } },
        requiredEvidenceType: { type: 'string', enum: [...EVIDENCE_TYPES] },
        planSection: { type: 'string' },
        planText: { type: 'string' },
        keywords: { type: 'array', items: { type: 'string' }, description: 'Words a checked item must mention outside code' }
      },
      required: ['taskId', 'planItemId', 'checklistItemIds', 'requiredEvidenceType']
    }
  },
  {
    name: 'phasegate_mapping_search',
    description: 'Search plan and checklist texts of a task mapping (literal, case-insensitive).',
    inputSchema: { type: 'object', properties: { ...taskIdProp, query: { type: 'string' } }, required: ['taskId', 'query'] }
  },
  {
    name: 'phasegate_audit',
    description: 'Audit the task checklist: complete-with-evidence counts and hollow items (checked without valid evidence).',
    inputSchema: {
      type: 'object',
      properties: { ...taskIdProp, checklist: { type: 'string', description: 'Checklist text (defaults to the task checklist file)' } },
      required: ['taskId']
    }
  },
  {
    name: 'phasegate_advance',
    description: 'Request the transition to the next phase. A refusal lists every unmet condition with a remediation.',
    inputSchema: {
      type: 'object',
      properties: { ...taskIdProp, to: { type: 'string', enum: [...PHASES] } },
      required: ['taskId']
    }
  },
  {
    name: 'phasegate_agent_record',
    description: 'Record an agent invocation signed by the orchestrator. Depth above 1 is rejected.',
    inputSchema: {
      type: 'object',
      properties: {
        ...taskIdProp,
        agentName: { type: 'string' },
        depth: { type: 'number', description: '0 = orchestrator, 1 = dispatched agent' },
        invokedAt: { type: 'number', description: 'epoch ms' },
        signature: { type: 'string', description: 'HMAC-SHA256 hex from the orchestrator' }
      },
      required: ['taskId', 'agentName', 'depth', 'invokedAt', 'signature']
    }
  },
  {
    name: 'phasegate_autofix',
    description: 'Try a known remediation for an error message. High-risk or low-confidence fixes need confirmed=true.',
    inputSchema: {
      type: 'object',
      properties: {
        errorSignature: { type: 'string' },
        confidence: { type: 'number', description: '0..1' },
        confirmed: { type: 'boolean' },
        verify: { type: 'array', items: { type: 'string' }, description: 'Command that must pass after the fix' }
      },
      required: ['errorSignature', 'confidence']
    }
  },
  {
    name: 'phasegate_kpi',
    description: 'Auto-fix success rate, MTTR, evidence compliance and pattern reuse over a period (epoch ms).',
    inputSchema: { type: 'object', properties: { since: { type: 'number' }, until: { type: 'number' } }, required: [] }
  },
  {
    name: 'phasegate_gate',
    description: 'Evaluate a lifecycle event (pre_mutation, pre_commit, pre_push, phase_advance) and return allow + reasons.',
    inputSchema: { type: 'object', properties: { event: { type: 'object' } }, required: ['event'] }
  }
];

function json(data: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

function failure(data: unknown): ToolResult {
  return { ...json(data), isError: true };
}

export async function status(engine: Engine) {
  const tasks = [];
  for (const id of await engine.tasks.list()) {
    const task = await engine.tasks.resolve(id);
    tasks.push({ id, lane: task.lane, phase: currentPhase(task) });
  }
  return { enforcement: engine.policy.enforcement.mode, signing: engine.signingConfigured, tasks };
}

export async function callTool(engine: Engine, name: string, args: unknown): Promise<ToolResult> {
  try {
    switch (name) {
      case 'phasegate_status':
        return json(await status(engine));

      case 'phasegate_task_create': {
        const input = TaskCreateInput.parse(args);
        return json(await engine.tasks.create(input.slug, { lane: input.lane ?? 'full' }));
      }

      case 'phasegate_task_get': {
        const input = TaskIdInput.parse(args);
        const task = await engine.tasks.resolve(input.taskId);
        return json({
          task,
          phase: currentPhase(task),
          invocations: engine.agents.list(task.id),
          evidence: await engine.evidence.entries({ taskId: task.id })
        });
      }

      case 'phasegate_evidence_append': {
        const input = EvidenceAppendInput.parse(args);
        const task = await engine.tasks.resolve(input.taskId);
        return json(await engine.evidence.append({ ...input.evidence, task_id: task.id }));
      }

      case 'phasegate_evidence_get': {
        const input = EvidenceGetInput.parse(args);
        const record = await engine.evidence.require(input.evidenceId);
        return json({ record, freshness: engine.evidence.freshness(record) });
      }

      case 'phasegate_bind': {
        const input = BindInput.parse(args);
        const mapping = await engine.mapping(input.taskId);
        return json(
          await mapping.bind(input.planItemId, input.checklistItemIds, input.requiredEvidenceType, {
            planSection: input.planSection,
            planText: input.planText,
            keywords: input.keywords
          })
        );
      }

      case 'phasegate_mapping_search': {
        const input = SearchInput.parse(args);
        const mapping = await engine.mapping(input.taskId);
        return json(await mapping.search(input.query));
      }

      case 'phasegate_audit': {
        const input = AuditInput.parse(args);
        const text = input.checklist ?? (await engine.checklistText(input.taskId)) ?? '';
        return json(await engine.audit(input.taskId, text));
      }

      case 'phasegate_advance': {
        const input = AdvanceInput.parse(args);
        const task = await engine.tasks.resolve(input.taskId);
        const from = currentPhase(task);
        const result = await engine.machine.attemptAdvance(task.id, from, input.to ?? nextPhase(from) ?? from);
        return result.ok ? json(result) : failure(result);
      }

      case 'phasegate_agent_record': {
        const input = AgentRecordInput.parse(args);
        return json(
          await engine.agents.record(input.taskId, {
            agentName: input.agentName,
            depth: input.depth,
            invokedAt: input.invokedAt,
            signature: input.signature
          })
        );
      }

      case 'phasegate_autofix': {
        const input = AutoFixInput.parse(args);
        const result = await engine.autofix.apply(input.errorSignature, input.confidence, {
          confirmed: input.confirmed,
          verify: input.verify
        });
        return result.status === 'applied' || result.status === 'no_match' ? json(result) : failure(result);
      }

      case 'phasegate_kpi': {
        const input = KpiInput.parse(args ?? {});
        const fallback = engine.kpi.defaultPeriod();
        return json(await engine.kpiReport({ since: input.since ?? fallback.since, until: input.until ?? fallback.until }));
      }

      case 'phasegate_gate': {
        const input = GateInput.parse(args);
        const decision = await engine.gate.handle(input.event);
        return decision.allow ? json(decision) : failure(decision);
      }

      default:
        return {
          content: [{ type: 'text', text: `Unknown tool: ${name}` }],
          isError: true
        };
    }
  } catch (err) {
    if (isPhaseGateError(err)) return failure({ error: err.toJSON() });
    return {
      content: [{ type: 'text', text: `Error: ${errorMessage(err)}` }],
      isError: true
    };
  }
}

export const CONTRACT = `# phasegate contract

## Evidence is the currency
A checklist item ticked \`[x]\` counts only when an evidence record backs it:
append the record, then put \`<!-- evidence: EVID-YYYYWww-nnn -->\` on the item
line or within the next 5 lines. Items with no resolvable reference are hollow
and block the phase.

## Phases
${PHASES.map((p, i) => `${i + 1}. ${p}`).join('\n')}

Phases cannot be skipped. Leaving a phase needs its required evidence types,
the checklist threshold where the phase has one, and the lane's agent count
where the phase needs delegated work. Rollback is an administrative action.

## Delegation
Agent invocations are recorded by the orchestrator with a signature. Depth 1 is
the limit: a dispatched agent never dispatches further agents.

## Auto-fix
Known error classes are fixed automatically only at high confidence and low
risk. Every fix is preceded by a snapshot and rolled back on failure.

## Workflow
1. \`phasegate_task_create\`
2. \`phasegate_bind\` plan items to checklist ids
3. Do the work, then \`phasegate_evidence_append\` per item
4. Reference the evidence ids in the checklist
5. \`phasegate_audit\`, then \`phasegate_advance\``;
