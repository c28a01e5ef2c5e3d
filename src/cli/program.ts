import fs from 'node:fs/promises';
import { Command, InvalidArgumentError } from 'commander';
import { signInvocation } from '../core/agents.js';
import type { Engine } from '../core/engine.js';
import { errorMessage, isPhaseGateError, SchemaViolation, SignatureInvalid } from '../core/errors.js';
import { EvidenceTypeSchema } from '../core/evidence-schema.js';
import { formatUnmet } from '../core/lifecycle.js';
import { isPhase, nextPhase, PHASES, type Phase } from '../core/phases.js';
import { currentPhase } from '../core/tasks.js';

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  readStdin: () => Promise<string>;
  setExitCode: (code: number) => void;
}

export interface CliDeps {
  /** Opened lazily so `--help` never touches the ledger. */
  engine: () => Engine;
  signingKey?: string;
  io: CliIO;
  now?: () => number;
}

function parsePhase(value: string): Phase {
  if (!isPhase(value)) throw new InvalidArgumentError(`expected one of ${PHASES.join(', ')}`);
  return value;
}

function parseRatio(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0 || n > 1) throw new InvalidArgumentError('expected a number between 0 and 1');
  return n;
}

function parseIso(value: string): number {
  const ms = Date.parse(value);
  if (!Number.isFinite(ms)) throw new InvalidArgumentError('expected an ISO-8601 timestamp');
  return ms;
}

function parseDepth(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError('expected an integer');
  return n;
}

function parseJson(text: string, field: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new SchemaViolation(field, `not valid JSON: ${errorMessage(err)}`);
  }
}

export function buildProgram(deps: CliDeps): Command {
  const { io } = deps;
  const now = deps.now ?? Date.now;
  let engine: Engine | null = null;
  const getEngine = () => (engine ??= deps.engine());
  const print = (data: unknown) => io.out(JSON.stringify(data, null, 2));

  const run =
    <A extends unknown[]>(fn: (...args: A) => Promise<void>) =>
    async (...args: A) => {
      try {
        await fn(...args);
      } catch (err) {
        if (!isPhaseGateError(err)) throw err;
        io.err(`error [${err.code}]: ${err.message}`);
        if (err.remediation) io.err(`  fix: ${err.remediation}`);
        io.setExitCode(1);
      }
    };

  const program = new Command()
    .name('phasegate')
    .description('Evidence-backed phase gates for development work')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({ writeOut: (s) => io.out(s.trimEnd()), writeErr: (s) => io.err(s.trimEnd()) });

  program.hook('postAction', () => {
    engine?.close();
    engine = null;
  });

  program
    .command('hook')
    .description('Evaluate a lifecycle event read as JSON from stdin; exits 1 when blocked')
    .action(
      run(async () => {
        const event = parseJson(await deps.io.readStdin(), 'event');
        const decision = await getEngine().gate.handle(event);
        for (const w of decision.warnings) io.err(`warning: ${w}`);
        for (const r of decision.reasons) io.err(r);
        if (!decision.allow) io.setExitCode(1);
      })
    );

  const task = program.command('task').description('Create and inspect tasks');

  task
    .command('create')
    .argument('<slug>', 'short name of the work')
    .option('--lane <lane>', 'fast or full', 'full')
    .action(
      run(async (slug: string, opts: { lane: string }) => {
        if (opts.lane !== 'fast' && opts.lane !== 'full') throw new SchemaViolation('lane', 'expected fast or full');
        const created = await getEngine().tasks.create(slug, { lane: opts.lane });
        io.out(created.id);
      })
    );

  task
    .command('show')
    .argument('<task-id>')
    .action(
      run(async (id: string) => {
        const e = getEngine();
        const t = await e.tasks.resolve(id);
        print({ task: t, phase: currentPhase(t), agents: { count: e.agents.count(t.id), required: t.required_agent_count } });
      })
    );

  task
    .command('list')
    .description('Active task ids')
    .action(
      run(async () => {
        for (const id of await getEngine().tasks.list()) io.out(id);
      })
    );

  program
    .command('evidence')
    .description('Append an evidence record (JSON from --file, or stdin)')
    .argument('<task-id>')
    .option('--file <path>', 'JSON file with the record')
    .action(
      run(async (taskId: string, opts: { file?: string }) => {
        const text = opts.file ? await fs.readFile(opts.file, 'utf8') : await io.readStdin();
        const body = parseJson(text, 'evidence');
        if (typeof body !== 'object' || body === null || Array.isArray(body)) {
          throw new SchemaViolation('evidence', 'expected a JSON object');
        }
        const e = getEngine();
        const t = await e.tasks.resolve(taskId);
        const record = await e.evidence.append({ ...body, task_id: t.id });
        io.out(record.id);
      })
    );

  program
    .command('bind')
    .description('Bind a plan item to checklist item ids')
    .argument('<task-id>')
    .argument('<plan-item-id>')
    .argument('<checklist-ids...>')
    .requiredOption('--type <evidence-type>', 'evidence type the items require')
    .option('--section <text>', 'plan section heading')
    .option('--keyword <words...>', 'words a checked item must mention outside code')
    .action(
      run(async (taskId: string, planItemId: string, ids: string[], opts: { type: string; section?: string; keyword?: string[] }) => {
        const type = EvidenceTypeSchema.safeParse(opts.type);
        if (!type.success) throw new SchemaViolation('type', `unknown evidence type ${opts.type}`);
        const mapping = await getEngine().mapping(taskId);
        print(await mapping.bind(planItemId, ids, type.data, { planSection: opts.section, keywords: opts.keyword }));
      })
    );

  program
    .command('audit')
    .description('Audit a task checklist for hollow items')
    .argument('<task-id>')
    .option('--checklist <path>', 'checklist file (defaults to the task checklist)')
    .action(
      run(async (taskId: string, opts: { checklist?: string }) => {
        const e = getEngine();
        const text = opts.checklist ? await fs.readFile(opts.checklist, 'utf8') : ((await e.checklistText(taskId)) ?? '');
        const audit = await e.audit(taskId, text);
        print(audit);
        if (audit.report.hollow.length > 0) io.setExitCode(1);
      })
    );

  program
    .command('advance')
    .description('Advance a task to its next phase')
    .argument('<task-id>')
    .option('--to <phase>', 'target phase', parsePhase)
    .action(
      run(async (taskId: string, opts: { to?: Phase }) => {
        const e = getEngine();
        const t = await e.tasks.resolve(taskId);
        const from = currentPhase(t);
        const result = await e.machine.attemptAdvance(t.id, from, opts.to ?? nextPhase(from) ?? from);
        for (const w of result.warnings) io.err(`warning: ${w}`);
        if (result.ok) {
          io.out(`${from} -> ${currentPhase(result.task)}`);
          return;
        }
        for (const u of result.unmet) io.err(formatUnmet(u));
        io.setExitCode(1);
      })
    );

  program
    .command('rollback')
    .description('Return a task to an earlier phase')
    .argument('<task-id>')
    .argument('<phase>', 'earlier phase', parsePhase)
    .requiredOption('--reason <text>')
    .requiredOption('--actor <name>')
    .action(
      run(async (taskId: string, phase: Phase, opts: { reason: string; actor: string }) => {
        const t = await getEngine().machine.rollbackTo(taskId, phase, opts);
        io.out(`${t.id} -> ${currentPhase(t)}`);
      })
    );

  program
    .command('receipts')
    .description('Verify gate receipts against the phase history')
    .argument('<task-id>')
    .action(
      run(async (taskId: string) => {
        const v = await getEngine().machine.verifyReceipts(taskId);
        for (const p of v.problems) io.err(p);
        io.out(`${v.checked} receipt(s) checked, ${v.problems.length} problem(s)`);
        if (!v.ok) io.setExitCode(1);
      })
    );

  program
    .command('agent')
    .description('Record an agent invocation, signed with PHASEGATE_SIGNING_KEY')
    .argument('<task-id>')
    .argument('<agent-name>')
    .option('--depth <n>', 'delegation depth', parseDepth, 1)
    .action(
      run(async (taskId: string, agentName: string, opts: { depth: number }) => {
        if (!deps.signingKey) throw new SignatureInvalid('no orchestrator signing key is configured');
        const invokedAt = now();
        const signature = signInvocation(deps.signingKey, { taskId, agentName, depth: opts.depth, invokedAt });
        const inv = await getEngine().agents.record(taskId, { agentName, depth: opts.depth, invokedAt, signature });
        io.out(inv.id);
      })
    );

  program
    .command('kpi')
    .description('Auto-fix and evidence KPIs')
    .option('--since <iso>', 'period start', parseIso)
    .option('--until <iso>', 'period end', parseIso)
    .action(
      run(async (opts: { since?: number; until?: number }) => {
        const e = getEngine();
        const fallback = e.kpi.defaultPeriod();
        print(
          await e.kpiReport({
            since: opts.since ?? fallback.since,
            until: opts.until ?? fallback.until
          })
        );
      })
    );

  program
    .command('fix')
    .description('Apply a known remediation for an error message')
    .argument('<error-signature>')
    .requiredOption('--confidence <ratio>', '0..1', parseRatio)
    .option('--confirm', 'approve a fix that needs confirmation', false)
    .option('--verify <command...>', 'command that must pass after the fix')
    .action(
      run(async (signature: string, opts: { confidence: number; confirm: boolean; verify?: string[] }) => {
        const result = await getEngine().autofix.apply(signature, opts.confidence, {
          confirmed: opts.confirm,
          verify: opts.verify
        });
        print(result);
        if (result.status !== 'applied' && result.status !== 'no_match') io.setExitCode(1);
      })
    );

  return program;
}
