import fs from 'node:fs';
import fsp from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from 'pino';
import { openDb, type LedgerDb } from '../infra/db.js';
import { processRunner, type CommandRunner } from '../infra/exec.js';
import { pathExists } from '../infra/files.js';
import { GitProbe } from '../infra/git.js';
import { AgentTracker } from './agents.js';
import { AutoFixEngine, AutoFixLog } from './autofix.js';
import { systemClock, type Clock } from './clock.js';
import type { Policy, ResolvedPaths } from './config.js';
import { EvidenceStore, statusMap } from './evidence.js';
import { KpiReporter, type KpiPeriod, type KpiReport } from './kpi.js';
import { LifecycleGate } from './lifecycle.js';
import { MappingStore, type AuditReport } from './mapping.js';
import { checklistPathFor, PhaseMachine } from './state-machine.js';
import { FileSnapshotter, GitSnapshotter, type Snapshotter } from './snapshots.js';
import { TaskNamespace } from './tasks.js';
import type { EngineEvent, EventSink } from './types.js';

export interface ChecklistAudit {
  report: AuditReport;
  /** status per checklist item id */
  items: Record<string, string>;
}

/** Files the fallback snapshotter guards when the repository is not a git checkout. */
export const DEFAULT_SNAPSHOT_PATHS = ['package.json', 'package-lock.json', 'tsconfig.json'];

export interface EngineOptions {
  paths: ResolvedPaths;
  policy: Policy;
  log: Logger;
  signingKey?: string;
  runner?: CommandRunner;
  snapshotter?: Snapshotter;
  now?: Clock;
  idSuffix?: () => string;
  db?: LedgerDb;
}

/**
 * Composition root shared by the HTTP server, the MCP server and the CLI.
 * Holds no phase state of its own: every operation takes the task id and
 * reads the task from its namespace.
 */
export class Engine {
  readonly db: LedgerDb;
  readonly policy: Policy;
  readonly log: Logger;
  readonly paths: ResolvedPaths;
  readonly git: GitProbe;
  readonly tasks: TaskNamespace;
  readonly evidence: EvidenceStore;
  readonly agents: AgentTracker;
  readonly machine: PhaseMachine;
  readonly autofixLog: AutoFixLog;
  readonly autofix: AutoFixEngine;
  readonly kpi: KpiReporter;
  readonly gate: LifecycleGate;
  readonly signingConfigured: boolean;

  private sinks = new Set<EventSink>();
  private now: Clock;

  constructor(opts: EngineOptions) {
    this.paths = opts.paths;
    this.policy = opts.policy;
    this.log = opts.log;
    this.now = opts.now ?? systemClock;
    this.db = opts.db ?? openDb(opts.paths.dbPath);
    this.signingConfigured = Boolean(opts.signingKey);

    const { repoRoot, stateDir } = opts.paths;
    const runner = opts.runner ?? processRunner;
    const onEvent: EventSink = (evt) => this.publish(evt);
    const now = this.now;

    this.git = new GitProbe(repoRoot, runner, this.log);
    this.tasks = new TaskNamespace({
      root: stateDir,
      log: this.log,
      minAgentCount: this.policy.agents.min_count_default,
      now,
      idSuffix: opts.idSuffix,
      onEvent
    });
    this.evidence = new EvidenceStore({
      root: path.join(stateDir, 'evidence'),
      log: this.log,
      vcs: () => this.git.context(),
      now,
      freshnessWindowSeconds: this.policy.evidence.freshness_window_seconds,
      lookahead: this.policy.evidence.lookahead_lines,
      onEvent
    });
    this.agents = new AgentTracker(this.db, { tasks: this.tasks, log: this.log, signingKey: opts.signingKey, now, onEvent });
    const mappingFor = (taskDir: string) => this.mappingAt(taskDir);
    this.machine = new PhaseMachine({
      tasks: this.tasks,
      evidence: this.evidence,
      mappingFor,
      agents: this.agents,
      log: this.log,
      completionThreshold: this.policy.checklist.completion_threshold,
      freshnessWindowSeconds: this.policy.evidence.freshness_window_seconds,
      signingKey: opts.signingKey,
      now,
      onEvent
    });

    const snapshotDir = path.join(stateDir, 'snapshots');
    const snapshotter =
      opts.snapshotter ??
      (fs.existsSync(path.join(repoRoot, '.git'))
        ? new GitSnapshotter({ root: repoRoot, dir: snapshotDir, runner, log: this.log, now })
        : new FileSnapshotter({ root: repoRoot, dir: snapshotDir, paths: DEFAULT_SNAPSHOT_PATHS, log: this.log, now }));
    this.autofixLog = new AutoFixLog(this.db);
    this.autofix = new AutoFixEngine({
      root: repoRoot,
      runner,
      snapshotter,
      log: this.log,
      policy: this.policy.auto_fix,
      ledger: this.autofixLog,
      now,
      onEvent
    });
    this.kpi = new KpiReporter({ ledger: this.autofixLog, evidence: this.evidence, now });
    this.gate = new LifecycleGate(this.db, {
      repoRoot,
      stateDir,
      tasks: this.tasks,
      evidence: this.evidence,
      mappingFor,
      machine: this.machine,
      git: this.git,
      policy: this.policy,
      log: this.log,
      now,
      onEvent
    });
  }

  subscribe(sink: EventSink): () => void {
    this.sinks.add(sink);
    return () => this.sinks.delete(sink);
  }

  private publish(evt: EngineEvent) {
    for (const sink of this.sinks) {
      try {
        sink(evt);
      } catch (err) {
        this.log.warn({ err, type: evt.type }, 'event sink failed');
      }
    }
  }

  private mappingAt(taskDir: string): MappingStore {
    return new MappingStore({ file: path.join(taskDir, 'mapping.json'), evidence: this.evidence, log: this.log });
  }

  async mapping(taskId: string): Promise<MappingStore> {
    return this.mappingAt(await this.tasks.taskDir(taskId));
  }

  async checklistPath(taskId: string): Promise<string> {
    const dir = await this.tasks.taskDir(taskId);
    return checklistPathFor(dir, this.mappingAt(dir));
  }

  /** Checklist text of a task; null when it has not been written yet. */
  async checklistText(taskId: string): Promise<string | null> {
    const file = await this.checklistPath(taskId);
    if (!(await pathExists(file))) return null;
    return fsp.readFile(file, 'utf8');
  }

  /**
   * Audits `text`, or the task's own checklist file when no text is given.
   * Evidence recorded for another task does not count.
   */
  async audit(taskId: string, text?: string): Promise<ChecklistAudit> {
    const task = await this.tasks.resolve(taskId);
    const checklist = text ?? (await this.checklistText(task.id)) ?? '';
    const results = await this.evidence.validateChecklist(checklist, { taskId: task.id });
    const report = await (await this.mapping(task.id)).report(checklist, results);
    return { report, items: statusMap(results) };
  }

  /** KPI report over the checklists of every active task. */
  async kpiReport(period?: KpiPeriod): Promise<KpiReport> {
    const checklists: { text: string; taskId: string }[] = [];
    for (const id of await this.tasks.list()) {
      const text = await this.checklistText(id);
      if (text !== null) checklists.push({ text, taskId: id });
    }
    return this.kpi.report(period ?? this.kpi.defaultPeriod(), { checklists });
  }

  close() {
    this.db.close();
  }
}
