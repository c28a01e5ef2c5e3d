import type { Phase } from './phases.js';

export type TaskId = string;
export type EvidenceId = string;
export type Lane = 'fast' | 'full';

export interface PhaseHistoryEntry {
  phase: Phase;
  entered_at: string;
  exited_at: string | null;
  gate_passed: boolean | null;
  reentry_reason?: string;
}

export interface Task {
  id: TaskId;
  slug: string;
  lane: Lane;
  started_at: string;
  phase_history: PhaseHistoryEntry[];
  required_agent_count: number;
  invoked_agents: string[];
  archived_at?: string;
}

export type InvocationStatus = 'success' | 'failure' | 'timeout';

export interface AgentInvocation {
  id: string;
  taskId: TaskId;
  agentName: string;
  depth: number;
  invokedAt: number;
  completedAt: number | null;
  status: InvocationStatus | null;
  signature: string;
}

export interface UnmetCondition {
  code:
    | 'PHASE_MISMATCH'
    | 'NOT_SUCCESSOR'
    | 'TERMINAL'
    | 'ARCHIVED'
    | 'MAPPING_EMPTY'
    | 'CHECKLIST_EMPTY'
    | 'CHECKLIST_BELOW_THRESHOLD'
    | 'HOLLOW_ITEMS'
    | 'MISSING_EVIDENCE_TYPE'
    | 'STALE_EVIDENCE'
    | 'AGENT_COUNT';
  message: string;
  remediation?: string;
  items?: string[];
}

export type LifecycleEventType = 'pre_mutation' | 'pre_commit' | 'pre_push' | 'phase_advance';

export interface LifecycleDecision {
  allow: boolean;
  reasons: string[];
  warnings: string[];
}

export type EngineEvent =
  | { type: 'task.created'; taskId: string; lane: Lane; ts: number }
  | { type: 'task.archived'; taskId: string; ts: number }
  | { type: 'evidence.appended'; evidenceId: string; taskId: string; evidenceType: string; ts: number }
  | { type: 'phase.advanced'; taskId: string; from: Phase; to: Phase; ts: number }
  | { type: 'phase.refused'; taskId: string; from: Phase; unmet: string[]; ts: number }
  | { type: 'phase.rollback'; taskId: string; to: Phase; reason: string; ts: number }
  | { type: 'agent.recorded'; taskId: string; agentName: string; depth: number; ts: number }
  | { type: 'autofix.result'; signature: string; status: string; tier: string; ts: number }
  | { type: 'gate.result'; eventType: LifecycleEventType; allow: boolean; reasons: string[]; ts: number };

export type EventSink = (evt: EngineEvent) => void;
