import type { EvidenceType } from './evidence-schema.js';
import { matchesAny } from './glob.js';

export const PHASES = [
  'discovery',
  'planning',
  'implementation',
  'testing',
  'review',
  'release',
  'acceptance',
  'closure'
] as const;

export type Phase = (typeof PHASES)[number];

export interface PhaseDefinition {
  phase: Phase;
  title: string;
  /** Paths (globs, repository-relative) that may be mutated while the task is in this phase. */
  allowPaths: readonly string[];
  /** Evidence types that need at least one record for the task before the phase can be left. */
  requiredEvidence: readonly EvidenceType[];
  /** Whether the checklist audit threshold applies when leaving the phase. */
  checklist: boolean;
  /** Whether the lane's required agent count must be met when leaving the phase. */
  requiresAgents: boolean;
  /** Evidence types whose latest record must fall inside the freshness window. */
  freshEvidence: readonly EvidenceType[];
  /** Whether the plan-to-checklist mapping must hold at least one binding. */
  requiresMapping: boolean;
}

const DOC_PATHS = ['docs/**', '**/*.md'] as const;
const TEST_PATHS = ['tests/**', 'test/**', '**/*.test.*', '**/*.spec.*', '**/__tests__/**'] as const;

export function isPhase(value: unknown): value is Phase {
  return typeof value === 'string' && (PHASES as readonly string[]).includes(value);
}

function assertNever(value: never): never {
  throw new Error(`Unhandled phase: ${String(value)}`);
}

export function phaseDefinition(phase: Phase): PhaseDefinition {
  switch (phase) {
    case 'discovery':
      return {
        phase,
        title: 'Discovery',
        allowPaths: DOC_PATHS,
        requiredEvidence: ['artifact'],
        checklist: false,
        requiresAgents: false,
        freshEvidence: [],
        requiresMapping: false
      };
    case 'planning':
      return {
        phase,
        title: 'Planning',
        allowPaths: DOC_PATHS,
        requiredEvidence: ['artifact'],
        checklist: false,
        requiresAgents: false,
        freshEvidence: [],
        requiresMapping: true
      };
    case 'implementation':
      return {
        phase,
        title: 'Implementation',
        allowPaths: ['**'],
        requiredEvidence: ['command_output'],
        checklist: true,
        requiresAgents: true,
        freshEvidence: [],
        requiresMapping: true
      };
    case 'testing':
      return {
        phase,
        title: 'Testing',
        allowPaths: [...TEST_PATHS, ...DOC_PATHS],
        requiredEvidence: ['test_result'],
        checklist: true,
        requiresAgents: false,
        freshEvidence: ['test_result'],
        requiresMapping: true
      };
    case 'review':
      return {
        phase,
        title: 'Review',
        allowPaths: DOC_PATHS,
        requiredEvidence: ['code_review'],
        checklist: true,
        requiresAgents: true,
        freshEvidence: [],
        requiresMapping: true
      };
    case 'release':
      return {
        phase,
        title: 'Release',
        allowPaths: ['CHANGELOG.md', 'package.json', 'package-lock.json', ...DOC_PATHS],
        requiredEvidence: ['command_output'],
        checklist: false,
        requiresAgents: false,
        freshEvidence: ['command_output'],
        requiresMapping: false
      };
    case 'acceptance':
      return {
        phase,
        title: 'Acceptance',
        allowPaths: DOC_PATHS,
        requiredEvidence: ['artifact'],
        checklist: true,
        requiresAgents: false,
        freshEvidence: [],
        requiresMapping: true
      };
    case 'closure':
      return {
        phase,
        title: 'Closure',
        allowPaths: [],
        requiredEvidence: [],
        checklist: false,
        requiresAgents: false,
        freshEvidence: [],
        requiresMapping: false
      };
    default:
      return assertNever(phase);
  }
}

export const INITIAL_PHASE: Phase = PHASES[0];
export const TERMINAL_PHASE: Phase = PHASES[PHASES.length - 1];

export function phaseIndex(phase: Phase): number {
  return PHASES.indexOf(phase);
}

export function nextPhase(phase: Phase): Phase | null {
  return PHASES[phaseIndex(phase) + 1] ?? null;
}

/** 1-based number used in receipts and messages (`P3 implementation`). */
export function phaseLabel(phase: Phase): string {
  return `P${phaseIndex(phase) + 1} ${phase}`;
}

export function phaseAllows(phase: Phase, relPath: string): boolean {
  return matchesAny(relPath, phaseDefinition(phase).allowPaths);
}
