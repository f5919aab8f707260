export type PhaseDefinition = { id: ProvisionPhaseId; title: string };

export type ProvisionPhaseId =
  | 'environment'
  | 'prerequisites'
  | 'runner'
  | 'paths'
  | 'framework'
  | 'test-library'
  | 'config'
  | 'database'
  | 'cleanup';

export type PhaseStatus = 'pending' | 'in_progress' | 'success' | 'failed';

export type TrackedPhase = PhaseDefinition & {
  status: PhaseStatus;
  startedAt: string | null;
  finishedAt: string | null;
  error: { message: string; name: string } | null;
  meta: Record<string, unknown>;
};

const DEFAULT_PHASES: PhaseDefinition[] = [
  { id: 'environment', title: 'Detect environment' },
  { id: 'prerequisites', title: 'Install required packages' },
  { id: 'runner', title: 'Install PHPUnit' },
  { id: 'paths', title: 'Set WordPress directories' },
  { id: 'framework', title: 'Install WordPress' },
  { id: 'test-library', title: 'Install WordPress test suite' },
  { id: 'config', title: 'Update wp-tests-config.php' },
  { id: 'database', title: 'Create test database' },
  { id: 'cleanup', title: 'Remove temporary files' }
];

/**
 * Tracks the status of each provisioning phase.
 */
export class TaskPhaseTracker {
  private readonly _phases: TrackedPhase[];

  constructor(phases: PhaseDefinition[] = DEFAULT_PHASES) {
    this._phases = phases.map((phase) => ({
      ...phase,
      status: 'pending',
      startedAt: null,
      finishedAt: null,
      error: null,
      meta: {}
    }));
  }

  start(phaseId: ProvisionPhaseId, meta: Record<string, unknown> = {}): void {
    const phase = this._findPhase(phaseId);
    if (!phase) {
      return;
    }
    phase.status = 'in_progress';
    phase.startedAt = phase.startedAt || new Date().toISOString();
    phase.meta = { ...phase.meta, ...meta };
  }

  complete(phaseId: ProvisionPhaseId, meta: Record<string, unknown> = {}): void {
    const phase = this._findPhase(phaseId);
    if (!phase) {
      return;
    }
    phase.status = 'success';
    phase.finishedAt = new Date().toISOString();
    phase.meta = { ...phase.meta, ...meta };
  }

  fail(phaseId: ProvisionPhaseId, error: Error | string, meta: Record<string, unknown> = {}): void {
    const phase = this._findPhase(phaseId);
    if (!phase) {
      return;
    }
    phase.status = 'failed';
    phase.finishedAt = new Date().toISOString();
    phase.meta = { ...phase.meta, ...meta };
    phase.error =
      typeof error === 'string'
        ? { message: error, name: 'Error' }
        : { message: error.message, name: error.name };
  }

  getPhases(): TrackedPhase[] {
    return this._phases.map((phase) => ({
      ...phase,
      meta: { ...phase.meta }
    }));
  }

  private _findPhase(phaseId: ProvisionPhaseId): TrackedPhase | undefined {
    return this._phases.find((phase) => phase.id === phaseId);
  }
}
