import type { ProvisionPhaseId, TrackedPhase } from './TaskPhaseTracker.js';

/**
 * Fatal provisioning failure, carrying the phase snapshot at the time it was raised.
 */
export class ProvisionError extends Error {
  phaseId: ProvisionPhaseId | null;
  phases: TrackedPhase[];

  constructor(
    message: string,
    phases: TrackedPhase[],
    options: { cause?: unknown; phaseId?: ProvisionPhaseId } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'ProvisionError';
    this.phases = phases;
    this.phaseId = options.phaseId ?? null;
  }
}
