/**
 * Thrown synchronously when a caller hands the simulator an out-of-range
 * entry point, base address, image or register/memory value. Runtime faults
 * are never thrown; they come back from step()/run() as values.
 */
export class PreconditionViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreconditionViolationError';
  }
}
