export type EffectsErrorType = 'disabled' | 'invalid-limit' | 'factory-missing';

/**
 * Thrown when an effects call breaks a state rule. The caller can recover,
 * e.g. re-enable the manager and retry.
 */
export class EffectsError extends Error {
  constructor(
    message: string,
    public readonly type: EffectsErrorType
  ) {
    super(message);
    this.name = 'EffectsError';
  }
}
