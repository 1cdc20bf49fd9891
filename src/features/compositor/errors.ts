export type CompositorErrorType =
  | 'duplicate-window'
  | 'duplicate-output'
  | 'not-initialized'
  | 'parent-cycle';

/**
 * Thrown when a compositor call would break a registry or lifecycle rule.
 * Unknown ids are not errors; those calls return false instead.
 */
export class CompositorError extends Error {
  constructor(
    message: string,
    public readonly type: CompositorErrorType
  ) {
    super(message);
    this.name = 'CompositorError';
  }
}
