/**
 * Raised by storage implementations when a unique constraint is violated.
 *
 * `target` names the logical key that collided (e.g. `tenant.slug`,
 * `user.username`) so services can map it to a domain error.
 */
export class ConflictError extends Error {
  public readonly target: string;

  constructor(target: string, options?: { cause?: unknown }) {
    super(`Unique constraint violated: ${target}`, options);
    this.name = 'ConflictError';
    this.target = target;
  }
}
