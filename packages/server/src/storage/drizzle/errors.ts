import postgres from 'postgres';
import { ConflictError } from '../../errors/storage-error.js';

const UNIQUE_VIOLATION = '23505';

function findUniqueViolation(error: unknown): postgres.PostgresError | null {
  let current: unknown = error;

  // Driver errors may arrive wrapped
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if (current instanceof postgres.PostgresError && current.code === UNIQUE_VIOLATION) {
      return current;
    }
    current = current.cause;
  }

  return null;
}

/**
 * Run a write, translating unique violations into ConflictError
 *
 * `targets` maps constraint names to the logical key reported to callers.
 */
export async function withConflictMapping<T>(
  operation: () => Promise<T>,
  targets: Record<string, string>
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    const violation = findUniqueViolation(error);
    if (violation) {
      throw new ConflictError(targets[violation.constraint_name ?? ''] ?? 'unknown', { cause: error });
    }
    throw error;
  }
}
