import { AppError, DatabaseError, errorMessage } from '../../errors';

export function sqlStateOf(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** Runs a store operation, turning driver failures into DatabaseError. */
export async function withDatabaseErrors<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (err) {
    if (err instanceof AppError) throw err;
    throw new DatabaseError(errorMessage(err), sqlStateOf(err));
  }
}
