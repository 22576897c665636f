/**
 * Signal that every write a task initiated has been issued. Carries no data;
 * durability is the file system's concern.
 */
export interface Completion {
  readonly completed: true;
}

export const COMPLETED: Completion = Object.freeze({ completed: true });

/** Await every completion, failing with the first failure. */
export async function allCompleted(completions: Iterable<Promise<Completion>>): Promise<Completion> {
  await Promise.all(completions);
  return COMPLETED;
}
