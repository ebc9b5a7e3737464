/**
 * A request that cannot be accepted as sent: wrong file type, missing
 * MPN column, empty table, bad field. Rejected before any work starts.
 */
export class ValidationError extends Error {
  readonly status = 400;

  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
