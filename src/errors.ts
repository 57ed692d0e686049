/**
 * Base error for every failure raised by the engine.
 *
 * Each subclass carries a stable `code` so run reports and callers can
 * branch on the kind of failure without matching on messages.
 */
export class EngineError extends Error {
  public readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Narrow an unknown thrown value to a code/message pair for reports.
 */
export function describeError(err: unknown): { code: string; message: string } {
  if (err instanceof EngineError) {
    return { code: err.code, message: err.message };
  }
  if (err instanceof Error) {
    return { code: "UNEXPECTED", message: err.message };
  }
  return { code: "UNEXPECTED", message: String(err) };
}
