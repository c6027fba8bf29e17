/**
 * Failure reported by an action collaborator for one attempt.
 * Carries whatever the adapter knows about the cause (exit code, stderr tail…).
 */
export class ActionFailure extends Error {
  constructor(
    message: string,
    public readonly details: Readonly<Record<string, unknown>> = {},
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ActionFailure";
  }
}

/** Normalise anything thrown into an Error, wrapping non-Error values. */
export const toError = (thrown: unknown): Error =>
  thrown instanceof Error ? thrown : new ActionFailure(String(thrown), {}, { cause: thrown });
