export type FailureKind =
  | "precondition"
  | "render"
  | "secret"
  | "orchestration"
  | "bootstrap"
  | "federation";

export interface ProvisionErrorOptions {
  hint?: string; // extra guidance, shown under the message
  cause?: unknown;
}

/** Fatal failure: the run stops and the CLI exits non-zero. */
export class ProvisionError extends Error {
  readonly kind: FailureKind;
  readonly hint?: string;

  constructor(
    kind: FailureKind,
    message: string,
    options: ProvisionErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "ProvisionError";
    this.kind = kind;
    this.hint = options.hint;
  }
}

export function isProvisionError(err: unknown): err is ProvisionError {
  return err instanceof ProvisionError;
}

/** Collate an error into the lines shown in the final cancel message. */
export function describeFailure(err: unknown): string[] {
  if (!isProvisionError(err)) {
    return [err instanceof Error ? err.message : String(err)];
  }
  const lines = [`${err.kind} error: ${err.message}`];
  if (err.hint) lines.push(`  - ${err.hint}`);
  return lines;
}
