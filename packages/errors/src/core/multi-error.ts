import { BaseError } from "./base-error"

/**
 * Several independent failures reported as one error.
 *
 * Nested MultiErrors are flattened, so `errors` never contains another MultiError.
 */
export class MultiError extends BaseError<"multiple_errors"> {
  readonly errors: readonly unknown[]

  constructor(errors: readonly unknown[]) {
    const flat = flatten(errors)

    super(flat.map(describe).join("; "), {
      code: "multiple_errors",
      context: { count: flat.length },
    })

    this.errors = Object.freeze(flat)
  }
}

/**
 * Combine failures the way a best-effort caller reports them.
 *
 * - no errors: `undefined`
 * - one error: that error, unchanged
 * - several: a {@link MultiError}
 *
 * `undefined` entries are skipped.
 */
export function combineErrors(errors: readonly unknown[]): unknown {
  const present = errors.filter((e) => e !== undefined)

  if (present.length === 0) return undefined
  if (present.length === 1) return present[0]

  return new MultiError(present)
}

function flatten(errors: readonly unknown[]): unknown[] {
  return errors.flatMap((e) => (e instanceof MultiError ? [...e.errors] : [e]))
}

function describe(err: unknown): string {
  if (err instanceof Error) return err.message

  return typeof err === "string" ? err : String(err)
}
