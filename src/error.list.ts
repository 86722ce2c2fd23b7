/** A single error wrapping every failure of a batch of operations */
export class ErrorList extends Error {
  readonly errors: readonly Error[];

  constructor(msg: string, errors: readonly Error[]) {
    super(msg);
    this.name = this.constructor.name;
    this.errors = errors;
    this.message = msg + ': ' + errors.map((e) => e.message).join(', ');
    this.stack = errors.map((e) => e.stack).join('\n\n');
  }

  /** Coerce a thrown value into an Error */
  static toError(e: unknown): Error {
    if (e instanceof Error) return e;
    return new Error(String(e));
  }
}
