import { z } from 'zod';

/** A version document could not be read */
export class DocumentParseError extends Error {
  readonly document: string;

  constructor(document: string, reason: string) {
    super(`Invalid ${document}: ${reason}`);
    this.name = this.constructor.name;
    this.document = document;
  }
}

export function parseJson(document: string, input: Buffer | string): unknown {
  try {
    const value: unknown = JSON.parse(input.toString());
    return value;
  } catch (e) {
    throw new DocumentParseError(document, e instanceof Error ? e.message : String(e));
  }
}

export function validateDocument<S extends z.ZodTypeAny>(document: string, schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new DocumentParseError(document, reason);
  }
  return parsed.data;
}
