/**
 * Request Validation
 * Layer: Interfaces (HTTP)
 *
 * `parseRequest(schema, value)` checks a request part against a Zod schema and
 * returns the parsed, typed data. On failure it throws a ValidationError
 * (400) whose message joins every issue message with "; ", which the error
 * handler sends back as `{ error }`.
 *
 * A missing body (no JSON content-type) is validated as `{}` so the client
 * gets the field-level message ("Company name is required") rather than a
 * complaint about the body itself.
 *
 * Required text is checked for blankness after trimming, but the value is
 * passed on as the client sent it.
 */
import { ValidationError } from '@shared/errors/AppError';
import { z } from 'zod';

export function parseRequest<T extends z.ZodType>(schema: T, value: unknown): z.infer<T> {
  const result = schema.safeParse(value ?? {});

  if (!result.success) {
    const messages = result.error.issues.map((issue) => issue.message).join('; ');
    throw new ValidationError(messages);
  }

  return result.data;
}

const requiredText = (message: string) =>
  z.string({ error: message }).refine((value) => value.trim().length > 0, { error: message });

export const searchBodySchema = z.object({
  company_name: requiredText('Company name is required'),
  jurisdiction: z.string({ error: 'Jurisdiction must be a string' }).nullish(),
});

export const companyDetailsQuerySchema = z.object({
  jurisdiction: requiredText('Jurisdiction is required'),
  company_number: requiredText('Company number is required'),
});
