/**
 * Wire schemas for Faultline
 * Using Zod for runtime validation and type inference
 */

import { z } from 'zod';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema)
  ])
);

const messageField = z.string().describe('Free-form error message');

/**
 * Tagged encoding of every FaultError variant.
 * Custom errors carry no classifier on the wire.
 */
export const FaultErrorSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('Database'), message: messageField }),
  z.object({ kind: z.literal('Network'), message: messageField }),
  z.object({
    kind: z.literal('Validation'),
    field: z.string().describe('Name of the rejected field'),
    message: messageField
  }),
  z.object({
    kind: z.literal('NotFound'),
    resource: z.string().describe('Resource type that was looked up'),
    id: z.string().describe('Identifier that was not found')
  }),
  z.object({ kind: z.literal('Conflict'), message: messageField }),
  z.object({ kind: z.literal('Internal'), message: messageField }),
  z.object({ kind: z.literal('Configuration'), message: messageField }),
  z.object({
    kind: z.literal('NotImplemented'),
    feature: z.string().describe('Missing feature')
  }),
  z.object({ kind: z.literal('Custom'), message: messageField })
]);

/**
 * Encoding of an ErrorContext. The category is not part of it.
 */
export const ErrorContextSchema = z.object({
  errorId: z.string().uuid(),
  operation: z.string(),
  message: z.string(),
  occurredAt: z.string().datetime({ offset: true }),
  attemptCount: z.number().int().nonnegative(),
  metadata: z.record(JsonValueSchema)
});

export type FaultErrorJson = z.infer<typeof FaultErrorSchema>;
export type ErrorContextJson = z.infer<typeof ErrorContextSchema>;

/**
 * Format Zod issues on one line
 */
export function formatSchemaError(error: z.ZodError): string {
  return error.errors
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
