import { z } from 'zod';

export class ContractValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[],
    public readonly rawData: unknown
  ) {
    super(message);
    this.name = 'ContractValidationError';
  }
}

export function parseContract<T extends z.ZodTypeAny>(schema: T, data: unknown, context?: string): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const message = context
      ? `Contract validation failed for ${context}: ${result.error.message}`
      : `Contract validation failed: ${result.error.message}`;
    throw new ContractValidationError(message, result.error.issues, data);
  }
  return result.data;
}

export function safeParseContract<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown
): { success: true; data: z.output<T> } | { success: false; error: z.ZodError; rawData: unknown } {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error, rawData: data };
}
