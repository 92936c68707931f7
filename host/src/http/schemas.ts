import { z } from 'zod';
import { fromZodError } from '../errors';

export const VolumeSetSchema = z.object({
  volume: z.number({
    required_error: 'is required',
    invalid_type_error: 'must be a number'
  })
    .min(0, 'must be between 0.0 and 1.0')
    .max(1, 'must be between 0.0 and 1.0')
});

export const MicStateSchema = z.object({
  muted: z.boolean({
    required_error: 'is required',
    invalid_type_error: 'must be a boolean'
  }),
  correlationId: z.string().min(1).optional()
});

export const BridgeModeSchema = z.object({
  enabled: z.boolean({
    required_error: 'is required',
    invalid_type_error: 'must be a boolean'
  })
});

export const PollQuerySchema = z.object({
  timeout: z.coerce.number().int().min(0).max(120000).optional()
});

export const LogsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional()
});

export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw fromZodError(result.error);
  }
  return result.data;
}

export function queryObject(url: URL, keys: string[]): Record<string, string | undefined> {
  const query: Record<string, string | undefined> = {};
  for (const key of keys) {
    query[key] = url.searchParams.get(key) ?? undefined;
  }
  return query;
}
