import { z } from 'zod';
import { ValidationError } from '../types/errors';

export const jobSpecSchema = z
  .object({
    requiredCapabilities: z.array(z.string().min(1)).default([]),
    name: z.string().min(1).max(128).optional(),
    script: z.string().min(1).optional(),
    image: z.string().min(1).optional(),
    command: z.array(z.string()).optional(),
    env: z.record(z.string()).optional(),
    resources: z
      .object({
        cpus: z.number().int().positive().optional(),
        memoryMb: z.number().int().positive().optional(),
        gpus: z.number().int().nonnegative().optional(),
        timeLimitMinutes: z.number().int().positive().optional(),
      })
      .optional(),
  })
  .passthrough();

export const jobCreateSchema = z.object({ spec: jobSpecSchema });
export const jobCancelSchema = z.object({ jobId: z.string().uuid() });

export const scheduleCreateSchema = z.object({ jobId: z.string().uuid() });

export const scheduleGetQuerySchema = z.object({
  queryType: z.string().min(1),
  value: z.string().min(1),
  includeInactive: z
    .union([z.boolean(), z.enum(['true', 'false']).transform((v) => v === 'true')])
    .optional(),
});

export const scheduleUpdateSchema = z.object({
  scheduleId: z.string().uuid(),
  externalJobId: z.string().min(1).optional(),
});

export const scheduleDeleteSchema = z.object({ scheduleId: z.string().uuid() });

export const credentialsSchema = z.object({
  email: z.string().email('Invalid email address'),
  password: z.string().min(1, 'Password is required'),
});

export const userCreateSchema = z.object({
  email: z.string().email('Invalid email address'),
  name: z.string().min(2, 'Name must be at least 2 characters'),
  organisation: z.string().optional(),
  role: z.enum(['admin', 'operator', 'viewer']).default('viewer'),
  password: z.string().min(8, 'Password must be at least 8 characters'),
});

/**
 * Parses a whole batch up front so a malformed item rejects the call before
 * anything is written.
 */
export function parseBatch<S extends z.ZodTypeAny>(schema: S, items: unknown, label: string): z.output<S>[] {
  const parsed = z.array(schema).min(1, `${label} batch is empty`).safeParse(items);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.') || label}: ${i.message}`);
    throw new ValidationError(`Invalid ${label} request: ${details.join('; ')}`);
  }
  return parsed.data;
}
