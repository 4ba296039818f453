import { z } from 'zod';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ValidationError } from '../types/errors';

const describeIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`).join('; ');

const parseWith = <S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> => {
  const parsed = schema.safeParse(value);
  if (!parsed.success) throw new ValidationError(`Validation error: ${describeIssues(parsed.error)}`);
  return parsed.data;
};

export const parseBody = <S extends z.ZodTypeAny>(schema: S, req: Request): z.output<S> => parseWith(schema, req.body);

export const parseQuery = <S extends z.ZodTypeAny>(schema: S, req: Request): z.output<S> =>
  parseWith(schema, req.query);

/** Accepts a single item or an array of them. */
export const asBatch = (body: unknown): unknown[] => (Array.isArray(body) ? body : [body]);

/**
 * Rejects the request early when `{ body, query, params }` does not match
 * `schema`. Handlers still parse what they read.
 */
export const validate =
  (schema: z.ZodTypeAny): RequestHandler =>
  (req: Request, _res: Response, next: NextFunction): void => {
    try {
      parseWith(schema, { body: req.body, query: req.query, params: req.params });
      next();
    } catch (error) {
      next(error);
    }
  };

export const routeSchemas = {
  idParam: z.object({ params: z.object({ id: z.string().uuid('Invalid id') }) }),
};
