// =============================================================================
// Request Validation Middleware (Zod)
// =============================================================================

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import { InvalidInputError } from '../../lib/errors';

type ParamsDictionary = Record<string, string>;

// -----------------------------------------------------------------------------
// Shared field schemas
// -----------------------------------------------------------------------------

/** Positive integer id given as a query-string value. */
const queryId = z
  .string()
  .regex(/^\d+$/, 'must be a positive integer')
  .transform((val) => parseInt(val, 10))
  .pipe(z.number().int().min(1))
  .optional();

/**
 * Page numbers are corrected rather than rejected, so any text passes through
 * and the compiler replaces what is not a positive number.
 */
const lenientNumber = z
  .string()
  .optional()
  .transform((val) => (val === undefined || val.trim() === '' ? undefined : Number(val)));

const entityId = z.number().int().min(1);
const tagMap = z.record(z.string(), z.string());

// -----------------------------------------------------------------------------
// Query schemas
// -----------------------------------------------------------------------------

export const paginationQuerySchema = z.object({
  page: lenientNumber,
  size: lenientNumber,
});

export const resourceQuerySchema = paginationQuerySchema.extend({
  type: z.string().optional(),
  location: z.string().optional(),
  environment: z.string().optional(),
  vendor: z.string().optional(),
  subscriptionId: queryId,
  resourceGroupId: queryId,
  search: z.string().optional(),
  tags: z.string().optional(),
  sortField: z.string().optional(),
  sortDirection: z
    .string()
    .transform((val) => val.toLowerCase())
    .pipe(z.enum(['asc', 'desc']))
    .optional(),
});

export const dashboardQuerySchema = z.object({
  subscriptionId: queryId,
  resourceGroupId: queryId,
  location: z.string().optional(),
  environment: z.string().optional(),
});

export const applicationListQuerySchema = paginationQuerySchema.extend({
  ownerEmail: z.string().min(1).optional(),
});

export const tagSuggestionQuerySchema = z.object({
  q: z.string().default(''),
});

export const relationQuerySchema = z.object({
  relationType: z.string().min(1).optional(),
});

// -----------------------------------------------------------------------------
// Body schemas
// -----------------------------------------------------------------------------

export const createResourceBodySchema = z.object({
  externalId: z.string().optional(),
  name: z.string(),
  resourceType: z.string(),
  kind: z.string().optional(),
  location: z.string(),
  subscriptionId: entityId,
  resourceGroupId: entityId,
  tags: tagMap.optional(),
  extendedLocation: z.string().optional(),
  vendor: z.string().optional(),
  environment: z.string().optional(),
  provisioner: z.string().optional(),
});

export const updateResourceBodySchema = createResourceBodySchema.partial();

export const createSubscriptionBodySchema = z.object({
  name: z.string(),
  tenantId: z.string().optional(),
});

export const updateSubscriptionBodySchema = createSubscriptionBodySchema.partial();

export const createResourceGroupBodySchema = z.object({
  name: z.string(),
  subscriptionId: entityId,
});

export const updateResourceGroupBodySchema = createResourceGroupBodySchema.partial();

export const applicationBodySchema = z.object({
  code: z.string().optional(),
  name: z.string().optional(),
  ownerTeam: z.string().optional(),
  ownerEmail: z.string().optional(),
});

export const linkApplicationBodySchema = z.object({
  applicationId: entityId,
  relationType: z.string().min(1).optional(),
});

// -----------------------------------------------------------------------------
// Path parameters
// -----------------------------------------------------------------------------

export function parseId(value: string, name = 'id'): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidInputError(`${name} must be a positive integer`);
  }
  const id = parseInt(value, 10);
  if (id < 1 || !Number.isSafeInteger(id)) {
    throw new InvalidInputError(`${name} must be a positive integer`);
  }
  return id;
}

// -----------------------------------------------------------------------------
// Validation Middleware Factory
// -----------------------------------------------------------------------------

function rejectWith(res: Response, error: z.ZodError): void {
  res.status(400).json({
    error: 'Validation error',
    details: error.issues.map((i) => ({
      path: i.path.join('.'),
      message: i.message,
    })),
  });
}

/**
 * Validate request query parameters against a Zod schema. Handlers behind it
 * see the parsed output as `req.query`.
 */
export function validateQuery<T extends z.ZodTypeAny>(
  schema: T
): RequestHandler<ParamsDictionary, unknown, unknown, z.output<T>> {
  return (req: Request<ParamsDictionary, unknown, unknown, z.output<T>>, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.query);
    if (!result.success) {
      rejectWith(res, result.error);
      return;
    }
    req.query = result.data;
    next();
  };
}

/**
 * Validate request body against a Zod schema.
 */
export function validateBody<T extends z.ZodTypeAny>(
  schema: T
): RequestHandler<ParamsDictionary, unknown, z.output<T>> {
  return (req: Request<ParamsDictionary, unknown, z.output<T>>, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      rejectWith(res, result.error);
      return;
    }
    req.body = result.data;
    next();
  };
}
