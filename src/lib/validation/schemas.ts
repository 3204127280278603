/**
 * Zod schemas for CA response bodies
 *
 * Bodies arrive as JSON text; `decodeBody` parses and validates them and
 * turns any mismatch into a ProtocolViolationError.
 */

import { z } from 'zod';
import { ProtocolViolationError } from '../errors/acme-operation-errors.js';
import type { AcmeProblem } from '../types/authorization.js';

export const ProblemSchema = z.object({
  type: z.string().optional(),
  detail: z.string().optional(),
  status: z.number().int().optional(),
});

export const IdentifierSchema = z.object({
  type: z.string(),
  value: z.string(),
});

export const ChallengeSchema = z.object({
  type: z.string(),
  token: z.string().optional(),
  status: z.string().optional(),
  uri: z.string().optional(),
  error: ProblemSchema.optional().catch(undefined),
});

export const AuthorizationSchema = z.object({
  identifier: IdentifierSchema.optional(),
  status: z.string().optional(),
  expires: z.string().optional(),
  challenges: z.array(ChallengeSchema).default([]),
  combinations: z.array(z.array(z.number().int().nonnegative())).optional(),
});

export const RegistrationSchema = z.object({
  id: z.union([z.number(), z.string()]).optional(),
  contact: z.array(z.string()).optional(),
  agreement: z.string().optional(),
  createdAt: z.string().optional(),
  status: z.string().optional(),
});

/**
 * A polled resource (authorization or challenge). `status` stays unknown so
 * the poller can tell an unrecognized value from a missing one.
 */
export const PolledResourceSchema = z.object({
  status: z.unknown(),
  error: ProblemSchema.optional().catch(undefined),
  challenges: z
    .array(z.object({ error: ProblemSchema.optional().catch(undefined) }))
    .optional()
    .catch(undefined),
});

export const DirectorySchema = z.object({
  'new-reg': z.string().optional(),
  'new-authz': z.string().optional(),
  'new-cert': z.string().optional(),
  'revoke-cert': z.string().optional(),
  'new-nonce': z.string().optional(),
  meta: z
    .object({
      'terms-of-service': z.string().optional(),
      website: z.string().optional(),
    })
    .optional()
    .catch(undefined),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parse a JSON body and validate it against `schema`.
 *
 * @param resource - Name used in the error message
 * @throws {ProtocolViolationError} When the body is not JSON or does not match
 */
export function decodeBody<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: string,
  resource: string,
): T {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (error) {
    throw ProtocolViolationError.malformedBody(
      resource,
      error instanceof Error ? error.message : String(error),
    );
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw ProtocolViolationError.malformedBody(resource, describeIssues(result.error));
  }
  return result.data;
}

/**
 * Best-effort read of a problem document from an error response body.
 * Returns undefined for anything that is not a JSON problem object.
 */
export function readProblem(body: string): AcmeProblem | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    return undefined;
  }
  const result = ProblemSchema.safeParse(raw);
  return result.success ? result.data : undefined;
}
