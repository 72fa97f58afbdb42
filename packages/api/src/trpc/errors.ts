// Mapping of runtime errors onto tRPC error codes

import {
  ConstraintViolation,
  DuplicateIdentifierError,
  IdentityChangeError,
  IntegrityError,
  RevisionNotFoundError,
  ValidationError,
} from '@revlog/runtime';
import { TRPCError } from '@trpc/server';

type TRPCErrorCode = ConstructorParameters<typeof TRPCError>[0]['code'];

/**
 * The tRPC code for a runtime error, or null for anything unrecognized.
 */
export function errorCodeFor(error: unknown): TRPCErrorCode | null {
  if (error instanceof ValidationError || error instanceof ConstraintViolation) {
    return 'BAD_REQUEST';
  }
  if (error instanceof RevisionNotFoundError) {
    return 'NOT_FOUND';
  }
  if (error instanceof DuplicateIdentifierError || error instanceof IdentityChangeError) {
    return 'CONFLICT';
  }
  if (error instanceof IntegrityError) {
    return 'INTERNAL_SERVER_ERROR';
  }
  return null;
}

/**
 * Wrap a runtime error in a TRPCError that keeps its message and cause.
 */
export function toTRPCError(error: unknown): TRPCError | null {
  const code = errorCodeFor(error);
  if (!code || !(error instanceof Error)) return null;

  return new TRPCError({ code, message: error.message, cause: error });
}
