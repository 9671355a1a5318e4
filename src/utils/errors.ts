/**
 * REST API Error Class
 * All errors in the application should be converted to this type
 */
export class ApiError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly field?: string,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'ApiError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export const Errors = {
  // 400 Bad Request
  badRequest: (message: string, field?: string) =>
    new ApiError(400, message, field, 'VALIDATION_ERROR'),

  joiningBlocked: (message: string) => new ApiError(400, message, undefined, 'JOINING_BLOCKED'),

  duplicateParticipation: (message = 'User already participates in this challenge') =>
    new ApiError(400, message, undefined, 'DUPLICATE_PARTICIPATION'),

  // 404 Not Found
  notFound: (resource: string, code = 'NOT_FOUND') =>
    new ApiError(404, `${resource} not found`, undefined, code),

  // 409 Conflict
  conflict: (message: string) => new ApiError(409, message, undefined, 'CONFLICT'),
};

/**
 * Postgres reports unique constraint violations with SQLSTATE 23505
 */
export function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === '23505';
}
