import { Request, Response, NextFunction } from 'express';

/** Largest value of the int4 id columns */
export const MAX_ID = 2147483647;

/**
 * Parses an id from a JSON number or a decimal string, within 1..MAX_ID
 */
export function parsePositiveInt(value: unknown): number | null {
  let parsed: number;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string' && /^[1-9][0-9]*$/.test(value)) {
    parsed = Number(value);
  } else {
    return null;
  }
  return Number.isInteger(parsed) && parsed > 0 && parsed <= MAX_ID ? parsed : null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate numeric id route parameter
 */
export function validateIdParam(paramName: string = 'id') {
  return (req: Request, res: Response, next: NextFunction) => {
    const value = req.params[paramName];

    if (parsePositiveInt(value) === null) {
      res.status(400).json({
        error: {
          code: 'VALIDATION_ERROR',
          message: `${paramName} must be a positive integer`,
          field: paramName,
        },
      });
      return;
    }

    next();
  };
}
