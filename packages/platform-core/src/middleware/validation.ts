import { Request, Response } from 'express';
import { z } from 'zod';
import { StructuredErrors, getCorrelationId } from '@netkpi/shared-contracts';

export interface FieldError {
  field: string;
  message: string;
  code: string;
}

export function formatZodIssues(error: z.ZodError): FieldError[] {
  return error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message,
    code: err.code,
  }));
}

function handleZodError(res: Response, req: Request, error: z.ZodError, serviceName: string, message: string): void {
  StructuredErrors.validation(res, message, {
    service: serviceName,
    correlationId: getCorrelationId(req),
    details: { errors: formatZodIssues(error) },
  });
}

export interface ValidationHelpers {
  /**
   * Parse the query string; on failure a 400 response is sent and `undefined` returned
   */
  parseQuery: <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, req: Request, res: Response) => T | undefined;
  /**
   * Parse the JSON body; on failure a 400 response is sent and `undefined` returned
   */
  parseBody: <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, req: Request, res: Response) => T | undefined;
}

export function createValidation(serviceName: string): ValidationHelpers {
  const parse = <T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    input: unknown,
    req: Request,
    res: Response,
    message: string
  ): T | undefined => {
    const result = schema.safeParse(input);
    if (result.success) return result.data;
    handleZodError(res, req, result.error, serviceName, message);
    return undefined;
  };

  return {
    parseQuery: (schema, req, res) => parse(schema, req.query, req, res, 'Query parameters validation failed'),
    parseBody: (schema, req, res) => parse(schema, req.body, req, res, 'Request body validation failed'),
  };
}
