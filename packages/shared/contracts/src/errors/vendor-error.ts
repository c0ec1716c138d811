/**
 * Vendor Error Envelope
 *
 * Error body returned by every simulated endpoint: `{ error: { code, message } }`,
 * where `code` repeats the HTTP status. Clients written against the real API
 * parse this shape, so it must not carry extra top-level fields.
 */

import type { Response } from 'express';
import { z } from 'zod';

export type ParameterLocation = 'QUERY' | 'PATH' | 'PAYLOAD_BODY' | 'HEADER';

export const ConstraintViolationSchema = z.object({
  path: z.string(),
  message: z.string(),
  parameterLocation: z.enum(['QUERY', 'PATH', 'PAYLOAD_BODY', 'HEADER']).optional(),
});
export type ConstraintViolation = z.infer<typeof ConstraintViolationSchema>;

export const VendorErrorEnvelopeSchema = z.object({
  error: z.object({
    code: z.number().int(),
    message: z.string(),
    constraintViolations: z.array(ConstraintViolationSchema).optional(),
  }),
});
export type VendorErrorEnvelope = z.infer<typeof VendorErrorEnvelopeSchema>;

export function createVendorError(
  statusCode: number,
  message: string,
  constraintViolations?: ConstraintViolation[]
): VendorErrorEnvelope {
  return {
    error: {
      code: statusCode,
      message,
      ...(constraintViolations && constraintViolations.length > 0 && { constraintViolations }),
    },
  };
}

export function sendVendorError(
  res: Response,
  statusCode: number,
  message: string,
  constraintViolations?: ConstraintViolation[]
): void {
  res.status(statusCode).json(createVendorError(statusCode, message, constraintViolations));
}
