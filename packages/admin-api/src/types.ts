import { z } from 'zod';

/**
 * Response envelopes of the admin REST API. Schemas are deliberately loose:
 * unknown fields pass through and optional fields may be null.
 */

export const listEnvelopeSchema = z
  .object({
    value: z.array(z.unknown()).nullish(),
  })
  .passthrough();

export type ListEnvelope = z.infer<typeof listEnvelopeSchema>;

export const scanJobResponseSchema = z
  .object({
    id: z.string().nullish(),
    status: z.string().nullish(),
    createdDateTime: z.string().nullish(),
    error: z.unknown().optional(),
  })
  .passthrough();

export type ScanJobResponse = z.infer<typeof scanJobResponseSchema>;

/** One past refresh of a dataset */
export interface RefreshEntry {
  requestId: string | null;
  id: string | null;
  refreshType: string | null;
  status: string | null;
  startTime: string | null;
  endTime: string | null;
  serviceExceptionJson: string | null;
}
