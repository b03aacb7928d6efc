import { z } from 'zod';

// Event shape shared by the carrier batch response and webhook pushes
export const CarrierEventSchema = z.object({
  time: z.string().nullish(),
  timestamp: z.string().nullish(),
  location: z.string().nullish(),
  description: z.string().nullish()
});

export const CarrierPackageSchema = z.object({
  status: z.string().nullish(),
  events: z.array(CarrierEventSchema).nullish()
});

// getpackageinfo batch response
export const CarrierBatchResponseSchema = z.object({
  data: z.record(z.string(), CarrierPackageSchema).optional(),
  error: z.string().optional()
});

export type CarrierEvent = z.infer<typeof CarrierEventSchema>;
export type CarrierPackage = z.infer<typeof CarrierPackageSchema>;
export type CarrierBatchResponse = z.infer<typeof CarrierBatchResponseSchema>;
