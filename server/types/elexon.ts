import { z } from 'zod';
import { MAX_SETTLEMENT_PERIODS, isValidSettlementPeriod } from '../utils/calculations';

// Prices and volumes arrive as numbers, but null and numeric strings have both been seen
const numericField = z.union([z.number(), z.string(), z.null()]).optional();

export const systemPriceRecordSchema = z
  .object({
    settlementDate: z.string(),
    settlementPeriod: z.number().int().refine(isValidSettlementPeriod, {
      message: `Settlement period must be between 1 and ${MAX_SETTLEMENT_PERIODS}`
    }),
    startTime: z.string(),
    createdDateTime: z.string().optional(),
    systemSellPrice: numericField,
    systemBuyPrice: numericField,
    netImbalanceVolume: numericField,
    totalAcceptedOfferVolume: numericField,
    totalAcceptedBidVolume: numericField
  })
  .passthrough();

// Records are validated one by one so a single bad row does not sink a day
export const systemPricesResponseSchema = z.object({
  data: z.array(z.unknown())
});

export type ElexonSystemPriceRecord = z.infer<typeof systemPriceRecordSchema>;
