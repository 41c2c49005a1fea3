/**
 * Response schemas for the utility API. Wire types in ./types are derived
 * from these.
 */
import { z } from "zod";

export const MeterSchema = z.object({
  meterNumber: z.coerce.string(),
  servicePointNumber: z.coerce.string(),
  meterPointNumber: z.coerce.string(),
  fuelType: z.string(),
  hasAmiSmartMeter: z.boolean().default(false),
  isSmartMeter: z.boolean().optional(),
});

export const BillingAccountSchema = z.object({
  billingAccountId: z.coerce.string(),
  region: z.string().nullable().optional(), // company code
  premiseNumber: z.coerce.string(),
  meter: z
    .object({
      nodes: z.array(MeterSchema),
    })
    .default({ nodes: [] }),
});

export const EnergyUsageSchema = z.object({
  usageYearMonth: z.number().int(),
  usageType: z.string(),
  usage: z.number(),
});

export const EnergyUsageCostSchema = z.object({
  month: z.number().int(),
  fuelType: z.string(),
  amount: z.number(),
});

export const AmiEnergyUsageSchema = z.object({
  date: z.string(),
  quantity: z.number(),
});

export const IntervalReadSchema = z.object({
  startTime: z.string(),
  value: z.number(),
});

// List endpoints: the envelope must be an array; records are checked one by
// one so a malformed record only drops itself
export const RecordListSchema = z.array(z.unknown());
