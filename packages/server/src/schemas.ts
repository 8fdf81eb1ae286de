import { z } from 'zod';

import { EMPTY_LENGTH } from './constants.js';

const finite = (): z.ZodNumber => z.number().finite();

/** Body of POST /api/devices/:deviceId/samples; the server clock fills a missing timestamp */
export const sampleRequestSchema = z.object({
  timestamp: z.number().int().nonnegative().optional(),
  utilizationPct: z.number(),
  memoryUsed: z.number(),
  memoryTotal: z.number(),
  temperatureC: z.number(),
  powerWatts: z.number(),
  fanPct: z.number(),
  coreClockMhz: z.number(),
  memClockMhz: z.number(),
  throttled: z.boolean().default(false),
});

export type SampleRequestBody = z.infer<typeof sampleRequestSchema>;

export const thresholdsUpdateSchema = z
  .object({
    tempWarn: finite().optional(),
    tempCrit: finite().optional(),
    powerWarn: finite().optional(),
    powerCrit: finite().optional(),
    memWarn: finite().optional(),
    memCrit: finite().optional(),
  })
  .strict()
  .refine((update) => Object.keys(update).length > EMPTY_LENGTH, { message: 'At least one threshold is required' });

export type ThresholdsUpdateBody = z.infer<typeof thresholdsUpdateSchema>;

const scoringOverridesSchema = z
  .object({
    tempBaseline: finite(),
    powerBaselinePct: finite(),
    memBaselinePct: finite(),
    warnScore: finite(),
    powerLimitWatts: finite().positive(),
    efficiencyPenalty: finite(),
    minEfficiencyUtilizationPct: finite(),
    powerSpikeDeltaWatts: finite(),
    powerSpikeLookback: z.number().int().positive(),
    powerSpikeTolerance: finite(),
    powerSpikePenalty: finite(),
    powerSpikeAlertCount: z.number().int().positive(),
    rapidHeatingRiseC: finite(),
    rapidHeatingWindowSeconds: finite().positive(),
    throttlePenalty: finite(),
    leakPenalty: finite(),
    fragmentationWeight: finite(),
    leakRatio: finite().positive(),
    leakMonotonicFraction: finite().min(0).max(1),
    leakMinSamples: z.number().int().nonnegative(),
    fragmentationDeltaCeilingPct: finite().positive(),
  })
  .partial()
  .strict();

/** Shape of the SETTINGS_PATH file */
export const settingsFileSchema = z
  .object({
    thresholds: thresholdsUpdateSchema.innerType().optional(),
    scoring: scoringOverridesSchema.optional(),
  })
  .strict();

export type SettingsFileBody = z.infer<typeof settingsFileSchema>;

export const alertsQuerySchema = z.object({
  limit: z.coerce.number().int().positive().optional(),
});
