import { z } from 'zod';
import { addressSchema, amountSchema, rewardMultiplierSchema } from './validators';

export const ledgerParamsUpdateSchema = z
  .object({
    governance: addressSchema.optional(),
    minimumStake: amountSchema.optional(),
    authorizationCeiling: z.number().int().nonnegative().optional(),
    discrepancyPenalty: amountSchema.optional(),
    discrepancyRewardMultiplier: rewardMultiplierSchema.optional(),
    notificationReward: amountSchema.optional(),
  })
  .strict();

export type LedgerParamsUpdate = z.output<typeof ledgerParamsUpdateSchema>;

export const ledgerStatusSchema = z.object({
  ok: z.boolean(),
  uptimeMs: z.number(),
  operators: z.number(),
  applications: z.object({ approved: z.number(), disabled: z.number() }),
  slashing: z.object({ queued: z.number(), processed: z.number() }),
  notifiersTreasury: z.string(),
  persistence: z.object({ state: z.boolean(), events: z.boolean() }),
});

export type LedgerStatusResponse = z.infer<typeof ledgerStatusSchema>;
