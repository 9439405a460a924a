import { z } from 'zod';
import { isAmountString } from './amounts';
import type { LedgerEventType } from './types';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; errors: string[] };

const toErrors = (issues: z.ZodIssue[]): string[] => {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'value';
    return `${path}: ${issue.message}`;
  });
};

export const parseWithSchema = <S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
): ParseResult<z.output<S>> => {
  const result = schema.safeParse(value);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return { ok: false, errors: toErrors(result.error.issues) };
};

export const addressSchema = z.string().min(1).max(128);

export const amountSchema = z
  .string()
  .refine(isAmountString, { message: 'expected a non-negative integer string' })
  .transform((value) => BigInt(value));

export const rewardMultiplierSchema = z.number().int().min(0).max(100);

export const stakeSourceSchema = z.enum(['native', 'legacyA', 'legacyB']);

export const LEDGER_EVENT_TYPES = [
  'Staked',
  'ToppedUp',
  'Unstaked',
  'AuthorizationIncreased',
  'AuthorizationDecreaseRequested',
  'AuthorizationDecreaseApproved',
  'AuthorizationInvoluntaryDecreased',
  'SlashingQueued',
  'NotifierRewarded',
  'TokensSeized',
  'SlashingProcessed',
  'ApplicationStatusChanged',
  'PanicButtonSet',
  'MinimumStakeAmountSet',
  'AuthorizationCeilingSet',
  'StakeDiscrepancyPenaltySet',
  'NotificationRewardSet',
  'NotificationRewardPushed',
  'NotificationRewardWithdrawn',
  'GovernanceTransferred',
] as const satisfies readonly LedgerEventType[];

export const ledgerEventTypeSchema = z.enum(LEDGER_EVENT_TYPES);

export const processSlashingRequestSchema = z
  .object({
    processor: addressSchema,
    count: z.number().int().positive(),
  })
  .strict();

export type ProcessSlashingRequest = z.output<typeof processSlashingRequestSchema>;

export const discrepancyNoticeSchema = z
  .object({
    notifier: addressSchema,
    operator: addressSchema,
  })
  .strict();

export type DiscrepancyNotice = z.output<typeof discrepancyNoticeSchema>;

const appAuthorizationSnapshotSchema = z.object({
  application: addressSchema,
  authorized: amountSchema,
  deauthorizing: amountSchema,
});

const operatorSnapshotSchema = z.object({
  operator: addressSchema,
  owner: addressSchema,
  beneficiary: addressSchema,
  authorizer: addressSchema,
  origin: stakeSourceSchema,
  nativeStake: amountSchema,
  legacyAInNative: amountSchema,
  legacyBInNative: amountSchema,
  startStakingMs: z.number().int().nonnegative(),
  authorizations: z.array(appAuthorizationSnapshotSchema),
  authorizedApplications: z.array(addressSchema),
});

const applicationSnapshotSchema = z.object({
  application: addressSchema,
  status: z.enum(['approved', 'disabled']),
  panicButton: addressSchema.optional(),
});

export const ledgerParamsSchema = z.object({
  governance: addressSchema,
  minimumStake: amountSchema,
  authorizationCeiling: z.number().int().nonnegative(),
  discrepancyPenalty: amountSchema,
  discrepancyRewardMultiplier: rewardMultiplierSchema,
  notificationReward: amountSchema,
});

export const ledgerSnapshotSchema = z.object({
  capturedAtMs: z.number(),
  params: ledgerParamsSchema,
  notifiersTreasury: amountSchema,
  operators: z.array(operatorSnapshotSchema),
  applications: z.array(applicationSnapshotSchema),
  legacyBOwners: z.array(z.object({ owner: addressSchema, operator: addressSchema })),
  slashingQueue: z.array(z.object({ operator: addressSchema, amount: amountSchema })),
  slashingQueueIndex: z.number().int().nonnegative(),
});

export type LedgerSnapshot = z.output<typeof ledgerSnapshotSchema>;

/** Wire form of {@link LedgerSnapshot}: amounts are decimal strings. */
export type LedgerSnapshotInput = z.input<typeof ledgerSnapshotSchema>;
