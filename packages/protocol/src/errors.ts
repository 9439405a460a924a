export type LedgerErrorKind = 'precondition' | 'consistency' | 'external';

const ERROR_KINDS = {
  'invalid-parameters': 'precondition',
  'not-governance': 'precondition',
  'not-owner-or-operator': 'precondition',
  'not-authorizer': 'precondition',
  'not-panic-button': 'precondition',
  'operator-not-found': 'precondition',
  'operator-in-use': 'precondition',
  'legacy-owner-in-use': 'precondition',
  'amount-below-minimum': 'precondition',
  'application-not-approved': 'precondition',
  'application-not-disabled': 'precondition',
  'application-not-authorized': 'precondition',
  'application-unknown': 'precondition',
  'operator-not-authorized': 'precondition',
  'too-many-applications': 'precondition',
  'nothing-to-process': 'precondition',
  'nothing-to-slash': 'precondition',
  'nothing-to-unstake': 'precondition',
  'nothing-authorized': 'precondition',
  'no-pending-decrease': 'precondition',
  'not-enough-stake-to-authorize': 'consistency',
  'amount-exceeds-authorized': 'consistency',
  'too-much-to-unstake': 'consistency',
  'unstake-too-early': 'consistency',
  'stake-still-authorized': 'consistency',
  'nothing-to-top-up': 'consistency',
  'no-discrepancy': 'consistency',
  'treasury-insufficient': 'consistency',
  'nothing-to-sync': 'external',
  'conversion-yields-zero': 'external',
  'application-unreachable': 'external',
} as const satisfies Record<string, LedgerErrorKind>;

export type LedgerErrorCode = keyof typeof ERROR_KINDS;

export class LedgerError extends Error {
  public code: LedgerErrorCode;
  public kind: LedgerErrorKind;
  public detail?: string;

  constructor(code: LedgerErrorCode, detail?: string) {
    const suffix = detail ? `: ${detail}` : '';
    super(`${code}${suffix}`);
    this.name = 'LedgerError';
    this.code = code;
    this.kind = ERROR_KINDS[code];
    this.detail = detail;
  }
}

export const isLedgerError = (error: unknown): error is LedgerError => error instanceof LedgerError;

