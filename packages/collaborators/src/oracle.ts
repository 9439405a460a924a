import type { ConversionOracle } from '@stake-ledger/protocol';

export type RatioConversionOptions = {
  /** Native units obtained for every `divisor` legacy units. */
  ratio: bigint;
  divisor: bigint;
};

export const createRatioConversionOracle = ({ ratio, divisor }: RatioConversionOptions): ConversionOracle => {
  if (ratio <= 0n || divisor <= 0n) {
    throw new Error('conversion ratio and divisor must be positive');
  }
  return {
    toNative: (legacyAmount) => {
      const remainder = legacyAmount % divisor;
      return { amount: ((legacyAmount - remainder) * ratio) / divisor, remainder };
    },
    fromNative: (nativeAmount) => {
      const remainder = nativeAmount % ratio;
      return { amount: ((nativeAmount - remainder) * divisor) / ratio, remainder };
    },
  };
};

export const identityConversionOracle = (): ConversionOracle =>
  createRatioConversionOracle({ ratio: 1n, divisor: 1n });
