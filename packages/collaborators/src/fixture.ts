import type { Address, ConversionOracle, LedgerCollaborators } from '@stake-ledger/protocol';
import { InMemoryApplicationRegistry } from './applications';
import { InMemoryLegacyMirrorA } from './legacy-a';
import { InMemoryLegacyMirrorB } from './legacy-b';
import { identityConversionOracle } from './oracle';
import { InMemoryToken } from './token';

export type InMemoryCollaborators = {
  token: InMemoryToken;
  legacyA: InMemoryLegacyMirrorA;
  legacyB: InMemoryLegacyMirrorB;
  applications: InMemoryApplicationRegistry;
  collaborators: LedgerCollaborators;
};

export type InMemoryCollaboratorOptions = {
  legacyAOracle?: ConversionOracle;
  legacyBOracle?: ConversionOracle;
};

export const createInMemoryCollaborators = (
  ledgerAddress: Address,
  options: InMemoryCollaboratorOptions = {},
): InMemoryCollaborators => {
  const token = new InMemoryToken();
  const legacyA = new InMemoryLegacyMirrorA();
  const legacyB = new InMemoryLegacyMirrorB();
  const applications = new InMemoryApplicationRegistry();
  return {
    token,
    legacyA,
    legacyB,
    applications,
    collaborators: {
      token: token.as(ledgerAddress),
      legacyA,
      legacyB,
      legacyAOracle: options.legacyAOracle ?? identityConversionOracle(),
      legacyBOracle: options.legacyBOracle ?? identityConversionOracle(),
      applications,
    },
  };
};
