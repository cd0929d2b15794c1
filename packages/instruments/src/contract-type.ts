import type { AssetType } from './types.js';

export type DerivativeAssetType = Exclude<AssetType, 'coinpair'>;

export interface ContractClassification {
  assetType: DerivativeAssetType;
  shortCode: string;
}

const CLASSIFICATIONS: Readonly<Record<string, ContractClassification>> = {
  PERPETUAL: { assetType: 'perp', shortCode: 'PF' },
  CURRENT_QUARTER: { assetType: 'future', shortCode: '' },
  NEXT_QUARTER: { assetType: 'future', shortCode: '' },
};

/**
 * Map a venue `contractType` tag to the canonical asset type.
 *
 * Returns undefined for tags this generator does not model (delivering,
 * settled or new contract kinds); callers skip those instruments.
 */
export function classifyContractType(contractType: string | undefined): ContractClassification | undefined {
  if (contractType === undefined || !Object.hasOwn(CLASSIFICATIONS, contractType)) {
    return undefined;
  }
  return CLASSIFICATIONS[contractType];
}
