import { InvalidCoinTypeError } from './errors';
import { Bip44CoinType, CoinType, CryptoType, WalletType } from './types';

const COIN_TYPES: readonly string[] = Object.values(CoinType);
const CRYPTO_TYPES: readonly string[] = Object.values(CryptoType);
const WALLET_TYPES: readonly string[] = Object.values(WalletType);

/**
 * Normalize a user-supplied coin name (case-insensitive, with aliases) to a CoinType
 * @throws InvalidCoinTypeError for anything else
 */
export function resolveCoinType(input: string): CoinType {
  switch (input.toLowerCase()) {
    case 'sky':
    case 'skycoin':
      return CoinType.Skycoin;
    case 'btc':
    case 'bitcoin':
      return CoinType.Bitcoin;
    default:
      throw new InvalidCoinTypeError(input);
  }
}

/**
 * Check for a canonical coin type value (no alias resolution)
 */
export function isCoinType(value: string): value is CoinType {
  return COIN_TYPES.includes(value);
}

export function isCryptoType(value: string): value is CryptoType {
  return CRYPTO_TYPES.includes(value);
}

export function isWalletType(value: string): value is WalletType {
  return WALLET_TYPES.includes(value);
}

/**
 * BIP-44 coin index used by default for a coin's bip44 wallets
 */
export function defaultBip44Coin(coin: CoinType): number {
  switch (coin) {
    case CoinType.Skycoin:
      return Bip44CoinType.Skycoin;
    case CoinType.Bitcoin:
      return Bip44CoinType.Bitcoin;
  }
}
