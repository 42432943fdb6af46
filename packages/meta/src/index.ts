/**
 * @walletmeta/meta
 *
 * Typed wallet metadata: identity, coin type, derivation state and encryption status.
 *
 * @example
 * ```typescript
 * import { WalletMeta, CoinType, resolveCoinType } from '@walletmeta/meta';
 *
 * const meta = new WalletMeta();
 * meta.setCoin(resolveCoinType('btc'));
 * meta.isEncrypted(); // false
 * ```
 */

export { WalletMeta, isMetaKey } from './WalletMeta';
export { createWalletMeta } from './createWalletMeta';
export { resolveCoinType, isCoinType, isCryptoType, isWalletType, defaultBip44Coin } from './CoinType';
export { ConfigLoader, DEFAULT_META_DEFAULTS } from './utils/ConfigLoader';
export {
  MetaError,
  MetaErrorCode,
  InvalidCoinTypeError,
  MalformedFieldError,
  InvalidMetaError,
  ConfigError,
  isMetaError,
} from './errors';
export * from './types';
