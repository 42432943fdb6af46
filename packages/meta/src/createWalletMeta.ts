import { defaultBip44Coin, resolveCoinType } from './CoinType';
import { DEFAULT_META_DEFAULTS } from './utils/ConfigLoader';
import { WalletMeta } from './WalletMeta';
import { WalletType } from './types';
import type { CreateWalletMetaOptions, MetaDefaults } from './types';

/**
 * Generate the metadata for a newly created wallet
 * @param options - Wallet identity and derivation state
 * @param defaults - Version, coin and type used when options leave them out
 */
export function createWalletMeta(
  options: CreateWalletMetaOptions,
  defaults: MetaDefaults = DEFAULT_META_DEFAULTS
): WalletMeta {
  const coin = options.coin !== undefined ? resolveCoinType(options.coin) : defaults.coin;
  const type = options.type ?? defaults.type;

  const meta = new WalletMeta();
  meta.setFilename(options.filename);
  meta.setVersion(defaults.version);
  meta.setLabel(options.label ?? '');
  meta.setCoin(coin);
  meta.setType(type);
  meta.setTimestamp(options.timestamp ?? Math.floor(Date.now() / 1000));
  meta.setSeed(options.seed ?? '');
  meta.setSeedPassphrase(options.seedPassphrase ?? '');
  meta.setXPub(options.xpub ?? '');
  meta.setDecrypted();

  // Deterministic wallets derive their first address from the seed itself
  const lastSeed = options.lastSeed ?? (type === WalletType.Deterministic ? options.seed : undefined);
  meta.setLastSeed(lastSeed ?? '');

  if (options.bip44Coin !== undefined) {
    meta.setBip44Coin(options.bip44Coin);
  } else if (type === WalletType.Bip44) {
    meta.setBip44Coin(defaultBip44Coin(coin));
  }

  return meta;
}
