/**
 * Types for the wallet metadata package
 */

/**
 * Stored key names of the wallet metadata mapping
 */
export const MetaKey = {
  Version: 'version', // wallet version
  Filename: 'filename', // wallet file name
  Label: 'label', // wallet label
  Timestamp: 'tm', // creation time, unix seconds
  Type: 'type', // wallet type
  Coin: 'coin', // coin type
  Encrypted: 'encrypted', // whether the wallet is encrypted
  CryptoType: 'cryptoType', // encryption/decryption type
  Seed: 'seed', // wallet seed
  LastSeed: 'lastSeed', // seed for generating next address [deterministic wallets]
  Secrets: 'secrets', // encrypted seeds and address entry secrets
  Bip44Coin: 'bip44Coin', // bip44 coin type
  AccountsHash: 'accountsHash', // accounts hash
  SeedPassphrase: 'seedPassphrase', // seed passphrase [bip44 wallets]
  XPub: 'xpub', // xpub key [xpub wallets]
} as const;

export type MetaKey = (typeof MetaKey)[keyof typeof MetaKey];

export const META_KEYS: readonly MetaKey[] = Object.values(MetaKey);

/**
 * Target chain the wallet's addresses are derived for
 */
export const CoinType = {
  Skycoin: 'skycoin',
  Bitcoin: 'bitcoin',
} as const;

export type CoinType = (typeof CoinType)[keyof typeof CoinType];

/**
 * Encryption schemes that may protect wallet secrets at rest
 */
export const CryptoType = {
  ScryptChacha20poly1305: 'scrypt-chacha20poly1305',
  ScryptChacha20poly1305NoConstraint: 'scrypt-chacha20poly1305-no-constraint',
  Sha256Xor: 'sha256-xor',
} as const;

export type CryptoType = (typeof CryptoType)[keyof typeof CryptoType];

/**
 * Derivation schemes a wallet can be built on
 */
export const WalletType = {
  Deterministic: 'deterministic',
  Collection: 'collection',
  Bip44: 'bip44',
  XPub: 'xpub',
} as const;

export type WalletType = (typeof WalletType)[keyof typeof WalletType];

/**
 * Registered BIP-44 coin indices
 */
export const Bip44CoinType = {
  Bitcoin: 0,
  BitcoinTestnet: 1,
  Skycoin: 8000,
} as const;

/**
 * Plain key/value form handed to and received from the persistence layer
 */
export type MetaEntries = Partial<Record<MetaKey, string>>;

/**
 * Defaults applied when a new wallet's metadata is generated
 */
export interface MetaDefaults {
  version: string;
  coin: CoinType;
  cryptoType: CryptoType;
  type: WalletType;
}

/**
 * Options for generating the metadata of a new wallet
 */
export interface CreateWalletMetaOptions {
  filename: string;
  label?: string;
  type?: string;
  /** Coin name or alias, resolved with resolveCoinType */
  coin?: string;
  seed?: string;
  lastSeed?: string;
  seedPassphrase?: string;
  xpub?: string;
  bip44Coin?: number;
  /** Unix seconds; defaults to now */
  timestamp?: number;
}
