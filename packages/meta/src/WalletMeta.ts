import { HDNodeVoidWallet, HDNodeWallet, decodeBase58, getBytes, sha256, toBeArray } from 'ethers';
import { isCoinType, isCryptoType, isWalletType, resolveCoinType } from './CoinType';
import { InvalidMetaError, MalformedFieldError } from './errors';
import { META_KEYS, MetaKey, WalletType } from './types';
import type { CoinType, CryptoType, MetaEntries } from './types';

const META_KEY_SET: ReadonlySet<string> = new Set<string>(META_KEYS);

const MAX_UINT32 = 0xffffffff;
const MIN_INT64 = -(2n ** 63n);
const MAX_INT64 = 2n ** 63n - 1n;

// version (4) + depth (1) + fingerprint (4) + index (4) + chain code (32) + key (33)
const EXTENDED_KEY_PAYLOAD_LENGTH = 78;
const EXTENDED_KEY_LENGTH = EXTENDED_KEY_PAYLOAD_LENGTH + 4;

// Literals accepted for the encrypted flag; older wallet files use the short forms
const TRUE_LITERALS = new Set(['1', 't', 'T', 'true', 'TRUE', 'True']);
const FALSE_LITERALS = new Set(['0', 'f', 'F', 'false', 'FALSE', 'False']);

export function isMetaKey(key: string): key is MetaKey {
  return META_KEY_SET.has(key);
}

function parseBool(value: string): boolean | undefined {
  if (TRUE_LITERALS.has(value)) return true;
  if (FALSE_LITERALS.has(value)) return false;
  return undefined;
}

function parseInt64(value: string): bigint | undefined {
  if (!/^[+-]?\d+$/.test(value)) return undefined;
  const n = BigInt(value);
  return n >= MIN_INT64 && n <= MAX_INT64 ? n : undefined;
}

function parseUint32(value: string): number | undefined {
  if (!/^\d+$/.test(value)) return undefined;
  const n = Number(value);
  return n <= MAX_UINT32 ? n : undefined;
}

/**
 * WalletMeta holds a wallet's metadata.
 *
 * Every value is stored as a string under one of the {@link MetaKey} names, which
 * is the form the persistence layer reads and writes. Typed accessors decode on
 * read and encode on write. Setters never check cross-field invariants; use
 * {@link WalletMeta.validate} or the compound operations for that.
 *
 * Not synchronized: the owning wallet serializes access.
 */
export class WalletMeta {
  private readonly fields = new Map<MetaKey, string>();

  constructor(entries: MetaEntries = {}) {
    for (const key of META_KEYS) {
      const value = entries[key];
      if (value !== undefined) {
        this.fields.set(key, value);
      }
    }
  }

  /**
   * Build metadata from an untrusted mapping (e.g. a wallet file just read from disk).
   * Unknown keys are dropped, typed fields are checked, the coin is canonicalized
   * and the cross-field invariants are enforced.
   */
  static parse(raw: Record<string, unknown>): WalletMeta {
    const meta = new WalletMeta();

    for (const [key, value] of Object.entries(raw)) {
      if (!isMetaKey(key)) {
        console.warn(`Dropping unknown wallet meta key: ${key}`);
        continue;
      }
      if (typeof value !== 'string') {
        throw new InvalidMetaError(`Wallet meta field "${key}" must be a string`, key);
      }
      meta.fields.set(key, value);
    }

    const encrypted = meta.fields.get(MetaKey.Encrypted);
    if (encrypted !== undefined && parseBool(encrypted) === undefined) {
      throw new InvalidMetaError('Wallet meta field "encrypted" must be a boolean', MetaKey.Encrypted);
    }

    const tm = meta.fields.get(MetaKey.Timestamp);
    if (tm !== undefined && tm !== '' && parseInt64(tm) === undefined) {
      throw new InvalidMetaError('Wallet meta field "tm" must be an integer', MetaKey.Timestamp);
    }

    const bip44Coin = meta.fields.get(MetaKey.Bip44Coin);
    if (bip44Coin !== undefined && parseUint32(bip44Coin) === undefined) {
      throw new InvalidMetaError(
        'Wallet meta field "bip44Coin" must be a 32-bit unsigned integer',
        MetaKey.Bip44Coin
      );
    }

    const coin = meta.fields.get(MetaKey.Coin);
    if (coin !== undefined && coin !== '') {
      meta.setCoin(resolveCoinType(coin));
    }

    meta.validate();
    return meta;
  }

  /**
   * Check the cross-field invariants
   * @throws InvalidMetaError on the first violation
   */
  validate(): void {
    if (this.coin() === undefined) {
      throw new InvalidMetaError('Wallet meta is missing a coin type', MetaKey.Coin);
    }

    const type = this.type();
    if (type !== '' && !isWalletType(type)) {
      throw new InvalidMetaError(`Invalid wallet type: "${type}"`, MetaKey.Type);
    }

    if (this.isEncrypted()) {
      const cryptoType = this.cryptoType();
      if (cryptoType === '') {
        throw new InvalidMetaError('Encrypted wallet is missing a crypto type', MetaKey.CryptoType);
      }
      if (!isCryptoType(cryptoType)) {
        throw new InvalidMetaError(`Unknown crypto type: "${cryptoType}"`, MetaKey.CryptoType);
      }
      if (this.secrets() === '') {
        throw new InvalidMetaError('Encrypted wallet is missing its secrets', MetaKey.Secrets);
      }
      for (const key of [MetaKey.Seed, MetaKey.LastSeed, MetaKey.SeedPassphrase]) {
        if ((this.fields.get(key) ?? '') !== '') {
          throw new InvalidMetaError(`Encrypted wallet must not hold a plaintext ${key}`, key);
        }
      }
    } else {
      if (this.cryptoType() !== '') {
        throw new InvalidMetaError('Decrypted wallet must not have a crypto type', MetaKey.CryptoType);
      }
      if (this.secrets() !== '') {
        throw new InvalidMetaError('Decrypted wallet must not hold encrypted secrets', MetaKey.Secrets);
      }
      if ((type === WalletType.Deterministic || type === WalletType.Bip44) && this.seed() === '') {
        throw new InvalidMetaError(`Decrypted ${type} wallet is missing its seed`, MetaKey.Seed);
      }
    }

    if (type === WalletType.Bip44 && !this.hasBip44Coin()) {
      throw new InvalidMetaError('bip44 wallet is missing its bip44 coin type', MetaKey.Bip44Coin);
    }

    if (type === WalletType.XPub) {
      this.validateXPub();
    }
  }

  private validateXPub(): void {
    const xpub = this.xpub();
    if (xpub === '') {
      throw new InvalidMetaError('xpub wallet is missing its xpub key', MetaKey.XPub);
    }

    let bytes: Uint8Array;
    try {
      bytes = toBeArray(decodeBase58(xpub));
    } catch (error) {
      throw new InvalidMetaError('Invalid xpub key', MetaKey.XPub, error);
    }
    if (bytes.length !== EXTENDED_KEY_LENGTH) {
      throw new InvalidMetaError('Invalid xpub key', MetaKey.XPub);
    }

    // fromExtendedKey skips the checksum on full-length keys
    const payload = bytes.slice(0, EXTENDED_KEY_PAYLOAD_LENGTH);
    const checksum = getBytes(sha256(sha256(payload))).slice(0, 4);
    if (!checksum.every((byte, i) => byte === bytes[EXTENDED_KEY_PAYLOAD_LENGTH + i])) {
      throw new InvalidMetaError('xpub key checksum mismatch', MetaKey.XPub);
    }

    let node: HDNodeWallet | HDNodeVoidWallet;
    try {
      node = HDNodeWallet.fromExtendedKey(xpub);
    } catch (error) {
      throw new InvalidMetaError('Invalid xpub key', MetaKey.XPub, error);
    }

    if (!(node instanceof HDNodeVoidWallet)) {
      throw new InvalidMetaError('xpub key must be an extended public key', MetaKey.XPub);
    }
  }

  /**
   * Make an independent copy
   */
  clone(): WalletMeta {
    return new WalletMeta(this.toJSON());
  }

  /**
   * Wipe the plaintext seed, last seed and seed passphrase
   */
  eraseSeeds(): void {
    this.setSeed('');
    this.setLastSeed('');
    this.setSeedPassphrase('');
  }

  /**
   * Raw stored value for a key, undefined when the key is unset or unknown
   */
  find(key: string): string | undefined {
    return isMetaKey(key) ? this.fields.get(key) : undefined;
  }

  has(key: MetaKey): boolean {
    return this.fields.has(key);
  }

  get size(): number {
    return this.fields.size;
  }

  /**
   * Plain mapping of exactly the stored keys, for the persistence layer
   */
  toJSON(): MetaEntries {
    const entries: MetaEntries = {};
    for (const [key, value] of this.fields) {
      entries[key] = value;
    }
    return entries;
  }

  type(): string {
    return this.fields.get(MetaKey.Type) ?? '';
  }

  setType(type: string): void {
    this.fields.set(MetaKey.Type, type);
  }

  version(): string {
    return this.fields.get(MetaKey.Version) ?? '';
  }

  setVersion(version: string): void {
    this.fields.set(MetaKey.Version, version);
  }

  filename(): string {
    return this.fields.get(MetaKey.Filename) ?? '';
  }

  setFilename(filename: string): void {
    this.fields.set(MetaKey.Filename, filename);
  }

  label(): string {
    return this.fields.get(MetaKey.Label) ?? '';
  }

  setLabel(label: string): void {
    this.fields.set(MetaKey.Label, label);
  }

  lastSeed(): string {
    return this.fields.get(MetaKey.LastSeed) ?? '';
  }

  setLastSeed(lastSeed: string): void {
    this.fields.set(MetaKey.LastSeed, lastSeed);
  }

  seed(): string {
    return this.fields.get(MetaKey.Seed) ?? '';
  }

  setSeed(seed: string): void {
    this.fields.set(MetaKey.Seed, seed);
  }

  seedPassphrase(): string {
    return this.fields.get(MetaKey.SeedPassphrase) ?? '';
  }

  setSeedPassphrase(passphrase: string): void {
    this.fields.set(MetaKey.SeedPassphrase, passphrase);
  }

  accountsHash(): string {
    return this.fields.get(MetaKey.AccountsHash) ?? '';
  }

  setAccountsHash(hash: string): void {
    this.fields.set(MetaKey.AccountsHash, hash);
  }

  xpub(): string {
    return this.fields.get(MetaKey.XPub) ?? '';
  }

  setXPub(xpub: string): void {
    this.fields.set(MetaKey.XPub, xpub);
  }

  /**
   * The wallet's coin type, undefined when unset.
   * Not alias-resolved: values from untrusted storage go through {@link WalletMeta.parse}.
   * @throws MalformedFieldError if the stored value is not a canonical coin type
   */
  coin(): CoinType | undefined {
    const value = this.fields.get(MetaKey.Coin);
    if (value === undefined || value === '') {
      return undefined;
    }
    if (!isCoinType(value)) {
      throw new MalformedFieldError(MetaKey.Coin, value, 'a coin type');
    }
    return value;
  }

  setCoin(coin: CoinType): void {
    this.fields.set(MetaKey.Coin, coin);
  }

  /**
   * The bip44 coin type, or undefined if this is not a bip44 wallet.
   * Zero is a valid coin type (bitcoin), so check for undefined, not falsiness.
   * @throws MalformedFieldError if the stored value is not a uint32
   */
  bip44Coin(): number | undefined {
    const value = this.fields.get(MetaKey.Bip44Coin);
    if (value === undefined) {
      return undefined;
    }
    const coin = parseUint32(value);
    if (coin === undefined) {
      throw new MalformedFieldError(MetaKey.Bip44Coin, value, 'a 32-bit unsigned integer');
    }
    return coin;
  }

  hasBip44Coin(): boolean {
    return this.bip44Coin() !== undefined;
  }

  setBip44Coin(coin: number): void {
    if (!Number.isInteger(coin) || coin < 0 || coin > MAX_UINT32) {
      throw new RangeError(`bip44 coin type must be a 32-bit unsigned integer, got ${coin}`);
    }
    this.fields.set(MetaKey.Bip44Coin, coin.toString());
  }

  /**
   * Whether the wallet secrets are encrypted. An unset flag reads as false.
   * @throws MalformedFieldError if the flag is set to something other than a boolean
   */
  isEncrypted(): boolean {
    const value = this.fields.get(MetaKey.Encrypted);
    if (value === undefined) {
      return false;
    }
    const encrypted = parseBool(value);
    if (encrypted === undefined) {
      throw new MalformedFieldError(MetaKey.Encrypted, value, 'a boolean');
    }
    return encrypted;
  }

  private setIsEncrypted(encrypted: boolean): void {
    this.fields.set(MetaKey.Encrypted, String(encrypted));
  }

  /**
   * Record that the secrets are now encrypted. Plaintext seeds must already be
   * erased with {@link WalletMeta.eraseSeeds}; this does not erase them.
   */
  setEncrypted(cryptoType: CryptoType, encryptedSecrets: string): void {
    this.setCryptoType(cryptoType);
    this.setSecrets(encryptedSecrets);
    this.setIsEncrypted(true);
  }

  /**
   * Clear the encryption fields. The caller restores the plaintext seeds.
   */
  setDecrypted(): void {
    this.setIsEncrypted(false);
    this.setSecrets('');
    this.setCryptoType('');
  }

  cryptoType(): string {
    return this.fields.get(MetaKey.CryptoType) ?? '';
  }

  private setCryptoType(cryptoType: string): void {
    this.fields.set(MetaKey.CryptoType, cryptoType);
  }

  secrets(): string {
    return this.fields.get(MetaKey.Secrets) ?? '';
  }

  private setSecrets(secrets: string): void {
    this.fields.set(MetaKey.Secrets, secrets);
  }

  /**
   * Creation time in unix seconds. Unset or unparsable values read as 0;
   * the load path has already checked the field.
   * @throws MalformedFieldError for an int64 that a number cannot hold exactly
   */
  timestamp(): number {
    const value = this.fields.get(MetaKey.Timestamp) ?? '';
    const timestamp = parseInt64(value);
    if (timestamp === undefined) {
      return 0;
    }
    if (timestamp < BigInt(Number.MIN_SAFE_INTEGER) || timestamp > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new MalformedFieldError(MetaKey.Timestamp, value, 'a timestamp within the safe integer range');
    }
    return Number(timestamp);
  }

  setTimestamp(timestamp: number): void {
    if (!Number.isSafeInteger(timestamp)) {
      throw new RangeError(`timestamp must be an integer, got ${timestamp}`);
    }
    this.fields.set(MetaKey.Timestamp, timestamp.toString());
  }
}
