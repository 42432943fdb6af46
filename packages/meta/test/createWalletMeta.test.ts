import { describe, it, expect, vi, afterEach } from 'vitest';
import { createWalletMeta } from '../src/createWalletMeta';
import { InvalidCoinTypeError } from '../src/errors';
import { CoinType, CryptoType, WalletType } from '../src/types';
import type { MetaDefaults } from '../src/types';

describe('createWalletMeta', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should apply the built-in defaults', () => {
    const meta = createWalletMeta({ filename: 'new.wlt', seed: 'test seed', timestamp: 1700000000 });

    expect(meta.toJSON()).toEqual({
      version: '0.4',
      filename: 'new.wlt',
      label: '',
      tm: '1700000000',
      type: 'deterministic',
      coin: 'skycoin',
      encrypted: 'false',
      cryptoType: '',
      seed: 'test seed',
      lastSeed: 'test seed',
      secrets: '',
      seedPassphrase: '',
      xpub: '',
    });
    expect(meta.hasBip44Coin()).toBe(false);
    expect(() => meta.validate()).not.toThrow();
  });

  it('should stamp the current time in unix seconds', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));

    const meta = createWalletMeta({ filename: 'now.wlt', seed: 'test seed' });

    expect(meta.timestamp()).toBe(1704067200);
  });

  it('should resolve coin aliases', () => {
    const meta = createWalletMeta({ filename: 'btc.wlt', coin: 'BTC', seed: 'test seed' });

    expect(meta.coin()).toBe(CoinType.Bitcoin);
  });

  it('should reject unknown coins', () => {
    expect(() => createWalletMeta({ filename: 'x.wlt', coin: 'eth' })).toThrow(InvalidCoinTypeError);
  });

  it('should default the bip44 coin type from the coin', () => {
    const sky = createWalletMeta({ filename: 'a.wlt', type: WalletType.Bip44, seed: 'test seed' });
    const btc = createWalletMeta({
      filename: 'b.wlt',
      type: WalletType.Bip44,
      coin: CoinType.Bitcoin,
      seed: 'test seed',
    });

    expect(sky.bip44Coin()).toBe(8000);
    expect(btc.bip44Coin()).toBe(0);
    expect(btc.hasBip44Coin()).toBe(true);
  });

  it('should prefer an explicit bip44 coin type', () => {
    const meta = createWalletMeta({
      filename: 'a.wlt',
      type: WalletType.Bip44,
      bip44Coin: 1,
      seed: 'test seed',
    });

    expect(meta.bip44Coin()).toBe(1);
  });

  it('should leave lastSeed empty for non-deterministic wallets', () => {
    const meta = createWalletMeta({ filename: 'a.wlt', type: WalletType.Bip44, seed: 'test seed' });

    expect(meta.lastSeed()).toBe('');
  });

  it('should use the given defaults', () => {
    const defaults: MetaDefaults = {
      version: '0.5',
      coin: CoinType.Bitcoin,
      cryptoType: CryptoType.Sha256Xor,
      type: WalletType.Collection,
    };

    const meta = createWalletMeta({ filename: 'c.wlt', label: 'Cold' }, defaults);

    expect(meta.version()).toBe('0.5');
    expect(meta.coin()).toBe(CoinType.Bitcoin);
    expect(meta.type()).toBe('collection');
    expect(meta.label()).toBe('Cold');
    expect(meta.isEncrypted()).toBe(false);
  });
});
