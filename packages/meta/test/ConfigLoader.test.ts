import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ConfigLoader, DEFAULT_META_DEFAULTS } from '../src/utils/ConfigLoader';
import { ConfigError, MetaErrorCode } from '../src/errors';
import { CoinType, CryptoType } from '../src/types';

describe('ConfigLoader', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'wallet-meta-config-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function writeConfig(content: string): Promise<string> {
    const configPath = path.join(tmpDir, 'meta.json');
    await fs.writeFile(configPath, content);
    return configPath;
  }

  describe('loadFromFile', () => {
    it('should merge file values over the built-in defaults', async () => {
      const configPath = await writeConfig(JSON.stringify({ coin: 'btc', version: '0.5' }));

      const defaults = ConfigLoader.loadFromFile(configPath);

      expect(defaults).toEqual({
        version: '0.5',
        coin: CoinType.Bitcoin,
        cryptoType: CryptoType.ScryptChacha20poly1305,
        type: 'deterministic',
      });
      expect(console.log).toHaveBeenCalledWith(`✓ Loaded wallet meta defaults from ${configPath}`);
    });

    it('should throw if the file does not exist', () => {
      expect(() => ConfigLoader.loadFromFile(path.join(tmpDir, 'missing.json'))).toThrow(
        'Config file not found'
      );
    });

    it('should reject invalid JSON', async () => {
      const configPath = await writeConfig('{ not json');

      expect(() => ConfigLoader.loadFromFile(configPath)).toThrow(ConfigError);
    });

    it('should reject a non-object document', async () => {
      const configPath = await writeConfig('["skycoin"]');

      expect(() => ConfigLoader.loadFromFile(configPath)).toThrow(
        `Config file must contain a JSON object: ${configPath}`
      );
    });

    it('should reject an unknown coin', async () => {
      const configPath = await writeConfig(JSON.stringify({ coin: 'eth' }));

      try {
        ConfigLoader.loadFromFile(configPath);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigError);
        if (error instanceof ConfigError) {
          expect(error.message).toBe('Invalid default coin type: "eth"');
          expect(error.code).toBe(MetaErrorCode.InvalidConfig);
        }
      }
    });

    it('should reject an unknown crypto type', async () => {
      const configPath = await writeConfig(JSON.stringify({ cryptoType: 'rot13' }));

      expect(() => ConfigLoader.loadFromFile(configPath)).toThrow('Unknown crypto type: "rot13"');
    });

    it('should reject an unknown wallet type', async () => {
      const configPath = await writeConfig(JSON.stringify({ type: 'paper' }));

      expect(() => ConfigLoader.loadFromFile(configPath)).toThrow('Unknown wallet type: "paper"');
    });

    it('should reject non-string fields', async () => {
      const configPath = await writeConfig(JSON.stringify({ version: 4 }));

      expect(() => ConfigLoader.loadFromFile(configPath)).toThrow(
        'Config field "version" must be a non-empty string'
      );
    });
  });

  describe('fromEnv', () => {
    it('should return the built-in defaults with an empty environment', () => {
      expect(ConfigLoader.fromEnv({})).toEqual(DEFAULT_META_DEFAULTS);
    });

    it('should overlay WALLET_META_* variables', () => {
      const defaults = ConfigLoader.fromEnv({
        WALLET_META_COIN: 'BITCOIN',
        WALLET_META_CRYPTO_TYPE: 'sha256-xor',
        WALLET_META_TYPE: 'bip44',
        WALLET_META_VERSION: '',
      });

      expect(defaults).toEqual({
        version: '0.4',
        coin: CoinType.Bitcoin,
        cryptoType: CryptoType.Sha256Xor,
        type: 'bip44',
      });
    });

    it('should reject an unknown wallet type', () => {
      expect(() => ConfigLoader.fromEnv({ WALLET_META_TYPE: 'paper' })).toThrow(ConfigError);
    });
  });

  describe('load', () => {
    it('should apply the environment over the file', async () => {
      const configPath = await writeConfig(JSON.stringify({ coin: 'bitcoin', type: 'collection' }));

      const defaults = ConfigLoader.load({ configPath, env: { WALLET_META_COIN: 'sky' } });

      expect(defaults.coin).toBe(CoinType.Skycoin);
      expect(defaults.type).toBe('collection');
    });
  });
});
