import { readFileSync } from 'fs';
import { isCryptoType, isWalletType, resolveCoinType } from '../CoinType';
import { ConfigError, InvalidCoinTypeError } from '../errors';
import { CoinType, CryptoType, WalletType } from '../types';
import type { MetaDefaults } from '../types';

export const DEFAULT_META_DEFAULTS: Readonly<MetaDefaults> = Object.freeze({
  version: '0.4',
  coin: CoinType.Skycoin,
  cryptoType: CryptoType.ScryptChacha20poly1305,
  type: WalletType.Deterministic,
});

type DefaultsInput = Partial<Record<keyof MetaDefaults, unknown>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  /**
   * Load metadata defaults from a JSON file. Missing fields keep their built-in defaults.
   */
  static loadFromFile(configPath: string, base: MetaDefaults = DEFAULT_META_DEFAULTS): MetaDefaults {
    let data: string;
    try {
      data = readFileSync(configPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new ConfigError(`Config file not found: ${configPath}`, error);
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      throw new ConfigError(`Config file is not valid JSON: ${configPath}`, error);
    }

    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a JSON object: ${configPath}`);
    }

    const defaults = this.merge(base, parsed);
    console.log(`✓ Loaded wallet meta defaults from ${configPath}`);
    return defaults;
  }

  /**
   * Overlay WALLET_META_* environment variables on the given defaults
   */
  static fromEnv(
    env: NodeJS.ProcessEnv = process.env,
    base: MetaDefaults = DEFAULT_META_DEFAULTS
  ): MetaDefaults {
    return this.merge(base, {
      version: env.WALLET_META_VERSION || undefined,
      coin: env.WALLET_META_COIN || undefined,
      cryptoType: env.WALLET_META_CRYPTO_TYPE || undefined,
      type: env.WALLET_META_TYPE || undefined,
    });
  }

  /**
   * File first (when given), then environment
   */
  static load(options: { configPath?: string; env?: NodeJS.ProcessEnv } = {}): MetaDefaults {
    const base = options.configPath
      ? this.loadFromFile(options.configPath)
      : DEFAULT_META_DEFAULTS;
    return this.fromEnv(options.env ?? process.env, base);
  }

  private static merge(base: MetaDefaults, input: DefaultsInput): MetaDefaults {
    const result: MetaDefaults = { ...base };

    if (input.version !== undefined) {
      result.version = this.requireString('version', input.version);
    }

    if (input.coin !== undefined) {
      const coin = this.requireString('coin', input.coin);
      try {
        result.coin = resolveCoinType(coin);
      } catch (error) {
        if (error instanceof InvalidCoinTypeError) {
          throw new ConfigError(`Invalid default coin type: "${coin}"`, error);
        }
        throw error;
      }
    }

    if (input.cryptoType !== undefined) {
      const cryptoType = this.requireString('cryptoType', input.cryptoType);
      if (!isCryptoType(cryptoType)) {
        throw new ConfigError(`Unknown crypto type: "${cryptoType}"`);
      }
      result.cryptoType = cryptoType;
    }

    if (input.type !== undefined) {
      const type = this.requireString('type', input.type);
      if (!isWalletType(type)) {
        throw new ConfigError(`Unknown wallet type: "${type}"`);
      }
      result.type = type;
    }

    return result;
  }

  private static requireString(field: string, value: unknown): string {
    if (typeof value !== 'string' || value === '') {
      throw new ConfigError(`Config field "${field}" must be a non-empty string`);
    }
    return value;
  }
}
