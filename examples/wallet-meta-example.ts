/**
 * Example: wallet metadata lifecycle
 *
 * 1. Generate metadata for a new bip44 wallet
 * 2. Lock it: erase plaintext seeds, record the encrypted secrets
 * 3. Persist and reload through the validated load path
 * 4. Unlock it again
 *
 * Usage:
 *   WALLET_META_COIN=btc npx tsx examples/wallet-meta-example.ts
 */

import { ConfigLoader, WalletMeta, WalletType, createWalletMeta } from '@walletmeta/meta';

function main(): void {
  const defaults = ConfigLoader.fromEnv();

  const meta = createWalletMeta(
    {
      filename: 'example.wlt',
      label: 'Example',
      type: WalletType.Bip44,
      seed: 'example seed words',
    },
    defaults
  );
  console.log(`✓ Created ${meta.type()} wallet for ${meta.coin()} (bip44 coin ${meta.bip44Coin()})`);

  // The encrypted blob comes from the wallet's crypto layer
  const encryptedSecrets = 'example-encrypted-secrets';
  meta.eraseSeeds();
  meta.setEncrypted(defaults.cryptoType, encryptedSecrets);
  console.log(`✓ Locked with ${meta.cryptoType()}`);

  const stored = JSON.stringify(meta.toJSON(), null, 2);
  const reloaded = WalletMeta.parse(JSON.parse(stored));
  console.log(`✓ Reloaded ${reloaded.filename()}, encrypted: ${reloaded.isEncrypted()}`);

  reloaded.setDecrypted();
  reloaded.setSeed('example seed words');
  reloaded.validate();
  console.log('✓ Unlocked');
}

main();
