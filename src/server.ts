import { createApp } from './app';
import { ConfigError, loadEnvConfig, type AppConfig } from './config';
import { openDatabase, SqliteEscrowRepository, SqliteLedger } from './db';
import { BitcoinHeightOracle, ManualHeightOracle } from './services/height-oracle';
import { BitcoinRpc } from './lib/bitcoin';
import type { HeightOracle } from './types/ledger';

async function start(config: AppConfig): Promise<void> {
  console.log('Starting server initialization...');

  const db = openDatabase(config.dbPath);
  const repository = new SqliteEscrowRepository(db);
  const ledger = new SqliteLedger(db);

  let oracle: HeightOracle;
  let manualOracle: ManualHeightOracle | undefined;
  let bitcoinOracle: BitcoinHeightOracle | undefined;
  if (config.heightSource === 'bitcoind') {
    bitcoinOracle = new BitcoinHeightOracle(new BitcoinRpc(config.bitcoinRpc), config.heightPollMs);
    await bitcoinOracle.start();
    oracle = bitcoinOracle;
  } else {
    manualOracle = new ManualHeightOracle(config.initialHeight);
    oracle = manualOracle;
    console.warn('⚠️  Manual height oracle — advance with POST /api/dev/mine. NOT for real value.');
  }

  const { app } = createApp({
    repository,
    ledger,
    oracle,
    manualOracle,
    owner: config.ownerPubkey,
    holdingAccount: config.holdingAccount,
    production: config.production,
    rateLimitPerMin: config.rateLimitPerMin,
    authMaxSkewSecs: config.authMaxSkewSecs
  });

  const server = app.listen(config.port, () => {
    console.log(`🚀 Escrow API running at http://localhost:${config.port}`);
    console.log(`   Height source: ${config.heightSource} (current ${oracle.currentHeight()})`);
    console.log(`   Owner: ${config.ownerPubkey}`);
  });

  const shutdown = () => {
    bitcoinOracle?.stop();
    server.close(() => {
      db.close();
      process.exit(0);
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

try {
  const config = loadEnvConfig();
  start(config).catch((err: unknown) => {
    console.error('Failed to start server:', err);
    process.exit(1);
  });
} catch (err) {
  if (err instanceof ConfigError) {
    console.error(`FATAL: invalid configuration — ${err.message}`);
  } else {
    console.error('FATAL:', err);
  }
  process.exit(1);
}
