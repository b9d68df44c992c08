/**
 * Example: streaming top-of-book and account events
 *
 * Reads credentials from .env (NDAX_ACCOUNT_ID, NDAX_USERNAME, NDAX_PASSWORD,
 * NDAX_2FA_SECRET), logs in, prints BTC/CAD quotes and account events, and
 * shuts down cleanly on Ctrl+C.
 */

import { loadCredentials, loadEnvFile, NdaxClient } from '../src';

const INSTRUMENT_ID = 1;

async function main(): Promise<void> {
  const credentials = loadCredentials({ ...process.env, ...loadEnvFile('.env') });
  const client = new NdaxClient({ credentials, verbose: true, reconnect: { jitter: 0.2 } });

  client.on('error', (error) => console.error('Client error:', error.message));
  client.on('anomaly', (anomaly) => console.warn('Dropped frame:', anomaly.kind));
  client.on('reconnecting', ({ attempt, delayMs }) => console.log(`Reconnect #${attempt} in ${delayMs}ms`));

  await client.subscribeLevel1(INSTRUMENT_ID, (update) => {
    console.log(`${update.InstrumentId}: bid ${update.BestBid} / ask ${update.BestOffer}`);
  });
  await client.subscribeAccountEvents((event) => {
    console.log(`${event.event} on account ${event.accountId}`);
  });

  await client.start();

  const positions = await client.getAccountPositions();
  for (const position of positions) {
    console.log(`${position.ProductSymbol}: ${position.Amount} (hold ${position.Hold})`);
  }

  process.once('SIGINT', () => {
    client.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error(error);
        process.exit(1);
      }
    );
  });
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
