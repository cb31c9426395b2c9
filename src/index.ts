/**
 * SMA Crossover Alert Bot
 *
 * Watches an instrument against its simple moving averages and alerts
 * subscribed Telegram chats on every crossover.
 *
 * Run: npm start
 */

import 'dotenv/config';
import { createApp } from './app.ts';
import { loadConfig } from './config.ts';

async function main(): Promise<void> {
  const config = loadConfig();
  console.log(
    `[Main] Monitoring ${config.symbol} (SMA ${config.smaPeriods.join('/')}) every ${config.monitoringIntervalMinutes}min`
  );

  const app = createApp(config);

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) return;
    stopping = true;
    console.log(`[Main] Received ${signal}`);
    app.stop().catch(err => {
      console.error('[Main] Shutdown error:', err);
      process.exitCode = 1;
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  // Log instead of dying on stray rejections
  process.on('unhandledRejection', reason => {
    console.error('[Main] Unhandled rejection:', reason);
  });

  await app.start();
  console.log('[Main] Stopped');
}

main().catch(err => {
  console.error('[Main] Fatal:', err instanceof Error ? err.message : err);
  process.exit(1);
});
