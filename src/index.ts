// =========================================================
// LAUNCH SIGNAL PIPELINE
// Main Entry Point
// =========================================================

import { AUDITOR_CONFIG, ENGINE_CONFIG, FEED_CONFIG, validateConfig } from './config';
import { createPipeline } from './pipeline';
import { MessageFeed } from './data/messageFeed';
import { StatusServer } from './server/status';
import { errorMessage } from './utils/errors';
import { logger } from './utils/logger';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  validateConfig();

  console.log(`
╔═══════════════════════════════════════════════════════════════╗
║                                                               ║
║   LAUNCH SIGNAL PIPELINE                                      ║
║                                                               ║
║   Chatter  →  Contract audit  →  Position management          ║
║                                                               ║
║   Trading: ${(ENGINE_CONFIG.dryRun ? 'DRY RUN (no real funds)' : 'LIVE').padEnd(51)}║
║   Audits:  ${(AUDITOR_CONFIG.simulationMode ? 'SIMULATED' : 'LIVE APIs').padEnd(51)}║
║                                                               ║
╚═══════════════════════════════════════════════════════════════╝
`);

  const pipeline = createPipeline();
  const { detector, orchestrator, engine, metrics, tradeLogger } = pipeline;
  const server = new StatusServer();
  const feed = FEED_CONFIG.url ? new MessageFeed(message => { detector.ingest(message); }) : null;

  server.setProviders({
    status: () => orchestrator.getStatus(),
    signals: limit => detector.getTopSignals(limit),
    positions: () => ({ open: engine.getOpenPositions(), closed: engine.getClosedPositions() }),
    rejections: () => orchestrator.getRejections(),
    performance: () => metrics.calculate(),
  });

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    console.log(`\nReceived ${signal}. Shutting down gracefully...`);

    feed?.disconnect();
    detector.stop();
    await orchestrator.stop();
    await server.stop();
    await tradeLogger?.close();

    const open = engine.getOpenPositions();
    if (open.length > 0) {
      logger.warn('Exiting with open positions', { count: open.length });
    }

    console.log('\n' + metrics.getSummary());
    logger.close();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error('Shutdown failed', { error: errorMessage(error) });
      process.exit(1);
    });
  };
  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', { error: error.message, stack: error.stack });
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason: errorMessage(reason) });
  });

  try {
    await server.start();

    detector.start();
    orchestrator.start();

    if (feed) {
      await feed.connect();
      logger.info('Listening for chatter', { url: FEED_CONFIG.url });
    } else {
      logger.warn('FEED_WS_URL not set; no chatter will arrive unless pushed into the detector');
    }

    logger.info('Status available at /health, /status, /signals, /positions, /metrics');
    logger.info('Press Ctrl+C to stop and view metrics summary');
  } catch (error) {
    logger.error('Failed to start system', { error: errorMessage(error) });
    await orchestrator.stop();
    await server.stop();
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
