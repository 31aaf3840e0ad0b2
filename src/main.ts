#!/usr/bin/env node
/**
 * Gatehouse - Process entry point
 *
 * Exit codes: 0 after a graceful stop (Enter on stdin, SIGINT, SIGTERM),
 * 1 when configuration or startup fails.
 */

import { createGatehouse } from './bootstrap';
import { loadConfig } from './infrastructure/config/loader';
import { NodeHttpAdapter } from './infrastructure/http/NodeHttpAdapter';

async function main(): Promise<number> {
  let stopRequested: (reason: string) => void = () => undefined;
  const stopped = new Promise<string>((resolve) => {
    stopRequested = resolve;
  });

  const config = loadConfig();
  const gatehouse = await createGatehouse(config, {
    onSignalShutdown: (signal) => stopRequested(signal),
  });
  const { app, logger } = gatehouse;

  const adapter = new NodeHttpAdapter(app.requestHandler(), {
    host: config.listen.host,
    port: config.listen.port,
    logger,
  });

  try {
    await app.run(adapter);
  } catch (error) {
    logger.error(`Failed to listen on ${config.listen.prefix}`, error);
    await gatehouse.shutdown();
    return 1;
  }

  logger.info(`Listening on ${config.listen.prefix}. Press Enter to stop.`);
  process.stdin.once('data', () => stopRequested('stdin'));

  const reason = await stopped;
  logger.info(`Shutting down (${reason})`);
  process.stdin.pause();
  await gatehouse.shutdown();
  return 0;
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error('[gatehouse] Fatal:', error instanceof Error ? error.message : error);
    process.exit(1);
  },
);
