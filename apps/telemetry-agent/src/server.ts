import 'dotenv/config';
import type { Server } from 'http';
import { createLogger, setLogLevel } from '@telemetry-relay/adapters';
import { loadConfig } from './config/agent-config.js';
import { buildAgent } from './agent.js';
import { buildHttpServer, buildStatusApp } from './app.js';

const log = createLogger('server');

async function main() {
  const config = loadConfig();
  const level = setLogLevel(config.general.logLevel);
  log.info(`log level ${level}`);

  const agent = buildAgent(config);
  await agent.start();

  let httpServer: Server | null = null;
  if (config.status.enabled) {
    httpServer = buildHttpServer(buildStatusApp(agent));
    httpServer.listen(config.status.port, config.status.host, () => {
      log.info(`status API listening on http://${config.status.host}:${config.status.port}`);
    });
  }

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`${signal} received, shutting down...`);
    httpServer?.close();
    await agent.stop();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      log.error('shutdown failed', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((err) => {
  log.error('fatal startup error', err);
  process.exit(1);
});
