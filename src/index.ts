import 'dotenv/config';
import type { Server } from 'http';
import { createApp } from './app.js';
import { loadConfig, type AppConfig } from './config/index.js';
import { logger, setLogLevel } from './utils/logger.js';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    logger.error({ err }, 'config_invalid');
    process.exit(1);
  }
}

const config = readConfig();
setLogLevel(config.logLevel);

process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'unhandled_rejection');
});
process.on('uncaughtException', (err) => {
  logger.error({ err }, 'uncaught_exception');
  process.exit(1);
});

const app = createApp({ config });
const server: Server = app.listen(config.port, () => {
  logger.info({ port: config.port, backend: config.backend.baseUrl }, 'server_listening');
});
server.on('error', (err) => {
  logger.error({ err, port: config.port }, 'server_listen_failed');
  process.exit(1);
});

function shutdown(signal: string) {
  logger.info({ signal }, 'server_shutdown');
  server.close(() => process.exit(0));
}
process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
