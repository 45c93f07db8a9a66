#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { createApp, createAppContext } from './app';
import { ConfigError, describeConfig, loadConfigOrThrow } from './config';
import { errorContext, logger, setLogLevel } from './logger';
import { prepareRuntimeDir, removeRuntimeDir } from './utils/ssh';

const USAGE = `Receives Gitea webhook events and deploys the pushed commit with fly.

Usage: gitea-fly-deployer [--dev]

  -D, --dev    Development mode (disables signature checks)
  -h, --help   Print usage info

Settings are read from GFC_* environment variables.`;

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      dev: { type: 'boolean', short: 'D', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }

  const config = loadConfigOrThrow(process.env, { devMode: values.dev ?? false });
  setLogLevel(config.logLevel);

  logger.info('Starting gitea-fly-deployer', describeConfig(config));
  if (config.devMode) {
    logger.warn('Development mode: webhook signatures are NOT checked');
  }

  const paths = await prepareRuntimeDir(config);
  const app = createApp(createAppContext(config, paths));

  const server = app.listen(config.port, () => {
    logger.info('Listening', { port: config.port });
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => {
      removeRuntimeDir(paths).then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error('could not remove runtime directory', errorContext(err));
          process.exit(1);
        },
      );
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    logger.error(`Invalid configuration: ${err.message}`);
  } else {
    logger.error('Startup failed', errorContext(err));
  }
  process.exit(1);
});
