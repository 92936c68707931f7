#!/usr/bin/env node

// mic-remote host
// Serves the local HTTP control endpoint for microphone and volume control

import { parseArgs } from 'util';
import { MicRemoteHost } from './host';
import { getLogger } from './logger';
import { AppSettings, SettingsStore } from './settings';

const USAGE = 'Usage: mic-remote [--port N] [--host ADDR] [--settings PATH] [--simulate] [--bridge]';

interface CliOptions {
  overrides: Partial<AppSettings>;
  settingsPath?: string;
  simulate: boolean;
}

export function parseCli(argv: string[], env: NodeJS.ProcessEnv = process.env): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      port: { type: 'string', short: 'p' },
      host: { type: 'string' },
      settings: { type: 'string' },
      simulate: { type: 'boolean', default: false },
      bridge: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' }
    },
    strict: true
  });

  if (values.help) {
    console.log(USAGE);
    process.exit(0);
  }

  // Only keys that were actually given, so file values are not masked
  const overrides: Partial<AppSettings> = {};

  const rawPort = values.port ?? env.MIC_REMOTE_PORT;
  if (rawPort !== undefined) {
    const port = Number(rawPort);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      throw new Error(`Invalid port: ${rawPort}`);
    }
    overrides.httpPort = port;
  }
  if (values.host !== undefined) {
    overrides.bindAddress = values.host;
  }
  if (values.bridge !== undefined) {
    overrides.bridgeMode = values.bridge;
  }

  return {
    overrides,
    settingsPath: values.settings,
    simulate: values.simulate ?? false
  };
}

async function main(): Promise<void> {
  const logger = getLogger();

  let cli: CliOptions;
  try {
    cli = parseCli(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    process.exit(2);
  }

  const settings = new SettingsStore({
    filePath: cli.settingsPath,
    overrides: cli.overrides,
    logger
  });
  const host = new MicRemoteHost({ settings, simulate: cli.simulate, logger });

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down gracefully`, undefined, 'GLOBAL');
    host.stop()
      .catch((error) => {
        logger.error('Error while stopping host', error, 'GLOBAL');
      })
      .finally(() => {
        logger.shutdown();
        process.exit(0);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGHUP', () => {
    logger.info('Received SIGHUP, reloading settings', { path: settings.path }, 'GLOBAL');
    host.reload().catch((error) => {
      logger.error('Failed to apply reloaded settings', error, 'GLOBAL');
    });
  });

  const started = await host.launch();
  if (started) {
    logger.info('mic-remote ready', { port: host.server.port, settings: settings.path }, 'GLOBAL');
  }
}

if (require.main === module) {
  const globalLogger = getLogger();

  process.on('uncaughtException', (error) => {
    globalLogger.error('Uncaught exception', error, 'GLOBAL');
    globalLogger.shutdown();
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    globalLogger.error('Unhandled rejection', reason, 'GLOBAL');
    globalLogger.shutdown();
    process.exit(1);
  });

  main().catch((error) => {
    globalLogger.error('Failed to start mic-remote', error, 'GLOBAL');
    globalLogger.shutdown();
    process.exit(1);
  });
}
