/**
 * Multi-agent sequential thinking MCP server: entry point.
 *
 * Loads `.env`, builds the configuration and starts the selected transport
 * (stdio by default, HTTP with `--transport http` or MCP_TRANSPORT=http).
 */

import { config as loadDotenv } from 'dotenv';
import { ActivityLog } from './activity-log.js';
import { createAppContext, startHttp, startStdio, type RunningServer } from './app.js';
import { parseCliArgs, runHostingEnv } from './cli.js';
import { describeConfig, loadConfig } from './config.js';
import { HostingConfigError } from './errors.js';
import { createLogger, setDebugLogging } from './logger.js';

const log = createLogger('main');

async function main(): Promise<void> {
  const command = parseCliArgs(process.argv.slice(2));

  if (command.kind === 'hosting-env') {
    process.stdout.write(runHostingEnv(command.config, command.descriptorPath) + '\n');
    return;
  }

  loadDotenv();
  const config = loadConfig(
    command.transport ? { ...process.env, MCP_TRANSPORT: command.transport } : process.env,
  );
  setDebugLogging(config.logging.debug);
  log.info(`Starting sequential thinking server (${describeConfig(config)})`);

  const activityLog = new ActivityLog(config.logging.folder);
  activityLog.init();

  const context = createAppContext(config, activityLog);
  let running: RunningServer;
  try {
    running = config.server.transport === 'http'
      ? await startHttp(context, config)
      : await startStdio(context);
  } catch (err) {
    await activityLog.close();
    throw err;
  }

  let stopping = false;
  const shutdown = async () => {
    if (stopping) return;
    stopping = true;
    log.info('Shutting down...');
    try {
      await running.close();
    } catch (err) {
      log.error('Error during shutdown:', err);
    }
    await activityLog.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

main().catch((err: unknown) => {
  if (err instanceof HostingConfigError) {
    console.error(`Invalid hosting configuration: ${err.message}`);
  } else {
    log.error('Fatal error:', err);
  }
  process.exit(1);
});
