import { Command } from 'commander';
import chalk from 'chalk';
import { describeError, type StatusView } from '@printlink/core';
import { createDeviceContext, type DeviceCommandOptions } from '../context';
import { withDeviceOptions } from './options';
import { formatConnectionState, formatError, formatStatusLine, toPlainView } from '../formatters/output';

interface WatchOptions extends DeviceCommandOptions {
  json?: boolean;
}

export const watchCommand = withDeviceOptions(
  new Command('watch')
    .description('Follow the printer status live until interrupted')
    .option('--json', 'Print every update as a JSON line')
).action(async (options: WatchOptions) => {
  try {
    const { engine, config, logger } = await createDeviceContext(options);
    console.log(chalk.bold(`Watching ${config.device.apiUrl} (Ctrl-C to stop)`));

    let lastLine = '';
    let lastConnection = engine.getConnectionState();

    engine.channels.on('reconnect:scheduled', (delayMs) => {
      logger.info(`Stream unavailable, retrying in ${(delayMs / 1000).toFixed(1)}s`);
    });

    engine.subscribe({
      onUpdate: (view: StatusView) => {
        if (options.json) {
          console.log(JSON.stringify(toPlainView(view)));
          return;
        }
        if (view.connection !== lastConnection) {
          lastConnection = view.connection;
          console.log(formatConnectionState(view.connection));
        }
        const line = formatStatusLine(view);
        if (line !== lastLine) {
          lastLine = line;
          console.log(line);
        }
      },
    });

    const stop = () => {
      engine.dispose();
      console.log(chalk.gray('\nStopped watching.'));
      process.exit(0);
    };
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);

    engine.start();
  } catch (error) {
    console.error(formatError(describeError(error)));
    process.exit(1);
  }
});
