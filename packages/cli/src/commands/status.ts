import { Command } from 'commander';
import { describeError } from '@printlink/core';
import { createDeviceContext, fetchOnce, type DeviceCommandOptions } from '../context';
import { withDeviceOptions } from './options';
import { formatError, formatJSON, formatStatusView, printBox, toPlainView } from '../formatters/output';

interface StatusOptions extends DeviceCommandOptions {
  json?: boolean;
}

export const statusCommand = withDeviceOptions(
  new Command('status').description('Show the current printer status once').option('--json', 'Print the raw view as JSON')
).action(async (options: StatusOptions) => {
  try {
    const { engine, config } = await createDeviceContext(options);
    try {
      await fetchOnce(engine);
      const view = engine.getView();

      if (options.json) {
        console.log(formatJSON(toPlainView(view)));
      } else {
        printBox(`Printer at ${config.device.apiUrl}`, formatStatusView(view));
      }

      if (view.error) {
        process.exitCode = 1;
      }
    } finally {
      engine.dispose();
    }
  } catch (error) {
    console.error(formatError(describeError(error)));
    process.exit(1);
  }
});
