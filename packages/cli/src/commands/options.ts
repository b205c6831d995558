import type { Command } from 'commander';

export function withDeviceOptions(command: Command): Command {
  return command
    .option('-u, --url <url>', 'Device API base URL (overrides config)')
    .option('-b, --backend <backend>', 'Device backend (odyssey|nanodlp)')
    .option('--config-dir <dir>', 'Configuration directory');
}
