import { Command } from 'commander';
import { watchCommand } from './commands/watch';
import { statusCommand } from './commands/status';
import { pauseCommand, resumeCommand, cancelCommand } from './commands/control';
import { configCommand } from './commands/config';
import { interactiveCommand } from './interactive/menu';

const program = new Command();

program
  .name('printlink')
  .description('Live status and job control for networked resin printers')
  .version('1.0.0');

// Register commands
program.addCommand(watchCommand);
program.addCommand(statusCommand);
program.addCommand(pauseCommand);
program.addCommand(resumeCommand);
program.addCommand(cancelCommand);
program.addCommand(configCommand);
program.addCommand(interactiveCommand);

// Error handling
program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  console.error(`Error: ${err.message}`);
  process.exit(1);
});

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
