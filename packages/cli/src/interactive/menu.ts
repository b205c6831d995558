import { Command } from 'commander';
import inquirer from 'inquirer';
import chalk from 'chalk';
import { describeError, type StatusEngine, type StatusView } from '@printlink/core';
import { createDeviceContext, type DeviceCommandOptions } from '../context';
import { withDeviceOptions } from '../commands/options';
import {
  formatSuccess,
  formatError,
  formatInfo,
  formatWarning,
  formatStatusView,
  printBox,
} from '../formatters/output';

type MenuAction = 'status' | 'pause' | 'resume' | 'cancel' | 'new-session' | 'refresh' | 'exit';

export function menuChoices(view: StatusView): Array<{ name: string; value: MenuAction }> {
  const snapshot = view.snapshot;
  const choices: Array<{ name: string; value: MenuAction }> = [{ name: '📋 Show Status', value: 'status' }];

  if (snapshot?.isPrinting && !view.pausing) {
    choices.push({ name: '⏸  Pause Print', value: 'pause' });
  }
  if (snapshot?.isPaused && !view.pausing) {
    choices.push({ name: '▶  Resume Print', value: 'resume' });
  }
  if ((snapshot?.isPrinting || snapshot?.isPaused) && !view.canceling) {
    choices.push({ name: '🛑 Cancel Print', value: 'cancel' });
  }

  choices.push(
    { name: '🆕 Wait For New Job', value: 'new-session' },
    { name: '🔄 Refresh', value: 'refresh' },
    { name: '❌ Exit', value: 'exit' }
  );
  return choices;
}

export const interactiveCommand = withDeviceOptions(
  new Command('interactive').alias('i').description('Start interactive mode')
).action(async (options: DeviceCommandOptions) => {
  let engine: StatusEngine | undefined;
  try {
    const context = await createDeviceContext(options);
    engine = context.engine;
    console.log(chalk.bold(`\n  PrintLink - Interactive Mode (${context.config.device.apiUrl})\n`));
    engine.start();
    await engine.refresh();

    for (;;) {
      const { action } = await inquirer.prompt<{ action: MenuAction }>([
        {
          type: 'list',
          name: 'action',
          message: `${engine.getView().label} - what would you like to do?`,
          choices: [...menuChoices(engine.getView()), new inquirer.Separator()],
        },
      ]);

      if (action === 'exit') break;
      await handleAction(engine, action);
      console.log();
    }
  } catch (error) {
    console.error(formatError(describeError(error)));
    process.exitCode = 1;
  } finally {
    engine?.dispose();
  }
  console.log(chalk.gray('\nGoodbye!\n'));
});

async function handleAction(engine: StatusEngine, action: Exclude<MenuAction, 'exit'>): Promise<void> {
  switch (action) {
    case 'status':
      printBox('Printer Status', formatStatusView(engine.getView()));
      return;

    case 'refresh': {
      const outcome = await engine.refresh();
      if (outcome === 'skipped') {
        console.log(formatInfo('A refresh is already running'));
      }
      printBox('Printer Status', formatStatusView(engine.getView()));
      return;
    }

    case 'pause':
    case 'resume': {
      const accepted = await engine.pauseOrResume();
      console.log(
        accepted ? formatSuccess(`${action} sent`) : formatError(`${action} was not accepted by the printer`)
      );
      return;
    }

    case 'cancel': {
      const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
        { type: 'confirm', name: 'confirm', message: 'Cancel the current print?', default: false },
      ]);
      if (!confirm) return;
      const accepted = await engine.cancel();
      console.log(accepted ? formatSuccess('cancel sent') : formatWarning('cancel failed, still waiting for the printer'));
      return;
    }

    case 'new-session': {
      const { path, location } = await inquirer.prompt<{ path: string; location: string }>([
        { type: 'input', name: 'path', message: 'File path of the new job (optional):' },
        { type: 'input', name: 'location', message: 'Storage location:', default: 'Local' },
      ]);
      const trimmed = path.trim();
      engine.resetForNewSession(
        trimmed
          ? { job: { name: trimmed.split('/').pop() ?? trimmed, path: trimmed, locationCategory: location } }
          : {}
      );
      console.log(formatInfo('Waiting for the new job to start...'));
      return;
    }
  }
}
