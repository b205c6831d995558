import { Command } from 'commander';
import inquirer from 'inquirer';
import { describeError, type StatusView } from '@printlink/core';
import { createDeviceContext, fetchOnce, type DeviceCommandOptions } from '../context';
import { withDeviceOptions } from './options';
import { formatError, formatInfo, formatStatusLine, spinner } from '../formatters/output';

export type ControlAction = 'pause' | 'resume' | 'cancel';

interface ControlOptions extends DeviceCommandOptions {
  yes?: boolean;
}

/** Returns a reason the action cannot run now, or null. */
export function checkPrecondition(view: StatusView, action: ControlAction): string | null {
  const snapshot = view.snapshot;
  if (!snapshot) {
    return view.error ? `Printer unreachable: ${view.error}` : 'No status received from the printer';
  }
  switch (action) {
    case 'pause':
      return snapshot.isPrinting ? null : `Nothing to pause (printer is ${view.label.toLowerCase()})`;
    case 'resume':
      return snapshot.isPaused ? null : `Nothing to resume (printer is ${view.label.toLowerCase()})`;
    case 'cancel':
      return snapshot.isPrinting || snapshot.isPaused
        ? null
        : `Nothing to cancel (printer is ${view.label.toLowerCase()})`;
  }
}

async function runControl(action: ControlAction, options: ControlOptions): Promise<void> {
  const { engine } = await createDeviceContext(options);
  try {
    await fetchOnce(engine);

    const problem = checkPrecondition(engine.getView(), action);
    if (problem) {
      console.log(formatInfo(problem));
      process.exitCode = 1;
      return;
    }

    if (action === 'cancel' && !options.yes) {
      const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
        { type: 'confirm', name: 'confirm', message: 'Cancel the current print?', default: false },
      ]);
      if (!confirm) return;
    }

    const spin = spinner(`Sending ${action}...`);
    const accepted = action === 'cancel' ? await engine.cancel() : await engine.pauseOrResume();
    await engine.whenIdle();

    if (accepted) {
      spin.success(`${action} sent: ${formatStatusLine(engine.getView())}`);
    } else {
      spin.error(`${action} failed: ${engine.getView().error ?? 'device rejected the command'}`);
      process.exitCode = 1;
    }
  } finally {
    engine.dispose();
  }
}

function controlCommand(action: ControlAction, description: string): Command {
  const command = withDeviceOptions(new Command(action).description(description));
  if (action === 'cancel') {
    command.option('-y, --yes', 'Skip confirmation');
  }
  return command.action(async (options: ControlOptions) => {
    try {
      await runControl(action, options);
    } catch (error) {
      console.error(formatError(describeError(error)));
      process.exit(1);
    }
  });
}

export const pauseCommand = controlCommand('pause', 'Pause the running print');
export const resumeCommand = controlCommand('resume', 'Resume a paused print');
export const cancelCommand = controlCommand('cancel', 'Cancel the current print');
