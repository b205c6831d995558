import chalk from 'chalk';
import { formatClock, type ConnectionState, type StatusView } from '@printlink/core';

export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

export function formatSuccess(message: string): string {
  return chalk.green('✓ ') + message;
}

export function formatError(message: string): string {
  return chalk.red('✗ ') + message;
}

export function formatWarning(message: string): string {
  return chalk.yellow('⚠ ') + message;
}

export function formatInfo(message: string): string {
  return chalk.blue('ℹ ') + message;
}

export function formatConnectionState(state: ConnectionState): string {
  switch (state) {
    case 'streaming':
      return chalk.green('● Streaming');
    case 'polling':
      return chalk.yellow('◐ Polling');
    case 'disconnected':
      return chalk.gray('○ Disconnected');
  }
}

export function formatLabel(label: string): string {
  switch (label) {
    case 'Printing':
    case 'Curing':
      return chalk.green(label);
    case 'Pausing':
    case 'Paused':
    case 'Resuming':
      return chalk.yellow(label);
    case 'Canceling':
    case 'Canceled':
      return chalk.red(label);
    case 'Finished':
      return chalk.cyan(label);
    default:
      return chalk.gray(label);
  }
}

export function formatProgressBar(progress: number, width = 20): string {
  const ratio = Math.min(Math.max(progress, 0), 1);
  const filled = Math.round(ratio * width);
  return `${'█'.repeat(filled)}${'░'.repeat(width - filled)} ${(ratio * 100).toFixed(1)}%`;
}

function formatLayers(view: StatusView): string {
  const snapshot = view.snapshot;
  if (!snapshot || snapshot.layerIndex === null) return '';
  return snapshot.layerCount === null
    ? `  layer ${snapshot.layerIndex}`
    : `  layer ${snapshot.layerIndex}/${snapshot.layerCount}`;
}

function formatThumbnail(view: StatusView): string {
  if (view.thumbnail) return `ready (${view.thumbnail.length} bytes)`;
  switch (view.thumbnailState) {
    case 'resolving':
      return 'loading';
    case 'ready':
      return 'none';
    default:
      return '-';
  }
}

/** One-line summary used by `watch`. */
export function formatStatusLine(view: StatusView): string {
  const parts = [formatLabel(view.label)];
  if (view.snapshot && (view.snapshot.isPrinting || view.snapshot.isPaused)) {
    parts.push(`${(view.progress * 100).toFixed(1)}%${formatLayers(view)}`);
  }
  if (view.job) {
    parts.push(view.job.name);
  }
  if (view.awaitingSession) {
    parts.push(chalk.gray('waiting for new job'));
  }
  if (view.error) {
    parts.push(chalk.red(`error: ${view.error}`));
  }
  return parts.join(chalk.gray(' | '));
}

export function formatStatusView(view: StatusView): string {
  const snapshot = view.snapshot;
  const lines = [
    `Status:     ${formatLabel(view.label)}`,
    `Connection: ${formatConnectionState(view.connection)}`,
    `Job:        ${view.job ? `${view.job.name} (${view.job.locationCategory})` : chalk.gray('(none)')}`,
    `Progress:   ${formatProgressBar(view.progress)}${formatLayers(view)}`,
  ];

  if (snapshot) {
    lines.push(`Elapsed:    ${formatClock(snapshot.elapsedSeconds)}`);
    lines.push(`Z:          ${snapshot.physicalPosition.z.toFixed(2)} mm`);
    lines.push(`Material:   ${snapshot.usedMaterialMl.toFixed(1)} ml`);
    if (snapshot.resinTemperature !== null) {
      lines.push(`Resin:      ${snapshot.resinTemperature.toFixed(1)} °C`);
    }
  }
  if (view.prevLayerSeconds !== null) {
    lines.push(`Layer time: ${view.prevLayerSeconds.toFixed(1)}s`);
  }
  lines.push(`Preview:    ${formatThumbnail(view)}`);

  if (view.awaitingSession) {
    lines.push(chalk.gray('Waiting for the new job to start...'));
  }
  if (view.error) {
    lines.push(chalk.red(`Last error: ${view.error} (${view.consecutiveErrors} in a row)`));
  }
  return lines.join('\n');
}

/** JSON-safe copy of a view; thumbnail bytes are reduced to their length. */
export function toPlainView(view: StatusView): Record<string, unknown> {
  const { thumbnail, ...rest } = view;
  return { ...rest, thumbnailBytes: thumbnail ? thumbnail.length : 0 };
}

export function spinner(message: string): {
  update: (msg: string) => void;
  success: (msg: string) => void;
  error: (msg: string) => void;
  stop: () => void;
} {
  const frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  let frameIndex = 0;
  let running = true;

  const interval = setInterval(() => {
    if (running) {
      process.stdout.write(`\r${chalk.cyan(frames[frameIndex])} ${message}`);
      frameIndex = (frameIndex + 1) % frames.length;
    }
  }, 80);

  const finish = (line: string) => {
    running = false;
    clearInterval(interval);
    process.stdout.write(line);
  };

  return {
    update: (msg: string) => {
      message = msg;
    },
    success: (msg: string) => finish(`\r${formatSuccess(msg)}\n`),
    error: (msg: string) => finish(`\r${formatError(msg)}\n`),
    stop: () => finish('\r'),
  };
}

export function printBox(title: string, content: string): void {
  const lines = content.split('\n');
  const visible = (s: string) => s.replace(/\u001b\[[0-9;]*m/g, '').length;
  const maxWidth = Math.max(title.length + 4, ...lines.map((l) => visible(l) + 4));

  console.log(chalk.gray('┌' + '─'.repeat(maxWidth) + '┐'));
  console.log(chalk.gray('│ ') + chalk.bold(title.padEnd(maxWidth - 2)) + chalk.gray(' │'));
  console.log(chalk.gray('├' + '─'.repeat(maxWidth) + '┤'));
  for (const line of lines) {
    console.log(chalk.gray('│ ') + line + ' '.repeat(maxWidth - 2 - visible(line)) + chalk.gray(' │'));
  }
  console.log(chalk.gray('└' + '─'.repeat(maxWidth) + '┘'));
}
