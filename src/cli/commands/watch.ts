/**
 * Watch Command
 *
 * Prints a report, then re-runs the whole pipeline whenever a file under a
 * provider root changes. Bursts of changes are debounced: the report is
 * redrawn once no event has arrived for the configured interval.
 */

import { existsSync, watch, type FSWatcher } from 'fs';
import chalk from 'chalk';
import { allWatchPaths } from '../../lib/providers/index.js';
import { createLogger } from '../../lib/logger.js';
import type { ReportKind } from '../../lib/usage/aggregate.js';
import { resolveRunContext, type CommonOptions, type RunContext } from '../context.js';
import { runReport } from './report.js';

const log = createLogger('watch');

export interface WatchOptions extends CommonOptions {
  interval?: number;
}

export interface Debouncer {
  trigger(): void;
  cancel(): void;
}

/**
 * Call `fn` once `delayMs` has passed without another trigger
 */
export function createDebouncer(delayMs: number, fn: () => void): Debouncer {
  let timer: NodeJS.Timeout | null = null;
  return {
    trigger() {
      if (timer) clearTimeout(timer);
      timer = setTimeout(() => {
        timer = null;
        fn();
      }, delayMs);
    },
    cancel() {
      if (timer) clearTimeout(timer);
      timer = null;
    },
  };
}

/**
 * Provider roots that exist right now
 */
export function existingWatchPaths(context: RunContext): string[] {
  return allWatchPaths(context.providers).filter((path) => existsSync(path));
}

export async function runWatch(kind: ReportKind, options: WatchOptions, context: RunContext): Promise<void> {
  const paths = existingWatchPaths(context);
  if (paths.length === 0) {
    throw new Error('No provider directories found to watch.');
  }

  const interval = options.interval ?? context.config.watch.interval_ms;
  const reportOptions: CommonOptions = { ...options, quiet: true };

  let running = false;
  let pending = false;

  const render = async (): Promise<void> => {
    if (running) {
      pending = true;
      return;
    }
    running = true;
    try {
      do {
        pending = false;
        console.clear();
        await runReport(kind, reportOptions, context);
        console.error(chalk.dim(`Watching ${paths.length} directories. Press Ctrl+C to stop.`));
      } while (pending);
    } finally {
      running = false;
    }
  };

  const rerender = (): void => {
    render().catch((error: unknown) => {
      log.error('Refresh failed', { error });
    });
  };

  await render();

  const debouncer = createDebouncer(interval, rerender);
  const watchers: FSWatcher[] = [];
  for (const path of paths) {
    try {
      const watcher = watch(path, { recursive: true }, () => debouncer.trigger());
      watcher.on('error', (error) => log.warn('Watcher error', { path, error }));
      watchers.push(watcher);
    } catch (error) {
      log.warn('Cannot watch directory', { path, error });
    }
  }

  await new Promise<void>((resolve) => {
    process.once('SIGINT', () => {
      debouncer.cancel();
      for (const watcher of watchers) watcher.close();
      resolve();
    });
  });
}

export async function watchCommand(kind: ReportKind, options: WatchOptions): Promise<void> {
  try {
    const context = resolveRunContext(options);
    await runWatch(kind, options, context);
  } catch (error) {
    console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}
