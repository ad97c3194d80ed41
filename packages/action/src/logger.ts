/**
 * Logger interface for the report pipeline.
 * Decouples the pipeline from @actions/core so it can run
 * inside a workflow, from a terminal, or under test.
 */

import * as core from '@actions/core';

export interface Logger {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

/**
 * Logger backed by the Actions toolkit. Warnings and errors
 * show up as annotations on the workflow run.
 */
export const actionsLogger: Logger = {
  info: (message: string) => core.info(message),
  warning: (message: string) => core.warning(message),
  error: (message: string) => core.error(message),
  debug: (message: string) => core.debug(message),
};

/**
 * Simple console-based logger for use outside GitHub Actions.
 */
export const consoleLogger: Logger = {
  info: (message: string) => console.log(`[info] ${message}`),
  warning: (message: string) => console.warn(`[warning] ${message}`),
  error: (message: string) => console.error(`[error] ${message}`),
  debug: (message: string) => console.debug(`[debug] ${message}`),
};

/**
 * A no-op logger for tests. Swallows all output.
 */
export const silentLogger: Logger = {
  info: () => {},
  warning: () => {},
  error: () => {},
  debug: () => {},
};
