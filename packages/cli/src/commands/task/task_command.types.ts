/**
 * Types for the task read commands.
 */

import type { BaseCommandOptions } from '../../interfaces/command';

/** Options for `revq status <taskId>` */
export interface TaskStatusOptions extends BaseCommandOptions { }

/** Options for `revq results <taskId>` */
export interface TaskResultsOptions extends BaseCommandOptions { }

/** Options for `revq list` */
export interface TaskListOptions extends BaseCommandOptions {
  /** 1-indexed page, as typed on the command line */
  page?: string;
  perPage?: string;
  status?: string;
}

/** Options for `revq delete <taskId>` */
export interface TaskDeleteOptions extends BaseCommandOptions { }
