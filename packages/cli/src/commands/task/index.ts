import { Command } from 'commander';
import { addOutputOptions } from '../../base/base-command';
import { TaskCommand } from './task_command';
import type {
  TaskDeleteOptions,
  TaskListOptions,
  TaskResultsOptions,
  TaskStatusOptions,
} from './task_command.types';

/**
 * Registers the task read commands: status, results, list, delete.
 */
export function registerTaskCommands(program: Command): void {
  const taskCommand = new TaskCommand();

  addOutputOptions(
    program
      .command('status <taskId>')
      .description('Show the status of a review task, with live progress while it runs')
  ).action(async (taskId: string, options: TaskStatusOptions) => {
    await taskCommand.executeStatus(taskId, options);
  });

  addOutputOptions(
    program
      .command('results <taskId>')
      .description('Show the review of a completed task')
  ).action(async (taskId: string, options: TaskResultsOptions) => {
    await taskCommand.executeResults(taskId, options);
  });

  addOutputOptions(
    program
      .command('list')
      .description('List review tasks, newest first')
      .alias('ls')
      .option('-p, --page <page>', 'Page number (1-indexed)')
      .option('--per-page <perPage>', 'Tasks per page (1-100)')
      .option('-s, --status <status>', 'Filter by status (pending, processing, completed, failed)')
  ).action(async (options: TaskListOptions) => {
    await taskCommand.executeList(options);
  });

  addOutputOptions(
    program
      .command('delete <taskId>')
      .description('Delete a review task; a queued task is cancelled first')
  ).action(async (taskId: string, options: TaskDeleteOptions) => {
    await taskCommand.executeDelete(taskId, options);
  });
}
