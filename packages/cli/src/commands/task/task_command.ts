import { Command } from 'commander';
import { StatusReporter } from '@revq/core';
import { BaseCommand } from '../../base/base-command';
import { formatList, formatResults, formatStatus } from './task_format';
import type {
  TaskDeleteOptions,
  TaskListOptions,
  TaskResultsOptions,
  TaskStatusOptions,
} from './task_command.types';

/**
 * TaskCommand - read side of the queue.
 *
 * Delegates to the review service; registration happens via registerTaskCommands().
 */
export class TaskCommand extends BaseCommand {

  register(program: Command): void {
    // Not used: registration happens via registerTaskCommands()
  }

  /**
   * revq status <taskId>
   */
  async executeStatus(taskId: string, options: TaskStatusOptions): Promise<void> {
    try {
      const view = await this.withService(options, (service) => service.getStatus(taskId));
      this.handleSuccess(view, options, formatStatus(view));
    } catch (error) {
      this.handleError(error, options);
    }
  }

  /**
   * revq results <taskId>
   */
  async executeResults(taskId: string, options: TaskResultsOptions): Promise<void> {
    try {
      const view = await this.withService(options, (service) => service.getResults(taskId));
      this.handleSuccess(view, options, formatResults(view));
    } catch (error) {
      this.handleError(error, options);
    }
  }

  /**
   * revq list [--page] [--per-page] [--status]
   */
  async executeList(options: TaskListOptions): Promise<void> {
    const { status } = options;
    if (status !== undefined && !StatusReporter.isTaskStatus(status)) {
      this.handleError(`Invalid status: ${status}. Use pending, processing, completed or failed`, options);
      return;
    }

    try {
      const page = options.page !== undefined ? Number(options.page) : undefined;
      const perPage = options.perPage !== undefined ? Number(options.perPage) : undefined;
      const view = await this.withService(options, (service) => service.listTasks(page, perPage, status));
      if (options.quiet && !options.json) {
        view.tasks.forEach((task) => console.log(task.taskId));
        return;
      }
      this.handleSuccess(view, options, formatList(view));
    } catch (error) {
      this.handleError(error, options);
    }
  }

  /**
   * revq delete <taskId>
   */
  async executeDelete(taskId: string, options: TaskDeleteOptions): Promise<void> {
    try {
      await this.withService(options, (service) => service.deleteTask(taskId));
      this.handleSuccess({ taskId, deleted: true }, options, [`🗑️  Task ${taskId} deleted`]);
    } catch (error) {
      this.handleError(error, options);
    }
  }
}
