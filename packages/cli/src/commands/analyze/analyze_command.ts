import { Command } from 'commander';
import { EventBus } from '@revq/core';
import type { TaskStatusView } from '@revq/core';
import { addOutputOptions, BaseCommand } from '../../base/base-command';
import { formatStatus } from '../task/task_format';
import type { AnalyzeOptions } from './analyze_command.types';

/**
 * AnalyzeCommand - submits a pull request and reviews it in-process.
 *
 * Starts the worker pool, prints progress events as they arrive and
 * waits until the queue has drained before printing the final status.
 */
export class AnalyzeCommand extends BaseCommand<AnalyzeOptions> {

  register(program: Command): void {
    addOutputOptions(
      program
        .command('analyze <repoUrl> <prNumber>')
        .description('Queue a pull request for AI review and wait for the result')
        .option('-t, --token <token>', 'GitHub token for this pull request (default: GITHUB_TOKEN)')
        .addHelpText('after', `
EXAMPLES:
  revq analyze https://github.com/octo/widgets 42
  revq analyze https://github.com/octo/widgets 42 --json
`)
    ).action(async (repoUrl: string, prNumber: string, options: AnalyzeOptions) => {
      await this.executeAnalyze(repoUrl, prNumber, options);
    });
  }

  async executeAnalyze(repoUrl: string, prNumber: string, options: AnalyzeOptions): Promise<void> {
    let view: TaskStatusView;
    try {
      view = await this.withService(options, async (service) => {
        const subscription = EventBus.subscribeToTaskEvent(
          service.eventBus,
          'review_task.progress',
          (event) => {
            const { current, total, phase } = event.payload;
            this.info(`   [${current}/${total}] ${phase}`, options);
          },
        );
        try {
          await service.start();
          const { taskId } = await service.submit(repoUrl, Number(prNumber), options.token);
          this.info(`⏳ Task ${taskId} queued for ${repoUrl} #${prNumber}`, options);
          await service.dispatcher.drain();
          return await service.getStatus(taskId);
        } finally {
          service.eventBus.unsubscribe(subscription.id);
        }
      });
    } catch (error) {
      this.handleError(error, options);
      return;
    }

    if (view.status === 'completed') {
      this.handleSuccess(view, options, formatStatus(view));
    } else if (view.status === 'failed') {
      this.handleError(`Task ${view.taskId} failed: ${view.errorMessage ?? 'unknown error'}`, options);
    } else {
      this.handleError(`Task ${view.taskId} did not finish (status: ${view.status})`, options);
    }
  }
}
