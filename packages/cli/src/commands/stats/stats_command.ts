import { Command } from 'commander';
import { addOutputOptions, BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { formatStats } from '../task/task_format';

/**
 * revq stats - counts per status and success rate
 */
export class StatsCommand extends BaseCommand {

  register(program: Command): void {
    addOutputOptions(
      program
        .command('stats')
        .description('Show task counts per status and the success rate')
    ).action(async (options: BaseCommandOptions) => {
      await this.execute(options);
    });
  }

  async execute(options: BaseCommandOptions): Promise<void> {
    try {
      const stats = await this.withService(options, (service) => service.getStats());
      this.handleSuccess(stats, options, formatStats(stats));
    } catch (error) {
      this.handleError(error, options);
    }
  }
}
