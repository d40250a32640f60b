import type { BaseCommandOptions } from '../../interfaces/command';

/** Options for `revq analyze <repoUrl> <prNumber>` */
export interface AnalyzeOptions extends BaseCommandOptions {
  /** GitHub token for this submission; GITHUB_TOKEN otherwise */
  token?: string;
}
