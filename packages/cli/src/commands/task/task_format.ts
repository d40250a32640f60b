import type { TaskListView, TaskResultsView, TaskStats, TaskStatusView } from '@revq/core';

const STATUS_ICONS: Record<TaskStatusView['status'], string> = {
  pending: '⏳',
  processing: '🔄',
  completed: '✅',
  failed: '❌',
};

export function formatStatus(view: TaskStatusView): string[] {
  const lines = [
    `${STATUS_ICONS[view.status]} Task ${view.taskId}: ${view.status}`,
    `   Repository: ${view.repoUrl} #${view.prNumber}`,
    `   Created:    ${view.createdAt}`,
  ];
  if (view.startedAt) lines.push(`   Started:    ${view.startedAt}`);
  if (view.completedAt) lines.push(`   Finished:   ${view.completedAt}`);
  if (view.prTitle) lines.push(`   Title:      ${view.prTitle}`);
  if (view.author) lines.push(`   Author:     ${view.author}`);
  if (view.filesCount !== null) {
    lines.push(`   Files:      ${view.filesCount} (+${view.additions ?? 0} / -${view.deletions ?? 0})`);
  }
  if (view.progress) {
    lines.push(`   Progress:   [${view.progress.current}/${view.progress.total}] ${view.progress.phase}`);
  }
  if (view.errorMessage) lines.push(`   Error:      ${view.errorMessage}`);
  return lines;
}

export function formatResults(view: TaskResultsView): string[] {
  const { review, reviewError } = view.results;
  const lines = [`📝 Review for task ${view.taskId} (finished ${view.completedAt})`];
  if (!review) {
    lines.push(`   Review unavailable: ${reviewError ?? 'unknown error'}`);
    return lines;
  }

  const { summary } = review;
  lines.push(`   Files: ${summary.totalFiles}, issues: ${summary.totalIssues}, critical: ${summary.criticalIssues}`);
  for (const file of review.files) {
    lines.push(`   ${file.name}`);
    for (const issue of file.issues) {
      const location = issue.line !== undefined ? ` line ${issue.line}` : '';
      lines.push(`     - [${issue.type}]${location}: ${issue.description}`);
      lines.push(`       Suggestion: ${issue.suggestion}`);
    }
  }
  return lines;
}

export function formatList(view: TaskListView): string[] {
  if (view.tasks.length === 0) {
    return ['No tasks found'];
  }
  const lines = view.tasks.map((task) => {
    const title = task.prTitle ? `  ${task.prTitle}` : '';
    return `${STATUS_ICONS[task.status]} ${task.taskId}  ${task.status.padEnd(10)} ${task.repoUrl} #${task.prNumber}  ${task.createdAt}${title}`;
  });
  lines.push(`Page ${view.page}/${view.pages} (${view.total} tasks)`);
  return lines;
}

export function formatStats(stats: TaskStats): string[] {
  return [
    `📊 Tasks: ${stats.totalTasks}`,
    `   Pending:      ${stats.pending}`,
    `   Processing:   ${stats.processing}`,
    `   Completed:    ${stats.completed}`,
    `   Failed:       ${stats.failed}`,
    `   Success rate: ${stats.successRate}%`,
  ];
}
