export { AnalyzeCommand } from './analyze_command';
export type { AnalyzeOptions } from './analyze_command.types';
