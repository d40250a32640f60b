export { StatsCommand } from './stats_command';
