// Mock DependencyInjectionService before importing the command
jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: jest.fn()
  }
}));

import type { TaskStats } from '@revq/core';
import { StatsCommand } from './stats_command';
import { DependencyInjectionService } from '../../services/dependency-injection';

const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

const stats: TaskStats = {
  pending: 1,
  processing: 0,
  completed: 2,
  failed: 1,
  totalTasks: 4,
  successRate: 50,
};

describe('StatsCommand', () => {
  let statsCommand: StatsCommand;
  let mockService: { getStats: jest.Mock };
  let mockDependencyService: { getService: jest.Mock; closeService: jest.Mock };

  beforeEach(() => {
    jest.clearAllMocks();

    mockService = { getStats: jest.fn().mockResolvedValue(stats) };
    mockDependencyService = {
      getService: jest.fn().mockResolvedValue(mockService),
      closeService: jest.fn().mockResolvedValue(undefined),
    };

    (DependencyInjectionService.getInstance as jest.MockedFunction<typeof DependencyInjectionService.getInstance>)
      .mockReturnValue(mockDependencyService as never);

    statsCommand = new StatsCommand();
  });

  it('should print counts per status', async () => {
    await statsCommand.execute({});

    expect(mockConsoleLog.mock.calls.map((call) => String(call[0]))).toEqual([
      '📊 Tasks: 4',
      '   Pending:      1',
      '   Processing:   0',
      '   Completed:    2',
      '   Failed:       1',
      '   Success rate: 50%',
    ]);
    expect(mockDependencyService.closeService).toHaveBeenCalledTimes(1);
  });

  it('should print JSON with --json', async () => {
    await statsCommand.execute({ json: true });

    expect(JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]))).toEqual({ success: true, data: stats });
  });

  it('should exit with 1 when the store cannot be read', async () => {
    mockService.getStats.mockRejectedValue(new Error('connection refused'));

    await statsCommand.execute({});

    expect(mockConsoleError).toHaveBeenCalledWith('❌ connection refused');
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });
});
