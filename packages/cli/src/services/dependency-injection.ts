import { createReviewService, loadServiceConfig } from '@revq/core';
import type { ReviewService, ServiceConfig } from '@revq/core';
import type { BaseCommandOptions } from '../interfaces/command';

/**
 * Dependency Injection Service for the revq CLI
 *
 * Loads the configuration once per process and builds the review
 * service on first use. Commands release it with `closeService`.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private config: ServiceConfig | null = null;
  private service: ReviewService | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  static resetInstance(): void {
    DependencyInjectionService.instance = null;
  }

  /**
   * Configuration from .env, revq.config.yaml and the environment.
   * --verbose raises the log level to debug; --json and --quiet silence it.
   */
  getConfig(options: BaseCommandOptions = {}): ServiceConfig {
    if (!this.config) {
      this.config = loadServiceConfig();
    }
    if (options.verbose) {
      return { ...this.config, logLevel: 'debug' };
    }
    if (options.json || options.quiet) {
      return { ...this.config, logLevel: 'silent' };
    }
    return this.config;
  }

  async getService(options: BaseCommandOptions = {}): Promise<ReviewService> {
    if (!this.service) {
      this.service = createReviewService(this.getConfig(options));
    }
    return this.service;
  }

  async closeService(): Promise<void> {
    const service = this.service;
    this.service = null;
    if (service) {
      await service.close();
    }
  }
}
