/**
 * Dependency injection container for Strategos services.
 *
 * Provides:
 * - Registries loaded once, on first use
 * - Easy substitution for tests
 */

import type { Registries } from '../types/index.js';
import type { logger as Logger } from '../utils/logger.js';

type LoggerType = typeof Logger;

/**
 * Service configuration options
 */
export interface ServiceConfig {
  /** Registry directory (default: STRATEGOS_CONFIG_DIR or the packaged config) */
  configDir?: string;
}

/**
 * Service container interface for dependency injection
 */
export interface Services {
  registries: Registries;
  logger: LoggerType;
}

/**
 * Service factory functions for lazy initialization
 */
export interface ServiceFactories {
  loadRegistries: (config: ServiceConfig) => Promise<Registries>;
  getLogger: () => LoggerType;
}

let defaultFactories: ServiceFactories | null = null;

/**
 * Get default factories (lazy loaded to avoid circular imports)
 */
async function getDefaultFactories(): Promise<ServiceFactories> {
  if (!defaultFactories) {
    const [{ loadRegistries }, { logger }] = await Promise.all([
      import('../registry/index.js'),
      import('../utils/logger.js'),
    ]);

    defaultFactories = {
      loadRegistries: (config) => loadRegistries({ configDir: config.configDir }),
      getLogger: () => logger,
    };
  }
  return defaultFactories;
}

/**
 * Service container that manages service lifecycles
 */
export class ServiceContainer {
  private registries: Promise<Registries> | null = null;
  private logger: LoggerType | null = null;
  private config: ServiceConfig;
  private factories: ServiceFactories | null = null;
  private customFactories: Partial<ServiceFactories> = {};

  constructor(config: ServiceConfig = {}) {
    this.config = config;
  }

  /**
   * Override a factory for testing
   */
  setFactory<K extends keyof ServiceFactories>(
    key: K,
    factory: ServiceFactories[K]
  ): this {
    this.customFactories[key] = factory;
    this.factories = null;
    this.clear();
    return this;
  }

  /**
   * Load the registries once. A failed load is not cached, so a fixed
   * config directory is picked up on the next call.
   */
  async getRegistries(): Promise<Registries> {
    if (!this.registries) {
      const factories = await this.getFactories();
      const pending = factories.loadRegistries(this.config);
      this.registries = pending;
      void pending.catch(() => {
        if (this.registries === pending) {
          this.registries = null;
        }
      });
    }
    return this.registries;
  }

  async getLogger(): Promise<LoggerType> {
    if (!this.logger) {
      const factories = await this.getFactories();
      this.logger = factories.getLogger();
    }
    return this.logger;
  }

  /**
   * Get all services (for tool handlers)
   */
  async getAll(): Promise<Services> {
    const [registries, logger] = await Promise.all([this.getRegistries(), this.getLogger()]);
    return { registries, logger };
  }

  /**
   * Clear all services (for cleanup/testing)
   */
  clear(): void {
    this.registries = null;
    this.logger = null;
  }

  /**
   * Update configuration
   */
  configure(config: Partial<ServiceConfig>): this {
    this.config = { ...this.config, ...config };
    // Clear services so they're recreated with new config
    this.clear();
    return this;
  }

  private async getFactories(): Promise<ServiceFactories> {
    if (!this.factories) {
      const defaults = await getDefaultFactories();
      this.factories = {
        ...defaults,
        ...this.customFactories,
      };
    }
    return this.factories;
  }
}

let globalContainer: ServiceContainer | null = null;

/**
 * Get the global service container
 */
export function getContainer(): ServiceContainer {
  if (!globalContainer) {
    globalContainer = new ServiceContainer();
  }
  return globalContainer;
}

/**
 * Create a new container (useful for testing)
 */
export function createContainer(config?: ServiceConfig): ServiceContainer {
  return new ServiceContainer(config);
}

/**
 * Reset the global container (for testing)
 */
export function resetContainer(): void {
  if (globalContainer) {
    globalContainer.clear();
  }
  globalContainer = null;
}
