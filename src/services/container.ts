/**
 * Dependency injection container for the server's services.
 *
 * Services are created lazily from factories; tests override a factory to
 * swap in an in-memory store or a scripted generator.
 */

import type { Storage } from '../storage/index.js';
import type { ConversationEngine } from '../engines/conversation.js';
import type { Generator } from '../engines/generator.js';
import type { Retriever } from '../engines/retriever.js';
import type { AppConfig } from '../utils/config.js';
import type { logger as Logger } from '../utils/logger.js';

type LoggerType = typeof Logger;

/**
 * Service container interface for dependency injection
 */
export interface Services {
  config: AppConfig;
  storage: Storage;
  generator: Generator;
  retriever: Retriever;
  engine: ConversationEngine;
  logger: LoggerType;
}

/**
 * Service factory functions for lazy initialization
 */
export interface ServiceFactories {
  loadConfig: (overrides: Partial<AppConfig>) => AppConfig;
  createStorage: (config: AppConfig) => Storage;
  createGenerator: (config: AppConfig) => Generator;
  createRetriever: (config: AppConfig) => Retriever;
  createEngine: (deps: { config: AppConfig; storage: Storage; generator: Generator; retriever: Retriever }) => ConversationEngine;
  getLogger: () => LoggerType;
}

let defaultFactories: ServiceFactories | null = null;

/**
 * Default factories, imported on first use to avoid circular imports
 */
async function getDefaultFactories(): Promise<ServiceFactories> {
  if (!defaultFactories) {
    const [{ Storage }, { LLMClient }, generatorModule, retrieverModule, { ConversationEngine }, configModule, { logger }] =
      await Promise.all([
        import('../storage/index.js'),
        import('../engines/llm-client.js'),
        import('../engines/generator.js'),
        import('../engines/retriever.js'),
        import('../engines/conversation.js'),
        import('../utils/config.js'),
        import('../utils/logger.js'),
      ]);

    defaultFactories = {
      loadConfig: (overrides) => configModule.loadConfig(overrides),
      createStorage: (config) => new Storage(config.dbPath),
      createGenerator: (config) =>
        config.anthropicApiKey
          ? new generatorModule.AnthropicGenerator(
              new LLMClient({ apiKey: config.anthropicApiKey, model: config.model, maxRetries: config.maxRetries })
            )
          : new generatorModule.FallbackGenerator(),
      createRetriever: (config) => {
        const snippets = retrieverModule.loadKnowledgeBase(config.knowledgePath);
        return snippets.length > 0
          ? new retrieverModule.KeywordRetriever(snippets)
          : new retrieverModule.EmptyRetriever();
      },
      createEngine: ({ config, storage, generator, retriever }) =>
        new ConversationEngine({
          store: storage,
          generator,
          retriever,
          shortTimeoutMs: config.shortTimeoutMs,
          longTimeoutMs: config.longTimeoutMs,
        }),
      getLogger: () => logger,
    };
  }
  return defaultFactories;
}

/**
 * Service container that manages service lifecycles
 */
export class ServiceContainer {
  private services: Partial<Services> = {};
  private overrides: Partial<AppConfig>;
  private factories: ServiceFactories | null = null;
  private customFactories: Partial<ServiceFactories> = {};

  constructor(overrides: Partial<AppConfig> = {}) {
    this.overrides = overrides;
  }

  /**
   * Override a factory for testing
   */
  setFactory<K extends keyof ServiceFactories>(key: K, factory: ServiceFactories[K]): this {
    this.customFactories[key] = factory;
    this.factories = null;
    return this;
  }

  async getConfig(): Promise<AppConfig> {
    if (!this.services.config) {
      const factories = await this.getFactories();
      this.services = { ...this.services, config: factories.loadConfig(this.overrides) };
    }
    return this.services.config ?? this.fail('config');
  }

  async getStorage(): Promise<Storage> {
    if (!this.services.storage) {
      const [factories, config] = await Promise.all([this.getFactories(), this.getConfig()]);
      this.services = { ...this.services, storage: factories.createStorage(config) };
    }
    return this.services.storage ?? this.fail('storage');
  }

  async getGenerator(): Promise<Generator> {
    if (!this.services.generator) {
      const [factories, config] = await Promise.all([this.getFactories(), this.getConfig()]);
      this.services = { ...this.services, generator: factories.createGenerator(config) };
    }
    return this.services.generator ?? this.fail('generator');
  }

  async getRetriever(): Promise<Retriever> {
    if (!this.services.retriever) {
      const [factories, config] = await Promise.all([this.getFactories(), this.getConfig()]);
      this.services = { ...this.services, retriever: factories.createRetriever(config) };
    }
    return this.services.retriever ?? this.fail('retriever');
  }

  async getEngine(): Promise<ConversationEngine> {
    if (!this.services.engine) {
      const [factories, config, storage, generator, retriever] = await Promise.all([
        this.getFactories(),
        this.getConfig(),
        this.getStorage(),
        this.getGenerator(),
        this.getRetriever(),
      ]);
      this.services = { ...this.services, engine: factories.createEngine({ config, storage, generator, retriever }) };
    }
    return this.services.engine ?? this.fail('engine');
  }

  async getLogger(): Promise<LoggerType> {
    if (!this.services.logger) {
      const factories = await this.getFactories();
      this.services = { ...this.services, logger: factories.getLogger() };
    }
    return this.services.logger ?? this.fail('logger');
  }

  /**
   * Get all services (for tool handlers)
   */
  async getAll(): Promise<Services> {
    const [config, storage, generator, retriever, engine, logger] = await Promise.all([
      this.getConfig(),
      this.getStorage(),
      this.getGenerator(),
      this.getRetriever(),
      this.getEngine(),
      this.getLogger(),
    ]);
    return { config, storage, generator, retriever, engine, logger };
  }

  /**
   * Close the storage connection and drop every service
   */
  clear(): void {
    this.services.storage?.close();
    this.services = {};
  }

  /**
   * Update configuration; services are recreated on next use
   */
  configure(overrides: Partial<AppConfig>): this {
    this.overrides = { ...this.overrides, ...overrides };
    this.clear();
    return this;
  }

  private fail(name: string): never {
    throw new Error(`Service ${name} could not be created`);
  }

  private async getFactories(): Promise<ServiceFactories> {
    if (!this.factories) {
      const defaults = await getDefaultFactories();
      this.factories = { ...defaults, ...this.customFactories };
    }
    return this.factories;
  }
}

let globalContainer: ServiceContainer | null = null;

export function getContainer(): ServiceContainer {
  if (!globalContainer) {
    globalContainer = new ServiceContainer();
  }
  return globalContainer;
}

/**
 * Create a new container (useful for testing)
 */
export function createContainer(overrides?: Partial<AppConfig>): ServiceContainer {
  return new ServiceContainer(overrides);
}

export function resetContainer(): void {
  if (globalContainer) {
    globalContainer.clear();
  }
  globalContainer = null;
}
