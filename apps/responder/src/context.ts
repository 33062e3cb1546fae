import type { Logger } from 'pino';
import type { AppConfig } from './lib/env.js';
import { silentLogger } from './lib/logger.js';
import { Dispatcher } from './services/dispatcher.js';
import type { MessageRepository } from './services/messageRepository.js';
import { MessageStore } from './services/messages.js';
import type { MessageNotifier } from './services/notifier.js';
import type { ChatBackend } from './services/ollama.js';
import { OllamaClient } from './services/ollama.js';
import { ResponseOrchestrator } from './services/orchestrator.js';
import { OutboundRelay } from './services/relay.js';
import { SettingsStore, settingsFromConfig } from './services/settings.js';
import { SimilarityEngine } from './services/similarity/engine.js';
import type { Embedder } from './services/similarity/features.js';
import { FeatureEmbedder } from './services/similarity/features.js';
import { ServerStats } from './services/stats.js';

/** Everything the routers and the process entry need, wired once. */
export type AppContext = {
  config: AppConfig;
  logger: Logger;
  settings: SettingsStore;
  store: MessageStore;
  similarity: SimilarityEngine;
  orchestrator: ResponseOrchestrator;
  relay: OutboundRelay;
  dispatcher: Dispatcher;
  stats: ServerStats;
};

export type ContextOptions = {
  repository: MessageRepository;
  backend?: ChatBackend;
  embedder?: Embedder;
  notifier?: MessageNotifier;
  logger?: Logger;
  concurrency?: number;
};

export function buildContext(config: AppConfig, opts: ContextOptions): AppContext {
  const logger = opts.logger ?? silentLogger;
  const settings = new SettingsStore(settingsFromConfig(config));
  const store = new MessageStore(opts.repository, { notifier: opts.notifier, logger });
  const similarity = new SimilarityEngine(store, opts.embedder ?? new FeatureEmbedder(), { logger });
  const orchestrator = new ResponseOrchestrator({
    store,
    backend: opts.backend ?? new OllamaClient(config.ollamaUrl),
    settings,
    timeoutMs: config.generationTimeoutMs,
    logger
  });
  const relay = new OutboundRelay({ store, settings, timeoutMs: config.relayTimeoutMs, logger });
  const dispatcher = new Dispatcher({
    store,
    similarity,
    orchestrator,
    relay,
    settings,
    capacity: config.queueCapacity,
    concurrency: opts.concurrency,
    logger
  });
  return { config, logger, settings, store, similarity, orchestrator, relay, dispatcher, stats: new ServerStats() };
}
