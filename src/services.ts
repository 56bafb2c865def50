/**
 * Service container
 *
 * Builds the process-wide resources once and hands them to the app. Tests
 * pass overrides for the store, upstream clients and renderer.
 */

import { GenerationCache } from './cache/index.js';
import type { AppConfig } from './config.js';
import { Translator } from './i18n/translator.js';
import { createKeyValueStore, type KeyValueStore } from './kv/index.js';
import { JimpCardRenderer, type CardRenderer } from './render/renderer.js';
import { TransactionRegistry } from './transactions/TransactionRegistry.js';
import { HttpHoyolabClient, type HoyolabClient } from './upstream/hoyolab/client.js';
import { HttpMihomoClient, type MihomoClient } from './upstream/mihomo/client.js';

export interface Services {
  config: AppConfig;
  store: KeyValueStore;
  registry: TransactionRegistry;
  generationCache: GenerationCache;
  translator: Translator;
  renderer: CardRenderer;
  hoyolab: HoyolabClient;
  mihomo: MihomoClient;
  /** Close the store and drop cached resources */
  shutdown(): Promise<void>;
}

export interface ServiceOverrides {
  store?: KeyValueStore;
  translator?: Translator;
  renderer?: CardRenderer;
  hoyolab?: HoyolabClient;
  mihomo?: MihomoClient;
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const store = overrides.store ?? createKeyValueStore(config);
  const translator = overrides.translator ?? Translator.fromDirectory(undefined, config.verboseLogging);
  const renderer = overrides.renderer ?? new JimpCardRenderer();

  return {
    config,
    store,
    registry: new TransactionRegistry(store, config.transactionNamespace),
    generationCache: new GenerationCache(store, config.transactionNamespace),
    translator,
    renderer,
    hoyolab:
      overrides.hoyolab ??
      new HttpHoyolabClient({ baseUrl: config.hoyolabApiBase, timeoutMs: config.upstreamTimeoutMs }),
    mihomo:
      overrides.mihomo ?? new HttpMihomoClient({ baseUrl: config.mihomoApiBase, timeoutMs: config.upstreamTimeoutMs }),
    async shutdown() {
      renderer.clear();
      translator.clear();
      await store.close();
    },
  };
}
