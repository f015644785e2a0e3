import { buildConfig, loadDynamicConfig, mergeConfig, validateConfig } from './config';
import type { PlacementConfig } from './config';
import { InMemoryNodeDirectory, readNodesFile } from './directory/memory';
import { createPostgresNodeDirectory } from './directory/postgres';
import type { NodeDirectory } from './directory/types';
import { createPlacementHttpServer } from './http';
import { logInfo, logWarn } from './logging';
import { DEFAULT_MODEL_PROFILES_PATH, loadModelProfiles } from './profiles';
import { createRateLimiter } from './rate-limit';
import { createPlacementService } from './server';
import { InMemoryDecisionStore } from './storage/memory';
import { createPostgresDecisionStore, createPostgresPool } from './storage/postgres';
import type { DecisionStore } from './storage/types';

const buildBackends = async (
  config: PlacementConfig,
): Promise<{ directory: NodeDirectory; store: DecisionStore }> => {
  const seed = config.nodesPath ? readNodesFile(config.nodesPath) : [];

  if (config.db) {
    const pool = createPostgresPool(config.db);
    const directory = await createPostgresNodeDirectory(pool);
    for (const node of seed) {
      await directory.saveNode(node);
    }
    const store = await createPostgresDecisionStore(pool);
    return { directory, store };
  }

  logWarn('[placement] PLACEMENT_DB_URL not set; decisions are kept in memory only');
  if (seed.length === 0) {
    logWarn('[placement] node directory is empty; set PLACEMENT_NODES_PATH to seed it');
  }
  return { directory: new InMemoryNodeDirectory(seed), store: new InMemoryDecisionStore() };
};

const start = async (): Promise<void> => {
  try {
    const config = mergeConfig(buildConfig(process.env), loadDynamicConfig());
    const issues = validateConfig(config);
    if (issues.length > 0) {
      throw new Error(`invalid configuration: ${issues.join(' ')}`);
    }

    logInfo('[placement] starting', {
      serviceId: config.serviceId,
      endpoint: config.endpoint,
      policy: config.policy,
      persistence: config.db ? 'postgres' : 'memory',
    });

    const profiles = loadModelProfiles(config.modelProfilesPath ?? DEFAULT_MODEL_PROFILES_PATH);
    const { directory, store } = await buildBackends(config);
    const service = createPlacementService(config, { directory, store, profiles });
    const quoteRateLimiter = createRateLimiter(config.quoteRateLimitMax, config.quoteRateLimitWindowMs);
    if (!config.apiKeys?.length) {
      logWarn('[placement] PLACEMENT_API_KEYS not set; public quote API is disabled');
    }

    const server = createPlacementHttpServer(service, quoteRateLimiter);
    server.listen(config.port);
    logInfo(`[placement] listening on ${config.port}`);
  } catch (error) {
    logWarn('[placement] fatal startup error', error);
    process.exit(1);
  }
};

void start();
