// src/services/pipeline-deps.ts: wires retriever, agents, orchestrator and trip service from config
import { getAppConfig, type AppConfig } from '@/config/app.config';
import { InMemoryTripStore } from '@/memory/InMemoryTripStore';
import type { TripStore } from '@/memory/TripStore';
import { configureLogger, logger } from '@/services/logger';
import { Orchestrator } from '@/services/orchestrator';
import type { CatalogStore } from '@/services/providers/catalog/catalog-store';
import { JsonCatalogStore } from '@/services/providers/catalog/json-catalog';
import {
  OpenAiGenerativeBackend,
  type GenerativeBackend,
} from '@/services/providers/generative/generative-backend';
import { createAmadeusFlightClient } from '@/services/providers/live/amadeus-flight-client';
import type { LiveApiClient } from '@/services/providers/live/live-api-client';
import { createOpenTripMapClient } from '@/services/providers/live/opentripmap-client';
import { TieredRetriever } from '@/services/providers/tiered-retriever';
import { CatalogTier } from '@/services/providers/tiers/catalog-tier';
import { GenerativeTier } from '@/services/providers/tiers/generative-tier';
import { LiveApiTier } from '@/services/providers/tiers/live-api-tier';
import { TripService } from '@/services/trip-service';
import { VerifierAgent } from '@/services/verifier-agent';
import { createAgentRegistry, type AgentRegistry } from '@/services/vertical/agent-registry';

export interface PlannerDeps {
  retriever: TieredRetriever;
  agents: AgentRegistry;
  verifier: VerifierAgent;
  orchestrator: Orchestrator;
  store: TripStore;
  tripService: TripService;
}

/** Replaceable collaborators; anything omitted is built from config. */
export interface PlannerOverrides {
  catalog?: CatalogStore;
  liveClients?: LiveApiClient[];
  generativeBackend?: GenerativeBackend | null;
  store?: TripStore;
}

function liveClientsFromConfig(config: AppConfig): LiveApiClient[] {
  const clients: LiveApiClient[] = [];
  if (config.openTripMap.apiKey) {
    clients.push(createOpenTripMapClient({ apiKey: config.openTripMap.apiKey }));
  }
  const { clientId, clientSecret, baseUrl } = config.amadeus;
  if (clientId && clientSecret) {
    clients.push(createAmadeusFlightClient({ clientId, clientSecret, baseUrl }));
  }
  return clients;
}

function generativeBackendFromConfig(config: AppConfig): GenerativeBackend | null {
  if (!config.openai.apiKey) return null;
  return new OpenAiGenerativeBackend({ apiKey: config.openai.apiKey, model: config.openai.model });
}

export function createPlannerDeps(config: AppConfig, overrides: PlannerOverrides = {}): PlannerDeps {
  configureLogger(config);
  const catalog = overrides.catalog ?? JsonCatalogStore.fromDirectory(config.catalogDir);
  const liveClients = overrides.liveClients ?? liveClientsFromConfig(config);
  const backend =
    overrides.generativeBackend !== undefined ? overrides.generativeBackend : generativeBackendFromConfig(config);

  const retriever = new TieredRetriever(
    [
      new LiveApiTier(liveClients, {
        timeoutMs: config.retrieval.liveApiTimeoutMs,
        maxRetries: config.retrieval.liveApiMaxRetries,
      }),
      new CatalogTier(catalog),
      new GenerativeTier(backend, { timeoutMs: config.retrieval.generativeTimeoutMs }),
    ],
    { cacheTtlSeconds: config.retrieval.cacheTtlSeconds },
  );

  const agents = createAgentRegistry({ retriever });
  const verifier = new VerifierAgent({ budgetTolerance: config.verification.budgetTolerance });
  const orchestrator = new Orchestrator({
    agents,
    verifier,
    options: {
      independentDeadlineMs: config.orchestration.independentDeadlineMs,
      runDeadlineMs: config.orchestration.runDeadlineMs,
    },
  });
  const store = overrides.store ?? new InMemoryTripStore(config.tripTtlMinutes);
  const tripService = new TripService({ orchestrator, agents, store });

  logger.info('pipeline:ready', {
    liveSources: liveClients.map((c) => c.name),
    generative: backend?.name ?? 'disabled',
  });
  return { retriever, agents, verifier, orchestrator, store, tripService };
}

let cachedDeps: PlannerDeps | null = null;

/** Process-wide dependencies for the HTTP layer. */
export function getPipelineDeps(): PlannerDeps {
  if (!cachedDeps) cachedDeps = createPlannerDeps(getAppConfig());
  return cachedDeps;
}
