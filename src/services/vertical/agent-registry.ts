// One agent per category. The set is closed; callers dispatch by category tag.
import type { AgentCategory } from '@/types/trip';
import type { AgentDeps, TripAgent } from './base-agent';
import { BudgetAgent } from './budget-agent';
import { DestinationAgent } from './destination-agent';
import { DiningAgent } from './dining-agent';
import { ItineraryAgent } from './itinerary-agent';
import { LodgingAgent } from './lodging-agent';
import { TransportAgent } from './transport-agent';

export type AgentRegistry = { readonly [K in AgentCategory]: TripAgent<K> };

export function createAgentRegistry(deps: AgentDeps): AgentRegistry {
  return {
    destination: new DestinationAgent(deps),
    lodging: new LodgingAgent(deps),
    dining: new DiningAgent(deps),
    transport: new TransportAgent(deps),
    budget: new BudgetAgent(deps),
    itinerary: new ItineraryAgent(deps),
  };
}
