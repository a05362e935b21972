import type { RouteDefinition } from '../../entities/route.js';

export interface RouteDefinitionPort {
  findById(routeId: string): Promise<RouteDefinition | null>;
}
