import { moviesDomain } from './movies.routes';

import type { DomainRoutes } from './types';

export function apiDomains(): DomainRoutes[] {
  return [moviesDomain()];
}

export * from './types';
export * from './route-helper';
