import * as path from 'path';

import type { DomainRoutes, RouteDef } from './types';

/**
 * Helper to generate the correct Lambda entry path from route files.
 * Routes are defined in packages/infra/api/routes/
 * Lambda handlers are in apps/functions/src/handlers/
 *
 * @param handlerPath - Path relative to apps/functions/src/handlers/ (e.g. 'movies/put-movie.ts')
 */
export function lambdaEntry(handlerPath: string): string {
  // routes -> api -> infra -> packages -> root, then down into apps/functions
  return path.join(__dirname, '../../../../apps/functions/src/handlers', handlerPath);
}

export function routePath(domain: DomainRoutes, route: RouteDef): string {
  const segments = [...domain.basePath.split('/'), ...route.path.split('/')].filter((s) => s);
  return `/${segments.join('/')}`;
}

/** "POST /movies", the same shape API Gateway reports as the route key. */
export function routeKey(domain: DomainRoutes, route: RouteDef): string {
  return `${route.method} ${routePath(domain, route)}`;
}

/**
 * Flatten the domains into route keys, refusing two bindings for the same
 * method and path.
 */
export function collectRouteKeys(domains: readonly DomainRoutes[]): string[] {
  const keys: string[] = [];
  for (const domain of domains) {
    for (const route of domain.routes) {
      const key = routeKey(domain, route);
      if (keys.includes(key)) {
        throw new Error(`Duplicate route binding: ${key}`);
      }
      keys.push(key);
    }
  }
  return keys;
}
