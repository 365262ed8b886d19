import { lambdaEntry } from './route-helper';

import type { DomainRoutes } from './types';

export function moviesDomain(): DomainRoutes {
  return {
    basePath: 'movies',
    routes: [
      {
        method: 'POST',
        path: '',
        entry: lambdaEntry('movies/put-movie.ts'),
      },
    ],
  };
}
