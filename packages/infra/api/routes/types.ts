export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type RouteDef = {
  method: HttpMethod;
  path: string;                 // relative under basePath, '' for the base resource itself
  entry: string;                // absolute path of the handler file, see lambdaEntry()
};

export type DomainRoutes = {
  basePath: string;             // e.g. 'movies'
  routes: RouteDef[];
};
