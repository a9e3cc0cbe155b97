import type { Express, Router } from 'express';
import apiCalendarRoutes from './api/calendars.js';
import apiGoogleIntegrationRoutes from './api/integrations/google.js';
import apiUserRoutes from './api/users.js';
import { ROUTER_METADATA, API_ROUTE_METADATA, type RouterMeta, type RouteMeta } from './registry.metadata.js';

export interface RouterRegistration extends RouterMeta {
  router: Router;
}

export interface RouteDefinition extends RouteMeta {}

const routerLookup: Record<string, Router | undefined> = {
  '/api/calendars': apiCalendarRoutes,
  '/api/integrations/google': apiGoogleIntegrationRoutes,
  '/api/users': apiUserRoutes
};

export const ROUTER_REGISTRATIONS: RouterRegistration[] = ROUTER_METADATA.flatMap((meta) => {
  const router = routerLookup[meta.basePath];
  return router ? [{ ...meta, router }] : [];
});

export const API_ROUTE_MAP: RouteDefinition[] = [...API_ROUTE_METADATA];

export function registerRoutes(app: Express): void {
  ROUTER_REGISTRATIONS.forEach(({ basePath, router }) => {
    app.use(basePath, router);
  });
}
