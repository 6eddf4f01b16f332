import { RequestHandler } from 'express';
import { MemoryReviewRepository } from '../../repositories/memoryReviewRepository';
import { ReviewStore } from '../../services/reviewStore';
import { createReviewsRouter } from '../reviews';

const requireAuth: RequestHandler = (_req, _res, next) => next();

// Lists mounted routes as "METHOD path" from the router's layer stack.
function mountedRoutes(router: { stack: unknown[] }): string[] {
  const routes: string[] = [];
  for (const layer of router.stack) {
    if (typeof layer !== 'object' || layer === null || !('route' in layer)) continue;
    const { route } = layer;
    if (typeof route !== 'object' || route === null || !('path' in route) || !('methods' in route)) continue;
    const { path, methods } = route;
    if (typeof path !== 'string' || typeof methods !== 'object' || methods === null) continue;
    for (const method of Object.keys(methods)) {
      routes.push(`${method.toUpperCase()} ${path}`);
    }
  }
  return routes;
}

describe('createReviewsRouter', () => {
  const store = new ReviewStore(new MemoryReviewRepository());

  it('leaves the store reset unmounted by default', () => {
    const routes = mountedRoutes(createReviewsRouter({ store, requireAuth, allowReset: false }));

    expect(routes).toContain('DELETE /:id');
    expect(routes).not.toContain('DELETE /');
  });

  it('mounts the store reset when the switch is on', () => {
    const routes = mountedRoutes(createReviewsRouter({ store, requireAuth, allowReset: true }));

    expect(routes).toContain('DELETE /');
    expect(routes.filter(route => route === 'DELETE /')).toHaveLength(1);
  });
});
