import { Router } from '../lib/router.js';
import { Errors } from '../lib/errors.js';
import type { StaticAssets } from '../lib/static-assets.js';

const STATIC_ROUTES: Record<string, string> = {
  '/': 'index.html',
  '/index.html': 'index.html',
  '/style.css': 'style.css',
  '/script.js': 'script.js',
};

/**
 * Create router serving the bundled frontend
 */
export function createStaticRouter(assets: StaticAssets): Router {
  const router = new Router();

  for (const [path, name] of Object.entries(STATIC_ROUTES)) {
    router.get(path, () => {
      const asset = assets.get(name);
      if (!asset) {
        throw Errors.notFound();
      }
      return asset;
    });
  }

  return router;
}
