import { Router } from 'express';

export interface PageRoutesOptions {
  aboutPageEnabled: boolean;
}

/**
 * Static pages. The about page is only routed when enabled in configuration.
 */
export function createPageRoutes({ aboutPageEnabled }: PageRoutesOptions) {
  const router = Router();

  if (aboutPageEnabled) {
    router.get('/about', (_req, res) => {
      res.render('about');
    });
  }

  return router;
}
