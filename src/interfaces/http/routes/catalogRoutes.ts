/**
 * Catalog Routes
 * Layer: Interfaces (HTTP)
 *
 * Mounted under `/api/v1/catalog` in app.ts:
 *
 *   GET /api/v1/catalog/search?term=change&entity=music&limit=12  →  controller.search
 *   GET /api/v1/catalog/search?id=263058648                            →  controller.search (lookup)
 *   GET /api/v1/catalog/lookup/263058648                               →  controller.lookup
 */
import { CatalogController } from '@interfaces/http/controllers/CatalogController';
import { Router } from 'express';

const router = Router();
const controller = new CatalogController();

router.get('/search', controller.search);
router.get('/lookup/:id', controller.lookup);

export { router as catalogRoutes };
