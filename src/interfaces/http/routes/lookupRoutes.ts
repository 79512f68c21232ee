/**
 * Lookup Routes
 * Layer: Interfaces (HTTP)
 *
 * Mounted under `/api` in app.ts:
 *
 *   POST /api/search            { company_name, jurisdiction? }  →  controller.search
 *   GET  /api/company_details?jurisdiction=us_ca&company_number=C1234567
 *                                                                →  controller.companyDetails
 */
import { LookupController } from '@interfaces/http/controllers/LookupController';
import { Router } from 'express';

const router = Router();
const controller = new LookupController();

router.post('/search', controller.search);
router.get('/company_details', controller.companyDetails);

export { router as lookupRoutes };
