/**
 * Lookup Controller - HTTP Boundary for Company Search & Details
 * Layer: Interfaces (HTTP)
 *
 * Thin on purpose: validate the request part, call ControllerLookupService,
 * send JSON. Arrow-function properties keep `this` bound when Express calls
 * them as route handlers.
 */
/// <reference path="../../../shared/express.d.ts" />
import type { ControllerLookupService } from '@application/services/ControllerLookupService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import {
  companyDetailsQuerySchema,
  parseRequest,
  searchBodySchema,
} from '@interfaces/http/middleware/validation';
import type { Request, Response } from 'express';

export class LookupController {
  private service: ControllerLookupService;

  constructor() {
    this.service = container.resolve<ControllerLookupService>(TOKENS.ControllerLookupService);
  }

  search = async (req: Request, res: Response): Promise<void> => {
    const { company_name, jurisdiction } = parseRequest(searchBodySchema, req.body);

    const result = await this.service.findControllers(company_name, jurisdiction);

    const totalTimeMs =
      req.requestStartTime != null ? Math.round(Date.now() - req.requestStartTime) : undefined;

    res.status(200).json({
      ...result,
      ...(result.meta && { meta: { ...result.meta, ...(totalTimeMs != null && { totalTimeMs }) } }),
    });
  };

  companyDetails = async (req: Request, res: Response): Promise<void> => {
    const { jurisdiction, company_number } = parseRequest(companyDetailsQuerySchema, req.query);

    const details = await this.service.getCompanyDetails(jurisdiction, company_number);

    res.status(200).json(details);
  };
}
