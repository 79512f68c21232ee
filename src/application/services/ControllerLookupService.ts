/**
 * Controller Lookup Service - The Orchestrator
 * Layer: Application
 * Pattern: Facade (over the registry client and the jurisdiction resolver)
 *
 * Two responsibilities:
 *   1. findControllers(): resolve the jurisdiction hint, search by name, take
 *      the first MAX_CANDIDATES hits in registry order, fetch officers for each
 *      usable hit and classify the outcome (success / partial_results /
 *      not_found).
 *   2. getCompanyDetails(): company record plus officers for an exact
 *      (jurisdiction, number) pair, passed through as the registry sent them.
 *
 * Candidates are processed concurrently but each one is isolated: a hit that
 * fails to map is logged and counted, the others still come back. Results
 * keep the order of the search hits they came from.
 */
import { toCompany, toOfficers } from '@application/mappers/registryMapper';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { CompanyWithOfficers } from '@domain/entities/Company';
import type { IRegistryClient } from '@domain/interfaces/IRegistryClient';
import { LOOKUP_STATUS, MAX_CANDIDATES } from '@shared/constants';
import type { CompanyDetailsResult, ControllerLookupResult, LookupStatus } from '@shared/types';
import { inject, injectable } from 'tsyringe';

import { JurisdictionResolver } from './JurisdictionResolver';

type CandidateOutcome =
  | { kind: 'resolved'; result: CompanyWithOfficers }
  | { kind: 'skipped' }
  | { kind: 'failed' };

@injectable()
export class ControllerLookupService {
  constructor(
    @inject(TOKENS.RegistryClient) private registry: IRegistryClient,
    @inject(TOKENS.JurisdictionResolver) private resolver: JurisdictionResolver,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async findControllers(
    companyName: string,
    jurisdictionHint?: string | null,
  ): Promise<ControllerLookupResult> {
    const jurisdictionCode = this.resolver.resolve(jurisdictionHint);
    const hits = await this.registry.searchCompanies(companyName, jurisdictionCode);

    if (hits.length === 0) {
      return {
        status: LOOKUP_STATUS.NOT_FOUND,
        message: `No companies found matching '${companyName}'`,
        results: [],
      };
    }

    const candidates = hits.slice(0, MAX_CANDIDATES);
    const outcomes = await Promise.all(
      candidates.map((hit, index) => this.processCandidate(hit, index)),
    );

    const results: CompanyWithOfficers[] = [];
    let skippedCandidates = 0;
    let failedCandidates = 0;
    for (const outcome of outcomes) {
      if (outcome.kind === 'resolved') results.push(outcome.result);
      else if (outcome.kind === 'skipped') skippedCandidates++;
      else failedCandidates++;
    }

    const status: LookupStatus = results.length > 0 ? LOOKUP_STATUS.SUCCESS : LOOKUP_STATUS.PARTIAL;

    this.log.debug(
      {
        companyName,
        jurisdictionCode,
        hits: hits.length,
        resolved: results.length,
        skippedCandidates,
        failedCandidates,
      },
      'Controller lookup complete',
    );

    return {
      status,
      message: `Found ${results.length} potential matches for '${companyName}'`,
      results,
      meta: {
        candidatesConsidered: candidates.length,
        skippedCandidates,
        failedCandidates,
      },
    };
  }

  async getCompanyDetails(
    jurisdictionCode: string,
    companyNumber: string,
  ): Promise<CompanyDetailsResult> {
    const [company, officers] = await Promise.all([
      this.registry.getCompanyDetails(jurisdictionCode, companyNumber),
      this.registry.getCompanyOfficers(jurisdictionCode, companyNumber),
    ]);
    return { company, officers };
  }

  private async processCandidate(hit: unknown, index: number): Promise<CandidateOutcome> {
    try {
      const company = toCompany(hit, index);
      if (!company) return { kind: 'skipped' };

      const officerEntries = await this.registry.getCompanyOfficers(
        company.jurisdictionCode,
        company.companyNumber,
      );

      return { kind: 'resolved', result: { ...company, officers: toOfficers(officerEntries) } };
    } catch (err) {
      this.log.warn({ err, candidateIndex: index }, 'Failed to process search candidate');
      return { kind: 'failed' };
    }
  }
}
