/**
 * Shared Type Definitions
 * Layer: Shared (cross-cutting)
 *
 * Response shapes that the service builds and the controllers serialize.
 * ControllerLookupResult is what POST /api/search returns; CompanyDetailsResult
 * is what GET /api/company_details returns.
 */
import type { CompanyWithOfficers } from '@domain/entities/Company';

import type { LOOKUP_STATUS } from './constants';

export type LookupStatus = (typeof LOOKUP_STATUS)[keyof typeof LOOKUP_STATUS];

/**
 * Diagnostics attached to a lookup. Additive: clients that only read
 * status/message/results are unaffected.
 */
export interface LookupMeta {
  /** Search hits that were looked at (at most MAX_CANDIDATES). */
  candidatesConsidered: number;
  /** Hits dropped because jurisdiction_code or company_number was missing. */
  skippedCandidates: number;
  /** Hits dropped because processing them failed (malformed record, etc.). */
  failedCandidates: number;
  /** Wall-clock time from request arrival to response (ms), set by the controller. */
  totalTimeMs?: number;
}

export interface ControllerLookupResult {
  status: LookupStatus;
  message: string;
  results: CompanyWithOfficers[];
  meta?: LookupMeta;
}

/**
 * Upstream company object and officer entries, passed through unchanged.
 * `company` is {} when the registry could not supply it.
 */
export interface CompanyDetailsResult {
  company: Record<string, unknown>;
  officers: unknown[];
}
