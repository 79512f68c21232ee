/**
 * Company Entity
 * Layer: Domain
 *
 * Two shapes for the same concept:
 *
 *   Company             - camelCase, what the application and the API work with.
 *   companyRecordSchema - snake_case, the object the registry returns under
 *                         `results.company` (search hits wrap it as `{ company }`).
 *
 * Identity is the (jurisdictionCode, companyNumber) pair. Names are not
 * unique across jurisdictions, numbers are unique within one.
 *
 * The record schema is loose: the registry sends many more fields than we
 * read, and any of the ones we read may be missing or null. Whether a record
 * is usable (has both identity fields) is decided by the mapper, not here.
 */
import { z } from 'zod';

import type { Officer } from './Officer';

export interface Company {
  name: string | null;
  jurisdictionCode: string;
  companyNumber: string;
  incorporationDate: string | null;
  companyType: string | null;
  currentStatus: string | null;
}

export interface CompanyWithOfficers extends Company {
  officers: Officer[];
}

const optionalText = z.string().nullish();

export const companyRecordSchema = z.looseObject({
  name: optionalText,
  jurisdiction_code: optionalText,
  company_number: optionalText,
  incorporation_date: optionalText,
  company_type: optionalText,
  current_status: optionalText,
});

/** One element of `results.companies` in a search response. */
export const companySearchHitSchema = z.looseObject({
  company: companyRecordSchema.nullish(),
});
