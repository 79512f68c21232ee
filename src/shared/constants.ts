/** Status of a controller lookup, as serialized in API responses. */
export const LOOKUP_STATUS = {
  SUCCESS: 'success',
  PARTIAL: 'partial_results',
  NOT_FOUND: 'not_found',
} as const;

/** Search hits enriched with officers per lookup. Later hits are ignored. */
export const MAX_CANDIDATES = 3;

export const REGISTRY_ENDPOINTS = {
  search: 'companies/search',
  company: (jurisdictionCode: string, companyNumber: string) =>
    `companies/${encodeURIComponent(jurisdictionCode)}/${encodeURIComponent(companyNumber)}`,
  officers: (jurisdictionCode: string, companyNumber: string) =>
    `companies/${encodeURIComponent(jurisdictionCode)}/${encodeURIComponent(companyNumber)}/officers`,
} as const;
