/**
 * Registry Client Interface - The Upstream Access Contract
 * Layer: Domain
 * Pattern: Gateway
 *
 * The application needs three things from the corporate registry: a name
 * search, a single company record, and the officers of a company. This
 * interface says WHAT those calls return; OpenCorporatesRegistryClient
 * (Infrastructure) decides how they go over the wire.
 *
 * Nothing here throws for upstream trouble. `get()` folds every transport or
 * HTTP failure into a `RegistryResult` with ok=false, and the typed helpers
 * turn that into their "nothing found" value ([] or {}).
 */
export type RegistryQueryParams = Record<string, string>;

export type RegistryFailureCode = 'HTTP_ERROR' | 'NETWORK_ERROR' | 'TIMEOUT' | 'INVALID_RESPONSE';

export interface RegistryFailure {
  code: RegistryFailureCode;
  /** Human-readable description, safe to log. */
  message: string;
  /** Upstream HTTP status, when a response was received. */
  status?: number;
}

export type RegistryResult<T = unknown> = { ok: true; data: T } | { ok: false; error: RegistryFailure };

export interface IRegistryClient {
  /** Single authenticated GET against `<baseUrl>/<endpointPath>`. Never rejects. */
  get(endpointPath: string, params?: RegistryQueryParams): Promise<RegistryResult>;

  /**
   * `companies/search`. Returns the raw `results.companies` entries in
   * upstream order; each entry is validated by the caller. [] on failure.
   */
  searchCompanies(query: string, jurisdictionCode?: string | null): Promise<unknown[]>;

  /** `companies/:jurisdiction/:number`. The upstream company object as sent; {} on failure. */
  getCompanyDetails(jurisdictionCode: string, companyNumber: string): Promise<Record<string, unknown>>;

  /** `companies/:jurisdiction/:number/officers`. Raw `results.officers` entries; [] on failure. */
  getCompanyOfficers(jurisdictionCode: string, companyNumber: string): Promise<unknown[]>;
}

/** Settings the client is constructed with (registered from config.registry). */
export interface RegistryOptions {
  apiToken: string | null;
}
