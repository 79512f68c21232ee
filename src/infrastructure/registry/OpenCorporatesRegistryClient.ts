/**
 * OpenCorporates Registry Client - Upstream Access Implementation
 * Layer: Infrastructure
 * Pattern: Gateway (implements IRegistryClient)
 *
 * `get()` is the only place that touches the network. It appends the
 * configured `api_token`, issues one GET, and converts whatever goes wrong
 * (non-2xx, timeout, refused connection, non-JSON body) into a RegistryFailure
 * value. The three typed helpers unwrap the registry's `results` envelope and
 * fall back to [] / {} on any failure, so callers treat "upstream broken"
 * and "nothing found" the same way.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type {
  IRegistryClient,
  RegistryFailure,
  RegistryOptions,
  RegistryQueryParams,
  RegistryResult,
} from '@domain/interfaces/IRegistryClient';
import type { HttpClient } from '@infrastructure/http/httpClient';
import { REGISTRY_ENDPOINTS } from '@shared/constants';
import { isAxiosError } from 'axios';
import { inject, injectable } from 'tsyringe';
import { z } from 'zod';

const searchEnvelopeSchema = z.object({
  results: z.object({ companies: z.array(z.unknown()) }),
});

const companyEnvelopeSchema = z.object({
  results: z.object({ company: z.record(z.string(), z.unknown()) }),
});

const officersEnvelopeSchema = z.object({
  results: z.object({ officers: z.array(z.unknown()) }),
});

@injectable()
export class OpenCorporatesRegistryClient implements IRegistryClient {
  constructor(
    @inject(TOKENS.HttpClient) private http: HttpClient,
    @inject(TOKENS.RegistryOptions) private options: RegistryOptions,
    @inject(TOKENS.Logger) private log: Logger,
  ) {
    if (!options.apiToken) {
      this.log.warn('No registry API token configured; requests will be sent unauthenticated');
    }
  }

  async get(endpointPath: string, params: RegistryQueryParams = {}): Promise<RegistryResult> {
    const query: RegistryQueryParams = { ...params };
    if (this.options.apiToken) {
      query.api_token = this.options.apiToken;
    }

    try {
      const response = await this.http.get<unknown>(endpointPath, { params: query });
      return { ok: true, data: response.data };
    } catch (err) {
      const error = toRegistryFailure(err);
      this.log.warn(
        {
          endpoint: endpointPath,
          params: query,
          code: error.code,
          status: error.status,
          responseBody: isAxiosError(err) ? err.response?.data : undefined,
        },
        `Registry request failed: ${error.message}`,
      );
      return { ok: false, error };
    }
  }

  async searchCompanies(query: string, jurisdictionCode?: string | null): Promise<unknown[]> {
    const params: RegistryQueryParams = { q: query };
    if (jurisdictionCode) {
      params.jurisdiction_code = jurisdictionCode;
    }

    const result = await this.get(REGISTRY_ENDPOINTS.search, params);
    if (!result.ok) return [];

    const envelope = this.unwrap(searchEnvelopeSchema, result.data, REGISTRY_ENDPOINTS.search);
    return envelope?.results.companies ?? [];
  }

  async getCompanyDetails(
    jurisdictionCode: string,
    companyNumber: string,
  ): Promise<Record<string, unknown>> {
    const endpoint = REGISTRY_ENDPOINTS.company(jurisdictionCode, companyNumber);
    const result = await this.get(endpoint);
    if (!result.ok) return {};

    const envelope = this.unwrap(companyEnvelopeSchema, result.data, endpoint);
    return envelope?.results.company ?? {};
  }

  async getCompanyOfficers(jurisdictionCode: string, companyNumber: string): Promise<unknown[]> {
    const endpoint = REGISTRY_ENDPOINTS.officers(jurisdictionCode, companyNumber);
    const result = await this.get(endpoint);
    if (!result.ok) return [];

    const envelope = this.unwrap(officersEnvelopeSchema, result.data, endpoint);
    return envelope?.results.officers ?? [];
  }

  /** Validates the `results` envelope; a body of the wrong shape counts as empty. */
  private unwrap<T extends z.ZodType>(schema: T, data: unknown, endpoint: string): z.infer<T> | null {
    const parsed = schema.safeParse(data);
    if (parsed.success) return parsed.data;

    this.log.warn(
      { endpoint, code: 'INVALID_RESPONSE', issues: parsed.error.issues.length },
      'Registry response did not match the expected envelope',
    );
    return null;
  }
}

function toRegistryFailure(err: unknown): RegistryFailure {
  if (isAxiosError(err)) {
    if (err.response) {
      return {
        code: 'HTTP_ERROR',
        status: err.response.status,
        message: `Registry responded with HTTP ${err.response.status}`,
      };
    }
    if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
      return { code: 'TIMEOUT', message: `Registry request timed out: ${err.message}` };
    }
    return { code: 'NETWORK_ERROR', message: `Registry unreachable: ${err.message}` };
  }

  if (err instanceof SyntaxError) {
    return { code: 'INVALID_RESPONSE', message: `Registry sent an unreadable body: ${err.message}` };
  }

  return {
    code: 'NETWORK_ERROR',
    message: err instanceof Error ? err.message : String(err),
  };
}
