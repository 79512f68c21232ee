/**
 * Unit Tests - OpenCorporatesRegistryClient
 *
 * The axios instance is replaced by a bare `{ get: jest.fn() }`, so these
 * tests pin down what goes over the wire (path, query params, token) and how
 * every failure mode becomes a value instead of a rejection.
 */
import type { RegistryOptions } from '@domain/interfaces/IRegistryClient';
import { OpenCorporatesRegistryClient } from '@infrastructure/registry/OpenCorporatesRegistryClient';
import { AxiosError, AxiosHeaders } from 'axios';
import pino from 'pino';

import { sampleCompanyRecord, sampleHit, sampleOfficerEntries } from '../helpers/fixtures';

function httpError(status: number, data: unknown = { error: { message: 'nope' } }): AxiosError {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError(
    `Request failed with status code ${status}`,
    AxiosError.ERR_BAD_RESPONSE,
    config,
    undefined,
    { status, statusText: '', data, headers: {}, config },
  );
}

describe('OpenCorporatesRegistryClient', () => {
  let http: { get: jest.Mock };
  const log = pino({ level: 'silent' });

  function createClient(options: RegistryOptions = { apiToken: 'test-token' }) {
    return new OpenCorporatesRegistryClient(http, options, log);
  }

  beforeEach(() => {
    http = { get: jest.fn() };
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('get()', () => {
    it('should append the configured api_token to the query params', async () => {
      http.get.mockResolvedValue({ data: { results: {} } });

      const result = await createClient().get('companies/search', { q: 'ACME' });

      expect(http.get).toHaveBeenCalledWith('companies/search', {
        params: { q: 'ACME', api_token: 'test-token' },
      });
      expect(result).toEqual({ ok: true, data: { results: {} } });
    });

    it('should send no api_token when none is configured', async () => {
      http.get.mockResolvedValue({ data: {} });

      await createClient({ apiToken: null }).get('companies/search', { q: 'ACME' });

      expect(http.get).toHaveBeenCalledWith('companies/search', { params: { q: 'ACME' } });
    });

    it('should warn once at construction when no token is configured', () => {
      const warn = jest.spyOn(log, 'warn');

      createClient({ apiToken: null });
      createClient();

      expect(warn).toHaveBeenCalledTimes(1);
    });

    it('should not mutate the caller params', async () => {
      http.get.mockResolvedValue({ data: {} });
      const params = { q: 'ACME' };

      await createClient().get('companies/search', params);

      expect(params).toEqual({ q: 'ACME' });
    });

    it('should return an HTTP_ERROR result for a non-2xx response', async () => {
      http.get.mockRejectedValue(httpError(404));

      const result = await createClient().get('companies/us_ca/0000');

      expect(result).toEqual({
        ok: false,
        error: { code: 'HTTP_ERROR', status: 404, message: 'Registry responded with HTTP 404' },
      });
    });

    it('should return a TIMEOUT result when the request times out', async () => {
      http.get.mockRejectedValue(
        new AxiosError('timeout of 10000ms exceeded', AxiosError.ECONNABORTED),
      );

      const result = await createClient().get('companies/search');

      expect(result).toEqual({
        ok: false,
        error: { code: 'TIMEOUT', message: 'Registry request timed out: timeout of 10000ms exceeded' },
      });
    });

    it('should return a NETWORK_ERROR result when the registry is unreachable', async () => {
      http.get.mockRejectedValue(new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED'));

      const result = await createClient().get('companies/search');

      expect(result).toEqual({
        ok: false,
        error: { code: 'NETWORK_ERROR', message: 'Registry unreachable: connect ECONNREFUSED 127.0.0.1:443' },
      });
    });

    it('should return an INVALID_RESPONSE result for an unparseable body', async () => {
      http.get.mockRejectedValue(new SyntaxError('Unexpected token < in JSON'));

      const result = await createClient().get('companies/search');

      expect(result.ok).toBe(false);
      expect(!result.ok && result.error.code).toBe('INVALID_RESPONSE');
    });

    it('should log a warning on failure', async () => {
      const warn = jest.spyOn(log, 'warn');
      http.get.mockRejectedValue(httpError(503));

      await createClient().get('companies/search', { q: 'ACME' });

      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0][1]).toBe('Registry request failed: Registry responded with HTTP 503');
    });
  });

  describe('searchCompanies()', () => {
    it('should search by name and return the raw hits', async () => {
      http.get.mockResolvedValue({ data: { results: { companies: [sampleHit] } } });

      const hits = await createClient().searchCompanies('HOMECOMERS RCC INC');

      expect(http.get).toHaveBeenCalledWith('companies/search', {
        params: { q: 'HOMECOMERS RCC INC', api_token: 'test-token' },
      });
      expect(hits).toEqual([sampleHit]);
    });

    it('should filter by jurisdiction_code when one is given', async () => {
      http.get.mockResolvedValue({ data: { results: { companies: [] } } });

      await createClient().searchCompanies('HOMECOMERS RCC INC', 'us_ca');

      expect(http.get).toHaveBeenCalledWith('companies/search', {
        params: { q: 'HOMECOMERS RCC INC', jurisdiction_code: 'us_ca', api_token: 'test-token' },
      });
    });

    it('should not send jurisdiction_code for a null code', async () => {
      http.get.mockResolvedValue({ data: { results: { companies: [] } } });

      await createClient({ apiToken: null }).searchCompanies('ACME', null);

      expect(http.get).toHaveBeenCalledWith('companies/search', { params: { q: 'ACME' } });
    });

    it('should return [] when the request fails', async () => {
      http.get.mockRejectedValue(httpError(500));

      await expect(createClient().searchCompanies('ACME')).resolves.toEqual([]);
    });

    it('should return [] when the envelope is malformed', async () => {
      http.get.mockResolvedValue({ data: { results: { companies: 'none' } } });

      await expect(createClient().searchCompanies('ACME')).resolves.toEqual([]);
    });
  });

  describe('getCompanyDetails()', () => {
    it('should request the company path and return the record verbatim', async () => {
      http.get.mockResolvedValue({ data: { results: { company: sampleCompanyRecord } } });

      const company = await createClient().getCompanyDetails('us_ca', 'C4012345');

      expect(http.get).toHaveBeenCalledWith('companies/us_ca/C4012345', {
        params: { api_token: 'test-token' },
      });
      expect(company).toEqual(sampleCompanyRecord);
    });

    it('should encode path segments', async () => {
      http.get.mockResolvedValue({ data: { results: { company: {} } } });

      await createClient().getCompanyDetails('us_ca', 'C 12/3');

      expect(http.get.mock.calls[0][0]).toBe('companies/us_ca/C%2012%2F3');
    });

    it('should return {} when the request fails', async () => {
      http.get.mockRejectedValue(httpError(404));

      await expect(createClient().getCompanyDetails('us_ca', '0000')).resolves.toEqual({});
    });

    it('should return {} when the envelope has no company object', async () => {
      http.get.mockResolvedValue({ data: { results: {} } });

      await expect(createClient().getCompanyDetails('us_ca', '0000')).resolves.toEqual({});
    });
  });

  describe('getCompanyOfficers()', () => {
    it('should request the officers path and return the entries verbatim', async () => {
      http.get.mockResolvedValue({ data: { results: { officers: sampleOfficerEntries } } });

      const officers = await createClient().getCompanyOfficers('us_ca', 'C4012345');

      expect(http.get).toHaveBeenCalledWith('companies/us_ca/C4012345/officers', {
        params: { api_token: 'test-token' },
      });
      expect(officers).toEqual(sampleOfficerEntries);
    });

    it('should return [] when the request fails', async () => {
      http.get.mockRejectedValue(new AxiosError('socket hang up', 'ECONNRESET'));

      await expect(createClient().getCompanyOfficers('us_ca', 'C4012345')).resolves.toEqual([]);
    });
  });
});
