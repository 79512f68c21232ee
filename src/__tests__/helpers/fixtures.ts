/**
 * Test Fixtures - Registry Payloads
 * Layer: Test Helpers
 *
 * Shapes mirror what the registry sends: search hits wrap the company as
 * `{ company: {...} }`, officers come as `{ officer: {...} }`. Names and
 * numbers are made up.
 */
export const sampleCompanyRecord = {
  name: 'HOMECOMERS RCC INC',
  jurisdiction_code: 'us_ca',
  company_number: 'C4012345',
  incorporation_date: '2017-03-14',
  company_type: 'Domestic Stock',
  current_status: 'Active',
  registry_url: 'https://example.test/registry/C4012345',
};

export const sampleSecondCompanyRecord = {
  name: 'HOMECOMERS RCC HOLDINGS LLC',
  jurisdiction_code: 'us_ca',
  company_number: '201812345678',
  incorporation_date: null,
  company_type: 'Limited Liability Company',
  current_status: 'Suspended',
};

export const sampleHit = { company: sampleCompanyRecord };
export const sampleSecondHit = { company: sampleSecondCompanyRecord };

/** Has a name but neither jurisdiction_code nor company_number. */
export const hitMissingIdentity = {
  company: { name: 'NAMELESS NUMBERLESS CO', jurisdiction_code: null },
};

export const hitMissingNumber = {
  company: { name: 'NO NUMBER LLC', jurisdiction_code: 'us_il' },
};

export function makeHits(count: number): { company: Record<string, string> }[] {
  return Array.from({ length: count }, (_, i) => ({
    company: {
      name: `TEST COMPANY ${i + 1}`,
      jurisdiction_code: 'us_il',
      company_number: `IL${String(i + 1).padStart(4, '0')}`,
    },
  }));
}

export const sampleOfficerEntries = [
  { officer: { id: 101, name: 'JANE ROE', position: 'director', start_date: '2017-03-14' } },
  { officer: { id: 102, name: 'JOHN ROE', position: 'secretary', start_date: null } },
];
