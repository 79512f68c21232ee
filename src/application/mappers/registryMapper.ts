/**
 * Registry → Domain mapping
 * Layer: Application
 *
 * The one place where snake_case registry records become camelCase domain
 * objects. Search hits are validated here, one at a time, so a single
 * malformed hit can be reported without touching its neighbours.
 */
import { type Company, companySearchHitSchema } from '@domain/entities/Company';
import { type Officer, officerEntrySchema } from '@domain/entities/Officer';
import { PartialProcessingError } from '@shared/errors/AppError';

/**
 * Maps one search hit. Returns null when the hit lacks a company record, a
 * jurisdiction code or a company number (it cannot be looked up further).
 * Throws PartialProcessingError when the hit is not an object or one of the
 * fields read here has the wrong type.
 */
export function toCompany(hit: unknown, candidateIndex: number): Company | null {
  const parsed = companySearchHitSchema.safeParse(hit);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.') || '(root)').join(', ');
    throw new PartialProcessingError(
      `Search hit #${candidateIndex} is malformed (${fields})`,
      candidateIndex,
    );
  }

  const record = parsed.data.company;
  if (!record || !record.jurisdiction_code || !record.company_number) return null;

  return {
    name: record.name ?? null,
    jurisdictionCode: record.jurisdiction_code,
    companyNumber: record.company_number,
    incorporationDate: record.incorporation_date ?? null,
    companyType: record.company_type ?? null,
    currentStatus: record.current_status ?? null,
  };
}

/** Maps `results.officers` entries; entries that are not `{ officer: {...} }` are dropped. */
export function toOfficers(entries: unknown[]): Officer[] {
  const officers: Officer[] = [];
  for (const entry of entries) {
    const parsed = officerEntrySchema.safeParse(entry);
    if (!parsed.success) continue;

    const { officer } = parsed.data;
    officers.push({
      name: officer.name ?? null,
      position: officer.position ?? null,
      startDate: officer.start_date ?? null,
    });
  }
  return officers;
}
