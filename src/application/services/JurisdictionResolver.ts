/**
 * Jurisdiction Resolver
 * Layer: Application
 *
 * Turns a free-text hint ("CA", "california", " Illinois ") into the
 * registry's jurisdiction code ("us_ca"). The table is built once at startup
 * from shared/data/jurisdictions.json and injected; the resolver itself holds
 * no other state.
 *
 * A hint that is absent, blank or not in the table resolves to null, which
 * callers read as "search all jurisdictions".
 */
import { TOKENS } from '@core/types';
import { inject, injectable } from 'tsyringe';

export type JurisdictionTable = ReadonlyMap<string, string>;

export function createJurisdictionTable(entries: Readonly<Record<string, string>>): JurisdictionTable {
  return new Map(
    Object.entries(entries).map(([hint, code]) => [normalizeHint(hint), code] as const),
  );
}

function normalizeHint(hint: string): string {
  return hint.trim().toLowerCase();
}

@injectable()
export class JurisdictionResolver {
  constructor(@inject(TOKENS.JurisdictionTable) private table: JurisdictionTable) {}

  resolve(hint?: string | null): string | null {
    if (!hint) return null;
    const key = normalizeHint(hint);
    if (!key) return null;
    return this.table.get(key) ?? null;
  }
}
