/**
 * Officer Entity
 * Layer: Domain
 *
 * A person or entity holding a registered role in a company. Officers have
 * no identity outside the company they were fetched for and are never
 * deduplicated across companies.
 *
 * The registry wraps each record: `results.officers` is a list of
 * `{ officer: { name, position, start_date, ... } }`.
 */
import { z } from 'zod';

export interface Officer {
  name: string | null;
  position: string | null;
  startDate: string | null;
}

const optionalText = z.string().nullish();

export const officerRecordSchema = z.looseObject({
  name: optionalText,
  position: optionalText,
  start_date: optionalText,
});

export const officerEntrySchema = z.looseObject({
  officer: officerRecordSchema,
});
