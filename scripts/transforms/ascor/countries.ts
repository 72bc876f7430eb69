import type { RawTable, Relation } from '../../lib/types';
import { describeColumns, presentColumns } from '../../lib/columns';
import { reader } from '../shared';
import type { AssessmentElementRow, CountryRow } from './types';

const COUNTRY_COLUMNS = {
  name: 'country_name',
  country_iso_code: 'iso',
  region: 'region',
  world_bank_lending_group: 'bank_lending_group',
  international_monetary_fund_fiscal_monitor_category: 'imf_category',
  type_of_party_to_the_united_nations_framework_convention_on_climate_change: 'un_party_type',
} as const;

export function reshapeCountries(raw: RawTable): Relation<CountryRow> {
  const shape = describeColumns(raw.columns);
  const read = reader(shape);

  return {
    name: 'country',
    columns: presentColumns(shape, COUNTRY_COLUMNS),
    rows: raw.rows.map(row => ({
      country_name: read.text(row, 'name'),
      iso: read.text(row, 'country_iso_code'),
      region: read.text(row, 'region'),
      bank_lending_group: read.text(row, 'world_bank_lending_group'),
      imf_category: read.text(row, 'international_monetary_fund_fiscal_monitor_category'),
      un_party_type: read.text(row, 'type_of_party_to_the_united_nations_framework_convention_on_climate_change'),
    })),
    sourceFile: raw.sourceFile,
  };
}

const INDICATOR_COLUMNS = {
  code: 'code',
  text: 'text',
  units_or_response_type: 'response_type',
  type: 'type',
} as const;

/**
 * Indicator catalogue. A blank response type reads as "Not specified".
 */
export function reshapeIndicators(raw: RawTable): Relation<AssessmentElementRow> {
  const shape = describeColumns(raw.columns);
  const read = reader(shape);

  return {
    name: 'assessment_elements',
    columns: presentColumns(shape, INDICATOR_COLUMNS),
    rows: raw.rows.map(row => ({
      code: read.text(row, 'code'),
      text: read.text(row, 'text'),
      response_type: read.text(row, 'units_or_response_type') ?? 'Not specified',
      type: read.text(row, 'type'),
    })),
    sourceFile: raw.sourceFile,
  };
}
