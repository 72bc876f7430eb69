/**
 * Unit Tests for the company snapshot
 */

import { CompanyDataAccess } from '../company-data-access';
import { FakeQueryExecutor } from '../../__tests__/helpers/fakes';

const ROWS = [
  { company_name: 'Acme Steel', version: '4.0', geography: 'Germany', sector_name: 'Steel' },
  { company_name: 'Acme Steel', version: '5.0', geography: 'Germany', sector_name: 'Steel' },
  { company_name: 'Borealis Power', version: '5.0', geography: null, sector_name: 'Electricity Utilities' },
  { company_name: null, version: '5.0', geography: null, sector_name: null },
];

describe('CompanyDataAccess', () => {
  it('loads lazily on first use', async () => {
    const executor = new FakeQueryExecutor([ROWS]);
    const access = new CompanyDataAccess(executor, 'tpi');

    expect(access.lastLoaded).toBeNull();
    expect(await access.sectors()).toEqual(['Electricity Utilities', 'Steel']);
    expect(await access.all()).toHaveLength(3);
    expect(executor.calls).toHaveLength(1);
    expect(executor.calls[0].text).toContain('FROM [tpi].[company]');
    expect(access.lastLoaded).toBeInstanceOf(Date);
  });

  it('finds every version of a company regardless of case', async () => {
    const access = new CompanyDataAccess(new FakeQueryExecutor([ROWS]), 'tpi');
    expect((await access.find(' ACME steel')).map(record => record.version)).toEqual(['4.0', '5.0']);
  });

  it('only refreshes on reload', async () => {
    const executor = new FakeQueryExecutor([ROWS, ROWS.slice(0, 1)]);
    const access = new CompanyDataAccess(executor, 'tpi');

    expect(await access.reload()).toBe(3);
    expect(await access.all()).toHaveLength(3);
    expect(await access.reload()).toBe(1);
    expect(await access.all()).toEqual([{ companyName: 'Acme Steel', version: '4.0', geography: 'Germany', sector: 'Steel' }]);
  });
});
