import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { JsonDensityTableSource } from './json-density-table.source';
import { DensityClass } from './interfaces/coverage.interface';

describe('JsonDensityTableSource', () => {
  let dir: string;
  let source: JsonDensityTableSource;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'density-'));
    writeFileSync(
      join(dir, 'test-town.json'),
      JSON.stringify({
        region: 'test-town',
        entries: [
          { id: '00001', label: 'Center', density: 'high', expected: 120 },
          { id: '00002', density: 'low', expected: 15 },
        ],
      }),
    );
    source = new JsonDensityTableSource(dir);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should map file entries to density entries', async () => {
    const table = await source.lookup({ key: 'Test-Town' });

    expect(table).toEqual([
      {
        subRegionId: '00001',
        label: 'Center',
        densityClass: DensityClass.HIGH,
        expectedCount: 120,
      },
      {
        subRegionId: '00002',
        label: undefined,
        densityClass: DensityClass.LOW,
        expectedCount: 15,
      },
    ]);
  });

  it('should return an empty table for an unknown region', async () => {
    await expect(source.lookup({ key: 'nowhere' })).resolves.toEqual([]);
  });

  it('should not read outside its directory', async () => {
    await expect(source.lookup({ key: '../etc/passwd' })).resolves.toEqual([]);
  });

  it('should reject a malformed file', async () => {
    writeFileSync(join(dir, 'broken.json'), JSON.stringify({ entries: [{}] }));
    await expect(source.lookup({ key: 'broken' })).rejects.toThrow();
  });

  it('should ship a table for los-angeles-ca', async () => {
    const table = await new JsonDensityTableSource().lookup({
      key: 'los-angeles-ca',
    });

    expect(table.length).toBe(100);
    expect(table.find((e) => e.subRegionId === '90012')).toEqual({
      subRegionId: '90012',
      label: 'Downtown LA',
      densityClass: DensityClass.VERY_HIGH,
      expectedCount: 450,
    });
  });
});
