import { existsSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { DestinationWriteError } from '../errors.js';
import { FamilyWriter, formatLine } from '../family-writer.js';
import { FAMILY_DEFINITIONS, HealthRecordRow } from '../types.js';
import { createTempDir, readCsv } from './fixtures.js';

const HEADER = 'type,value,unit,source_name,source_version,start_date,end_date,creation_date';

function record(overrides: Partial<HealthRecordRow> = {}): HealthRecordRow {
  return {
    type: 'StepCount',
    value: '120',
    unit: 'count',
    source_name: '',
    source_version: '',
    start_date: '2024-01-01T08:00:00-05:00',
    end_date: '2024-01-01T08:01:00-05:00',
    creation_date: '',
    ...overrides
  };
}

describe('FamilyWriter', () => {
  let tempDir: string;
  let destination: string;

  beforeEach(() => {
    tempDir = createTempDir();
    destination = join(tempDir, 'health_records.csv');
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  test('should write a header and rows in column order', async () => {
    const writer = new FamilyWriter(FAMILY_DEFINITIONS.records);
    await writer.open(destination);
    await writer.write(record());
    const committed = await writer.close();

    expect(committed).toBe(destination);
    expect(writer.rowCount).toBe(1);
    expect(readFileSync(destination, 'utf-8')).toBe(
      `${HEADER}\nStepCount,120,count,,,2024-01-01T08:00:00-05:00,2024-01-01T08:01:00-05:00,\n`
    );
  });

  test('should write only the header when there are no rows', async () => {
    const writer = new FamilyWriter(FAMILY_DEFINITIONS.workouts);
    const path = join(tempDir, 'workouts.csv');
    await writer.open(path);
    await writer.close();

    expect(readFileSync(path, 'utf-8')).toBe(
      'workout_type,duration,duration_unit,total_distance,total_distance_unit,' +
      'total_energy_burned,total_energy_burned_unit,source_name,start_date,end_date\n'
    );
  });

  test('should keep rows in a partial file until closed', async () => {
    const writer = new FamilyWriter(FAMILY_DEFINITIONS.records, 1);
    await writer.open(destination);
    await writer.write(record());

    expect(writer.partialPath).toBe(`${destination}.partial`);
    expect(existsSync(`${destination}.partial`)).toBe(true);
    expect(existsSync(destination)).toBe(false);

    await writer.close();

    expect(existsSync(`${destination}.partial`)).toBe(false);
    expect(existsSync(destination)).toBe(true);
  });

  test('should truncate an existing destination on commit', async () => {
    writeFileSync(destination, 'stale content\n');

    const writer = new FamilyWriter(FAMILY_DEFINITIONS.records);
    await writer.open(destination);
    await writer.close();

    expect(readFileSync(destination, 'utf-8')).toBe(`${HEADER}\n`);
  });

  test('should discard the partial file and keep the previous output on abort', async () => {
    writeFileSync(destination, 'previous run\n');

    const writer = new FamilyWriter(FAMILY_DEFINITIONS.records, 1);
    await writer.open(destination);
    await writer.write(record());
    await writer.abort();

    expect(existsSync(`${destination}.partial`)).toBe(false);
    expect(readFileSync(destination, 'utf-8')).toBe('previous run\n');
  });

  test('should treat abort as a no-op once committed', async () => {
    const writer = new FamilyWriter(FAMILY_DEFINITIONS.records);
    await writer.open(destination);
    await writer.close();
    await writer.abort();

    expect(existsSync(destination)).toBe(true);
  });

  test('should reject writes after close', async () => {
    const writer = new FamilyWriter(FAMILY_DEFINITIONS.records);
    await writer.open(destination);
    await writer.close();

    await expect(writer.write(record())).rejects.toBeInstanceOf(DestinationWriteError);
  });

  test('should fail to open in a missing directory', async () => {
    const writer = new FamilyWriter(FAMILY_DEFINITIONS.records);

    await expect(writer.open(join(tempDir, 'missing', 'health_records.csv')))
      .rejects.toBeInstanceOf(DestinationWriteError);
  });

  test('should produce identical output whatever the flush threshold', async () => {
    const rows = Array.from({ length: 25 }, (_, i) => record({ value: String(i) }));

    const small = new FamilyWriter(FAMILY_DEFINITIONS.records, 16);
    const smallPath = join(tempDir, 'small.csv');
    await small.open(smallPath);
    for (const row of rows) {
      await small.write(row);
    }
    await small.close();

    const large = new FamilyWriter(FAMILY_DEFINITIONS.records);
    await large.open(destination);
    for (const row of rows) {
      await large.write(row);
    }
    await large.close();

    expect(readFileSync(smallPath, 'utf-8')).toBe(readFileSync(destination, 'utf-8'));
  });

  test('should round-trip values containing delimiters, quotes and line breaks', async () => {
    const awkward = ['a,b', 'say "hi"', 'line1\nline2', 'cr\r\nlf', ' padded '];

    const writer = new FamilyWriter(FAMILY_DEFINITIONS.records);
    await writer.open(destination);
    for (const value of awkward) {
      await writer.write(record({ value, source_name: value }));
    }
    await writer.close();

    const rows = readCsv(destination);
    expect(rows).toHaveLength(awkward.length + 1);
    expect(rows.slice(1).map(row => row[1])).toEqual(awkward);
    expect(rows.slice(1).map(row => row[3])).toEqual(awkward);
  });
});

describe('formatLine', () => {
  test('should quote only values that need it', () => {
    expect(formatLine(['plain', 'a,b', 'say "hi"', ''])).toBe('plain,"a,b","say ""hi""",\n');
  });
});
