import fs from 'fs';
import os from 'os';
import path from 'path';
import { SnapshotSource } from '../SnapshotSource';
import { normalizeBatch } from '../../utils/aircraftState';
import { buildOpenSkyState } from '../../__tests__/fixtures/aircraftFixtures';

jest.mock('../../utils/logger', () => ({
  __esModule: true,
  default: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const BUNDLED_SNAPSHOT = path.resolve(__dirname, '../../../data/fallbackSnapshot.json');

describe('SnapshotSource', () => {
  let tempDir: string;

  const writeSnapshot = (name: string, contents: string): string => {
    const filePath = path.join(tempDir, name);
    fs.writeFileSync(filePath, contents, 'utf8');
    return filePath;
  };

  beforeAll(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'snapshot-source-'));
  });

  afterAll(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('loads the bundled snapshot as named records', () => {
    const result = new SnapshotSource(BUNDLED_SNAPSHOT).load();

    expect(result.ok).toBe(true);
    if (!result.ok) {
      throw new Error('Snapshot should have loaded');
    }
    expect(result.value.shape).toBe('named');

    const observations = normalizeBatch(result.value);
    expect(observations).toHaveLength(8);
    expect(observations[0]).toMatchObject({ icao24: 'e48a1c', callsign: 'TAM3340' });
    observations.forEach((observation) => {
      expect(observation.altitudeM).toBeGreaterThan(0);
    });
  });

  it('reads the file only once', () => {
    const filePath = writeSnapshot('memo.json', JSON.stringify([{ hex: 'abc123', flight: 'TST1' }]));
    const source = new SnapshotSource(filePath);

    const first = source.load();
    fs.writeFileSync(filePath, 'not json', 'utf8');
    const second = source.load();

    expect(first.ok).toBe(true);
    expect(second).toEqual(first);
  });

  it('accepts state vector snapshots', () => {
    const states = [buildOpenSkyState()];
    const filePath = writeSnapshot('states.json', JSON.stringify({ time: 1_700_000_000, states }));

    const result = new SnapshotSource(filePath).load();

    expect(result).toEqual({ ok: true, value: { shape: 'positional', records: states } });
  });

  it('fails on a missing file', () => {
    const result = new SnapshotSource(path.join(tempDir, 'missing.json')).load();

    expect(result.ok).toBe(false);
  });

  it('fails on invalid JSON', () => {
    const result = new SnapshotSource(writeSnapshot('broken.json', '{"ac": [')).load();

    expect(result.ok).toBe(false);
  });

  it('fails on an unexpected shape', () => {
    const filePath = writeSnapshot('shape.json', JSON.stringify({ aircraft: [] }));

    const result = new SnapshotSource(filePath).load();

    expect(result).toEqual({
      ok: false,
      error: new Error(`Snapshot file ${filePath} has an unexpected shape`),
    });
  });
});
