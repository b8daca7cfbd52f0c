import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { readJsonFile, saveJsonFile } from '../utils/fileSystem';

interface State {
  label: string;
  rows: { index: number; text: string }[];
}

function buildState(label: string): State {
  return {
    label,
    rows: Array.from({ length: 2000 }, (_, index) => ({ index, text: `${label}-${index}`.repeat(8) })),
  };
}

describe('JSON file storage', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'json-files-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should round-trip a value and create missing directories', async () => {
    const filePath = path.join(dir, 'nested', 'state.json');

    await saveJsonFile(filePath, { label: 'a', rows: [] });

    expect(await readJsonFile<State>(filePath)).toEqual({ label: 'a', rows: [] });
  });

  it('should only ever expose whole files to concurrent readers', async () => {
    const filePath = path.join(dir, 'state.json');
    await saveJsonFile(filePath, buildState('a'));

    const writes = (async () => {
      for (let i = 0; i < 10; i++) {
        await saveJsonFile(filePath, buildState(i % 2 === 0 ? 'b' : 'a'));
      }
    })();
    const reads = Promise.all(Array.from({ length: 40 }, () => readJsonFile<State>(filePath)));

    const [, states] = await Promise.all([writes, reads]);

    for (const state of states) {
      expect(state === null ? null : [state.label === 'a' || state.label === 'b', state.rows.length]).toEqual([true, 2000]);
    }
    expect(await fs.readdir(dir)).toEqual(['state.json']);
  });

  it('should return null for a missing file', async () => {
    expect(await readJsonFile<State>(path.join(dir, 'absent.json'))).toBeNull();
  });
});
