import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { parseList, readCredentialsFile, readRegionsFile, resolveFirst } from './config.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'wg-config-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function writeFile(name: string, contents: string): string {
  const filePath = path.join(tmpDir, name);
  fs.writeFileSync(filePath, contents);
  return filePath;
}

describe('resolveFirst', () => {
  it('returns the first source with a value and stops there', async () => {
    const later = vi.fn(() => 'from-file');

    const resolved = await resolveFirst<string>([
      { name: 'flag', load: () => undefined },
      { name: 'environment', load: async () => 'from-env' },
      { name: 'file', load: later },
    ]);

    expect(resolved).toEqual({ value: 'from-env', source: 'environment' });
    expect(later).not.toHaveBeenCalled();
  });

  it('treats blank strings and empty lists as missing', async () => {
    const strings = await resolveFirst<string>([
      { name: 'flag', load: () => '  ' },
      { name: 'file', load: () => 'swiss' },
    ]);
    const lists = await resolveFirst<string[]>([
      { name: 'flag', load: () => [] },
      { name: 'saved', load: () => ['de-berlin'] },
    ]);

    expect(strings).toEqual({ value: 'swiss', source: 'file' });
    expect(lists).toEqual({ value: ['de-berlin'], source: 'saved' });
  });

  it('returns undefined when no source has a value', async () => {
    expect(await resolveFirst<string>([{ name: 'flag', load: () => undefined }])).toBeUndefined();
  });
});

describe('readCredentialsFile', () => {
  it('reads user and password lines', () => {
    const filePath = writeFile('credentials.properties', 'PIA_USER=p0000000\nPIA_PASS = test-secret \n');
    expect(readCredentialsFile(filePath)).toEqual({ username: 'p0000000', password: 'test-secret' });
  });

  it('returns undefined when a value is missing', () => {
    const filePath = writeFile('credentials.properties', 'PIA_USER=p0000000\n');
    expect(readCredentialsFile(filePath)).toBeUndefined();
  });

  it('returns undefined for a missing file', () => {
    expect(readCredentialsFile(path.join(tmpDir, 'absent.properties'))).toBeUndefined();
  });
});

describe('readRegionsFile', () => {
  it('splits on whitespace and newlines', () => {
    const filePath = writeFile('regions.properties', 'swiss de-berlin\n\n  ad\n');
    expect(readRegionsFile(filePath)).toEqual(['swiss', 'de-berlin', 'ad']);
  });

  it('returns undefined for an empty file', () => {
    const filePath = writeFile('regions.properties', '\n  \n');
    expect(readRegionsFile(filePath)).toBeUndefined();
  });
});

describe('parseList', () => {
  it('splits a comma separated value', () => {
    expect(parseList('swiss, de-berlin,,ad')).toEqual(['swiss', 'de-berlin', 'ad']);
  });

  it('returns undefined for nothing', () => {
    expect(parseList(undefined)).toBeUndefined();
    expect(parseList(' , ')).toBeUndefined();
  });
});
