import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { loadParams, parseAssignment } from '../src/config.js';

let dir: string;

beforeAll(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'fanduct-config-'));
});

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function writeFile(name: string, text: string): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, text);
  return file;
}

describe('parseAssignment', () => {
  it('parses numbers', () => {
    expect(parseAssignment('twist=45')).toEqual(['twist', 45]);
    expect(parseAssignment(' bendAngle = 30.5 ')).toEqual(['bendAngle', 30.5]);
  });

  it('keeps easing as text', () => {
    expect(parseAssignment('easing=cosine')).toEqual(['easing', 'cosine']);
  });

  it('rejects malformed assignments', () => {
    expect(() => parseAssignment('twist')).toThrow('Invalid --set "twist": expected name=value');
    expect(() => parseAssignment('=4')).toThrow('Invalid --set "=4": expected name=value');
    expect(() => parseAssignment('twist=lots')).toThrow('Invalid --set "twist=lots": twist must be a number');
    expect(() => parseAssignment('twist=')).toThrow('Invalid --set "twist=": twist must be a number');
  });
});

describe('loadParams', () => {
  it('returns the defaults with no sources', () => {
    expect(loadParams().twist).toBe(90);
  });

  it('reads a partial parameter file', () => {
    const file = writeFile('partial.json', JSON.stringify({ twist: 30, easing: 'linear' }));
    const p = loadParams({ config: file });
    expect(p.twist).toBe(30);
    expect(p.easing).toBe('linear');
    expect(p.fanSize).toBe(140);
  });

  it('applies --set after the file', () => {
    const file = writeFile('twist.json', JSON.stringify({ twist: 30 }));
    expect(loadParams({ config: file, set: ['twist=45'] }).twist).toBe(45);
  });

  it('validates the merged result once', () => {
    // Each on its own is fine, together the morph runs backwards
    const file = writeFile('morph.json', JSON.stringify({ morphStart: 0.6 }));
    expect(() => loadParams({ config: file, set: ['morphEnd=0.5'] }))
      .toThrow('morphEnd: morphEnd 0.5 must be greater than morphStart 0.6');
  });

  it('rejects non-finite numbers', () => {
    expect(() => loadParams({ set: ['run=Infinity'] })).toThrow('Invalid duct parameters:\n  - run: Number must be finite');
    expect(() => loadParams({ set: ['rise=-Infinity'] })).toThrow('  - rise: Number must be finite');
  });

  it('reports unknown names from --set', () => {
    expect(() => loadParams({ set: ['fanSze=120'] })).toThrow('Invalid duct parameters');
  });

  it('reports unreadable and malformed files', () => {
    expect(() => loadParams({ config: path.join(dir, 'missing.json') })).toThrow(/^Cannot read config /);
    expect(() => loadParams({ config: writeFile('bad.json', '{ twist: ') })).toThrow(/^Invalid JSON in /);
    expect(() => loadParams({ config: writeFile('list.json', '[1, 2]') }))
      .toThrow('must hold a JSON object of duct parameters');
  });
});
