import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { createProgram } from '../src/program.js';

let dir: string;

beforeAll(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'fanduct-cli-'));
});

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

async function run(...args: string[]): Promise<{ out: string[]; err: string[] }> {
  const out: string[] = [];
  const err: string[] = [];
  await createProgram({ out: (l) => out.push(l), err: (l) => err.push(l) })
    .parseAsync(args, { from: 'user' });
  return { out, err };
}

describe('fanduct params', () => {
  it('prints the effective parameters', async () => {
    const { out } = await run('params', '--set', 'twist=45', '-s', 'easing=linear');
    const params = JSON.parse(out.join('\n'));
    expect(params.twist).toBe(45);
    expect(params.easing).toBe('linear');
    expect(params.fanSize).toBe(140);
  });

  it('reads a config file', async () => {
    const file = path.join(dir, 'duct.json');
    fs.writeFileSync(file, JSON.stringify({ bendAngle: 45 }));
    const { out } = await run('params', '--config', file);
    expect(JSON.parse(out.join('\n')).bendAngle).toBe(45);
  });

  it('fails on invalid parameters', async () => {
    await expect(run('params', '--set', 'twist=999'))
      .rejects.toThrow('twist: Number must be less than or equal to 360');
  });
});

describe('fanduct stations', () => {
  it('prints a table', async () => {
    const { out } = await run('stations', '-n', '3', '--set', 'bendAngle=0');
    expect(out).toEqual([
      '#\tprogress\tarc\tmorph\ttwist\thalfW\thalfH\tr',
      '0\t0.000\t0.00\t0.000\t0.00\t68.00\t68.00\t68.00',
      '1\t0.500\t17.50\t0.500\t45.00\t64.00\t41.50\t37.00',
      '2\t1.000\t35.00\t1.000\t90.00\t60.00\t15.00\t6.00',
    ]);
  });

  it('prints JSON on request', async () => {
    const { out } = await run('stations', '-n', '2', '--json');
    const stations = JSON.parse(out.join('\n'));
    expect(stations.length).toBe(2);
    expect(stations[1].progress).toBe(1);
  });
});

describe('fanduct render', () => {
  it('writes a binary STL of the loft', async () => {
    const file = path.join(dir, 'loft.stl');
    const { out } = await run('render', '--method', 'loft', '--stations', '6', '--segments', '12', '-o', file);
    expect(fs.statSync(file).size).toBe(84 + 50 * 4 * 6 * 12);
    expect(out[0]).toMatch(/^Meshed \(loft\) in \d+ ms: 288 triangles, 144 vertices$/);
    expect(out[2]).toBe(`Wrote ${file}`);
  });

  it('writes ASCII STL on request', async () => {
    const file = path.join(dir, 'nested', 'loft.stl');
    await run('render', '--method', 'loft', '--stations', '4', '--segments', '8', '--ascii', '-o', file);
    const text = fs.readFileSync(file, 'utf8');
    expect(text.startsWith('solid fan_duct\n  facet normal ')).toBe(true);
    expect(text.endsWith('endsolid fan_duct\n')).toBe(true);
  });

  it('rejects an unknown method', async () => {
    await expect(run('render', '--method', 'voxels')).rejects.toThrow('voxels');
  });
});

describe('fanduct inspect', () => {
  it('prints the mesh report', async () => {
    const { out } = await run('inspect', '--method', 'loft', '--stations', '4', '--segments', '8');
    const report = JSON.parse(out.join('\n'));
    expect(report.method).toBe('loft');
    expect(report.triangleCount).toBe(128);
    expect(report.watertight).toBe(true);
    expect(report.genus).toBe(1);
    expect(report.defects).toEqual([]);
  });
});

describe('fanduct section', () => {
  it('requires --at', async () => {
    await expect(run('section')).rejects.toThrow("required option '--at <progress>' not specified");
  });

  it('rejects progress outside [0, 1]', async () => {
    await expect(run('section', '--at', '2')).rejects.toThrow('Expected a progress value from 0 to 1.');
  });

  it('prints the section loops', async () => {
    const { out } = await run('section', '--at', '0.5');
    const section = JSON.parse(out.join('\n'));
    expect(section.progress).toBe(0.5);
    expect(section.loops.length).toBe(2);
  });
});
