/**
 * fanduct command line.
 *
 *   fanduct render -o duct.stl -r 0.8 --set twist=45
 *   fanduct inspect --method loft
 *   fanduct stations -n 12 --config my-fan.json
 *   fanduct section --at 0.5
 *   fanduct params
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { exportSTL, exportAsciiSTL } from '@fanduct/sdf-kernel';
import { loadParams, type ParamSources } from './config.js';
import { buildDuct } from './duct.js';
import { sampleStations } from './stations.js';
import { renderDuct, assertPrintable, sectionDuct, RENDER_METHODS, type RenderMethod } from './render.js';

export interface ProgramIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

interface MeshOptions extends ParamSources {
  resolution: number;
  method: RenderMethod;
  stations?: number;
  segments?: number;
}

interface RenderCommandOptions extends MeshOptions {
  output: string;
  ascii: boolean;
  allowDefects: boolean;
}

interface StationsCommandOptions extends ParamSources {
  count: number;
  json: boolean;
}

interface SectionCommandOptions extends ParamSources {
  at: number;
  cell: number;
}

function positiveNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) throw new InvalidArgumentError('Expected a positive number.');
  return n;
}

function integer(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError('Expected an integer.');
  return n;
}

function progressValue(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !(n >= 0 && n <= 1)) throw new InvalidArgumentError('Expected a progress value from 0 to 1.');
  return n;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function withParamOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'JSON file with duct parameters')
    .option('-s, --set <name=value>', 'Override one parameter (repeatable)', collect, []);
}

function withMeshOptions(command: Command): Command {
  return withParamOptions(command)
    .option('-r, --resolution <mm>', 'Implicit mesher cell size', positiveNumber, 1)
    .addOption(new Option('--method <method>', 'Meshing method').choices(RENDER_METHODS).default('implicit'))
    .option('--stations <n>', 'Loft stations', integer)
    .option('--segments <n>', 'Loft points per ring', integer);
}

function fixed(n: number, digits = 2): string {
  return n.toFixed(digits);
}

export function createProgram(io: ProgramIO = { out: console.log, err: console.error }): Command {
  const program = new Command();

  program
    .name('fanduct')
    .description('Parametric fan duct: circular fan intake to a rectangular nozzle along a bent spine')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
    });

  withMeshOptions(
    program
      .command('render')
      .description('Build the duct, mesh it and write an STL')
      .option('-o, --output <file>', 'Output STL path', 'duct.stl')
      .option('--ascii', 'Write ASCII STL instead of binary', false)
      .option('--allow-defects', 'Write the file even if the mesh is not the printable duct', false)
  ).action((opts: RenderCommandOptions) => {
    const params = loadParams(opts);
    const { mesh, report, defects, elapsedMs, method } = renderDuct(params, opts);

    if (opts.allowDefects) {
      for (const defect of defects) io.err(`Warning: ${defect}, writing it anyway`);
    } else {
      assertPrintable(report, method);
    }

    const output = path.resolve(opts.output);
    fs.mkdirSync(path.dirname(output), { recursive: true });
    if (opts.ascii) {
      fs.writeFileSync(output, exportAsciiSTL(mesh));
    } else {
      fs.writeFileSync(output, Buffer.from(exportSTL(mesh)));
    }

    io.out(`Meshed (${method}) in ${Math.round(elapsedMs)} ms: ${report.triangleCount} triangles, ${report.vertexCount} vertices`);
    io.out(`Volume ${fixed(report.volume / 1000)} cm³, genus ${report.genus ?? 'n/a'}, watertight ${report.watertight}`);
    io.out(`Wrote ${output}`);
  });

  withMeshOptions(
    program
      .command('inspect')
      .description('Mesh the duct and print the mesh report as JSON')
  ).action((opts: MeshOptions) => {
    const { report, defects, elapsedMs, method } = renderDuct(loadParams(opts), opts);
    io.out(JSON.stringify({ method, elapsedMs: Math.round(elapsedMs), defects, ...report }, null, 2));
  });

  withParamOptions(
    program
      .command('stations')
      .description('Print the sampled cross-sections along the spine')
      .option('-n, --count <n>', 'Number of stations', integer, 24)
      .option('--json', 'Print JSON instead of a table', false)
  ).action((opts: StationsCommandOptions) => {
    const stations = sampleStations(loadParams(opts), opts.count);
    if (opts.json) {
      io.out(JSON.stringify(stations, null, 2));
      return;
    }
    io.out(['#', 'progress', 'arc', 'morph', 'twist', 'halfW', 'halfH', 'r'].join('\t'));
    for (const s of stations) {
      io.out([
        String(s.index), fixed(s.progress, 3), fixed(s.arcLength), fixed(s.morph, 3),
        fixed(s.twist), fixed(s.halfWidth), fixed(s.halfHeight), fixed(s.cornerRadius),
      ].join('\t'));
    }
  });

  withParamOptions(
    program
      .command('section')
      .description('Slice the duct normal to the spine and print the loops as JSON')
      .requiredOption('--at <progress>', 'Progress along the spine, 0 to 1', progressValue)
      .option('--cell <mm>', 'Contour cell size', positiveNumber, 1)
  ).action((opts: SectionCommandOptions) => {
    const section = sectionDuct(buildDuct(loadParams(opts)), opts.at, opts.cell);
    io.out(JSON.stringify(section, null, 2));
  });

  withParamOptions(
    program
      .command('params')
      .description('Print the effective duct parameters as JSON')
  ).action((opts: ParamSources) => {
    io.out(JSON.stringify(loadParams(opts), null, 2));
  });

  return program;
}
