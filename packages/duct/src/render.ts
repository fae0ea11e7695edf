/**
 * Render pipeline — design → mesh → report, plus plane sections for checks.
 */

import {
  marchingCubes, inspectMesh, sectionPlane, loopArea, roundedRectCircumradius,
  type TriangleMesh, type MeshReport, type ContourLoop, type Vec3,
} from '@fanduct/sdf-kernel';
import { buildDuct, type DuctDesign } from './duct.js';
import { loftStations } from './loft.js';
import { sectionAt } from './morph.js';
import type { DuctParams } from './params.js';

export const RENDER_METHODS = ['implicit', 'loft'] as const;
export type RenderMethod = (typeof RENDER_METHODS)[number];

export interface RenderOptions {
  /** Grid cell size in mm for the implicit mesher. Default 1. */
  resolution?: number;
  /** `implicit` meshes the full solid; `loft` the shell from its stations. Default implicit. */
  method?: RenderMethod;
  stations?: number;
  segments?: number;
}

export interface RenderResult {
  mesh: TriangleMesh;
  report: MeshReport;
  /** What stops the mesh from being the printable duct; empty when it is. */
  defects: string[];
  elapsedMs: number;
  method: RenderMethod;
}

/**
 * Handles a correct mesh has: the air passage, plus the four mounting holes
 * in the implicit solid. The loft is the shell alone.
 */
export const EXPECTED_GENUS: Readonly<Record<RenderMethod, number>> = { implicit: 5, loft: 1 };

export function renderDuct(overrides: Partial<DuctParams> = {}, options: RenderOptions = {}): RenderResult {
  const method = options.method ?? 'implicit';
  const start = performance.now();
  let mesh: TriangleMesh;
  if (method === 'loft') {
    mesh = loftStations(overrides, { stations: options.stations, segments: options.segments });
  } else {
    mesh = marchingCubes(buildDuct(overrides).solid, options.resolution ?? 1);
  }
  const report = inspectMesh(mesh);
  return { mesh, report, defects: meshDefects(report, method), elapsedMs: performance.now() - start, method };
}

/**
 * Everything that keeps a mesh from being the duct: leaks, stray parts, and
 * a genus other than the part's (a wall with tunnels through it is still
 * watertight).
 */
export function meshDefects(report: MeshReport, method: RenderMethod): string[] {
  if (report.triangleCount === 0) return ['mesh is empty'];
  const defects: string[] = [];
  if (!report.watertight) {
    defects.push(
      `not watertight (${report.boundaryEdges} boundary, ` +
      `${report.nonManifoldEdges} non-manifold, ${report.misorientedEdges} misoriented edges)`
    );
  }
  if (report.components !== 1) {
    defects.push(`${report.components} separate parts, expected 1`);
  }
  const expected = EXPECTED_GENUS[method];
  if (report.genus !== null && report.genus !== expected) {
    defects.push(`genus ${report.genus}, expected ${expected} for the ${method} mesh`);
  }
  return defects;
}

/** Throw unless the report describes the duct as one closed, manifold, oriented solid of the right genus. */
export function assertPrintable(report: MeshReport, method: RenderMethod): void {
  if (report.triangleCount === 0) {
    throw new Error('Mesh is empty: nothing to print');
  }
  const defects = meshDefects(report, method);
  if (defects.length > 0) {
    throw new Error(`Mesh is not printable: ${defects.join('; ')}`);
  }
}

export interface DuctSection {
  progress: number;
  arcLength: number;
  /** Plane origin on the spine. */
  origin: Vec3;
  /** Plane u axis (the spine normal). */
  uAxis: Vec3;
  /** Plane v axis (the spine binormal). */
  vAxis: Vec3;
  loops: ContourLoop[];
  /** Net material area over the closed loops in mm². */
  area: number;
}

/** Slice the duct solid on the plane normal to the spine at `progress`. */
export function sectionDuct(design: DuctDesign, progress: number, cellSize = 1): DuctSection {
  if (!(progress >= 0 && progress <= 1)) {
    throw new Error(`Section progress must be within [0, 1] (got ${progress})`);
  }
  const frame = design.path.frameAt(progress * design.length);
  const s = sectionAt(design.params, progress);
  const halfSize = roundedRectCircumradius(s.halfWidth, s.halfHeight, s.cornerRadius)
    + design.params.collarFillet + 2 * cellSize;

  const loops = sectionPlane(design.solid, frame.point, frame.normal, frame.binormal, halfSize, cellSize);
  const area = loops.filter((l) => l.closed).reduce((sum, l) => sum + loopArea(l.points), 0);
  return {
    progress,
    arcLength: frame.arcLength,
    origin: frame.point,
    uAxis: frame.normal,
    vAxis: frame.binormal,
    loops,
    area,
  };
}
