/**
 * Tool handlers — plain functions from validated input to a JSON-able result.
 *
 * tools.ts registers these with the MCP server; tests call them directly.
 * Errors are thrown and become tool errors.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { exportSTL, exportAsciiSTL, type Vec3 } from '@fanduct/sdf-kernel';
import {
  DEFAULT_PARAMS, buildDuct, sampleStations, sectionDuct, renderDuct, assertPrintable,
  type DuctParams, type RenderMethod,
} from '@fanduct/duct';
import * as registry from './registry.js';

/** Where export_mesh writes its files. */
export function exportDir(): string {
  return path.join(process.env.TMPDIR ?? '/tmp', 'fan-duct');
}

function round(n: number, digits = 3): number {
  const f = 10 ** digits;
  return Math.round(n * f) / f;
}

function cachedMesh(id: string): registry.CachedMesh {
  const cached = registry.getMesh(id);
  if (!cached) {
    throw new Error(
      `No mesh cached for "${id}". Call compute_mesh(duct: "${id}") first to generate the mesh.`
    );
  }
  return cached;
}

export function getDefaultParams() {
  return { type: 'params' as const, params: DEFAULT_PARAMS };
}

export function buildDuctHandler(input: { params?: Partial<DuctParams>; name?: string }) {
  return registry.create(buildDuct(input.params ?? {}), input.name);
}

export function listDucts() {
  const ducts = registry.list();
  return { count: ducts.length, ducts };
}

export function deleteDuct(input: { duct: string }) {
  registry.remove(input.duct);
  return { duct_id: input.duct, deleted: true };
}

export function getStations(input: { duct: string; count?: number }) {
  const entry = registry.get(input.duct);
  const stations = sampleStations(entry.design.params, input.count ?? 24);
  return { duct_id: entry.id, type: 'stations' as const, count: stations.length, stations };
}

export function evaluatePoint(input: { duct: string; point: Vec3 }) {
  const entry = registry.get(input.duct);
  const distance = entry.design.solid.evaluate(input.point);
  return { duct_id: entry.id, point: input.point, distance, inside: distance < 0 };
}

export function sectionDuctHandler(input: { duct: string; progress: number; cell_size?: number }) {
  const entry = registry.get(input.duct);
  const section = sectionDuct(entry.design, input.progress, input.cell_size ?? 1);
  return {
    duct_id: entry.id,
    type: 'section' as const,
    progress: section.progress,
    arc_length_mm: round(section.arcLength),
    origin: section.origin,
    u_axis: section.uAxis,
    v_axis: section.vAxis,
    loop_count: section.loops.length,
    area_mm2: round(section.area),
    loops: section.loops,
  };
}

export function computeMesh(input: {
  duct: string;
  resolution?: number;
  method?: RenderMethod;
  stations?: number;
  segments?: number;
}) {
  const entry = registry.get(input.duct);
  const resolution = input.resolution ?? 1;
  const { mesh, report, defects, elapsedMs, method } = renderDuct(entry.design.params, {
    resolution,
    method: input.method,
    stations: input.stations,
    segments: input.segments,
  });
  registry.cacheMesh(entry.id, { mesh, report, method, resolution_mm: resolution });
  return {
    duct_id: entry.id,
    type: 'mesh' as const,
    mesh_info: {
      method,
      vertex_count: mesh.vertexCount,
      triangle_count: mesh.triangleCount,
      resolution_mm: resolution,
      computed_in_ms: Math.round(elapsedMs),
      bounds: mesh.bounds,
      watertight: report.watertight,
      genus: report.genus,
      defects,
    },
  };
}

export function inspectMeshHandler(input: { duct: string }) {
  const entry = registry.get(input.duct);
  const cached = cachedMesh(entry.id);
  return {
    duct_id: entry.id,
    type: 'mesh_report' as const,
    method: cached.method,
    report: { ...cached.report, volume: round(cached.report.volume), surfaceArea: round(cached.report.surfaceArea) },
  };
}

export function exportMesh(input: { duct: string; format?: 'binary' | 'ascii'; allow_defects?: boolean }) {
  const entry = registry.get(input.duct);
  const { mesh, report, method } = cachedMesh(entry.id);
  if (!input.allow_defects) assertPrintable(report, method);

  const format = input.format ?? 'binary';
  const dir = exportDir();
  fs.mkdirSync(dir, { recursive: true });
  const safeId = entry.id.replace(/[^a-zA-Z0-9_-]/g, '_');
  const filePath = path.join(dir, `${safeId}-${Date.now()}.stl`);

  let size: number;
  if (format === 'ascii') {
    const text = exportAsciiSTL(mesh, safeId);
    fs.writeFileSync(filePath, text);
    size = Buffer.byteLength(text);
  } else {
    const buffer = exportSTL(mesh);
    fs.writeFileSync(filePath, Buffer.from(buffer));
    size = buffer.byteLength;
  }

  return {
    duct_id: entry.id,
    type: 'stl_export' as const,
    format,
    file_path: filePath,
    file_size_bytes: size,
    triangle_count: mesh.triangleCount,
    bounds: mesh.bounds,
    watertight: report.watertight,
  };
}
