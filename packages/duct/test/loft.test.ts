import { describe, it, expect } from 'vitest';
import { inspectMesh } from '@fanduct/sdf-kernel';
import { loftStations } from '../src/loft.js';
import { ductPath } from '../src/duct.js';
import { resolveParams } from '../src/params.js';
import { SMALL } from './small-duct.js';

describe('loftStations', () => {
  const mesh = loftStations(SMALL, { stations: 24, segments: 32 });

  it('has two rings of vertices per station and four triangles per ring segment', () => {
    expect(mesh.vertexCount).toBe(2 * 24 * 32);
    expect(mesh.triangleCount).toBe(4 * 24 * 32);
    expect(mesh.indices.length).toBe(3 * mesh.triangleCount);
  });

  it('is a closed, oriented tube', () => {
    const report = inspectMesh(mesh);
    expect(report.boundaryEdges).toBe(0);
    expect(report.nonManifoldEdges).toBe(0);
    expect(report.misorientedEdges).toBe(0);
    expect(report.watertight).toBe(true);
    expect(report.components).toBe(1);
    expect(report.genus).toBe(1);
    expect(report.volume).toBeGreaterThan(0);
  });

  it('starts on the intake circle', () => {
    // Outer ring 0 point 0 sits on the normal, inner ring one wall in
    const outer = mesh.vertices[0];
    const inner = mesh.vertices[24 * 32];
    expect(outer[0]).toBeCloseTo(25, 6);
    expect(outer[1]).toBeCloseTo(0, 6);
    expect(outer[2]).toBeCloseTo(0, 6);
    expect(inner[0]).toBeCloseTo(21, 6);
  });

  it('ends on the twisted egress', () => {
    // After a quarter turn the egress width lies along the binormal (+Y)
    const path = ductPath(resolveParams(SMALL));
    const end = path.frameAt(path.length);
    const p = mesh.vertices[23 * 32];
    expect(p[0]).toBeCloseTo(end.point[0], 6);
    expect(p[1]).toBeCloseTo(22, 6);
    expect(p[2]).toBeCloseTo(end.point[2], 6);
  });

  it('uses 48 stations of 96 points by default', () => {
    expect(loftStations(SMALL).triangleCount).toBe(4 * 48 * 96);
  });

  it('rejects too few stations or segments', () => {
    expect(() => loftStations(SMALL, { stations: 1 })).toThrow('Loft stations must be an integer of at least 2 (got 1)');
    expect(() => loftStations(SMALL, { segments: 2 })).toThrow('Loft segments must be an integer of at least 3 (got 2)');
  });
});
