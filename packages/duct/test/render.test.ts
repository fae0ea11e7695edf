import { describe, it, expect } from 'vitest';
import { inspectMesh, computeBounds, type TriangleMesh } from '@fanduct/sdf-kernel';
import { renderDuct, meshDefects, assertPrintable, sectionDuct } from '../src/render.js';
import { buildDuct } from '../src/duct.js';
import { loftStations } from '../src/loft.js';
import { SMALL } from './small-duct.js';

/** Area of a rounded rectangle from its half-extents and corner radius. */
function roundedRectArea(hw: number, hh: number, r: number): number {
  return 4 * hw * hh - (4 - Math.PI) * r * r;
}

describe('renderDuct', () => {
  it('lofts the shell from its stations', () => {
    const result = renderDuct(SMALL, { method: 'loft', stations: 12, segments: 24 });
    expect(result.method).toBe('loft');
    expect(result.report.triangleCount).toBe(4 * 12 * 24);
    expect(result.report.watertight).toBe(true);
    expect(result.defects).toEqual([]);
    expect(result.elapsedMs).toBeGreaterThanOrEqual(0);
  });

  it('meshes the implicit solid by default', () => {
    const result = renderDuct(SMALL);
    expect(result.method).toBe('implicit');
    expect(result.report.triangleCount).toBeGreaterThan(0);
    expect(result.defects).toEqual([]);
    expect(() => assertPrintable(result.report, result.method)).not.toThrow();
  });

  it('meshes the default duct at 1 mm as one part with four holes and a passage', () => {
    const { report, defects } = renderDuct({}, { resolution: 1 });
    expect(report.watertight).toBe(true);
    expect(report.components).toBe(1);
    expect(report.genus).toBe(5);
    expect(defects).toEqual([]);
  }, 600_000);
});

describe('meshDefects', () => {
  const tube = inspectMesh(loftStations(SMALL, { stations: 4, segments: 8 }));

  it('accepts the loft shell at genus 1', () => {
    expect(meshDefects(tube, 'loft')).toEqual([]);
  });

  it('flags a watertight mesh of the wrong genus', () => {
    expect(meshDefects(tube, 'implicit')).toEqual(['genus 1, expected 5 for the implicit mesh']);
    expect(meshDefects({ ...tube, genus: 255 }, 'implicit')).toEqual(['genus 255, expected 5 for the implicit mesh']);
  });

  it('flags stray parts', () => {
    expect(meshDefects({ ...tube, components: 13 }, 'loft')).toEqual(['13 separate parts, expected 1']);
  });
});

describe('assertPrintable', () => {
  const empty: TriangleMesh = { vertices: [], indices: [], vertexCount: 0, triangleCount: 0, bounds: computeBounds([]) };

  it('rejects an empty mesh', () => {
    expect(() => assertPrintable(inspectMesh(empty), 'implicit')).toThrow('Mesh is empty: nothing to print');
  });

  it('lists the defects of a leaky mesh', () => {
    const triangle: TriangleMesh = {
      vertices: [[0, 0, 0], [1, 0, 0], [0, 1, 0]],
      indices: [0, 1, 2],
      vertexCount: 3,
      triangleCount: 1,
      bounds: computeBounds([[0, 0, 0], [1, 0, 0], [0, 1, 0]]),
    };
    expect(() => assertPrintable(inspectMesh(triangle), 'loft'))
      .toThrow('Mesh is not printable: not watertight (3 boundary, 0 non-manifold, 0 misoriented edges)');
  });

  it('rejects a closed mesh with tunnels through the wall', () => {
    const tube = inspectMesh(loftStations(SMALL, { stations: 4, segments: 8 }));
    expect(() => assertPrintable({ ...tube, genus: 7 }, 'loft'))
      .toThrow('Mesh is not printable: genus 7, expected 1 for the loft mesh');
  });
});

describe('sectionDuct', () => {
  const design = buildDuct();

  it('cuts the wall as an outline around a hole', () => {
    // Past the morph and the bend the section neither twists nor tapers:
    // outer 120 × 30 r6, inner one 2.4 mm wall in
    const section = sectionDuct(design, 0.95);
    expect(section.loops.length).toBe(2);
    expect(section.loops.every((l) => l.closed)).toBe(true);
    const expected = roundedRectArea(60, 15, 6) - roundedRectArea(57.6, 12.6, 3.6);
    expect(Math.abs(section.area - expected) / expected).toBeLessThan(0.02);
  });

  it('shows a wider wall in the plane where the section twists', () => {
    // Halfway: outer 128 × 83 r37; the wall leans out of the plane, so it
    // cuts wider than one wall in
    const section = sectionDuct(design, 0.5);
    expect(section.loops.length).toBe(2);
    const inPlane = roundedRectArea(64, 41.5, 37) - roundedRectArea(61.6, 39.1, 34.6);
    expect(section.area).toBeGreaterThan(inPlane);
    expect(section.area).toBeLessThan(roundedRectArea(64, 41.5, 37));
  });

  it('lies on the spine frame', () => {
    const section = sectionDuct(design, 0.5);
    const frame = design.path.frameAt(design.length / 2);
    expect(section.arcLength).toBeCloseTo(design.length / 2, 9);
    expect(section.origin).toEqual(frame.point);
    expect(section.uAxis).toEqual(frame.normal);
    expect(section.vAxis).toEqual([0, 1, 0]);
  });

  it('rejects progress outside [0, 1]', () => {
    expect(() => sectionDuct(design, 1.5)).toThrow('Section progress must be within [0, 1] (got 1.5)');
    expect(() => sectionDuct(design, Number.NaN)).toThrow('Section progress must be within [0, 1]');
  });
});
