import { describe, it, expect } from 'vitest';
import { cylinder, SDF, type Vec3, type BoundingBox } from '../src/index.js';

describe('Translate', () => {
  const c = cylinder(5, 10).translate(10, 0, 0);

  it('moves the shape', () => {
    expect(c.evaluate([10, 0, 0])).toBe(-5);
    expect(c.contains([0, 0, 0])).toBe(false);
  });

  it('moves the bounds', () => {
    expect(c.bounds()).toEqual({ min: [5, -5, -5], max: [15, 5, 5] });
  });

  it('at() is an alias', () => {
    expect(cylinder(5, 10).at(10, 0, 0).evaluate([12, 0, 0])).toBe(c.evaluate([12, 0, 0]));
  });
});

// z·slope: a plane field that overstates distance by `slope`
class Steep extends SDF {
  constructor(readonly slope: number) { super(); }
  get name() { return `steep(${this.slope})`; }
  evaluate(p: Vec3): number { return this.slope * p[2]; }
  bounds(): BoundingBox {
    return { min: [-Infinity, -Infinity, -Infinity], max: [Infinity, Infinity, 0] };
  }
}

describe('gradient', () => {
  it('has unit length on an exact field', () => {
    const g = cylinder(10, 20).gradient([15, 0, 0]);
    expect(g[0]).toBeCloseTo(1, 6);
    expect(g[1]).toBeCloseTo(0, 6);
    expect(g[2]).toBeCloseTo(0, 6);
  });

  it('keeps the slope of a steep field, normal() drops it', () => {
    const steep = new Steep(3);
    expect(steep.gradient([1, 2, -4])[2]).toBeCloseTo(3, 6);
    expect(steep.normal([1, 2, -4])[2]).toBeCloseTo(1, 9);
  });
});

describe('Inset', () => {
  it('moves an exact surface in by the depth', () => {
    const core = cylinder(10, 20).inset(2);
    expect(core.evaluate([0, 0, 0])).toBeCloseTo(-8, 6);
    expect(core.evaluate([8, 0, 0])).toBeCloseTo(0, 6);
    expect(core.evaluate([9, 0, 0])).toBeCloseTo(1, 6);
  });

  it('measures depth in 3D on a field that overstates it', () => {
    // The surface of z·3 is z = 0; one unit in is z = -1, not z = -1/3
    const core = new Steep(3).inset(1);
    expect(core.evaluate([0, 0, -1])).toBeCloseTo(0, 6);
    expect(core.evaluate([0, 0, -0.5])).toBeCloseTo(0.5, 6);
    expect(core.evaluate([0, 0, -2])).toBeCloseTo(-1, 6);
  });

  it('is positive outside the shape', () => {
    expect(cylinder(10, 20).inset(2).evaluate([12, 0, 0])).toBe(4);
  });

  it('names the depth and keeps the bounds', () => {
    const core = cylinder(10, 20).inset(2);
    expect(core.name).toBe('cylinder(r=10, h=20).inset(2)');
    expect(core.bounds()).toEqual(cylinder(10, 20).bounds());
  });

  it('rejects a non-positive depth', () => {
    expect(() => cylinder(10, 20).inset(0)).toThrow('Inset depth must be positive (got 0)');
  });
});
