import { describe, it, expect } from 'vitest';
import { resolveParams, DEFAULT_PARAMS, maxSectionRadius } from '../src/params.js';
import { SMALL } from './small-duct.js';

describe('resolveParams', () => {
  it('returns the defaults when nothing is overridden', () => {
    expect(resolveParams()).toEqual(DEFAULT_PARAMS);
  });

  it('merges overrides onto the defaults', () => {
    const p = resolveParams({ twist: 45, easing: 'cosine' });
    expect(p.twist).toBe(45);
    expect(p.easing).toBe('cosine');
    expect(p.fanSize).toBe(140);
  });

  it('accepts the small test duct', () => {
    expect(resolveParams(SMALL).fanSize).toBe(60);
  });

  it('rejects unknown names', () => {
    expect(() => resolveParams({ fanSze: 120 }))
      .toThrow("Invalid duct parameters:\n  - (root): Unrecognized key(s) in object: 'fanSze'");
  });

  it('rejects values of the wrong type or range', () => {
    expect(() => resolveParams({ twist: 'lots' })).toThrow('twist: Expected number, received string');
    expect(() => resolveParams({ bendAngle: 200 })).toThrow('bendAngle: Number must be less than or equal to 180');
    expect(() => resolveParams({ easing: 'bounce' })).toThrow('easing: ');
  });

  it('does not touch DEFAULT_PARAMS', () => {
    resolveParams({ twist: 10 });
    expect(DEFAULT_PARAMS.twist).toBe(90);
    expect(Object.isFrozen(DEFAULT_PARAMS)).toBe(true);
  });
});

describe('cross-field rules', () => {
  it('intake must fit the fan frame', () => {
    expect(() => resolveParams({ intakeDiameter: 150 }))
      .toThrow('intakeDiameter: intake diameter 150 exceeds the fan frame 140');
  });

  it('plate corner radius is at most half the fan size', () => {
    expect(() => resolveParams({ plateCornerRadius: 71 })).toThrow('plateCornerRadius: ');
  });

  it('holes must stay inside the plate', () => {
    expect(() => resolveParams({ holeSpacing: 138 }))
      .toThrow('holeSpacing: mounting holes (pitch 138, Ø4.5) break out of the 140 mm plate');
  });

  it('holes must clear the intake', () => {
    expect(() => resolveParams({ holeSpacing: 98 }))
      .toThrow('holeSpacing: mounting holes (pitch 98, Ø4.5) cut into the 136 mm intake');
  });

  it('egress corner radius is at most half the smaller egress side', () => {
    expect(() => resolveParams({ egressCornerRadius: 16 }))
      .toThrow('egressCornerRadius: egress corner radius 16 exceeds half the smaller egress side (15)');
  });

  it('wall must leave a bore', () => {
    expect(() => resolveParams({ wallThickness: 15 }))
      .toThrow('wallThickness: wall thickness 15 leaves no bore: the section is only 15 mm from center to wall');
  });

  it('bend radius must exceed the largest section radius', () => {
    expect(() => resolveParams({ bendRadius: 60 }))
      .toThrow('bendRadius: bend radius 60 must exceed the largest section radius 68, or the shell folds into itself');
    expect(resolveParams({ bendRadius: 70 }).bendRadius).toBe(70);
  });

  it('a straight duct ignores the bend radius', () => {
    expect(resolveParams({ bendRadius: 60, bendAngle: 0 }).bendAngle).toBe(0);
  });

  it('morph must start before it ends', () => {
    expect(() => resolveParams({ morphStart: 0.5, morphEnd: 0.5 }))
      .toThrow('morphEnd: morphEnd 0.5 must be greater than morphStart 0.5');
  });

  it('lists every failing rule', () => {
    try {
      resolveParams({ intakeDiameter: 150, morphStart: 0.9, morphEnd: 0.1 });
      expect.fail('expected resolveParams to throw');
    } catch (err) {
      const lines = String(err instanceof Error ? err.message : err).split('\n');
      expect(lines[0]).toBe('Invalid duct parameters:');
      expect(lines.some((l) => l.startsWith('  - intakeDiameter: '))).toBe(true);
      expect(lines.some((l) => l.startsWith('  - morphEnd: '))).toBe(true);
    }
  });
});

describe('maxSectionRadius', () => {
  it('is the intake radius when the circle is the wider end', () => {
    expect(maxSectionRadius(resolveParams())).toBe(68);
  });

  it('is the egress corner reach when the rectangle is wider', () => {
    const p = resolveParams({ intakeDiameter: 100, egressWidth: 130, egressHeight: 20, egressCornerRadius: 0 });
    expect(maxSectionRadius(p)).toBeCloseTo(Math.hypot(65, 10), 9);
  });
});
