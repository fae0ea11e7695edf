import type { DuctParams } from '../src/params.js';

/** A 60 mm fan duct: small enough to mesh at 1 mm in a test. */
export const SMALL: Partial<DuctParams> = {
  fanSize: 60,
  holeSpacing: 50,
  holeDiameter: 5,
  plateThickness: 4,
  plateCornerRadius: 5,
  intakeDiameter: 50,
  egressWidth: 44,
  egressHeight: 16,
  egressCornerRadius: 4,
  rise: 8,
  bendRadius: 40,
  bendAngle: 60,
  run: 8,
  twist: 90,
  wallThickness: 4,
  collarFillet: 3,
};
