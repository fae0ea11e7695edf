/**
 * Duct parameters — one flat record, millimetres and degrees.
 *
 * The zod schema is the single source: types come from `z.infer`, the MCP
 * server reuses the field shapes, and `resolveParams` merges overrides onto
 * DEFAULT_PARAMS before checking the fields against each other.
 */

import { z } from 'zod';
import { roundedRectDistance, roundedRectCircumradius } from '@fanduct/sdf-kernel';

export const EASINGS = ['linear', 'smoothstep', 'cosine'] as const;
export type Easing = (typeof EASINGS)[number];

export const ductParamsShape = {
  fanSize: z.number().finite().positive().describe('Square fan frame edge in mm'),
  holeSpacing: z.number().finite().positive().describe('Mounting hole pitch in mm'),
  holeDiameter: z.number().finite().positive().describe('Mounting hole clearance diameter in mm'),
  plateThickness: z.number().finite().positive().describe('Base plate thickness in mm'),
  plateCornerRadius: z.number().finite().nonnegative().describe('Base plate corner radius in mm'),
  intakeDiameter: z.number().finite().positive().describe('Outer diameter of the circular intake in mm'),
  egressWidth: z.number().finite().positive().describe('Outer width of the exit opening in mm'),
  egressHeight: z.number().finite().positive().describe('Outer height of the exit opening in mm'),
  egressCornerRadius: z.number().finite().nonnegative().describe('Exit opening corner radius in mm'),
  rise: z.number().finite().nonnegative().describe('Straight section above the base plate in mm'),
  bendRadius: z.number().finite().positive().describe('Spine bend radius in mm'),
  bendAngle: z.number().finite().min(0).max(180).describe('Spine bend angle in degrees'),
  run: z.number().finite().nonnegative().describe('Straight section before the exit in mm'),
  twist: z.number().finite().min(-360).max(360).describe('Cross-section rotation from intake to exit in degrees'),
  morphStart: z.number().finite().min(0).max(1).describe('Progress where the circle starts turning into the rectangle'),
  morphEnd: z.number().finite().min(0).max(1).describe('Progress where the morph is complete'),
  easing: z.enum(EASINGS).describe('Morph easing curve'),
  wallThickness: z.number().finite().positive().describe('Shell wall thickness in mm'),
  collarFillet: z.number().finite().nonnegative().describe('Blend radius where the shell meets the plate in mm (0 = sharp)'),
};

const baseSchema = z.object(ductParamsShape).strict();

export type DuctParams = z.infer<typeof baseSchema>;

export const DEFAULT_PARAMS: Readonly<DuctParams> = Object.freeze({
  fanSize: 140,
  holeSpacing: 124.5,
  holeDiameter: 4.5,
  plateThickness: 4,
  plateCornerRadius: 8,
  intakeDiameter: 136,
  egressWidth: 120,
  egressHeight: 30,
  egressCornerRadius: 6,
  rise: 20,
  bendRadius: 100,
  bendAngle: 60,
  run: 15,
  twist: 90,
  morphStart: 0.1,
  morphEnd: 0.9,
  easing: 'smoothstep',
  wallThickness: 2.4,
  collarFillet: 4,
});

/** Largest distance from the spine to the outer surface anywhere along the morph. */
export function maxSectionRadius(p: DuctParams): number {
  // Convex in the morph, so it peaks at an end
  const intake = p.intakeDiameter / 2;
  const egress = roundedRectCircumradius(p.egressWidth / 2, p.egressHeight / 2, p.egressCornerRadius);
  return Math.max(intake, egress);
}

function checkFit(p: DuctParams, ctx: z.RefinementCtx): void {
  const issue = (path: keyof DuctParams, message: string) =>
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: [path], message });

  if (p.intakeDiameter > p.fanSize) {
    issue('intakeDiameter', `intake diameter ${p.intakeDiameter} exceeds the fan frame ${p.fanSize}`);
  }
  if (p.plateCornerRadius > p.fanSize / 2) {
    issue('plateCornerRadius', `plate corner radius ${p.plateCornerRadius} exceeds half the fan size (${p.fanSize / 2})`);
  }

  const half = p.holeSpacing / 2;
  const holeR = p.holeDiameter / 2;
  const plateR = Math.min(p.plateCornerRadius, p.fanSize / 2);
  if (roundedRectDistance(half, half, p.fanSize / 2, p.fanSize / 2, plateR) + holeR > 0) {
    issue('holeSpacing', `mounting holes (pitch ${p.holeSpacing}, Ø${p.holeDiameter}) break out of the ${p.fanSize} mm plate`);
  } else if (half * Math.SQRT2 - holeR < p.intakeDiameter / 2) {
    issue('holeSpacing', `mounting holes (pitch ${p.holeSpacing}, Ø${p.holeDiameter}) cut into the ${p.intakeDiameter} mm intake`);
  }

  const egressHalf = Math.min(p.egressWidth, p.egressHeight) / 2;
  if (p.egressCornerRadius > egressHalf) {
    issue('egressCornerRadius', `egress corner radius ${p.egressCornerRadius} exceeds half the smaller egress side (${egressHalf})`);
  }

  // Smallest half-extent along the morph, which is at an end
  const thinnest = Math.min(p.intakeDiameter / 2, egressHalf);
  if (p.wallThickness >= thinnest) {
    issue('wallThickness', `wall thickness ${p.wallThickness} leaves no bore: the section is only ${thinnest} mm from center to wall`);
  }

  if (p.bendAngle > 0 && p.egressCornerRadius <= egressHalf) {
    const reach = maxSectionRadius(p);
    if (p.bendRadius <= reach) {
      issue('bendRadius', `bend radius ${p.bendRadius} must exceed the largest section radius ${round(reach)}, or the shell folds into itself`);
    }
  }

  if (p.morphStart >= p.morphEnd) {
    issue('morphEnd', `morphEnd ${p.morphEnd} must be greater than morphStart ${p.morphStart}`);
  }
}

export const ductParamsSchema = baseSchema.superRefine(checkFit);

const overridesSchema = baseSchema.partial().strict();

function round(n: number): number {
  return Math.round(n * 100) / 100;
}

function paramsError(error: z.ZodError): Error {
  const lines = error.issues.map((i) => `  - ${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`);
  return new Error(`Invalid duct parameters:\n${lines.join('\n')}`);
}

/**
 * Merge overrides onto the defaults and validate the result.
 * Unknown names are rejected.
 */
export function resolveParams(overrides: unknown = {}): DuctParams {
  const partial = overridesSchema.safeParse(overrides);
  if (!partial.success) throw paramsError(partial.error);
  const merged = ductParamsSchema.safeParse({ ...DEFAULT_PARAMS, ...partial.data });
  if (!merged.success) throw paramsError(merged.error);
  return merged.data;
}
