/**
 * Fan duct construction.
 *
 * Z up, the fan sits on the z = 0 plane and blows along the spine:
 *
 *   plate      rounded square, z ∈ [0, plateThickness]
 *   shellOuter capped sweep of the outer morph section along the spine
 *   body       plate ∪ shellOuter, blended by collarFillet, clipped to z ≥ 0
 *   bore       open sweep of the outer section, inset by the wall in 3D,
 *              through the plate at the intake and out of the egress
 *   holes      four mounting holes on the hole pitch
 *
 *   solid = body − bore − holes
 *
 * The shell is one continuous field along the spine: there are no separate
 * cross-section solids to join, so nothing can open up between them.
 */

import {
  BendPath, extrude, roundedRect2d, cylinder, plane, sweep, subtract,
  type SDF, type Sweep,
} from '@fanduct/sdf-kernel';
import { resolveParams, type DuctParams } from './params.js';
import { MorphSection, twistAt } from './morph.js';

export interface DuctParts {
  plate: SDF;
  shellOuter: Sweep;
  bore: SDF;
  holes: SDF[];
}

export interface DuctDesign {
  params: DuctParams;
  path: BendPath;
  solid: SDF;
  parts: DuctParts;
  /** Spine length in mm. */
  length: number;
}

/** The rise–bend–run spine for a parameter set. */
export function ductPath(params: DuctParams): BendPath {
  return new BendPath({
    rise: params.rise,
    radius: params.bendRadius,
    angle: params.bendAngle,
    run: params.run,
  });
}

/** Build the duct solid. Overrides are merged onto the defaults and validated. */
export function buildDuct(overrides: Partial<DuctParams> = {}): DuctDesign {
  const params = resolveParams(overrides);
  const path = ductPath(params);
  const twist = twistAt(params);

  const t = params.plateThickness;
  const plate = extrude(roundedRect2d(params.fanSize, params.fanSize, params.plateCornerRadius), t)
    .at(0, 0, t / 2);

  const shellOuter = sweep(path, new MorphSection(params), { twist });
  const bore = sweep(path, new MorphSection(params), { twist, capped: false }).inset(params.wallThickness);

  const s = params.holeSpacing / 2;
  const holes = [[s, s], [-s, s], [-s, -s], [s, -s]].map(([x, y]) =>
    cylinder(params.holeDiameter / 2, t + 2).at(x, y, t / 2)
  );

  const body = plate
    .smoothUnion(shellOuter, params.collarFillet)
    .intersect(plane([0, 0, -1], 0));

  return {
    params,
    path,
    solid: subtract(body, bore, ...holes),
    parts: { plate, shellOuter, bore, holes },
    length: path.length,
  };
}
