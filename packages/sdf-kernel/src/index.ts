// Public API
export { SDF, capDistance } from './sdf.js';
export type { SDFReadback } from './sdf.js';
export type { Vec2, Vec3, BoundingBox } from './vec3.js';
export {
  vec3, add, sub, addScaled, dot, length, normalize, cross,
  len2d, lerp, clamp, unionBounds, intersectBounds, isFiniteBounds,
} from './vec3.js';

// 2D Profile API
export { SDF2D, roundedRectDistance, roundedRectCircumradius } from './sdf2d.js';
export type { BoundingBox2D } from './sdf2d.js';

// Primitives
export { cylinder, plane } from './api.js';

// 2D Profile constructors
export { roundedRect2d } from './api.js';

// 2D → 3D constructors
export { extrude, bendPath, sweep } from './api.js';

// Standalone booleans
export { subtract } from './api.js';

// Spines and sweeps
export type { SweepPath, SpineFrame, SpineProjection, BendPathOptions } from './path.js';
export { BendPath } from './path.js';
export type { SweepSection, SweepOptions } from './sweep.js';
export { Sweep } from './sweep.js';

// Meshing
export type { TriangleMesh, MeshReport } from './mesh.js';
export { inspectMesh, computeBounds } from './mesh.js';
export { marchingCubes, MAX_GRID_POINTS } from './marching-cubes.js';
export { exportSTL, exportAsciiSTL } from './stl.js';

// Plane sections
export type { ContourLoop, ContourBounds } from './marching-squares.js';
export { extractContours, sectionPlane, loopArea } from './marching-squares.js';

// Node classes (for advanced use / type checking)
export {
  Cylinder, Plane,
  Subtract, Intersect, SmoothUnion,
  Translate, Inset,
  Extrude,
} from './sdf.js';
export { RoundedRect2D } from './sdf2d.js';
