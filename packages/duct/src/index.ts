// Public API
export {
  EASINGS, ductParamsShape, ductParamsSchema, DEFAULT_PARAMS, maxSectionRadius, resolveParams,
} from './params.js';
export type { DuctParams, Easing } from './params.js';

export { ease, morphAt, sectionAt, morphProfile, MorphSection, twistAt } from './morph.js';
export type { SectionShape } from './morph.js';

export { ductPath, buildDuct } from './duct.js';
export type { DuctDesign, DuctParts } from './duct.js';

export { sampleStations } from './stations.js';
export type { Station } from './stations.js';

export { loftStations } from './loft.js';
export type { LoftOptions } from './loft.js';

export { renderDuct, meshDefects, assertPrintable, sectionDuct, RENDER_METHODS, EXPECTED_GENUS } from './render.js';
export type { RenderMethod, RenderOptions, RenderResult, DuctSection } from './render.js';

export { loadParams, parseAssignment } from './config.js';
export type { ParamSources } from './config.js';

export { createProgram } from './program.js';
export type { ProgramIO } from './program.js';
