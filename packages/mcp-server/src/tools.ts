/**
 * MCP Tool Registrations — 10 tools wrapping the duct pipeline.
 *
 * Every tool returns JSON text. Building returns { duct_id, readback, ... }
 * and later tools refer to the design by that ID.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { ductParamsShape, RENDER_METHODS } from '@fanduct/duct';
import * as handlers from './handlers.js';

const ductId = z.string().describe('ID returned by build_duct');

// Unknown names reach resolveParams, which rejects them
const paramOverrides = z.object(ductParamsShape).partial().passthrough();

const renderMethod = z.enum(RENDER_METHODS);

function text(result: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(result) }] };
}

export function registerTools(server: McpServer): void {

  // ─── Design (4) ─────────────────────────────────────────────

  server.tool(
    'get_default_params',
    'Get the default fan duct parameters (mm and degrees). Pass any subset of them to build_duct to override.',
    {},
    async () => text(handlers.getDefaultParams())
  );

  server.tool(
    'build_duct',
    'Build a fan duct from parameter overrides merged onto the defaults. Parameters are checked against each other; every failing rule is reported.',
    {
      params: paramOverrides.optional().describe('Parameter overrides; omitted names keep their defaults'),
      name: z.string().optional().describe('Optional name for the duct (letters, digits, hyphens, underscores only)'),
    },
    async ({ params, name }) => text(handlers.buildDuctHandler({ params, name }))
  );

  server.tool(
    'list_ducts',
    'List all ducts in the registry with their parameters and bounds.',
    {},
    async () => text(handlers.listDucts())
  );

  server.tool(
    'delete_duct',
    'Delete a duct and its cached mesh.',
    { duct: ductId },
    async ({ duct }) => text(handlers.deleteDuct({ duct }))
  );

  // ─── Queries (3) ────────────────────────────────────────────

  server.tool(
    'get_stations',
    'Sample cross-sections along the spine: center, frame, morph, twist and section size at each.',
    {
      duct: ductId,
      count: z.number().int().min(2).max(1000).optional().describe('Number of stations (default 24)'),
    },
    async ({ duct, count }) => text(handlers.getStations({ duct, count }))
  );

  server.tool(
    'evaluate_point',
    'Signed distance from a point to the duct surface. Negative = inside material.',
    {
      duct: ductId,
      x: z.number().describe('X in mm'),
      y: z.number().describe('Y in mm'),
      z: z.number().describe('Z in mm'),
    },
    async ({ duct, x, y, z: zc }) => text(handlers.evaluatePoint({ duct, point: [x, y, zc] }))
  );

  server.tool(
    'section_duct',
    'Slice the duct on the plane normal to the spine at a progress value. Returns contour loops in plane coordinates and the material area.',
    {
      duct: ductId,
      progress: z.number().min(0).max(1).describe('Arc-length fraction along the spine, 0 = intake, 1 = egress'),
      cell_size: z.number().min(0.1).max(10).optional().describe('Contour grid cell in mm (default 1)'),
    },
    async ({ duct, progress, cell_size }) => text(handlers.sectionDuctHandler({ duct, progress, cell_size }))
  );

  // ─── Mesh & Export (3) ──────────────────────────────────────

  server.tool(
    'compute_mesh',
    'Mesh a duct. implicit = marching the full solid (plate, holes, fillet); loft = the shell straight from its stations. Must be called before inspect_mesh and export_mesh.',
    {
      duct: ductId,
      resolution: z.number().min(0.2).max(10).optional().describe('Implicit voxel size in mm (default 1). Smaller = finer detail, slower.'),
      method: renderMethod.optional().describe('implicit (default) or loft'),
      stations: z.number().int().min(2).max(2000).optional().describe('Loft stations (default 48)'),
      segments: z.number().int().min(3).max(2000).optional().describe('Loft points per ring (default 96)'),
    },
    async (input) => text(handlers.computeMesh(input))
  );

  server.tool(
    'inspect_mesh',
    'Report on the cached mesh: boundary, non-manifold and misoriented edges, components, genus, volume.',
    { duct: ductId },
    async ({ duct }) => text(handlers.inspectMeshHandler({ duct }))
  );

  server.tool(
    'export_mesh',
    'Write the cached mesh as an STL file. Refuses a mesh that is not one watertight part of the expected genus unless allow_defects is set.',
    {
      duct: ductId,
      format: z.enum(['binary', 'ascii']).optional().describe('STL flavour (default binary)'),
      allow_defects: z.boolean().optional().describe('Export even if the mesh has defects'),
    },
    async (input) => text(handlers.exportMesh(input))
  );
}
