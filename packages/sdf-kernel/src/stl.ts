/**
 * STL export.
 *
 * Binary: 80-byte header + uint32 count + 50 bytes per triangle.
 * ASCII: `solid` / `facet normal` / `outer loop` blocks, for diffing and debugging.
 * Face normals computed via cross product (standard for slicers).
 */

import type { Vec3 } from './vec3.js';
import { sub, cross, normalize } from './vec3.js';
import type { TriangleMesh } from './mesh.js';

function checkMesh(mesh: TriangleMesh): void {
  if (mesh.triangleCount === 0) {
    throw new Error('Cannot export empty mesh (0 triangles)');
  }
  if (mesh.indices.length !== mesh.triangleCount * 3) {
    throw new Error(
      `Mesh data inconsistent: indices.length (${mesh.indices.length}) !== triangleCount * 3 (${mesh.triangleCount * 3})`
    );
  }
}

function facet(mesh: TriangleMesh, t: number): [Vec3, Vec3, Vec3, Vec3] {
  const v0 = mesh.vertices[mesh.indices[t * 3]];
  const v1 = mesh.vertices[mesh.indices[t * 3 + 1]];
  const v2 = mesh.vertices[mesh.indices[t * 3 + 2]];
  const n = normalize(cross(sub(v1, v0), sub(v2, v0)));
  return [n, v0, v1, v2];
}

export function exportSTL(mesh: TriangleMesh, header = 'fan-duct'): ArrayBuffer {
  checkMesh(mesh);
  const headerBytes = new TextEncoder().encode(header);
  if (headerBytes.length > 80) {
    throw new Error(
      `STL header exceeds 80 bytes (got ${headerBytes.length}). Shorten the header string.`
    );
  }

  const { triangleCount } = mesh;
  const buffer = new ArrayBuffer(84 + triangleCount * 50);
  const view = new DataView(buffer);

  // Header (80 bytes, pad with zeros)
  new Uint8Array(buffer, 0, 80).set(headerBytes);
  view.setUint32(80, triangleCount, true);

  let offset = 84;
  for (let t = 0; t < triangleCount; t++) {
    // Normal, then the three vertices
    for (const v of facet(mesh, t)) {
      view.setFloat32(offset, v[0], true);
      view.setFloat32(offset + 4, v[1], true);
      view.setFloat32(offset + 8, v[2], true);
      offset += 12;
    }
    // Attribute byte count
    view.setUint16(offset, 0, true);
    offset += 2;
  }

  return buffer;
}

export function exportAsciiSTL(mesh: TriangleMesh, solidName = 'fan_duct'): string {
  checkMesh(mesh);
  if (!/^\S+$/.test(solidName)) {
    throw new Error(`STL solid name "${solidName}" must be a single word without whitespace`);
  }
  const lines = [`solid ${solidName}`];
  for (let t = 0; t < mesh.triangleCount; t++) {
    const [n, v0, v1, v2] = facet(mesh, t);
    lines.push(
      `  facet normal ${n[0]} ${n[1]} ${n[2]}`,
      '    outer loop',
      `      vertex ${v0[0]} ${v0[1]} ${v0[2]}`,
      `      vertex ${v1[0]} ${v1[1]} ${v1[2]}`,
      `      vertex ${v2[0]} ${v2[1]} ${v2[2]}`,
      '    endloop',
      '  endfacet',
    );
  }
  lines.push(`endsolid ${solidName}`);
  return lines.join('\n') + '\n';
}
