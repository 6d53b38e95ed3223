// ---------------------------------------------------------------------------
// PLY codec: ascii / binary little- and big-endian reader, binary
// little-endian writer. Covers the vertex + face layouts written by SfM/MVS
// tools and surface reconstruction binaries.
// ---------------------------------------------------------------------------

import type { Mesh, PointCloud } from './types.js';
import { createMesh } from './types.js';

export type PlyFormat = 'ascii' | 'binary_little_endian' | 'binary_big_endian';

export type PlyScalarType =
  | 'int8'
  | 'uint8'
  | 'int16'
  | 'uint16'
  | 'int32'
  | 'uint32'
  | 'float32'
  | 'float64';

export interface PlyProperty {
  name: string;
  type: PlyScalarType;
  /** Count type for list properties; absent for scalars. */
  listCountType?: PlyScalarType;
}

export interface PlyElement {
  name: string;
  count: number;
  properties: PlyProperty[];
}

export interface PlyHeader {
  format: PlyFormat;
  elements: PlyElement[];
  comments: string[];
  /** Byte offset where the body starts. */
  bodyOffset: number;
}

/** Decoded element: one column per scalar property, flattened lists per list property. */
export interface PlyElementData {
  scalars: Map<string, Float64Array>;
  lists: Map<string, number[][]>;
}

export interface PlyData {
  header: PlyHeader;
  elements: Map<string, PlyElementData>;
}

export class PlyParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PlyParseError';
  }
}

const TYPE_ALIASES: Record<string, PlyScalarType> = {
  char: 'int8',
  int8: 'int8',
  uchar: 'uint8',
  uint8: 'uint8',
  short: 'int16',
  int16: 'int16',
  ushort: 'uint16',
  uint16: 'uint16',
  int: 'int32',
  int32: 'int32',
  uint: 'uint32',
  uint32: 'uint32',
  float: 'float32',
  float32: 'float32',
  double: 'float64',
  float64: 'float64',
};

const TYPE_SIZES: Record<PlyScalarType, number> = {
  int8: 1,
  uint8: 1,
  int16: 2,
  uint16: 2,
  int32: 4,
  uint32: 4,
  float32: 4,
  float64: 8,
};

function scalarType(name: string): PlyScalarType {
  const t = TYPE_ALIASES[name];
  if (!t) throw new PlyParseError(`Unknown PLY property type "${name}"`);
  return t;
}

// ---------------------------------------------------------------------------
// Header
// ---------------------------------------------------------------------------

const END_HEADER = 'end_header';

/** Parse only the header. Cheap; used to count points without decoding. */
export function parsePlyHeader(buf: Uint8Array): PlyHeader {
  // Headers are ASCII; cap the search so binary noise is never scanned.
  const limit = Math.min(buf.length, 64 * 1024);
  const text = Buffer.from(buf.buffer, buf.byteOffset, limit).toString('latin1');
  const end = text.indexOf(END_HEADER);
  if (!text.startsWith('ply') || end < 0) {
    throw new PlyParseError('Not a PLY file');
  }
  let bodyOffset = end + END_HEADER.length;
  if (text[bodyOffset] === '\r') bodyOffset++;
  if (text[bodyOffset] === '\n') bodyOffset++;

  const lines = text.slice(0, end).split(/\r?\n/);
  let format: PlyFormat | undefined;
  const elements: PlyElement[] = [];
  const comments: string[] = [];

  for (const raw of lines.slice(1)) {
    const line = raw.trim();
    if (line === '') continue;
    const parts = line.split(/\s+/);
    const keyword = parts[0];
    if (keyword === 'format') {
      const f = parts[1];
      if (f !== 'ascii' && f !== 'binary_little_endian' && f !== 'binary_big_endian') {
        throw new PlyParseError(`Unsupported PLY format "${f ?? ''}"`);
      }
      format = f;
    } else if (keyword === 'comment' || keyword === 'obj_info') {
      comments.push(line.slice(keyword.length).trim());
    } else if (keyword === 'element') {
      const count = Number(parts[2]);
      if (!parts[1] || !Number.isInteger(count) || count < 0) {
        throw new PlyParseError(`Malformed element line "${line}"`);
      }
      elements.push({ name: parts[1], count, properties: [] });
    } else if (keyword === 'property') {
      const el = elements[elements.length - 1];
      if (!el) throw new PlyParseError('Property declared before any element');
      if (parts[1] === 'list') {
        el.properties.push({
          name: parts[4] ?? '',
          listCountType: scalarType(parts[2] ?? ''),
          type: scalarType(parts[3] ?? ''),
        });
      } else {
        el.properties.push({ name: parts[2] ?? '', type: scalarType(parts[1] ?? '') });
      }
    }
  }

  if (!format) throw new PlyParseError('PLY header has no format line');
  return { format, elements, comments, bodyOffset };
}

/** Number of elements named `name`, 0 when absent. */
export function plyElementCount(header: PlyHeader, name: string): number {
  return header.elements.find((e) => e.name === name)?.count ?? 0;
}

/**
 * Smallest body the header allows: every list empty and, for ASCII, every
 * value a single character followed by a separator.
 */
export function plyMinimumBodyBytes(header: PlyHeader): number {
  let total = 0;
  for (const el of header.elements) {
    let row = 0;
    for (const p of el.properties) {
      row += header.format === 'ascii' ? 2 : TYPE_SIZES[p.listCountType ?? p.type];
    }
    total += row * el.count;
  }
  return total;
}

// ---------------------------------------------------------------------------
// Body
// ---------------------------------------------------------------------------

/** Decode a whole PLY file. */
export function parsePly(buf: Uint8Array): PlyData {
  const header = parsePlyHeader(buf);
  const body = buf.subarray(header.bodyOffset);
  const read = header.format === 'ascii' ? asciiReader(body) : binaryReader(body, header.format);

  const elements = new Map<string, PlyElementData>();
  for (const el of header.elements) {
    elements.set(el.name, readElement(el, read));
  }
  return { header, elements };
}

type ScalarReader = (type: PlyScalarType) => number;

function asciiReader(body: Uint8Array): ScalarReader {
  const tokens = Buffer.from(body.buffer, body.byteOffset, body.byteLength)
    .toString('latin1')
    .split(/\s+/)
    .filter((t) => t !== '');
  let pos = 0;
  return () => {
    const tok = tokens[pos++];
    if (tok === undefined) throw new PlyParseError('Unexpected end of PLY data');
    return Number(tok);
  };
}

function binaryReader(body: Uint8Array, format: PlyFormat): ScalarReader {
  const view = new DataView(body.buffer, body.byteOffset, body.byteLength);
  const little = format === 'binary_little_endian';
  let offset = 0;

  const at = (type: PlyScalarType, o: number): number => {
    switch (type) {
      case 'int8': return view.getInt8(o);
      case 'uint8': return view.getUint8(o);
      case 'int16': return view.getInt16(o, little);
      case 'uint16': return view.getUint16(o, little);
      case 'int32': return view.getInt32(o, little);
      case 'uint32': return view.getUint32(o, little);
      case 'float32': return view.getFloat32(o, little);
      case 'float64': return view.getFloat64(o, little);
    }
  };

  return (type) => {
    const size = TYPE_SIZES[type];
    if (offset + size > view.byteLength) {
      throw new PlyParseError('Unexpected end of PLY data');
    }
    const v = at(type, offset);
    offset += size;
    return v;
  };
}

type PropertySlot =
  | { kind: 'scalar'; type: PlyScalarType; values: Float64Array }
  | { kind: 'list'; type: PlyScalarType; countType: PlyScalarType; values: number[][] };

function readElement(el: PlyElement, read: ScalarReader): PlyElementData {
  const scalars = new Map<string, Float64Array>();
  const lists = new Map<string, number[][]>();
  const slots: PropertySlot[] = el.properties.map((p) => {
    if (p.listCountType) {
      const values: number[][] = [];
      lists.set(p.name, values);
      return { kind: 'list', type: p.type, countType: p.listCountType, values };
    }
    const values = new Float64Array(el.count);
    scalars.set(p.name, values);
    return { kind: 'scalar', type: p.type, values };
  });

  for (let i = 0; i < el.count; i++) {
    for (const slot of slots) {
      if (slot.kind === 'scalar') {
        slot.values[i] = read(slot.type);
        continue;
      }
      const len = read(slot.countType);
      const items = new Array<number>(len);
      for (let j = 0; j < len; j++) items[j] = read(slot.type);
      slot.values.push(items);
    }
  }

  return { scalars, lists };
}

// ---------------------------------------------------------------------------
// Typed views
// ---------------------------------------------------------------------------

function column(data: PlyElementData, ...names: string[]): Float64Array | undefined {
  for (const n of names) {
    const col = data.scalars.get(n);
    if (col) return col;
  }
  return undefined;
}

function interleave3(a: Float64Array, b: Float64Array, c: Float64Array, scale = 1): Float64Array {
  const out = new Float64Array(a.length * 3);
  for (let i = 0; i < a.length; i++) {
    out[i * 3] = a[i]! * scale;
    out[i * 3 + 1] = b[i]! * scale;
    out[i * 3 + 2] = c[i]! * scale;
  }
  return out;
}

function vertexAttributes(data: PlyElementData): {
  positions: Float64Array;
  normals?: Float64Array;
  colors?: Float64Array;
} {
  const x = column(data, 'x');
  const y = column(data, 'y');
  const z = column(data, 'z');
  if (!x || !y || !z) throw new PlyParseError('PLY vertex element lacks x/y/z');

  const nx = column(data, 'nx');
  const ny = column(data, 'ny');
  const nz = column(data, 'nz');
  const r = column(data, 'red', 'r', 'diffuse_red');
  const g = column(data, 'green', 'g', 'diffuse_green');
  const b = column(data, 'blue', 'b', 'diffuse_blue');

  return {
    positions: interleave3(x, y, z),
    normals: nx && ny && nz ? interleave3(nx, ny, nz) : undefined,
    colors: r && g && b ? interleave3(r, g, b, 1 / 255) : undefined,
  };
}

/** Read the vertex element as a point cloud. */
export function readPointCloud(buf: Uint8Array): PointCloud {
  const data = parsePly(buf);
  const vertex = data.elements.get('vertex');
  if (!vertex) throw new PlyParseError('PLY has no vertex element');
  const { positions, normals, colors } = vertexAttributes(vertex);
  return { positions, normals, colors, count: positions.length / 3 };
}

/** A mesh plus any per-vertex density written by the reconstruction step. */
export interface PlyMesh {
  mesh: Mesh;
  density?: Float64Array;
}

/** Read vertices and faces as a triangle mesh. Polygons are fan-split. */
export function readMesh(buf: Uint8Array): PlyMesh {
  const data = parsePly(buf);
  const vertex = data.elements.get('vertex');
  if (!vertex) throw new PlyParseError('PLY has no vertex element');
  const { positions, colors } = vertexAttributes(vertex);

  const faces = data.elements.get('face');
  const polys = faces?.lists.get('vertex_indices') ?? faces?.lists.get('vertex_index') ?? [];
  const indices: number[] = [];
  for (const poly of polys) {
    for (let j = 1; j + 1 < poly.length; j++) {
      indices.push(poly[0]!, poly[j]!, poly[j + 1]!);
    }
  }

  return {
    mesh: createMesh(positions, Uint32Array.from(indices), colors),
    density: column(vertex, 'value', 'density'),
  };
}

// ---------------------------------------------------------------------------
// Writer
// ---------------------------------------------------------------------------

export interface PlyWriteInput {
  positions: Float64Array;
  normals?: Float64Array;
  /** Colours in [0,1]; written as uchar. */
  colors?: Float64Array;
  /** Triangle indices; omit for a point cloud. */
  indices?: Uint32Array;
}

/** Encode points or a triangle mesh as binary little-endian PLY. */
export function encodePly(input: PlyWriteInput): Buffer {
  const n = input.positions.length / 3;
  const faces = input.indices ? input.indices.length / 3 : 0;

  const headerLines = ['ply', 'format binary_little_endian 1.0', `element vertex ${n}`];
  headerLines.push('property float x', 'property float y', 'property float z');
  if (input.normals) headerLines.push('property float nx', 'property float ny', 'property float nz');
  if (input.colors) headerLines.push('property uchar red', 'property uchar green', 'property uchar blue');
  if (input.indices) headerLines.push(`element face ${faces}`, 'property list uchar int vertex_indices');
  headerLines.push(END_HEADER, '');
  const header = Buffer.from(headerLines.join('\n'), 'latin1');

  const vertexSize = 12 + (input.normals ? 12 : 0) + (input.colors ? 3 : 0);
  const body = Buffer.alloc(n * vertexSize + faces * 13);
  let o = 0;
  for (let i = 0; i < n; i++) {
    o = body.writeFloatLE(input.positions[i * 3]!, o);
    o = body.writeFloatLE(input.positions[i * 3 + 1]!, o);
    o = body.writeFloatLE(input.positions[i * 3 + 2]!, o);
    if (input.normals) {
      o = body.writeFloatLE(input.normals[i * 3]!, o);
      o = body.writeFloatLE(input.normals[i * 3 + 1]!, o);
      o = body.writeFloatLE(input.normals[i * 3 + 2]!, o);
    }
    if (input.colors) {
      o = body.writeUInt8(toByte(input.colors[i * 3]!), o);
      o = body.writeUInt8(toByte(input.colors[i * 3 + 1]!), o);
      o = body.writeUInt8(toByte(input.colors[i * 3 + 2]!), o);
    }
  }
  if (input.indices) {
    for (let f = 0; f < faces; f++) {
      o = body.writeUInt8(3, o);
      o = body.writeInt32LE(input.indices[f * 3]!, o);
      o = body.writeInt32LE(input.indices[f * 3 + 1]!, o);
      o = body.writeInt32LE(input.indices[f * 3 + 2]!, o);
    }
  }

  return Buffer.concat([header, body]);
}

function toByte(v: number): number {
  return Math.max(0, Math.min(255, Math.round(v * 255)));
}
