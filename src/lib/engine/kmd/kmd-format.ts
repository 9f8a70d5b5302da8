import { type Quat, Vec3 } from "../math"

/*
 * KMD binary layout (little-endian)
 *
 * Top header, 18 bytes:
 *   0   4  magic 'K','M','D','\0'
 *   4   1  format version
 *   5   1  global scale factor selector (0-8, anything else reads as 0)
 *   6   4  model count
 *   10  4  combined size of all model tables
 *   14  4  combined size of all model blocks
 *
 * Model table, 28 bytes each, right after the header:
 *   0   20 model name (19 chars + null terminator)
 *   20  4  absolute block offset
 *   24  4  block size
 *
 * Model block, at the table's block offset:
 *   0   20 node name
 *   20  20 mesh name
 *   40  50 node path
 *   90  1  data type flags
 *   91  1  render type
 *   92  12 position (3 x f32)
 *   104 16 rotation quaternion (4 x f32, w x y z)
 *   120 12 size (3 x f32)
 *   132 16 vertices offset/size, indices offset/size (u32 each)
 *   148 .. vertex records, then index records (u32)
 */

export const KMD_MAGIC = 0x00444d4b
export const KMD_VERSION = 1
export const KMD_EXTENSION = ".kmd"

export const HEADER_SIZE = 18
export const TABLE_SIZE = 28
export const VERTEX_DATA_OFFSET = 148

export const NAME_CAPACITY = 20
export const PATH_CAPACITY = 50

export const VERTEX_FLOATS = 12
export const VERTEX_SIZE = VERTEX_FLOATS * 4
export const INDEX_SIZE = 4

export const MAX_MODEL_COUNT = 1024
// 28 KB
export const MAX_MODEL_TABLE_SIZE = 28672
// 1 GB
export const MAX_MODEL_BLOCK_SIZE = 1073741824

// Bounds are f32 values: the file stores f32, so 0.01 must compare as the f32 nearest to 0.01
export const MIN_POSITION = Math.fround(-10000)
export const MAX_POSITION = Math.fround(10000)
export const MIN_SIZE = Math.fround(0.01)
export const MAX_SIZE = Math.fround(10000)

export const MIN_TOTAL_SIZE = HEADER_SIZE + TABLE_SIZE + VERTEX_DATA_OFFSET
export const MAX_TOTAL_SIZE = HEADER_SIZE + MAX_MODEL_TABLE_SIZE + MAX_MODEL_BLOCK_SIZE

export const SCALE_FACTORS: readonly number[] = [1, 10, 100, 1000, 10000, 0.1, 0.01, 0.001, 0.0001]

export enum DataTypeFlag {
  Material = 1 << 0,
  Texture = 1 << 1,
  Camera = 1 << 2,
  Light = 1 << 3,
  Animation = 1 << 4,
}

export enum RenderType {
  Opaque = 0,
  Transparent = 1,
  Masked = 2,
}

export interface KmdHeader {
  magic: number
  version: number
  scaleFactor: number // selector, always 0-8 after decoding
  scaleMultiplier: number
  modelCount: number
  modelTablesSize: number
  modelBlocksSize: number
}

export interface KmdTable {
  name: string
  blockOffset: number // absolute offset from start of file
  blockSize: number
}

export interface Vertex {
  position: Vec3
  normal: Vec3
  texCoord: [number, number]
  tangent: [number, number, number, number]
}

export interface KmdBlock {
  nodeName: string
  meshName: string
  nodePath: string
  dataTypeFlags: number
  renderType: number
  position: Vec3
  rotation: Quat // stored as w, x, y, z
  size: Vec3
  verticesOffset: number
  verticesSize: number
  indicesOffset: number
  indicesSize: number
  vertexCount: number
  indexCount: number
  vertices: Float32Array // VERTEX_FLOATS per vertex
  indices: Uint32Array
}

export interface DataTypes {
  material: boolean
  texture: boolean
  camera: boolean
  light: boolean
  animation: boolean
}

export function normalizeScaleFactor(selector: number): number {
  return selector < SCALE_FACTORS.length ? selector : 0
}

export function getScaleMultiplier(selector: number): number {
  return SCALE_FACTORS[normalizeScaleFactor(selector)]
}

export function decodeDataTypeFlags(flags: number): DataTypes {
  return {
    material: (flags & DataTypeFlag.Material) !== 0,
    texture: (flags & DataTypeFlag.Texture) !== 0,
    camera: (flags & DataTypeFlag.Camera) !== 0,
    light: (flags & DataTypeFlag.Light) !== 0,
    animation: (flags & DataTypeFlag.Animation) !== 0,
  }
}

export function encodeDataTypeFlags(types: Partial<DataTypes>): number {
  let flags = 0
  if (types.material) flags |= DataTypeFlag.Material
  if (types.texture) flags |= DataTypeFlag.Texture
  if (types.camera) flags |= DataTypeFlag.Camera
  if (types.light) flags |= DataTypeFlag.Light
  if (types.animation) flags |= DataTypeFlag.Animation
  return flags
}

// 3-255 are unused and fall back to opaque
export function resolveRenderType(value: number): RenderType {
  switch (value) {
    case RenderType.Transparent:
      return RenderType.Transparent
    case RenderType.Masked:
      return RenderType.Masked
    default:
      return RenderType.Opaque
  }
}

export function getVertex(block: KmdBlock, index: number): Vertex {
  if (!Number.isInteger(index) || index < 0 || index >= block.vertexCount) {
    throw new RangeError(`Vertex index ${index} out of range 0..${block.vertexCount - 1}`)
  }
  const v = block.vertices
  const base = index * VERTEX_FLOATS
  return {
    position: Vec3.fromArray(v, base),
    normal: Vec3.fromArray(v, base + 3),
    texCoord: [v[base + 6], v[base + 7]],
    tangent: [v[base + 8], v[base + 9], v[base + 10], v[base + 11]],
  }
}

// Model-space position with the header's global scale factor applied
export function getScaledPosition(block: KmdBlock, header: KmdHeader): Vec3 {
  return block.position.clone().scale(header.scaleMultiplier)
}

export function isPositionInRange(position: Vec3): boolean {
  return position.every((c) => c >= MIN_POSITION && c <= MAX_POSITION)
}

export function isSizeInRange(size: Vec3): boolean {
  return size.every((c) => c >= MIN_SIZE && c <= MAX_SIZE)
}
