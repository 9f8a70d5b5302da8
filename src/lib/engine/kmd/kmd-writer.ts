import { type Quat, Vec3 } from "../math"
import {
  HEADER_SIZE,
  INDEX_SIZE,
  isPositionInRange,
  isSizeInRange,
  KMD_MAGIC,
  KMD_VERSION,
  MAX_MODEL_BLOCK_SIZE,
  MAX_MODEL_COUNT,
  NAME_CAPACITY,
  PATH_CAPACITY,
  RenderType,
  SCALE_FACTORS,
  TABLE_SIZE,
  VERTEX_DATA_OFFSET,
  VERTEX_FLOATS,
  VERTEX_SIZE,
} from "./kmd-format"

export interface KmdModelInput {
  name?: string // table entry name, defaults to nodeName
  nodeName: string
  meshName: string
  nodePath: string
  dataTypeFlags?: number
  renderType?: number
  position: Vec3
  rotation: Quat
  size: Vec3
  vertices: Float32Array | number[] // VERTEX_FLOATS per vertex
  indices: Uint32Array | number[]
}

export interface KmdWriterOptions {
  scaleFactor?: number // selector 0-8
}

export class KmdWriter {
  private static encoder = new TextEncoder()

  static createBundle(models: KmdModelInput[], options: KmdWriterOptions = {}): ArrayBuffer {
    const scaleFactor = options.scaleFactor ?? 0
    if (!Number.isInteger(scaleFactor) || scaleFactor < 0 || scaleFactor >= SCALE_FACTORS.length) {
      throw new Error(`Invalid scale factor selector: ${scaleFactor}`)
    }
    if (models.length < 1 || models.length > MAX_MODEL_COUNT) {
      throw new Error(`Model count must be between 1 and ${MAX_MODEL_COUNT}, got ${models.length}`)
    }

    models.forEach((model, index) => this.validateModel(model, index))

    const tablesSize = models.length * TABLE_SIZE
    const blockSizes = models.map(
      (m) => VERTEX_DATA_OFFSET + m.vertices.length * 4 + m.indices.length * INDEX_SIZE
    )
    const blocksSize = blockSizes.reduce((sum, size) => sum + size, 0)
    if (blocksSize > MAX_MODEL_BLOCK_SIZE) {
      throw new Error(`Combined block size ${blocksSize} exceeds ${MAX_MODEL_BLOCK_SIZE} bytes`)
    }

    const buffer = new ArrayBuffer(HEADER_SIZE + tablesSize + blocksSize)
    const view = new DataView(buffer)
    const bytes = new Uint8Array(buffer)

    view.setUint32(0, KMD_MAGIC, true)
    view.setUint8(4, KMD_VERSION)
    view.setUint8(5, scaleFactor)
    view.setUint32(6, models.length, true)
    view.setUint32(10, tablesSize, true)
    view.setUint32(14, blocksSize, true)

    let blockOffset = HEADER_SIZE + tablesSize
    models.forEach((model, index) => {
      const tableOffset = HEADER_SIZE + index * TABLE_SIZE
      bytes.set(this.encodeName(model.name ?? model.nodeName, NAME_CAPACITY, "name"), tableOffset)
      view.setUint32(tableOffset + 20, blockOffset, true)
      view.setUint32(tableOffset + 24, blockSizes[index], true)

      this.writeBlock(view, bytes, blockOffset, model)
      blockOffset += blockSizes[index]
    })

    return buffer
  }

  private static writeBlock(view: DataView, bytes: Uint8Array, start: number, model: KmdModelInput): void {
    bytes.set(this.encodeName(model.nodeName, NAME_CAPACITY, "nodeName"), start)
    bytes.set(this.encodeName(model.meshName, NAME_CAPACITY, "meshName"), start + 20)
    bytes.set(this.encodeName(model.nodePath, PATH_CAPACITY, "nodePath"), start + 40)
    view.setUint8(start + 90, model.dataTypeFlags ?? 0)
    view.setUint8(start + 91, model.renderType ?? RenderType.Opaque)

    const { x, y, z, w } = model.rotation
    const floats = [...model.position.toArray(), w, x, y, z, ...model.size.toArray()]
    floats.forEach((value, i) => view.setFloat32(start + 92 + i * 4, value, true))

    const verticesSize = model.vertices.length * 4
    const indicesSize = model.indices.length * INDEX_SIZE
    view.setUint32(start + 132, VERTEX_DATA_OFFSET, true)
    view.setUint32(start + 136, verticesSize, true)
    view.setUint32(start + 140, VERTEX_DATA_OFFSET + verticesSize, true)
    view.setUint32(start + 144, indicesSize, true)

    let cursor = start + VERTEX_DATA_OFFSET
    for (const value of model.vertices) {
      view.setFloat32(cursor, value, true)
      cursor += 4
    }
    for (const value of model.indices) {
      view.setUint32(cursor, value, true)
      cursor += INDEX_SIZE
    }
  }

  private static validateModel(model: KmdModelInput, index: number): void {
    const label = `Model ${index} (${model.nodeName})`

    this.encodeName(model.name ?? model.nodeName, NAME_CAPACITY, "name")
    this.encodeName(model.nodeName, NAME_CAPACITY, "nodeName")
    this.encodeName(model.meshName, NAME_CAPACITY, "meshName")
    this.encodeName(model.nodePath, PATH_CAPACITY, "nodePath")

    for (const [field, value] of [["dataTypeFlags", model.dataTypeFlags], ["renderType", model.renderType]] as const) {
      if (value !== undefined && (!Number.isInteger(value) || value < 0 || value > 255)) {
        throw new Error(`${label}: ${field} must be a byte, got ${value}`)
      }
    }

    // Compare what will actually be stored: f32, not the f64 input
    const stored = (v: Vec3) => new Vec3(Math.fround(v.x), Math.fround(v.y), Math.fround(v.z))
    if (!isPositionInRange(stored(model.position))) {
      throw new Error(`${label}: position out of range`)
    }
    if (!isSizeInRange(stored(model.size))) {
      throw new Error(`${label}: size out of range`)
    }

    if (model.vertices.length % VERTEX_FLOATS !== 0) {
      throw new Error(
        `${label}: vertex data must hold ${VERTEX_FLOATS} floats (${VERTEX_SIZE} bytes) per vertex, got ${model.vertices.length} floats`
      )
    }
    for (const value of model.indices) {
      if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
        throw new Error(`${label}: index ${value} is not a u32`)
      }
    }
  }

  // Field-sized, null-padded; the last byte is always the terminator
  private static encodeName(value: string, capacity: number, field: string): Uint8Array {
    const encoded = this.encoder.encode(value)
    if (encoded.byteLength > capacity - 1) {
      throw new Error(`${field} "${value}" is ${encoded.byteLength} bytes, at most ${capacity - 1} allowed`)
    }
    const bytes = new Uint8Array(capacity)
    bytes.set(encoded)
    return bytes
  }
}
