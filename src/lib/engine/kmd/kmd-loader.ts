import { Quat, Vec3 } from "../math"
import { BinaryReader, BufferOverrunError } from "./binary-reader"
import {
  HEADER_SIZE,
  INDEX_SIZE,
  isPositionInRange,
  isSizeInRange,
  KMD_MAGIC,
  KMD_VERSION,
  type KmdBlock,
  type KmdHeader,
  type KmdTable,
  MAX_MODEL_BLOCK_SIZE,
  MAX_MODEL_COUNT,
  MAX_MODEL_TABLE_SIZE,
  NAME_CAPACITY,
  normalizeScaleFactor,
  PATH_CAPACITY,
  SCALE_FACTORS,
  TABLE_SIZE,
  VERTEX_DATA_OFFSET,
  VERTEX_FLOATS,
  VERTEX_SIZE,
} from "./kmd-format"
import { ImportErrorKind, type KmdImportResult, type KmdInspectResult } from "./import-result"
import { preflightBuffer, preflightFile, readKmdFile } from "./preflight"

// Carries the first failed check out of the nested decode steps
class KmdImportFailure extends Error {
  constructor(readonly kind: ImportErrorKind) {
    super(`KMD import failed with ${ImportErrorKind[kind]}`)
    this.name = "KmdImportFailure"
  }
}

function failureKind(error: unknown): ImportErrorKind {
  if (error instanceof KmdImportFailure) return error.kind
  if (error instanceof BufferOverrunError) return ImportErrorKind.UnexpectedEof
  console.error("❌ Unexpected error while decoding KMD data:", error)
  return ImportErrorKind.UnknownReadError
}

export class KmdLoader {
  private reader: BinaryReader

  private constructor(bytes: Uint8Array | ArrayBuffer) {
    this.reader = new BinaryReader(bytes)
  }

  static load(filePath: string): KmdImportResult {
    try {
      const preflight = preflightFile(filePath)
      if (!preflight.ok) return preflight

      const file = readKmdFile(filePath)
      if (!file.ok) return file

      return KmdLoader.loadFromBuffer(file.data)
    } catch (error) {
      return { ok: false, error: failureKind(error) }
    }
  }

  static loadFromBuffer(buffer: ArrayBuffer | Uint8Array): KmdImportResult {
    const preflight = preflightBuffer(buffer)
    if (!preflight.ok) return preflight

    try {
      const loader = new KmdLoader(buffer)
      const header = loader.parseHeader()
      const tables = loader.parseTables(header)
      const blocks = loader.parseBlocks(tables)
      return { ok: true, header, tables, blocks }
    } catch (error) {
      return { ok: false, error: failureKind(error) }
    }
  }

  // Header and tables only, no block is decoded
  static inspect(buffer: ArrayBuffer | Uint8Array): KmdInspectResult {
    const preflight = preflightBuffer(buffer)
    if (!preflight.ok) return preflight

    try {
      const loader = new KmdLoader(buffer)
      const header = loader.parseHeader()
      const tables = loader.parseTables(header)
      return { ok: true, header, tables }
    } catch (error) {
      return { ok: false, error: failureKind(error) }
    }
  }

  // Magic before version before bounds, so a foreign file always reports invalid magic
  private parseHeader(): KmdHeader {
    this.reader.seek(0)

    const magic = this.reader.getUint32()
    if (magic !== KMD_MAGIC) throw new KmdImportFailure(ImportErrorKind.InvalidMagic)

    const version = this.reader.getUint8()
    if (version !== KMD_VERSION) throw new KmdImportFailure(ImportErrorKind.InvalidVersion)

    // Out of range selectors are clamped to 0 rather than rejected
    const scaleFactor = normalizeScaleFactor(this.reader.getUint8())

    const modelCount = this.reader.getUint32()
    if (modelCount > MAX_MODEL_COUNT) throw new KmdImportFailure(ImportErrorKind.InvalidModelCount)

    const modelTablesSize = this.reader.getUint32()
    if (modelTablesSize < TABLE_SIZE || modelTablesSize > MAX_MODEL_TABLE_SIZE) {
      throw new KmdImportFailure(ImportErrorKind.InvalidModelTableSize)
    }

    const modelBlocksSize = this.reader.getUint32()
    if (modelBlocksSize < VERTEX_DATA_OFFSET || modelBlocksSize > MAX_MODEL_BLOCK_SIZE) {
      throw new KmdImportFailure(ImportErrorKind.InvalidModelBlockSize)
    }

    return {
      magic,
      version,
      scaleFactor,
      scaleMultiplier: SCALE_FACTORS[scaleFactor],
      modelCount,
      modelTablesSize,
      modelBlocksSize,
    }
  }

  // Raw copy of each entry; offsets are validated against the file in parseBlock
  private parseTables(header: KmdHeader): KmdTable[] {
    const count = Math.floor(header.modelTablesSize / TABLE_SIZE)
    const tables: KmdTable[] = []

    this.reader.seek(HEADER_SIZE)
    for (let i = 0; i < count; i++) {
      const name = this.reader.getFixedString(NAME_CAPACITY)
      const blockOffset = this.reader.getUint32()
      const blockSize = this.reader.getUint32()
      tables.push({ name, blockOffset, blockSize })
    }

    return tables
  }

  // All or nothing: the first bad block aborts the whole import
  private parseBlocks(tables: KmdTable[]): KmdBlock[] {
    const blocks: KmdBlock[] = []
    for (const table of tables) {
      blocks.push(this.parseBlock(table))
    }
    return blocks
  }

  private parseBlock(table: KmdTable): KmdBlock {
    const fileSize = this.reader.byteLength
    const start = table.blockOffset

    if (start + table.blockSize > fileSize) {
      throw new KmdImportFailure(ImportErrorKind.UnexpectedEof)
    }

    this.reader.seek(start)

    const nodeName = this.reader.getFixedString(NAME_CAPACITY)
    const meshName = this.reader.getFixedString(NAME_CAPACITY)
    const nodePath = this.reader.getFixedString(PATH_CAPACITY)
    const dataTypeFlags = this.reader.getUint8()
    const renderType = this.reader.getUint8()

    const position = this.getVec3()
    if (!isPositionInRange(position)) {
      throw new KmdImportFailure(ImportErrorKind.InvalidModelPosition)
    }

    // Stored w first; taken as is, normalization is left to the caller
    const w = this.reader.getFloat32()
    const x = this.reader.getFloat32()
    const y = this.reader.getFloat32()
    const z = this.reader.getFloat32()
    const rotation = new Quat(x, y, z, w)

    const size = this.getVec3()
    if (!isSizeInRange(size)) {
      throw new KmdImportFailure(ImportErrorKind.InvalidModelSize)
    }

    const verticesOffset = this.reader.getUint32()
    const verticesSize = this.reader.getUint32()
    const indicesOffset = this.reader.getUint32()
    const indicesSize = this.reader.getUint32()

    if (start + VERTEX_DATA_OFFSET + verticesSize > fileSize) {
      throw new KmdImportFailure(ImportErrorKind.UnexpectedEof)
    }

    // Vertex data always starts at VERTEX_DATA_OFFSET, indices follow the declared vertex bytes
    const vertexCount = Math.floor(verticesSize / VERTEX_SIZE)
    this.reader.seek(start + VERTEX_DATA_OFFSET)
    const vertexBytes = this.reader.getBytes(vertexCount * VERTEX_SIZE)

    const indexCount = Math.floor(indicesSize / INDEX_SIZE)
    this.reader.seek(start + VERTEX_DATA_OFFSET + verticesSize)
    const indexBytes = this.reader.getBytes(indexCount * INDEX_SIZE)

    return {
      nodeName,
      meshName,
      nodePath,
      dataTypeFlags,
      renderType,
      position,
      rotation,
      size,
      verticesOffset,
      verticesSize,
      indicesOffset,
      indicesSize,
      vertexCount,
      indexCount,
      vertices: new Float32Array(vertexBytes.buffer, vertexBytes.byteOffset, vertexCount * VERTEX_FLOATS),
      indices: new Uint32Array(indexBytes.buffer, indexBytes.byteOffset, indexCount),
    }
  }

  private getVec3(): Vec3 {
    return new Vec3(this.reader.getFloat32(), this.reader.getFloat32(), this.reader.getFloat32())
  }
}

export function importKmd(filePath: string): KmdImportResult {
  return KmdLoader.load(filePath)
}
