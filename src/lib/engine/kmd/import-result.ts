import type { KmdBlock, KmdHeader, KmdTable } from "./kmd-format"

export enum ImportErrorKind {
  // file operations
  FileNotFound = 1,
  InvalidExtension = 2,
  UnauthorizedRead = 3,
  FileLocked = 4,
  UnknownReadError = 5,
  FileEmpty = 6,

  // import errors
  UnsupportedFileSize = 7,
  InvalidMagic = 8,
  InvalidVersion = 9,
  InvalidModelCount = 10,
  InvalidModelPosition = 11,
  InvalidModelSize = 12,
  InvalidModelTableSize = 13,
  InvalidModelBlockSize = 14,
  UnexpectedEof = 15,
}

export interface KmdData {
  header: KmdHeader
  tables: KmdTable[]
  blocks: KmdBlock[]
}

export type KmdImportResult = ({ ok: true } & KmdData) | { ok: false; error: ImportErrorKind }

export type KmdInspectResult =
  | { ok: true; header: KmdHeader; tables: KmdTable[] }
  | { ok: false; error: ImportErrorKind }

export function importResultToString(kind: ImportErrorKind): string {
  switch (kind) {
    case ImportErrorKind.FileNotFound:
      return "RESULT_FILE_NOT_FOUND"
    case ImportErrorKind.InvalidExtension:
      return "RESULT_INVALID_EXTENSION"
    case ImportErrorKind.UnauthorizedRead:
      return "RESULT_UNAUTHORIZED_READ"
    case ImportErrorKind.FileLocked:
      return "RESULT_FILE_LOCKED"
    case ImportErrorKind.UnknownReadError:
      return "RESULT_UNKNOWN_READ_ERROR"
    case ImportErrorKind.FileEmpty:
      return "RESULT_FILE_EMPTY"
    case ImportErrorKind.UnsupportedFileSize:
      return "RESULT_UNSUPPORTED_FILE_SIZE"
    case ImportErrorKind.InvalidMagic:
      return "RESULT_INVALID_MAGIC"
    case ImportErrorKind.InvalidVersion:
      return "RESULT_INVALID_VERSION"
    case ImportErrorKind.InvalidModelCount:
      return "RESULT_INVALID_MODEL_COUNT"
    case ImportErrorKind.InvalidModelPosition:
      return "RESULT_INVALID_MODEL_POSITION"
    case ImportErrorKind.InvalidModelSize:
      return "RESULT_INVALID_MODEL_SIZE"
    case ImportErrorKind.InvalidModelTableSize:
      return "RESULT_INVALID_MODEL_TABLE_SIZE"
    case ImportErrorKind.InvalidModelBlockSize:
      return "RESULT_INVALID_MODEL_BLOCK_SIZE"
    case ImportErrorKind.UnexpectedEof:
      return "RESULT_UNEXPECTED_EOF"
  }
}

const DESCRIPTIONS: Record<ImportErrorKind, string> = {
  [ImportErrorKind.FileNotFound]: "File does not exist",
  [ImportErrorKind.InvalidExtension]: "File is not a regular '.kmd' file",
  [ImportErrorKind.UnauthorizedRead]: "Not authorized to read this file",
  [ImportErrorKind.FileLocked]: "Cannot read this file, file is in use",
  [ImportErrorKind.UnknownReadError]: "Unknown error while reading file",
  [ImportErrorKind.FileEmpty]: "File has no content",
  [ImportErrorKind.UnsupportedFileSize]: "File size is outside the supported range",
  [ImportErrorKind.InvalidMagic]: "Magic word must be 'KMD\\0'",
  [ImportErrorKind.InvalidVersion]: "Unsupported KMD version",
  [ImportErrorKind.InvalidModelCount]: "Model count is out of range",
  [ImportErrorKind.InvalidModelPosition]: "Model position is out of range",
  [ImportErrorKind.InvalidModelSize]: "Model size is out of range",
  [ImportErrorKind.InvalidModelTableSize]: "Model table region size is out of range",
  [ImportErrorKind.InvalidModelBlockSize]: "Model block region size is out of range",
  [ImportErrorKind.UnexpectedEof]: "File ended sooner than expected",
}

export function describeImportError(kind: ImportErrorKind): string {
  return `${importResultToString(kind)}: ${DESCRIPTIONS[kind]}`
}
