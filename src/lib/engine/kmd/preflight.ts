import { existsSync, readFileSync, statSync, type Stats } from "fs"
import { extname } from "path"
import { KMD_EXTENSION, MAX_TOTAL_SIZE, MIN_TOTAL_SIZE } from "./kmd-format"
import { ImportErrorKind } from "./import-result"

export type PreflightResult = { ok: true; size: number } | { ok: false; error: ImportErrorKind }

export type ReadResult = { ok: true; data: Uint8Array } | { ok: false; error: ImportErrorKind }

const READ_PERMISSION_BITS = 0o444

export function checkTotalSize(size: number): ImportErrorKind | null {
  if (size === 0) return ImportErrorKind.FileEmpty
  if (size < MIN_TOTAL_SIZE || size > MAX_TOTAL_SIZE) return ImportErrorKind.UnsupportedFileSize
  return null
}

export function preflightBuffer(bytes: ArrayBuffer | Uint8Array): PreflightResult {
  const error = checkTotalSize(bytes.byteLength)
  return error === null ? { ok: true, size: bytes.byteLength } : { ok: false, error }
}

// Checks the path without opening it: existence, regular .kmd file, read bits, size envelope
export function preflightFile(filePath: string): PreflightResult {
  if (!existsSync(filePath)) return { ok: false, error: ImportErrorKind.FileNotFound }

  let stats: Stats
  try {
    stats = statSync(filePath)
  } catch (error) {
    return { ok: false, error: readErrorKind(error) }
  }

  if (!stats.isFile() || extname(filePath) !== KMD_EXTENSION) {
    return { ok: false, error: ImportErrorKind.InvalidExtension }
  }

  if ((stats.mode & READ_PERMISSION_BITS) === 0) {
    return { ok: false, error: ImportErrorKind.UnauthorizedRead }
  }

  const error = checkTotalSize(stats.size)
  return error === null ? { ok: true, size: stats.size } : { ok: false, error }
}

export function readErrorKind(error: unknown): ImportErrorKind {
  const code = error instanceof Error && "code" in error ? error.code : undefined
  switch (code) {
    case "ENOENT":
      return ImportErrorKind.FileNotFound
    case "EACCES":
    case "EPERM":
      return ImportErrorKind.UnauthorizedRead
    case "EBUSY":
    case "ETXTBSY":
      return ImportErrorKind.FileLocked
    default:
      return ImportErrorKind.UnknownReadError
  }
}

export function readKmdFile(filePath: string): ReadResult {
  try {
    return { ok: true, data: readFileSync(filePath) }
  } catch (error) {
    return { ok: false, error: readErrorKind(error) }
  }
}
