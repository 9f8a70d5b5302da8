import { describe, expect, it } from "vitest"
import { BinaryReader, BufferOverrunError } from "./binary-reader"

function bytesOf(...values: number[]): Uint8Array {
  return Uint8Array.from(values)
}

describe("BinaryReader", () => {
  it("reads little-endian values and advances", () => {
    const buffer = new ArrayBuffer(9)
    const view = new DataView(buffer)
    view.setUint8(0, 7)
    view.setUint32(1, 0x00444d4b, true)
    view.setFloat32(5, -2.5, true)

    const reader = new BinaryReader(buffer)
    expect(reader.getUint8()).toBe(7)
    expect(reader.getUint32()).toBe(0x00444d4b)
    expect(reader.getFloat32()).toBe(-2.5)
    expect(reader.position).toBe(9)
    expect(reader.remaining).toBe(0)
  })

  it("throws instead of reading past the end and keeps its position", () => {
    const reader = new BinaryReader(bytesOf(1, 2, 3))
    reader.skip(1)

    expect(() => reader.getUint32()).toThrow(BufferOverrunError)
    expect(() => reader.getUint32()).toThrow("Offset 1 + 4 exceeds buffer bounds 3")
    expect(reader.position).toBe(1)
    expect(reader.getUint8()).toBe(2)
  })

  it("is a RangeError", () => {
    const reader = new BinaryReader(bytesOf())
    expect(() => reader.getUint8()).toThrow(RangeError)
  })

  it("allows seeking to the end but not beyond", () => {
    const reader = new BinaryReader(bytesOf(1, 2))
    expect(reader.seek(2).remaining).toBe(0)
    expect(() => reader.seek(3)).toThrow(BufferOverrunError)
    expect(() => reader.seek(-1)).toThrow(BufferOverrunError)
  })

  it("decodes fixed strings up to the first null", () => {
    const reader = new BinaryReader(bytesOf(0x6b, 0x6d, 0x64, 0, 0x78, 0x79, 0x21))
    expect(reader.getFixedString(6)).toBe("kmd")
    expect(reader.position).toBe(6)
    expect(reader.getFixedString(1)).toBe("!")
  })

  it("decodes a full fixed string when no terminator exists", () => {
    const reader = new BinaryReader(bytesOf(0x61, 0x62, 0x63))
    expect(reader.getFixedString(3)).toBe("abc")
  })

  it("returns copies from getBytes", () => {
    const source = bytesOf(1, 2, 3, 4)
    const copy = new BinaryReader(source).getBytes(4)
    source[0] = 99
    expect(Array.from(copy)).toEqual([1, 2, 3, 4])
  })

  it("respects the byte offset of a subarray", () => {
    const reader = new BinaryReader(bytesOf(0xff, 0xff, 5, 0, 0, 0).subarray(2))
    expect(reader.byteLength).toBe(4)
    expect(reader.getUint32()).toBe(5)
  })
})
