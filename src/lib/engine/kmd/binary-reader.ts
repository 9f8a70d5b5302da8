export class BufferOverrunError extends RangeError {
  constructor(offset: number, length: number, byteLength: number) {
    super(`Offset ${offset} + ${length} exceeds buffer bounds ${byteLength}`)
    this.name = "BufferOverrunError"
  }
}

// Little-endian cursor; every read is checked against the buffer end before touching the view
export class BinaryReader {
  private view: DataView
  private bytes: Uint8Array
  private decoder = new TextDecoder("utf-8")
  private offset = 0

  constructor(source: ArrayBuffer | Uint8Array) {
    // Plain Uint8Array view, so slice() copies even when a Buffer is passed in
    this.bytes =
      source instanceof Uint8Array
        ? new Uint8Array(source.buffer, source.byteOffset, source.byteLength)
        : new Uint8Array(source)
    this.view = new DataView(this.bytes.buffer, this.bytes.byteOffset, this.bytes.byteLength)
  }

  get position(): number {
    return this.offset
  }

  get byteLength(): number {
    return this.view.byteLength
  }

  get remaining(): number {
    return this.view.byteLength - this.offset
  }

  seek(offset: number): this {
    if (offset < 0 || offset > this.view.byteLength) {
      throw new BufferOverrunError(offset, 0, this.view.byteLength)
    }
    this.offset = offset
    return this
  }

  skip(bytes: number): this {
    this.ensure(bytes)
    this.offset += bytes
    return this
  }

  getUint8(): number {
    this.ensure(1)
    const v = this.view.getUint8(this.offset)
    this.offset += 1
    return v
  }

  getUint32(): number {
    this.ensure(4)
    const v = this.view.getUint32(this.offset, true)
    this.offset += 4
    return v
  }

  getFloat32(): number {
    this.ensure(4)
    const v = this.view.getFloat32(this.offset, true)
    this.offset += 4
    return v
  }

  // Fixed-capacity name field: decoded up to the first null byte, or across the whole field if none
  getFixedString(capacity: number): string {
    const raw = this.getBytes(capacity)
    let length = capacity
    for (let i = 0; i < capacity; i++) {
      if (raw[i] === 0) {
        length = i
        break
      }
    }
    return this.decoder.decode(raw.subarray(0, length))
  }

  // Returns a copy, never a view into the source buffer
  getBytes(length: number): Uint8Array {
    this.ensure(length)
    const out = this.bytes.slice(this.offset, this.offset + length)
    this.offset += length
    return out
  }

  private ensure(length: number): void {
    if (length < 0 || this.offset + length > this.view.byteLength) {
      throw new BufferOverrunError(this.offset, length, this.view.byteLength)
    }
  }
}
