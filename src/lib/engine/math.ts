const EPSILON_SQ = 1e-16;

export class Vec3 {
  x: number;
  y: number;
  z: number;

  // Значения сохраняются как есть (включая -0 и NaN), без подмены на 0
  constructor(x?: number, y?: number, z?: number) {
    this.x = x ?? 0;
    this.y = y ?? 0;
    this.z = z ?? 0;
  }

  static fromArray(values: ArrayLike<number>, offset = 0): Vec3 {
    return new Vec3(values[offset], values[offset + 1], values[offset + 2]);
  }

  clone(): Vec3 {
    return new Vec3(this.x, this.y, this.z);
  }

  scale(factor: number): this {
    this.x *= factor;
    this.y *= factor;
    this.z *= factor;
    return this;
  }

  every(predicate: (component: number) => boolean): boolean {
    return predicate(this.x) && predicate(this.y) && predicate(this.z);
  }

  toArray(): [number, number, number] {
    return [this.x, this.y, this.z];
  }
}

export class Quat {
  x: number;
  y: number;
  z: number;
  w: number;

  constructor(x?: number, y?: number, z?: number, w?: number) {
    this.x = x ?? 0;
    this.y = y ?? 0;
    this.z = z ?? 0;
    this.w = w ?? 0;
  }

  static identity(): Quat {
    return new Quat(0, 0, 0, 1);
  }

  length(): number {
    const x = this.x, y = this.y, z = this.z, w = this.w;
    return Math.sqrt(x * x + y * y + z * z + w * w);
  }

  // Returns identity for a zero-length quaternion
  normalize(): this {
    const x = this.x, y = this.y, z = this.z, w = this.w;
    const lenSq = x * x + y * y + z * z + w * w;

    if (lenSq > EPSILON_SQ) {
      const invLen = 1 / Math.sqrt(lenSq);
      this.x = x * invLen;
      this.y = y * invLen;
      this.z = z * invLen;
      this.w = w * invLen;
    } else {
      this.x = this.y = this.z = 0;
      this.w = 1;
    }
    return this;
  }

  isNormalized(tolerance = 1e-3): boolean {
    return Math.abs(this.length() - 1) <= tolerance;
  }

  toArray(): [number, number, number, number] {
    return [this.x, this.y, this.z, this.w];
  }
}
