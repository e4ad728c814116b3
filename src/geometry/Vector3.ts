import logger from '../utils/logger';
import { config } from '../config/env';
import { IndexOutOfRangeError } from '../utils/errors';
import { Axis3, EuclideanVector, Vector3Like, Vector3Tuple } from '../types/vector';
import { approximatelyEqual } from './scalar';

const isAxis3 = (index: number): index is Axis3 => index === 0 || index === 1 || index === 2;

const checkAxis = (index: number): Axis3 => {
  if (!isAxis3(index)) {
    throw new IndexOutOfRangeError(index, 3);
  }
  return index;
};

export class Vector3 implements EuclideanVector<Vector3> {
  private readonly values: Vector3Tuple;

  constructor(x = 0, y = 0, z = 0) {
    this.values = [x, y, z];
  }

  static zero(): Vector3 {
    return new Vector3(0, 0, 0);
  }

  static from(value: Vector3Like | Readonly<Vector3Tuple>): Vector3 {
    if ('x' in value) {
      return new Vector3(value.x, value.y, value.z);
    }
    return new Vector3(value[0], value[1], value[2]);
  }

  /**
   * Builds a vector from an unchecked numeric sequence, such as a row read
   * from a Float32Array. Throws IndexOutOfRangeError unless it has exactly
   * three elements.
   */
  static fromArray(values: ArrayLike<number>): Vector3 {
    if (values.length !== 3) {
      throw new IndexOutOfRangeError(values.length, 3);
    }
    return new Vector3(values[0], values[1], values[2]);
  }

  get x(): number { return this.values[0]; }
  get y(): number { return this.values[1]; }
  get z(): number { return this.values[2]; }

  get(index: number): number {
    return this.values[checkAxis(index)];
  }

  set(index: number, value: number): this {
    this.values[checkAxis(index)] = value;
    return this;
  }

  clone(): Vector3 { return Vector3.from(this.values); }

  assign(other: Vector3): this {
    if (other === this) return this;
    this.values[0] = other.x;
    this.values[1] = other.y;
    this.values[2] = other.z;
    return this;
  }

  // ---------- non-mutating arithmetic ----------
  negate(): Vector3 {
    const [x, y, z] = this.values;
    return new Vector3(-x, -y, -z);
  }

  dot(other: Vector3): number {
    const [x, y, z] = this.values;
    return x * other.x + y * other.y + z * other.z;
  }

  multiply(scalar: number): Vector3 {
    const [x, y, z] = this.values;
    return new Vector3(x * scalar, y * scalar, z * scalar);
  }

  divide(scalar: number): Vector3 {
    return this.multiply(1 / scalar);
  }

  add(other: Vector3): Vector3 {
    const [x, y, z] = this.values;
    return new Vector3(x + other.x, y + other.y, z + other.z);
  }

  subtract(other: Vector3): Vector3 {
    const [x, y, z] = this.values;
    return new Vector3(x - other.x, y - other.y, z - other.z);
  }

  /** Right-handed cross product `this × other`. */
  cross(other: Vector3): Vector3 {
    const [x, y, z] = this.values;
    return new Vector3(
      y * other.z - z * other.y,
      z * other.x - x * other.z,
      x * other.y - y * other.x,
    );
  }

  // ---------- mutating (compound assignment) ----------
  multiplyAssign(scalar: number): this {
    this.values[0] *= scalar;
    this.values[1] *= scalar;
    this.values[2] *= scalar;
    return this;
  }

  divideAssign(scalar: number): this {
    return this.multiplyAssign(1 / scalar);
  }

  addAssign(other: Vector3): this {
    this.values[0] += other.x;
    this.values[1] += other.y;
    this.values[2] += other.z;
    return this;
  }

  subtractAssign(other: Vector3): this {
    this.values[0] -= other.x;
    this.values[1] -= other.y;
    this.values[2] -= other.z;
    return this;
  }

  // ---------- comparison ----------
  equals(other: Vector3, epsilon: number = config.epsilon): boolean {
    return (
      approximatelyEqual(this.values[0], other.x, epsilon) &&
      approximatelyEqual(this.values[1], other.y, epsilon) &&
      approximatelyEqual(this.values[2], other.z, epsilon)
    );
  }

  notEquals(other: Vector3, epsilon: number = config.epsilon): boolean {
    return !this.equals(other, epsilon);
  }

  // ---------- geometry ----------
  lengthSquared(): number { return this.dot(this); }
  length(): number        { return Math.sqrt(this.lengthSquared()); }

  tryNormalize(epsilon: number = config.epsilon): Vector3 | null {
    const length = this.length();
    if (length < epsilon) return null;
    return this.divide(length);
  }

  normalized(epsilon: number = config.epsilon): Vector3 {
    const unit = this.tryNormalize(epsilon);
    if (unit === null) {
      logger.debug(`Vector3.normalized: length of ${this.toString()} is below ${epsilon}, returning it unchanged`);
      return this.clone();
    }
    return unit;
  }

  // ---------- conversion ----------
  toTuple(): Vector3Tuple { return [this.values[0], this.values[1], this.values[2]]; }
  toJSON(): Vector3Like   { return { x: this.values[0], y: this.values[1], z: this.values[2] }; }
  toString(): string      { return `(${this.values[0]},${this.values[1]},${this.values[2]})`; }
}
