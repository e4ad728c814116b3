import logger from '../utils/logger';
import { config } from '../config/env';
import { EuclideanVector, Vector2Like, Vector2Tuple } from '../types/vector';
import { approximatelyEqual, wrapAngle } from './scalar';

/**
 * Two-dimensional vector used for agent positions, velocities and forces.
 *
 * Arithmetic returns new instances. The `*Assign` methods and `assign` are the
 * only ones that mutate the receiver.
 */
export class Vector2 implements EuclideanVector<Vector2> {
  private _x: number;
  private _y: number;

  constructor(x = 0, y = 0) {
    this._x = x;
    this._y = y;
  }

  static zero(): Vector2 {
    return new Vector2(0, 0);
  }

  static from(value: Vector2Like | Readonly<Vector2Tuple>): Vector2 {
    if ('x' in value) {
      return new Vector2(value.x, value.y);
    }
    return new Vector2(value[0], value[1]);
  }

  get x(): number { return this._x; }
  get y(): number { return this._y; }

  clone(): Vector2 { return new Vector2(this._x, this._y); }

  assign(other: Vector2): this {
    if (other === this) return this;
    this._x = other.x;
    this._y = other.y;
    return this;
  }

  // ---------- non-mutating arithmetic ----------
  negate(): Vector2                { return new Vector2(-this._x, -this._y); }
  dot(other: Vector2): number      { return this._x * other.x + this._y * other.y; }
  multiply(scalar: number): Vector2 { return new Vector2(this._x * scalar, this._y * scalar); }
  add(other: Vector2): Vector2      { return new Vector2(this._x + other.x, this._y + other.y); }
  subtract(other: Vector2): Vector2 { return new Vector2(this._x - other.x, this._y - other.y); }

  divide(scalar: number): Vector2 {
    const inverse = 1 / scalar;
    return new Vector2(this._x * inverse, this._y * inverse);
  }

  // ---------- mutating (compound assignment) ----------
  multiplyAssign(scalar: number): this { this._x *= scalar;  this._y *= scalar;  return this; }
  addAssign(other: Vector2): this      { this._x += other.x; this._y += other.y; return this; }
  subtractAssign(other: Vector2): this { this._x -= other.x; this._y -= other.y; return this; }

  divideAssign(scalar: number): this {
    const inverse = 1 / scalar;
    this._x *= inverse;
    this._y *= inverse;
    return this;
  }

  // ---------- comparison ----------
  equals(other: Vector2, epsilon: number = config.epsilon): boolean {
    return approximatelyEqual(this._x, other.x, epsilon) && approximatelyEqual(this._y, other.y, epsilon);
  }

  notEquals(other: Vector2, epsilon: number = config.epsilon): boolean {
    return !this.equals(other, epsilon);
  }

  // ---------- geometry ----------
  lengthSquared(): number { return this._x * this._x + this._y * this._y; }
  length(): number        { return Math.sqrt(this.lengthSquared()); }

  /** Unit-length copy, or null when the length is below `epsilon`. */
  tryNormalize(epsilon: number = config.epsilon): Vector2 | null {
    const length = this.length();
    if (length < epsilon) return null;
    return this.divide(length);
  }

  /**
   * Unit-length copy. A vector shorter than `epsilon` comes back as an
   * unchanged copy, so the result is not guaranteed to have unit length.
   */
  normalized(epsilon: number = config.epsilon): Vector2 {
    const unit = this.tryNormalize(epsilon);
    if (unit === null) {
      logger.debug(`Vector2.normalized: length of ${this.toString()} is below ${epsilon}, returning it unchanged`);
      return this.clone();
    }
    return unit;
  }

  /** Angle from the positive x-axis in radians, in (-π, π]. */
  polarAngle(): number {
    return Math.atan2(this._y, this._x);
  }

  /** Signed rotation from this vector to `other`, in (-π, π]. Positive is counter-clockwise. */
  angleTo(other: Vector2): number {
    return wrapAngle(other.polarAngle() - this.polarAngle());
  }

  // Rotated 90° counter-clockwise.
  leftNormal(): Vector2 {
    return new Vector2(-this._y, this._x);
  }

  // ---------- conversion ----------
  toTuple(): Vector2Tuple { return [this._x, this._y]; }
  toJSON(): Vector2Like   { return { x: this._x, y: this._y }; }
  toString(): string      { return `(${this._x},${this._y})`; }
}
