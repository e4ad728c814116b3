import { config } from '../config/env';
import { DegenerateVectorError } from '../utils/errors';
import { EuclideanVector } from '../types/vector';
import { Vector2 } from './Vector2';
import { Vector3 } from './Vector3';

// Free-function forms of the vector methods, for callers that read better
// as `abs(v)` or `scale(k, v)`. Each one delegates to a single method.

/** Left-hand scalar multiplication, `scalar * vector`. */
export const scale = <T extends EuclideanVector<T>>(scalar: number, vector: T): T => vector.multiply(scalar);

/** `"(x,y)"` or `"(x,y,z)"`, without spaces. */
export const format = (vector: Vector2 | Vector3): string => vector.toString();

export const abs = <T extends EuclideanVector<T>>(vector: T): number => vector.length();

export const absSq = <T extends EuclideanVector<T>>(vector: T): number => vector.lengthSquared();

export const getLength = <T extends EuclideanVector<T>>(vector: T): number => vector.length();

/**
 * Unit vector in the direction of `vector`.
 *
 * @throws DegenerateVectorError when the length is below `epsilon`.
 */
export const normalize = <T extends EuclideanVector<T>>(vector: T, epsilon: number = config.epsilon): T => {
  const unit = vector.tryNormalize(epsilon);
  if (unit === null) {
    throw new DegenerateVectorError('normalize', vector.length());
  }
  return unit;
};

/** Cosine of the angle between `a` and `b`. NaN when either has zero length. */
export const getCos = <T extends EuclideanVector<T>>(a: T, b: T): number =>
  a.dot(b) / (a.length() * b.length());

/**
 * Determinant of the 2×2 matrix with rows `a` and `b`: the z component of
 * their cross product. Positive when `b` is counter-clockwise from `a`.
 */
export const det = (a: Vector2, b: Vector2): number => a.x * b.y - a.y * b.x;

export const cross = (a: Vector3, b: Vector3): Vector3 => a.cross(b);
