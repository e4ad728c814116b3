export type Vector2Tuple = [number, number];
export type Vector3Tuple = [number, number, number];

export interface Vector2Like {
  x: number;
  y: number;
}

export interface Vector3Like {
  x: number;
  y: number;
  z: number;
}

// Positions addressable through Vector3.get/set.
export type Axis3 = 0 | 1 | 2;

/**
 * Surface shared by Vector2 and Vector3, used by the free functions in
 * geometry/operations.
 */
export interface EuclideanVector<T> {
  dot(other: T): number;
  multiply(scalar: number): T;
  length(): number;
  lengthSquared(): number;
  tryNormalize(epsilon?: number): T | null;
  toString(): string;
}
