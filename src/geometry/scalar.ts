import { config } from '../config/env';

export { SINGLE_PRECISION_EPSILON } from './constants';

export const approximatelyEqual = (a: number, b: number, epsilon: number = config.epsilon): boolean =>
  Math.abs(a - b) < epsilon;

/**
 * Maps the difference of two polar angles, which lies in (-2π, 2π), onto (-π, π].
 */
export const wrapAngle = (angle: number): number => {
  if (angle > Math.PI) return angle - 2 * Math.PI;
  if (angle <= -Math.PI) return angle + 2 * Math.PI;
  return angle;
};
