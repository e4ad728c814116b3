export { Vector2 } from './Vector2';
export { Vector3 } from './Vector3';
export { SINGLE_PRECISION_EPSILON, approximatelyEqual, wrapAngle } from './scalar';
export { abs, absSq, cross, det, format, getCos, getLength, normalize, scale } from './operations';
