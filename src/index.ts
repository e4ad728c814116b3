export * from './geometry';
export type { Axis3, EuclideanVector, Vector2Like, Vector2Tuple, Vector3Like, Vector3Tuple } from './types/vector';
export { ConfigurationError, DegenerateVectorError, IndexOutOfRangeError, VectorError } from './utils/errors';
export { config, loadConfig } from './config/env';
export type { Config, LogLevel } from './config/env';
export { default as logger } from './utils/logger';
