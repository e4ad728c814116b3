export class VectorError extends Error {
    public code: string;
    public details?: Record<string, unknown>;

    constructor(message: string, code: string, details?: Record<string, unknown>) {
      super(message);
      this.code = code;
      this.details = details;
      this.name = 'VectorError';
    }
  }

  export class IndexOutOfRangeError extends VectorError {
    constructor(index: number, length: number) {
      super(`Index ${index} is out of range for a vector of length ${length}`, 'INDEX_OUT_OF_RANGE', { index, length });
      this.name = 'IndexOutOfRangeError';
    }
  }

  export class DegenerateVectorError extends VectorError {
    constructor(operation: string, length: number) {
      super(`Cannot ${operation} a vector of length ${length}`, 'DEGENERATE_VECTOR', { operation, length });
      this.name = 'DegenerateVectorError';
    }
  }

  export class ConfigurationError extends VectorError {
    constructor(key: string, value: string) {
      super(`Invalid value "${value}" for ${key}`, 'INVALID_CONFIGURATION', { key, value });
      this.name = 'ConfigurationError';
    }
  }
