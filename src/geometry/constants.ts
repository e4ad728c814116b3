// Machine epsilon of a single-precision float (2^-23).
export const SINGLE_PRECISION_EPSILON = 1.1920928955078125e-7;
