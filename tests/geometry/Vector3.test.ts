import { Vector3 } from '../../src/geometry/Vector3';
import { IndexOutOfRangeError } from '../../src/utils/errors';
import logger from '../../src/utils/logger';

jest.mock('../../src/utils/logger', () => ({
  __esModule: true,
  default: { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() },
}));

describe('Vector3', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('construction', () => {
    it('should default to the zero vector', () => {
      expect(new Vector3().toTuple()).toEqual([0, 0, 0]);
      expect(Vector3.zero().toTuple()).toEqual([0, 0, 0]);
    });

    it('should build from scalars, a tuple, a plain object or another vector', () => {
      expect(new Vector3(1, 2, 3).toTuple()).toEqual([1, 2, 3]);
      expect(Vector3.from([4, 5, 6]).toTuple()).toEqual([4, 5, 6]);
      expect(Vector3.from({ x: 7, y: 8, z: 9 }).toTuple()).toEqual([7, 8, 9]);
      expect(Vector3.from(new Vector3(-1, 0.5, 2)).toTuple()).toEqual([-1, 0.5, 2]);
    });

    it('should build from a three-element array-like', () => {
      expect(Vector3.fromArray(Float32Array.of(1, 2, 3)).toTuple()).toEqual([1, 2, 3]);
    });

    it('should reject sequences that do not hold exactly three elements', () => {
      expect(() => Vector3.fromArray([1, 2])).toThrow(IndexOutOfRangeError);
      expect(() => Vector3.fromArray([1, 2, 3, 4])).toThrow('Index 4 is out of range for a vector of length 3');
    });

    it('should produce independent copies', () => {
      const original = new Vector3(1, 2, 3);
      const copy = original.clone();
      copy.set(0, 100);
      expect(original.x).toBe(1);
      expect(copy.x).toBe(100);
    });
  });

  describe('indexed access', () => {
    it('should read the same values as the named accessors', () => {
      const v = new Vector3(1.5, -2, 8);
      expect(v.get(0)).toBe(v.x);
      expect(v.get(1)).toBe(v.y);
      expect(v.get(2)).toBe(v.z);
    });

    it('should write through to the named accessors', () => {
      const v = new Vector3();
      expect(v.set(0, 4).set(1, 5).set(2, 6)).toBe(v);
      expect([v.x, v.y, v.z]).toEqual([4, 5, 6]);
    });

    it.each([3, -1, 1.5, NaN])('should reject index %p', (index) => {
      const v = new Vector3(1, 2, 3);
      expect(() => v.get(index)).toThrow(IndexOutOfRangeError);
      expect(() => v.set(index, 0)).toThrow(IndexOutOfRangeError);
      expect(v.toTuple()).toEqual([1, 2, 3]);
    });

    it('should describe the rejected index in the error', () => {
      try {
        new Vector3().get(5);
        throw new Error('expected get(5) to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(IndexOutOfRangeError);
        expect(error).toMatchObject({ code: 'INDEX_OUT_OF_RANGE', details: { index: 5, length: 3 } });
      }
    });
  });

  describe('assign', () => {
    it('should copy all components and return the receiver', () => {
      const target = new Vector3(1, 2, 3);
      expect(target.assign(new Vector3(4, 5, 6))).toBe(target);
      expect(target.toTuple()).toEqual([4, 5, 6]);
    });

    it('should leave a vector unchanged when assigned to itself', () => {
      const v = new Vector3(1, 2, 3);
      expect(v.assign(v).toTuple()).toEqual([1, 2, 3]);
    });
  });

  describe('arithmetic', () => {
    const a = new Vector3(1, 2, 3);
    const b = new Vector3(4, -5, 0.5);

    it('should compute a commutative dot product', () => {
      expect(a.dot(b)).toBe(-4.5);
      expect(b.dot(a)).toBe(-4.5);
    });

    it('should add, subtract and negate component-wise', () => {
      expect(a.add(b).toTuple()).toEqual([5, -3, 3.5]);
      expect(a.subtract(b).toTuple()).toEqual([-3, 7, 2.5]);
      expect(a.negate().toTuple()).toEqual([-1, -2, -3]);
      expect(a.subtract(a).equals(Vector3.zero())).toBe(true);
    });

    it('should multiply and divide by a scalar', () => {
      expect(a.multiply(2).toTuple()).toEqual([2, 4, 6]);
      expect(new Vector3(2, 4, 6).divide(2).toTuple()).toEqual([1, 2, 3]);
    });

    it('should propagate infinities on division by zero', () => {
      expect(a.divide(0).toTuple()).toEqual([Infinity, Infinity, Infinity]);
    });

    it('should mutate the receiver through compound assignment', () => {
      const v = new Vector3(1, 1, 1);
      const result = v
        .addAssign(new Vector3(1, 2, 3))
        .multiplyAssign(4)
        .subtractAssign(new Vector3(0, 4, 8))
        .divideAssign(2);
      expect(result).toBe(v);
      expect(v.toTuple()).toEqual([4, 4, 4]);
    });
  });

  describe('equality', () => {
    it('should compare with a tolerance on every component', () => {
      const base = new Vector3(1, 2, 3);
      expect(base.equals(new Vector3(1 + 1e-8, 2, 3 - 1e-8))).toBe(true);
      expect(base.equals(new Vector3(1, 2, 3.01))).toBe(false);
      expect(base.notEquals(new Vector3(1, 2, 3.01))).toBe(true);
      expect(base.notEquals(new Vector3(1, 2, 3))).toBe(false);
    });
  });

  describe('length and normalization', () => {
    it('should compute the length', () => {
      const v = new Vector3(1, 2, 2);
      expect(v.lengthSquared()).toBe(9);
      expect(v.length()).toBe(3);
    });

    it('should normalize to unit length', () => {
      const unit = new Vector3(0, 3, 4).normalized();
      expect(unit.x).toBe(0);
      expect(unit.y).toBeCloseTo(0.6, 12);
      expect(unit.z).toBeCloseTo(0.8, 12);
    });

    it('should return a zero vector unchanged from normalized()', () => {
      expect(Vector3.zero().normalized().toTuple()).toEqual([0, 0, 0]);
      expect(Vector3.zero().tryNormalize()).toBeNull();
      expect(logger.debug).toHaveBeenCalledTimes(1);
    });
  });

  describe('cross', () => {
    it('should follow the right-handed convention', () => {
      expect(new Vector3(1, 0, 0).cross(new Vector3(0, 1, 0)).toTuple()).toEqual([0, 0, 1]);
      expect(new Vector3(0, 1, 0).cross(new Vector3(0, 0, 1)).toTuple()).toEqual([1, 0, 0]);
    });

    it('should be orthogonal to both operands', () => {
      const a = new Vector3(1, 2, 3);
      const b = new Vector3(4, 5, 6);
      const c = a.cross(b);
      expect(c.toTuple()).toEqual([-3, 6, -3]);
      expect(c.dot(a)).toBe(0);
      expect(c.dot(b)).toBe(0);
    });
  });

  describe('conversion', () => {
    it('should format as (x,y,z) without spaces', () => {
      expect(new Vector3(1, -2.5, 3).toString()).toBe('(1,-2.5,3)');
    });

    it('should serialize to a plain object', () => {
      expect(new Vector3(1, 2, 3).toJSON()).toEqual({ x: 1, y: 2, z: 3 });
    });
  });
});
