import { linspace, midpoint, isRelativelyClose } from '../../utils/math';

describe('linspace', () => {
  it('should include both endpoints', () => {
    expect([...linspace(0, 1, 5)]).toEqual([0, 0.25, 0.5, 0.75, 1]);
  });

  it('should end exactly on stop', () => {
    const values = [...linspace(60, 85, 100)];
    expect(values).toHaveLength(100);
    expect(values[0]).toBe(60);
    expect(values[99]).toBe(85);
  });

  it('should repeat the value when start equals stop', () => {
    expect([...linspace(2, 2, 3)]).toEqual([2, 2, 2]);
  });

  it('should yield only start for a single point', () => {
    expect([...linspace(5, 9, 1)]).toEqual([5]);
  });

  it('should yield nothing for a non-positive count', () => {
    expect([...linspace(5, 9, 0)]).toEqual([]);
  });
});

describe('midpoint', () => {
  it('should average two values', () => {
    expect(midpoint(60, 85)).toBe(72.5);
  });
});

describe('isRelativelyClose', () => {
  it('should accept differences within tolerance', () => {
    expect(isRelativelyClose(1, 1 + 1e-12, 1e-9)).toBe(true);
  });

  it('should reject differences beyond tolerance', () => {
    expect(isRelativelyClose(1, 1.001, 1e-9)).toBe(false);
  });

  it('should treat two zeros as close', () => {
    expect(isRelativelyClose(0, 0, 1e-9)).toBe(true);
  });
});
