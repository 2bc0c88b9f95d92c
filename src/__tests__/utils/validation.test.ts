import {
  ComparisonInputsSchema,
  CurveInputsSchema,
  RateRangeSchema,
  parseInputs,
} from '../../utils/validation';
import { InvalidInputError } from '../../utils/errors';
import { defaultCurveInputs, scenarioInputs } from '../fixtures/inputs';

describe('RateRangeSchema', () => {
  it('should validate an ordered range', () => {
    expect(RateRangeSchema.safeParse({ min: 60, max: 85 }).success).toBe(true);
  });

  it('should accept equal bounds', () => {
    expect(RateRangeSchema.safeParse({ min: 72.5, max: 72.5 }).success).toBe(true);
  });

  it('should reject min greater than max', () => {
    expect(RateRangeSchema.safeParse({ min: 85, max: 60 }).success).toBe(false);
  });

  it('should reject non-positive bounds', () => {
    expect(RateRangeSchema.safeParse({ min: 0, max: 85 }).success).toBe(false);
    expect(RateRangeSchema.safeParse({ min: -60, max: 85 }).success).toBe(false);
  });
});

describe('ComparisonInputsSchema', () => {
  it('should validate valid comparison inputs', () => {
    expect(ComparisonInputsSchema.safeParse(scenarioInputs).success).toBe(true);
  });

  it('should accept a zero intermediate→foreign rate', () => {
    const data = { ...scenarioInputs, intermediateToForeignRate: 0 };
    expect(ComparisonInputsSchema.safeParse(data).success).toBe(true);
  });

  it('should reject a missing field', () => {
    const { budget: _budget, ...rest } = scenarioInputs;
    expect(ComparisonInputsSchema.safeParse(rest).success).toBe(false);
  });

  it('should reject strings in place of numbers', () => {
    const invalid = { ...scenarioInputs, directRate: '1.41' };
    expect(ComparisonInputsSchema.safeParse(invalid).success).toBe(false);
  });
});

describe('CurveInputsSchema', () => {
  it('should validate valid curve inputs', () => {
    expect(CurveInputsSchema.safeParse(defaultCurveInputs).success).toBe(true);
  });

  it('should reject a reversed range', () => {
    const invalid = { ...defaultCurveInputs, rateRange: { min: 85, max: 60 } };
    expect(CurveInputsSchema.safeParse(invalid).success).toBe(false);
  });
});

describe('parseInputs', () => {
  it('should return the parsed data without unknown keys', () => {
    const parsed = parseInputs(CurveInputsSchema, { ...defaultCurveInputs, currency: 'XYZ' });
    expect(parsed).toEqual(defaultCurveInputs);
  });

  it('should throw InvalidInputError with one issue per failure', () => {
    const invalid = { ...scenarioInputs, budget: undefined, homeToIntermediateRate: Infinity };
    try {
      parseInputs(ComparisonInputsSchema, invalid);
      throw new Error('expected parseInputs to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError);
      if (error instanceof InvalidInputError) {
        expect(error.name).toBe('InvalidInputError');
        expect(error.issues).toEqual([
          'budget: is required',
          'homeToIntermediateRate: must be finite',
        ]);
      }
    }
  });

  it('should name the input itself when it is not an object', () => {
    try {
      parseInputs(CurveInputsSchema, null);
      throw new Error('expected parseInputs to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError);
      if (error instanceof InvalidInputError) {
        expect(error.issues).toEqual(['input: Expected object, received null']);
      }
    }
  });
});
