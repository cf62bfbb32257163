import { ExactLocationResolver, FuzzyLocationResolver, similarity } from '../location-resolver';
import { Gazetteer } from '../../gazetteer/gazetteer';

const gazetteer = Gazetteer.build(
  [
    { name: 'Bhubaneswar', subcountry: 'Odisha', country: 'India' },
    { name: 'Shimla', subcountry: 'Himachal Pradesh', country: 'India' }
  ],
  ['name', 'subcountry', 'country']
);

describe('ExactLocationResolver', () => {
  const resolver = new ExactLocationResolver();

  it('should return the sorted candidates found in the gazetteer', () => {
    expect(resolver.resolve(['shimla', 'odisha', 'atlantis'], gazetteer)).toEqual(['odisha', 'shimla']);
  });

  it('should normalize candidates before matching', () => {
    expect(resolver.resolve([' Odisha ', 'ODISHA'], gazetteer)).toEqual(['odisha']);
  });

  it('should fall back to Unknown', () => {
    expect(resolver.resolve(['atlantis'], gazetteer)).toEqual(['Unknown']);
    expect(resolver.resolve([], gazetteer)).toEqual(['Unknown']);
    expect(resolver.resolve(['odisha'], Gazetteer.empty())).toEqual(['Unknown']);
  });
});

describe('FuzzyLocationResolver', () => {
  it('should accept close misspellings', () => {
    const resolver = new FuzzyLocationResolver(0.8);
    // odissa -> odisha: one substitution over six characters
    expect(resolver.resolve(['odissa'], gazetteer)).toEqual(['odisha']);
  });

  it('should keep exact hits and drop distant candidates', () => {
    const resolver = new FuzzyLocationResolver();
    expect(resolver.resolve(['shimla', 'paris'], gazetteer)).toEqual(['shimla']);
    expect(resolver.resolve(['paris'], gazetteer)).toEqual(['Unknown']);
  });

  it('should respect the threshold', () => {
    expect(new FuzzyLocationResolver(0.9).resolve(['odissa'], gazetteer)).toEqual(['Unknown']);
  });

  it('should handle an empty gazetteer', () => {
    expect(new FuzzyLocationResolver().resolve(['odisha'], Gazetteer.empty())).toEqual(['Unknown']);
  });

  it('should reject thresholds outside (0, 1]', () => {
    expect(() => new FuzzyLocationResolver(0)).toThrow(RangeError);
    expect(() => new FuzzyLocationResolver(1.5)).toThrow('Fuzzy threshold must be in (0, 1], got 1.5');
  });
});

describe('similarity', () => {
  it('should scale edit distance by the longer string', () => {
    expect(similarity('odisha', 'odisha')).toBe(1);
    expect(similarity('odissa', 'odisha')).toBeCloseTo(5 / 6);
    expect(similarity('', '')).toBe(1);
  });
});
