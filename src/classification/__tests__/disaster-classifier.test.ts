import { DisasterClassifier } from '../disaster-classifier';
import { getVocabulary, vocabularyNames } from '../../config/vocabulary';
import { ConfigurationError } from '../../pipeline/errors';

describe('DisasterClassifier', () => {
  const classifier = new DisasterClassifier(getVocabulary('extended'));

  it('should return matched keywords in vocabulary order', () => {
    const result = classifier.classify('Cyclone hits Odisha Officials began evacuation in Odisha state');
    expect(result).toEqual({ isRelevant: true, matchedKeywords: ['cyclone', 'evacuation'] });
  });

  it('should match case-insensitively', () => {
    expect(classifier.classify('EARTHQUAKE rocks the valley').matchedKeywords).toEqual(['earthquake']);
  });

  it('should match substrings without word boundaries', () => {
    expect(classifier.classify('Residents were alerted overnight').matchedKeywords).toEqual(['alert']);
    expect(classifier.classify('Flooding closes roads').matchedKeywords).toEqual(['flood', 'flooding']);
  });

  it('should report irrelevant text', () => {
    expect(classifier.classify('Local bakery wins award')).toEqual({ isRelevant: false, matchedKeywords: [] });
    expect(classifier.classify('')).toEqual({ isRelevant: false, matchedKeywords: [] });
  });

  it('should normalize and dedupe its vocabulary', () => {
    const custom = new DisasterClassifier([' Storm ', 'storm', '', 'HAIL']);
    expect(custom.vocabulary).toEqual(['storm', 'hail']);
    expect(custom.classify('Hailstorm damages crops').matchedKeywords).toEqual(['storm', 'hail']);
  });
});

describe('vocabularies', () => {
  it('should ship the basic and extended lists', () => {
    expect(vocabularyNames()).toEqual(['basic', 'extended']);
    expect(getVocabulary('basic')).toHaveLength(16);
    expect(getVocabulary('extended')).toHaveLength(48);
  });

  it('should reject an unknown vocabulary name', () => {
    expect(() => getVocabulary('volcanic')).toThrow(ConfigurationError);
    expect(() => getVocabulary('volcanic')).toThrow(
      'Invalid configuration: DISASTER_VOCABULARY: unknown vocabulary "volcanic" (available: basic, extended)'
    );
  });
});
