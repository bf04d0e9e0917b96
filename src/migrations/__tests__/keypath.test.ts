import { describe, it, expect } from 'vitest';
import { Keypath, hasKey, navigate } from '../keypath.js';

describe('Keypath', () => {
  it('should split a dotted path into segments', () => {
    const keypath = new Keypath('weather.pregame.enabled');
    expect(keypath.parts).toEqual(['weather', 'pregame', 'enabled']);
    expect(keypath.parents).toEqual(['weather', 'pregame']);
    expect(keypath.leaf).toBe('enabled');
    expect(keypath.toString()).toBe('weather.pregame.enabled');
  });

  it('should treat a single segment as a top-level key', () => {
    const keypath = new Keypath('debug');
    expect(keypath.parents).toEqual([]);
    expect(keypath.leaf).toBe('debug');
  });

  it('should freeze its segments', () => {
    expect(Object.isFrozen(new Keypath('a.b').parts)).toBe(true);
  });
});

describe('navigate', () => {
  const document = {
    weather: { pregame: { enabled: true } },
    teams: ['a', 'b'],
    rate: 15
  };

  it('should return the object at the end of the path', () => {
    expect(navigate(document, ['weather', 'pregame'])).toEqual({ enabled: true });
  });

  it('should return the root for an empty path', () => {
    expect(navigate(document, [])).toBe(document);
  });

  it('should return undefined for a missing segment', () => {
    expect(navigate(document, ['weather', 'postgame'])).toBeUndefined();
  });

  it('should return undefined when a segment holds a non-object', () => {
    expect(navigate(document, ['rate'])).toBeUndefined();
    expect(navigate(document, ['teams'])).toBeUndefined();
  });
});

describe('hasKey', () => {
  it('should only see own properties', () => {
    expect(hasKey({ a: 1 }, 'a')).toBe(true);
    expect(hasKey({ a: 1 }, 'toString')).toBe(false);
  });
});
