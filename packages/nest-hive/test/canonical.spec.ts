import { canonicalJson } from '../src/utils/canonical';

describe('canonicalJson', () => {
  it('sorts keys at every level without whitespace', () => {
    expect(canonicalJson({ b: { d: 1, c: [2, { z: true, a: null }] }, a: 'x' })).toBe(
      '{"a":"x","b":{"c":[2,{"a":null,"z":true}],"d":1}}',
    );
  });

  it('skips undefined members', () => {
    expect(canonicalJson({ a: 1, b: undefined })).toBe('{"a":1}');
  });

  it('writes non-finite numbers as null', () => {
    expect(canonicalJson([Number.NaN, 1.5])).toBe('[null,1.5]');
  });
});
