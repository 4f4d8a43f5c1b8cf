import { extractArtifacts } from '../src/engine/observable.extractor';
import { makeRule } from './helpers';

describe('extractArtifacts', () => {
  const rule = makeRule({
    observable_data_mapping: [
      { ip: 'src_ip' },
      { domain: 'dns.query', tlp: 3, message: 'queried', tags: ['dns'] },
      { tlp: 1 },
    ],
  });

  it('builds one artifact per mapping with defaults and overrides', () => {
    const artifacts = extractArtifacts(rule, { src_ip: '10.0.0.1', dns: { query: 'example.test' } });

    expect(artifacts).toEqual([
      { dataType: 'ip', data: '10.0.0.1', tlp: 2, tags: [], message: null },
      { dataType: 'domain', data: 'example.test', tlp: 3, tags: ['dns'], message: 'queried' },
    ]);
  });

  it('skips mappings whose data resolves to an empty string', () => {
    expect(extractArtifacts(rule, { src_ip: '' })).toEqual([]);
  });

  it('finds the primary key after auxiliary keys', () => {
    const hashes = makeRule({ observable_data_mapping: [{ tlp: 1, hash: 'file.sha256' }] });

    expect(extractArtifacts(hashes, { file: { sha256: 'abc123' } })).toEqual([
      { dataType: 'hash', data: 'abc123', tlp: 1, tags: [], message: null },
    ]);
  });

  it('uses only the first primary key of an entry', () => {
    const doubled = makeRule({ observable_data_mapping: [{ ip: 'a', domain: 'b' }] });

    expect(extractArtifacts(doubled, { a: '1.1.1.1', b: 'example.test' })).toEqual([
      { dataType: 'ip', data: '1.1.1.1', tlp: 2, tags: [], message: null },
    ]);
  });

  it('stringifies non-string values and falls back to rule options', () => {
    const ports = makeRule({
      src_ip: '192.0.2.9',
      observable_data_mapping: [{ other: 'dst_port' }, { ip: 'src_ip' }],
    });

    expect(extractArtifacts(ports, { dst_port: 443 })).toEqual([
      { dataType: 'other', data: '443', tlp: 2, tags: [], message: null },
      { dataType: 'ip', data: '192.0.2.9', tlp: 2, tags: [], message: null },
    ]);
  });

  it('does not share tag arrays between artifacts and the rule', () => {
    const [artifact] = extractArtifacts(rule, { dns: { query: 'example.test' } });
    artifact.tags.push('mutated');

    expect(rule.observableMappings[1].tags).toEqual(['dns']);
  });
});
