import { defaultBatchSummaryRenderer } from '../src/alerts/template.renderer';
import { AssembleContext, assembleAlert } from '../src/engine/alert.assembler';
import { makeRule } from './helpers';

function fixedContext(ids: string[] = ['id-1']): AssembleContext {
  let next = 0;
  return {
    renderer: defaultBatchSummaryRenderer,
    now: () => 1700000000999,
    generateId: () => ids[next++] ?? `id-${next}`,
  };
}

describe('assembleAlert', () => {
  const rule = makeRule({
    name: 'Suspicious login',
    environment: 'prod',
    alert_config: {
      title: 'Login from {0}',
      title_args: ['src_ip'],
      description: 'User {0} in {1}',
      description_args: ['user', 'environment'],
      type: 'external',
      source: 'siem-{0}',
      source_args: ['sensor'],
      severity: 2,
      caseTemplate: 'login-template',
      tags: ['auth', 'category'],
      customFields: [
        { name: 'user', type: 'string', value: 'user' },
        { name: 'score', type: 'integer', value: 10 },
      ],
      ticketRef: 'carried',
    },
    observable_data_mapping: [{ ip: 'src_ip' }],
  });

  const matches = [
    { src_ip: '1.2.3.4', user: 'alice', category: 'bruteforce', sensor: 's1' },
    { src_ip: '1.2.3.4', user: 'bob', category: ['bruteforce', 'vpn'] },
  ];

  it('aggregates the whole batch and templates from the first match', () => {
    const payload = assembleAlert(matches, rule, fixedContext());

    expect(payload).toEqual({
      ticketRef: 'carried',
      title: 'Login from 1.2.3.4',
      description: 'User alice in prod',
      date: 1700000000000,
      sourceRef: 'id-1',
      artifacts: [
        { dataType: 'ip', data: '1.2.3.4', tlp: 2, tags: [], message: null },
        { dataType: 'ip', data: '1.2.3.4', tlp: 2, tags: [], message: null },
      ],
      customFields: {
        user: { order: 0, string: 'alice' },
        score: { order: 1, integer: 10 },
      },
      tags: ['auth', 'bruteforce', 'vpn'],
      type: 'external',
      source: 'siem-s1',
      severity: 2,
      caseTemplate: 'login-template',
    });
  });

  it('drops _args keys but carries _missing_value keys into the payload', () => {
    const marked = makeRule({
      alert_config: { title: 'Seen on {0}', title_args: ['host'], title_missing_value: 'n/a' },
    });
    const payload = assembleAlert([{}], marked, fixedContext());

    expect(payload.title).toBe('Seen on n/a');
    expect(payload.title_missing_value).toBe('n/a');
    expect(Object.keys(payload).filter((key) => key.endsWith('_args'))).toEqual([]);
  });

  it('layers a configured date over the generated one', () => {
    const dated = makeRule({ alert_config: { date: 1600000000000 } });

    expect(assembleAlert([{}], dated, fixedContext()).date).toBe(1600000000000);
  });

  it('replaces configured artifacts with the extracted ones', () => {
    const withArtifacts = makeRule({
      alert_config: { artifacts: [{ dataType: 'stale', data: 'x' }] },
      observable_data_mapping: [{ ip: 'ip' }],
    });

    expect(assembleAlert([{ ip: '10.0.0.5' }], withArtifacts, fixedContext()).artifacts).toEqual([
      { dataType: 'ip', data: '10.0.0.5', tlp: 2, tags: [], message: null },
    ]);
  });

  it('skips custom fields and templating for an empty batch', () => {
    const payload = assembleAlert([], rule, fixedContext());

    expect(payload.title).toBe('Login from {0}');
    expect(payload.source).toBe('siem-{0}');
    expect(payload.customFields).toEqual({});
    expect(payload.artifacts).toEqual([]);
    expect(payload.tags).toEqual([]);
  });

  it('renders default title and description from the batch', () => {
    const plain = makeRule({ name: 'Rule A' });
    const payload = assembleAlert([{ host: 'srv1', count: 3 }, { host: 'srv2' }], plain, fixedContext());

    expect(payload.title).toBe('Rule A');
    expect(payload.description).toBe(
      `Rule A\n\nhost: srv1\ncount: 3\n${'-'.repeat(40)}\nRule A\n\nhost: srv2`,
    );
  });

  it('uses alert_subject as the default title', () => {
    const subject = makeRule({ name: 'Rule A', alert_subject: 'Login burst' });

    expect(assembleAlert([{}], subject, fixedContext()).title).toBe('Login burst');
  });

  it('keeps two identical artifacts from two matches', () => {
    const ips = makeRule({ observable_data_mapping: [{ ip: 'ip' }] });
    const payload = assembleAlert([{ ip: '1.2.3.4' }, { ip: '1.2.3.4' }], ips, fixedContext());

    expect(payload.artifacts).toHaveLength(2);
    expect(payload.artifacts.every((artifact) => artifact.dataType === 'ip' && artifact.data === '1.2.3.4')).toBe(true);
  });

  it('differs only in date and sourceRef between runs on identical input', () => {
    let clock = 1700000000000;
    let counter = 0;
    const context: AssembleContext = {
      renderer: defaultBatchSummaryRenderer,
      now: () => (clock += 1000),
      generateId: () => `ref-${++counter}`,
    };

    const first = assembleAlert(matches, rule, context);
    const second = assembleAlert(matches, rule, context);

    expect(second.sourceRef).not.toBe(first.sourceRef);
    expect(second.date).not.toBe(first.date);
    expect({ ...second, date: 0, sourceRef: '' }).toEqual({ ...first, date: 0, sourceRef: '' });
  });
});
