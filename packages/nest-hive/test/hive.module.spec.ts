import 'reflect-metadata';
import { Test } from '@nestjs/testing';
import { HiveModule } from '../src/module/hive.module';
import { HIVE_OPTIONS } from '../src/module/hive.tokens';
import { HiveModuleOptions } from '../src/module/options';
import { HiveRuntime } from '../src/module/runtime';

describe('HiveModule', () => {
  const options: HiveModuleOptions = {
    rule: {
      name: 'module-rule',
      connection: { host: 'https://hive.example.test', apiKey: 'test-key' },
      alert_config: { title: 'From module' },
    },
    logging: false,
  };

  it('provides a runtime built from the registered options', async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [HiveModule.forRoot(options)],
    }).compile();

    const runtime = moduleRef.get(HiveRuntime);
    expect(runtime).toBeInstanceOf(HiveRuntime);
    expect(runtime.describe()).toEqual({ type: 'hivealerter', host: 'https://hive.example.test' });
    expect(runtime.buildAlert([{}]).title).toBe('From module');
    expect(moduleRef.get(HIVE_OPTIONS)).toBe(options);

    await moduleRef.close();
  });
});
