import { describe, it, expect } from 'vitest';
import path from 'path';
import { ConfigError, ProvisionConfigSchema } from '@provisioner/shared';
import { WorkingArea } from '../workspace/working-area';
import { buildPlan } from './plan';

const base = {
  artifacts: {
    framework: { url: 'https://downloads.test/a.appx' },
    uiFramework: { url: 'https://downloads.test/b.appx' },
    packageManager: { url: 'https://downloads.test/c.msixbundle' },
  },
  configuration: { url: 'https://downloads.test/config.yaml' },
};

describe('buildPlan', () => {
  const area = new WorkingArea('/tmp', 'plan-test');

  it('lists bootstrap artifacts in registration order', () => {
    const plan = buildPlan(ProvisionConfigSchema.parse(base), area);

    expect(plan.bootstrap.map((a) => a.name)).toEqual(['framework', 'uiFramework', 'packageManager']);
    expect(plan.bootstrap[0]).toEqual({
      name: 'framework',
      url: 'https://downloads.test/a.appx',
      destination: path.join(area.path, 'Microsoft.VCLibs.x64.14.00.Desktop.appx'),
    });
    expect(plan.configuration.destination).toBe(path.join(area.path, 'configuration.dsc.yaml'));
  });

  it('freezes the artifact list', () => {
    const plan = buildPlan(ProvisionConfigSchema.parse(base), area);

    expect(Object.isFrozen(plan.bootstrap)).toBe(true);
    expect(Object.isFrozen(plan.configuration)).toBe(true);
  });

  it('rejects two artifacts with the same destination, ignoring case', () => {
    const config = ProvisionConfigSchema.parse({
      ...base,
      artifacts: {
        ...base.artifacts,
        uiFramework: { url: 'https://downloads.test/b.appx', fileName: 'PKG.appx' },
        packageManager: { url: 'https://downloads.test/c.msixbundle', fileName: 'pkg.appx' },
      },
    });

    expect(() => buildPlan(config, area)).toThrow(ConfigError);
    expect(() => buildPlan(config, area)).toThrow(/"uiFramework" and "packageManager"/);
  });
});
