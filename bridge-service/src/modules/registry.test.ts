import { describe, expect, it } from 'vitest';
import { MockPinModule } from './mock.js';
import { createModules } from './registry.js';
import { SysfsPinModule } from './sysfs.js';

describe('createModules', () => {
  it('builds one backend instance per configured module', () => {
    const modules = createModules([
      { name: 'bench', module: 'mock' },
      { name: 'pi', module: 'sysfs', base_path: '/sys/class/gpio' },
    ]);
    expect(Array.from(modules.keys())).toEqual(['bench', 'pi']);
    expect(modules.get('bench')).toBeInstanceOf(MockPinModule);
    expect(modules.get('pi')).toBeInstanceOf(SysfsPinModule);
    expect(modules.get('pi')?.name).toBe('pi');
  });
});
