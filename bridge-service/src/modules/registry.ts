import type { ModuleConfig } from '../settings.js';
import { MockPinModule } from './mock.js';
import { SysfsPinModule } from './sysfs.js';
import type { PinModule } from './types.js';

type BackendFactories = {
  [K in ModuleConfig['module']]: (config: Extract<ModuleConfig, { module: K }>) => PinModule;
};

export const BACKENDS: BackendFactories = {
  mock: (config) => MockPinModule.fromConfig(config),
  sysfs: (config) => new SysfsPinModule(config),
};

export function createModule(config: ModuleConfig): PinModule {
  switch (config.module) {
    case 'mock': return BACKENDS.mock(config);
    case 'sysfs': return BACKENDS.sysfs(config);
  }
}

/** One instance per configured module, keyed by module name. */
export function createModules(configs: ModuleConfig[]): Map<string, PinModule> {
  const modules = new Map<string, PinModule>();
  for (const config of configs) {
    modules.set(config.name, createModule(config));
  }
  return modules;
}

export type { PinModule, PinDirection, PinPull, PinConfig } from './types.js';
