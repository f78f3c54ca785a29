import { access, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { SERVICE } from '../config.js';
import type { SysfsModuleConfig } from '../settings.js';
import type { PinConfig, PinDirection, PinModule, PinPull } from './types.js';

/**
 * Linux sysfs GPIO (`/sys/class/gpio`). Pins are exported on setup when the
 * kernel has not already exported them, and unexported again on cleanup.
 * Pull resistors cannot be set through sysfs.
 */
export class SysfsPinModule implements PinModule {
  readonly type = 'sysfs';
  readonly name: string;
  private readonly basePath: string;
  private readonly exported = new Set<number>();

  constructor(config: SysfsModuleConfig) {
    this.name = config.name;
    this.basePath = config.base_path;
  }

  private pinPath(pin: number, file?: string): string {
    const dir = path.join(this.basePath, `gpio${pin}`);
    return file ? path.join(dir, file) : dir;
  }

  async setupPin(pin: number, direction: PinDirection, pull: PinPull, _config: PinConfig): Promise<void> {
    if (pull !== 'none') {
      console.warn(`[${SERVICE}] module ${this.name}: pull-${pull} on pin ${pin} is not supported by sysfs; configure it in the device tree`);
    }
    try {
      await access(this.pinPath(pin));
    } catch {
      await writeFile(path.join(this.basePath, 'export'), String(pin));
      this.exported.add(pin);
    }
    await writeFile(this.pinPath(pin, 'direction'), direction === 'input' ? 'in' : 'out');
  }

  async readPin(pin: number): Promise<boolean> {
    const raw = await readFile(this.pinPath(pin, 'value'), 'utf8');
    return raw.trim() === '1';
  }

  async writePin(pin: number, value: boolean): Promise<void> {
    await writeFile(this.pinPath(pin, 'value'), value ? '1' : '0');
  }

  async cleanup(): Promise<void> {
    for (const pin of this.exported) {
      await writeFile(path.join(this.basePath, 'unexport'), String(pin));
    }
    this.exported.clear();
  }
}
