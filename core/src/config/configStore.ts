import upath from "upath";
import debug from "debug";
import type { DumpConfig } from "../types";
import { DEFAULT_CONFIG, loadDumpConfig, saveDumpConfig } from "./dumpConfig";

const log = debug("Hexlines:Config");

/**
 * Process-wide configuration handle. `current()` is what the convenience functions
 * (`hexdump`, `printHexdump`) use; it starts as `DEFAULT_CONFIG` and changes only through
 * `install` and `reset`. Per-directory `.hexlines.json` files are cached separately.
 */
class ConfigStore {
  private installed: DumpConfig = DEFAULT_CONFIG;
  private readonly cache = new Map<string, DumpConfig>();
  private readonly loading = new Map<string, Promise<DumpConfig>>();

  current(): DumpConfig {
    return this.installed;
  }

  install(config: DumpConfig): DumpConfig {
    const previous = this.installed;
    this.installed = config;
    log("Installed default configuration");
    return previous;
  }

  reset(): void {
    this.installed = DEFAULT_CONFIG;
  }

  async load(dir: string): Promise<DumpConfig> {
    const key = this.normalize(dir);
    const cached = this.cache.get(key);
    if (cached) return cached;
    return this.read(key, dir);
  }

  async refresh(dir: string): Promise<DumpConfig> {
    const key = this.normalize(dir);
    this.cache.delete(key);
    return this.read(key, dir);
  }

  async save(dir: string, config: DumpConfig): Promise<void> {
    const key = this.normalize(dir);
    await saveDumpConfig(dir, config);
    this.cache.set(key, config);
  }

  clear(): void {
    this.cache.clear();
    this.loading.clear();
    this.reset();
  }

  private async read(key: string, dir: string): Promise<DumpConfig> {
    const existing = this.loading.get(key);
    if (existing) return existing;

    const promise = loadDumpConfig(dir).then((config) => {
      this.cache.set(key, config);
      this.loading.delete(key);
      return config;
    }).catch((err: unknown) => {
      this.loading.delete(key);
      throw err;
    });

    this.loading.set(key, promise);
    return promise;
  }

  private normalize(dir: string): string {
    return upath.normalizeTrim(upath.resolve(dir));
  }
}

export const configStore = new ConfigStore();
