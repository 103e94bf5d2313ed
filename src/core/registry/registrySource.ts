import { existsSync, readFileSync } from 'node:fs';
import { parse } from 'yaml';
import { EventRegistry } from './EventRegistry.js';
import { loadConfig } from '../../infra/config/config.js';

let cachedRegistry: EventRegistry | null = null;

export function readRegistryFile(filePath: string): EventRegistry {
  if (!existsSync(filePath)) return EventRegistry.empty();
  return EventRegistry.from(parse(readFileSync(filePath, 'utf-8')));
}

/**
 * Process-wide registry, read from `registry.file` on first use.
 */
export function getRegistry(): EventRegistry {
  if (!cachedRegistry) {
    cachedRegistry = readRegistryFile(loadConfig().registry.file);
  }
  return cachedRegistry;
}

export function setRegistry(registry: EventRegistry): void {
  cachedRegistry = registry;
}

export function resetRegistry(): void {
  cachedRegistry = null;
}
