import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { EventDescriptor, EventRegistry } from './EventRegistry.js';
import type { HandlerClass } from '../dispatcher/IHandler.js';
import type { HandlerRegistry } from '../dispatcher/handlerRegistry.js';
import type { Logger } from '../../infra/logger/logger.js';
import { HandlerResolutionError, errorMessage } from '../errors.js';

export type ModuleImporter = (specifier: string) => Promise<unknown>;

export interface HandlerModuleLoaderOptions {
  /** Directory descriptor paths are relative to. */
  root: string;
  importer?: ModuleImporter;
  logger?: Logger;
}

const defaultImporter: ModuleImporter = (specifier) => import(specifier);

export function isHandlerClass(value: unknown): value is HandlerClass {
  if (typeof value !== 'function' || !('metadata' in value)) return false;
  const { metadata } = value;
  return typeof metadata === 'object' && metadata !== null && 'name' in metadata && typeof metadata.name === 'string';
}

export function modulePathFor(root: string, descriptor: EventDescriptor): string {
  const dir = (descriptor.path ?? '').replace(/^\/+|\/+$/g, '');
  return resolve(root, dir, `${descriptor.class}.js`);
}

function exportNamed(mod: unknown, name: string): unknown {
  if (typeof mod !== 'object' || mod === null) return undefined;
  return Object.entries(mod).find(([key]) => key === name)?.[1];
}

/**
 * Registers handler classes that registry descriptors locate by `path`.
 * Runs once at startup, before any event is built; descriptors whose class
 * is already in the table are skipped.
 *
 * @returns the class names that were loaded
 */
export async function loadHandlerModules(
  registry: EventRegistry,
  handlers: HandlerRegistry,
  options: HandlerModuleLoaderOptions,
): Promise<string[]> {
  const importer = options.importer ?? defaultImporter;
  const loaded: string[] = [];

  for (const descriptor of registry.events) {
    if (!descriptor.path || handlers.has(descriptor.class)) continue;

    const file = modulePathFor(options.root, descriptor);
    let mod: unknown;
    try {
      mod = await importer(pathToFileURL(file).href);
    } catch (err) {
      throw new HandlerResolutionError(descriptor.class, `failed to import ${file}: ${errorMessage(err)}`);
    }

    const exported = exportNamed(mod, descriptor.class);
    if (!isHandlerClass(exported)) {
      throw new HandlerResolutionError(descriptor.class, `${file} does not export a handler class named ${descriptor.class}`);
    }

    handlers.register(descriptor.class, (d) => new exported(d));
    loaded.push(descriptor.class);
    options.logger?.debug('handler-loader', `Loaded ${descriptor.class} from ${file}`);
  }

  return loaded;
}
