import type { IHandler, HandlerClass } from './IHandler.js';
import type { EventDescriptor } from '../registry/EventRegistry.js';
import type { Logger } from '../../infra/logger/logger.js';
import { HandlerResolutionError } from '../errors.js';

export type HandlerFactory = (descriptor: EventDescriptor) => IHandler;

/**
 * Handler factory table, keyed by the class name registry descriptors use.
 * Built once at startup; events resolve their descriptors against it.
 */
export class HandlerRegistry {
	private handlers: Map<string, HandlerFactory> = new Map();

	constructor(private logger?: Logger) {}

	public register(name: string, factory: HandlerFactory): void {
		if (this.handlers.has(name)) {
			this.logger?.warn('handler-registry', `Handler already registered: ${name}, overwriting`);
		}
		this.handlers.set(name, factory);
	}

	public registerHandlerClass(handlerClass: HandlerClass): void {
		this.register(handlerClass.metadata.name, (descriptor) => new handlerClass(descriptor));
	}

	public get(name: string): HandlerFactory | undefined {
		return this.handlers.get(name);
	}

	public has(name: string): boolean {
		return this.handlers.has(name);
	}

	/**
	 * Build a fresh handler for a descriptor.
	 * @throws HandlerResolutionError when no factory is registered under its class
	 */
	public resolve(descriptor: EventDescriptor): IHandler {
		const factory = this.handlers.get(descriptor.class);
		if (!factory) {
			const where = descriptor.path ? ` (path: ${descriptor.path})` : '';
			throw new HandlerResolutionError(descriptor.class, `no factory registered${where}`);
		}
		return factory(descriptor);
	}

	public getAll(): Map<string, HandlerFactory> {
		return new Map(this.handlers);
	}

	public clear(): void {
		this.handlers.clear();
	}

	public deregister(name: string): boolean {
		return this.handlers.delete(name);
	}
}
