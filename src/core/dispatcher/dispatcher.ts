import type { HandlerResult, HandlerScope } from './IHandler.js';
import type { PlatformEvent } from '../event/PlatformEvent.js';
import type { TrackedHandler } from '../event/TrackedHandler.js';
import type { Logger } from '../../infra/logger/logger.js';
import { z } from 'zod';
import { DispatchError, HandlerLimitExceededError, errorMessage } from '../errors.js';

export type MiddlewareFunc = (
	handler: TrackedHandler,
	scope: HandlerScope,
	next: () => Promise<HandlerResult>,
) => Promise<HandlerResult>;

export interface DispatcherOptions {
	/** Stop after the first failed handler, leaving the rest queued. */
	stopOnFailure?: boolean;
	/** Executions allowed per dispatch before it aborts. */
	maxHandlers?: number;
	now?: () => number;
}

export interface DispatchSummary {
	type: string;
	executed: number;
	complete: number;
	failed: number;
	/** Handlers left in the incomplete bucket. */
	pending: number;
	/** True when stopOnFailure ended the run early. */
	stopped: boolean;
}

export const DEFAULT_MAX_HANDLERS = 1000;

const HandlerResultSchema = z.object({
	success: z.boolean(),
	message: z.string(),
});

/**
 * Handlers loaded by path are untyped at run time; anything that is not a
 * result counts as a failure of that handler.
 */
export function checkResult(raw: unknown): HandlerResult {
	const parsed = HandlerResultSchema.safeParse(raw);
	if (parsed.success) return parsed.data;
	return { success: false, message: 'Handler returned an invalid result' };
}

export class Dispatcher {
	private middleware: MiddlewareFunc[] = [];
	private logger: Logger;
	private readonly stopOnFailure: boolean;
	private readonly maxHandlers: number;
	private readonly now: () => number;

	constructor(logger: Logger, options: DispatcherOptions = {}) {
		this.logger = logger;
		this.stopOnFailure = options.stopOnFailure ?? false;
		this.maxHandlers = options.maxHandlers ?? DEFAULT_MAX_HANDLERS;
		this.now = options.now ?? Date.now;
	}

	public use(middleware: MiddlewareFunc): void {
		this.middleware.push(middleware);
	}

	/**
	 * Drains the event's incomplete bucket, one handler at a time. The bucket
	 * is re-read after every handler, so handlers queued during the run are
	 * executed by this same call.
	 *
	 * @throws DispatchError raised by a handler, or when maxHandlers is exceeded.
	 *   The handler that raised it is filed into failed; handlers still queued
	 *   stay in the incomplete bucket.
	 * @throws DispatchInProgressError if the event is already being dispatched
	 */
	public async dispatch(event: PlatformEvent): Promise<DispatchSummary> {
		event.beginDispatch();
		try {
			return await this.drain(event);
		} finally {
			event.endDispatch();
		}
	}

	private async drain(event: PlatformEvent): Promise<DispatchSummary> {
		const scope = event.scope();
		let executed = 0;
		let stopped = false;

		this.logger.debug('dispatcher', `Dispatching ${event.count('incomplete')} handler(s) for ${event.type}`);

		while (event.count('incomplete') > 0) {
			if (executed >= this.maxHandlers) {
				const err = new HandlerLimitExceededError(this.maxHandlers);
				this.logger.error('dispatcher', `${event.type}: ${err.message}`);
				throw err;
			}

			const tracked = event.popHandler('incomplete');
			if (!tracked) break;

			tracked.markStarted(this.now());
			let result: HandlerResult;
			try {
				result = await this.executeHandler(tracked, scope);
			} catch (err) {
				tracked.markCompleted({ success: false, message: errorMessage(err) }, this.now());
				event.pushHandler(tracked, 'failed');
				event.write(`[failed] ${tracked.name}: ${tracked.message}`);
				throw err;
			}
			tracked.markCompleted(result, this.now());
			executed++;

			const bucket = result.success ? 'complete' : 'failed';
			event.pushHandler(tracked, bucket);
			event.write(`[${bucket}] ${tracked.name}: ${result.message}`);

			if (!result.success && this.stopOnFailure) {
				this.logger.warn('dispatcher', `${event.type}: stopping after failure of ${tracked.name}`);
				stopped = true;
				break;
			}
		}

		const summary: DispatchSummary = {
			type: event.type,
			executed,
			complete: event.count('complete'),
			failed: event.count('failed'),
			pending: event.count('incomplete'),
			stopped,
		};
		this.logger.debug(
			'dispatcher',
			`${event.type}: executed ${executed}, complete ${summary.complete}, failed ${summary.failed}, pending ${summary.pending}`,
		);
		return summary;
	}

	private async executeHandler(tracked: TrackedHandler, scope: HandlerScope): Promise<HandlerResult> {
		try {
			const result = await this.runMiddlewareChain(tracked, scope, async () =>
				checkResult(await tracked.handler.execute(scope)),
			);
			return checkResult(result);
		} catch (err) {
			if (err instanceof DispatchError) {
				this.logger.error('dispatcher', `${tracked.name} aborted the run: ${err.message}`);
				throw err;
			}
			const message = errorMessage(err);
			this.logger.warn('dispatcher', `${tracked.name} threw: ${message}`);
			return { success: false, message };
		}
	}

	private async runMiddlewareChain(
		tracked: TrackedHandler,
		scope: HandlerScope,
		final: () => Promise<HandlerResult>,
	): Promise<HandlerResult> {
		const middleware = this.middleware;
		if (middleware.length === 0) return final();

		let index = -1;
		const dispatch = async (i: number): Promise<HandlerResult> => {
			if (i <= index) {
				throw new Error('next() called multiple times');
			}
			index = i;

			if (i === middleware.length) {
				return final();
			}
			return middleware[i](tracked, scope, () => dispatch(i + 1));
		};

		return dispatch(0);
	}
}
