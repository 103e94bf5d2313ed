import type { Site } from '../../core/model/Site.js';
import type { IHandler, HandlerResult, HandlerScope } from '../../core/dispatcher/IHandler.js';

export const PROVISIONED_KEY = 'provisioned';

export function provisionedSites(context: Record<string, unknown>): string[] {
  const value = context[PROVISIONED_KEY];
  return Array.isArray(value) ? value.filter((id): id is string => typeof id === 'string') : [];
}

/**
 * Provisions a single site of a group. Sites without a URL cannot be
 * provisioned and fail this handler only.
 */
export class SiteProvisionHandler implements IHandler {
  readonly name = 'SiteProvisionHandler';

  constructor(readonly site: Site) {}

  execute(scope: HandlerScope): HandlerResult {
    if (!this.site.url) {
      return { success: false, message: `Site ${this.site.id} has no url` };
    }

    scope.context[PROVISIONED_KEY] = [...provisionedSites(scope.context), this.site.id];
    scope.write(`provisioned ${this.site.id} (${this.site.url})`);
    return { success: true, message: `Provisioned ${this.site.id}` };
  }
}
