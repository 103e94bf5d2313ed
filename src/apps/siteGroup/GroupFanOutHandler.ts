import type { IHandler, HandlerMetadata, HandlerResult, HandlerScope } from '../../core/dispatcher/IHandler.js';
import type { Site } from '../../core/model/Site.js';
import { FanOutHandler } from '../../core/handlers/FanOutHandler.js';
import { SiteProvisionHandler } from './SiteProvisionHandler.js';
import { ProvisionReportHandler } from './ProvisionReportHandler.js';
import { isSite } from './siteSchema.js';

export const SITES_KEY = 'sites';

/**
 * Entry handler of `site_group_provision`: one SiteProvisionHandler per site
 * in `context.sites`, followed by a report once they have all run.
 */
export class GroupFanOutHandler implements IHandler {
  static readonly metadata: HandlerMetadata = {
    name: 'GroupFanOutHandler',
    description: 'Queues a provisioning handler for every site in a group',
  };

  readonly name = GroupFanOutHandler.metadata.name;

  private readonly fanOut = new FanOutHandler<Site>({
    name: this.name,
    source: SITES_KEY,
    accepts: isSite,
    build: (site) => new SiteProvisionHandler(site),
  });

  execute(scope: HandlerScope): HandlerResult {
    const result = this.fanOut.execute(scope);
    if (!result.success) return result;

    const sites = scope.context[SITES_KEY];
    scope.enqueue(new ProvisionReportHandler(Array.isArray(sites) ? sites.length : 0));
    return result;
  }
}
