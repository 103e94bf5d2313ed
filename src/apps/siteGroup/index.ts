import type { HandlerRegistry } from '../../core/dispatcher/handlerRegistry.js';
import { GroupFanOutHandler } from './GroupFanOutHandler.js';

export { GroupFanOutHandler, SITES_KEY } from './GroupFanOutHandler.js';
export { SiteProvisionHandler, PROVISIONED_KEY, provisionedSites } from './SiteProvisionHandler.js';
export { ProvisionReportHandler } from './ProvisionReportHandler.js';

export const SITE_GROUP_PROVISION = 'site_group_provision';

export function registerSiteGroupHandlers(handlers: HandlerRegistry): void {
  handlers.registerHandlerClass(GroupFanOutHandler);
}
