import type { IHandler, HandlerResult, HandlerScope } from '../../core/dispatcher/IHandler.js';
import { provisionedSites } from './SiteProvisionHandler.js';

export class ProvisionReportHandler implements IHandler {
  readonly name = 'ProvisionReportHandler';

  constructor(private readonly expected: number) {}

  execute(scope: HandlerScope): HandlerResult {
    const done = provisionedSites(scope.context).length;
    scope.context.report = { expected: this.expected, provisioned: done };
    return { success: true, message: `Provisioned ${done} of ${this.expected} site(s)` };
  }
}
