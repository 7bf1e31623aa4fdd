/**
 * CLI Route Command
 *
 * Runs a single routing pass: prepares the next questions for everyone in
 * the directory and flushes them to the gateway.
 */

import type { Services } from '@/services';
import { bold, green, yellow, formatField, formatSeparator } from '../utils/terminal';

export async function runRouteCommand(services: Services): Promise<void> {
  const summary = await services.router.routeMultiple();

  console.log(bold('Routing pass complete'));
  console.log(formatSeparator());
  console.log(formatField('People', summary.people));
  console.log(formatField('Prepared', summary.prepared));
  console.log(formatField('Sent', green(String(summary.sent))));

  if (summary.failed.length > 0) {
    console.log(formatField('Failed', yellow(summary.failed.join(', '))));
  }
  if (summary.undelivered.length > 0) {
    console.log(formatField('Undelivered', yellow(summary.undelivered.join(', '))));
  }
}
