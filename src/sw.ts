/**
 * Service worker entry, bundled to /sw.js
 */

import { bindWorker, createWorkerContext, createWorkerHandlers } from '@/lib/sw/handlers';
import { isServiceWorkerScope } from '@/lib/sw/types';

const scope: unknown = globalThis;

if (isServiceWorkerScope(scope)) {
  bindWorker(scope, createWorkerHandlers(createWorkerContext(scope)));
}
