import type { Check, CanRunResult } from './types.js';
import { RUNNABLE, cannotRun } from './types.js';
import { ResultRecorder, describeError, type DiagnosticResult } from './result.js';
import { guard, type ClusterClient } from '../cluster/client-interface.js';

export const CLUSTER_REGISTRY_CHECK_NAME = 'ClusterRegistry';

const REGISTRY_NAME = 'docker-registry';
const REGISTRY_NAMESPACE = 'default';

const clGetRegNone = `
There is no "%s" service in project "%s". This is not strictly required,
but builds that push images to the integrated registry will fail without it.
The registry may also have been named something different, in which case
this warning may be ignored.`;

const clGetRegFailed = `
Client error while retrieving the "%s" service. Client retrieved records
before, so this is likely to be a transient error. Try running diagnostics
again. If this message persists, there may be a permissions problem with
getting records. The error was:

%s`;

/** Checks that the integrated image registry service exists. */
export class ClusterRegistryCheck implements Check {
  readonly name = CLUSTER_REGISTRY_CHECK_NAME;
  readonly description = 'Check there is a registry service';

  constructor(private client: ClusterClient | undefined) {}

  async canRun(): Promise<CanRunResult> {
    const client = this.client;
    if (!client) {
      return cannotRun('clGetRegistryFailed', 'must have a cluster client');
    }

    const review = await guard(() => client.reviewAccess({
      namespace: REGISTRY_NAMESPACE,
      verb: 'get',
      resource: 'services',
      name: REGISTRY_NAME,
    }));
    if (!review.ok) {
      return cannotRun('clGetRegistryFailed', `Client error while checking access to services: ${review.error.message}`, review.error);
    }
    if (!review.value) {
      return cannotRun('clGetRegistryFailed', `Client is not allowed to get service "${REGISTRY_NAME}"`);
    }
    return RUNNABLE;
  }

  async inspect(): Promise<DiagnosticResult> {
    const r = new ResultRecorder(this.name);
    const client = this.client;
    if (!client) {
      r.error('DClu1000', null, 'No cluster client is available; this check cannot run.');
      return r.seal();
    }

    const service = await guard(() => client.getService(REGISTRY_NAMESPACE, REGISTRY_NAME));
    if (!service.ok) {
      if (service.error.kind === 'NotFound') {
        r.warn('DClu1001', service.error, clGetRegNone, REGISTRY_NAME, REGISTRY_NAMESPACE);
      } else {
        r.error('DClu1002', service.error, clGetRegFailed, REGISTRY_NAME, describeError(service.error));
      }
      return r.seal();
    }

    r.info('DClu1003', null, 'Found registry service "%s" at cluster IP %s', REGISTRY_NAME, service.value.clusterIP ?? '(none)');
    return r.seal();
  }
}
