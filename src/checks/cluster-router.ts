import type { Check, CanRunResult } from './types.js';
import { RUNNABLE, cannotRun } from './types.js';
import { ResultRecorder, describeError, type DiagnosticResult } from './result.js';
import {
  guard,
  type AccessAttributes,
  type ClusterClient,
  type PodSummary,
  type WorkloadSummary,
} from '../cluster/client-interface.js';
import { LineScanner, LogReadTimeoutError } from '../lib/line-scanner.js';
import { parseNanoTimestamp } from '../lib/timestamp.js';

export const CLUSTER_ROUTER_CHECK_NAME = 'ClusterRouter';

export interface RouterCheckOptions {
  // Deployment expected to run the router
  routerName: string;
  namespace: string;
  // Must capture the leading timestamp as group 1 and the reason as group 2
  failurePattern: RegExp;
  parseTimestamp: (text: string) => Date | null;
  // A failure younger than this is treated as still happening
  recencyMs: number;
  // 0 disables the limit
  logIdleTimeoutMs: number;
  now: () => Date;
}

// The router retries its route list every second, so anything older than a
// few multiples of that has already recovered.
export const ROUTER_CHECK_DEFAULTS: Readonly<RouterCheckOptions> = Object.freeze({
  routerName: 'router',
  namespace: 'default',
  failurePattern: /^(\S+).*Failed to list \*api.Route: (.*)/s,
  parseTimestamp: parseNanoTimestamp,
  recencyMs: 30_000,
  logIdleTimeoutMs: 60_000,
  now: () => new Date(),
});

const clientAccessError = (error: string) => `Client error while retrieving router records. Client retrieved records
during discovery, so this is likely to be a transient error. Try running
diagnostics again. If this message persists, there may be a permissions
problem with getting router records. The error was:

${error}`;

const clGetRtNone = `
There is no "%s" deployment. The router may have been named
something different, in which case this warning may be ignored.

A router is not strictly required; however it is needed for accessing
pods from external networks and its absence likely indicates an incomplete
installation of the cluster.`;

const clGetRtFailed = `
Client error while retrieving "%s" deployment. Client retrieved records
before, so this is likely to be a transient error. Try running
diagnostics again. If this message persists, there may be a permissions
problem with getting records. The error was:

%s`;

const clRtNoPods = `
The "%s" deployment exists but has no running pods, so it
is not available. Apps will not be externally accessible via the router.`;

const clRtPodLog = `
Failed to read the logs for the "{{podName}}" pod belonging to
the router deployment. This is not a problem by itself but prevents
diagnostics from looking for errors in those logs. The error encountered
was:
{{error}}`;

const clRtPodConn = `
Recent pod logs for the "{{podName}}" pod belonging to
the router deployment indicated a problem requesting route information
from the master. This prevents the router from functioning, so
applications will not be externally accessible via the router.

There are many reasons for this request to fail, including invalid
credentials, DNS failures, master outages, and so on. Examine the
following error message from the router pod logs to determine the
cause of the problem:

{{reason}}
Time: {{timestamp}}`;

/**
 * Checks that there is a working router: the router deployment exists, has
 * running pods, and none of those pods has recently failed to list routes.
 */
export class ClusterRouterCheck implements Check {
  readonly name = CLUSTER_ROUTER_CHECK_NAME;
  readonly description = 'Check there is a working router';
  private options: RouterCheckOptions;

  constructor(private client: ClusterClient | undefined, options: Partial<RouterCheckOptions> = {}) {
    const merged = { ...ROUTER_CHECK_DEFAULTS, ...options };
    // exec on a global or sticky pattern would resume from the previous line's lastIndex
    const { source, flags } = merged.failurePattern;
    this.options = { ...merged, failurePattern: new RegExp(source, flags.replace(/[gy]/g, '')) };
  }

  async canRun(): Promise<CanRunResult> {
    const client = this.client;
    if (!client) {
      return cannotRun('clGetRouterFailed', 'must have a cluster client');
    }

    for (const attributes of this.requiredAccess()) {
      const review = await guard(() => client.reviewAccess(attributes));
      if (!review.ok) {
        return cannotRun('clGetRouterFailed', clientAccessError(describeError(review.error)), review.error);
      }
      if (!review.value) {
        return cannotRun('clGetRouterFailed', `Client is not allowed to ${describeAccess(attributes)}`);
      }
    }
    return RUNNABLE;
  }

  async inspect(): Promise<DiagnosticResult> {
    const r = new ResultRecorder(this.name);
    if (!this.client) {
      r.error('DClu2000', null, 'No cluster client is available; this check cannot run.');
      return r.seal();
    }

    const router = await this.getRouterWorkload(this.client, r);
    if (router) {
      // Pods are scanned one after another so each pod's findings stay together
      for (const pod of await this.getRouterPods(this.client, router, r)) {
        await this.checkRouterLogs(this.client, pod, r);
      }
    }
    return r.seal();
  }

  private requiredAccess(): AccessAttributes[] {
    const { namespace, routerName } = this.options;
    return [
      { namespace, verb: 'get', group: 'apps', resource: 'deployments', name: routerName },
      { namespace, verb: 'list', resource: 'pods' },
      { namespace, verb: 'get', resource: 'pods', subresource: 'log' },
    ];
  }

  private async getRouterWorkload(client: ClusterClient, r: ResultRecorder): Promise<WorkloadSummary | null> {
    const { namespace, routerName } = this.options;
    const result = await guard(() => client.getDeployment(namespace, routerName));

    if (!result.ok) {
      if (result.error.kind === 'NotFound') {
        r.warn('DClu2001', result.error, clGetRtNone, routerName);
      } else {
        r.error('DClu2002', result.error, clGetRtFailed, routerName, describeError(result.error));
      }
      return null;
    }

    r.debug('DClu2003', null, 'Found default router deployment');
    return result.value;
  }

  private async getRouterPods(client: ClusterClient, router: WorkloadSummary, r: ResultRecorder): Promise<PodSummary[]> {
    const { routerName } = this.options;
    const result = await guard(() => client.listPods(router.namespace, router.selector));

    if (!result.ok) {
      r.error(
        'DClu2004',
        result.error,
        "Finding pods for '%s' deployment failed. This should never happen. Error: %s",
        routerName,
        describeError(result.error),
      );
      return [];
    }

    const running: PodSummary[] = [];
    for (const pod of result.value) {
      if (pod.phase !== 'Running') {
        r.debug('DClu2005', null, 'router pod with name %s is not running', pod.name);
      } else {
        running.push(pod);
        r.debug('DClu2006', null, 'Found running router pod with name %s', pod.name);
      }
    }

    if (running.length === 0) {
      r.error('DClu2007', null, clRtNoPods, routerName);
    }
    return running;
  }

  private async checkRouterLogs(client: ClusterClient, pod: PodSummary, r: ResultRecorder): Promise<void> {
    const container = pod.containers[0];
    if (container === undefined) {
      r.warnt('DClu2008', null, clRtPodLog, { podName: pod.name, error: 'pod has no containers' });
      return;
    }

    const opened = await guard(() => client.openPodLog(pod.namespace, pod.name, container));
    if (!opened.ok) {
      r.warnt('DClu2008', opened.error, clRtPodLog, {
        podName: pod.name,
        error: describeError(opened.error),
      });
      return;
    }

    const { failurePattern, parseTimestamp, recencyMs, now } = this.options;
    const scanner = new LineScanner(opened.value, { idleTimeoutMs: this.options.logIdleTimeoutMs });

    try {
      while (await scanner.scan()) {
        const matches = failurePattern.exec(scanner.text());
        if (!matches) continue;

        const timestamp = matches[1] ?? '';
        const stamp = parseTimestamp(timestamp);
        // Stale or unreadable matches are history, not a live problem. Note
        // that we cannot always trust the local clock.
        if (stamp && now().getTime() - stamp.getTime() < recencyMs) {
          r.errort('DClu2009', null, clRtPodConn, {
            reason: matches[2] ?? '',
            timestamp,
            podName: pod.name,
          });
          break;
        }
      }
    } catch (err) {
      if (err instanceof LogReadTimeoutError) {
        r.warnt('DClu2011', err, 'Stopped reading the logs for the "{{podName}}" router pod: {{error}}', {
          podName: pod.name,
          error: err.message,
        });
      } else {
        r.warnt('DClu2010', err, clRtPodLog, { podName: pod.name, error: describeError(err) });
      }
    } finally {
      await scanner.close().catch((err: unknown) => {
        r.debug('DClu2012', err, 'Closing the log stream for router pod %s failed: %s', pod.name, describeError(err));
      });
    }
  }
}

function describeAccess(attributes: AccessAttributes): string {
  const resource = attributes.subresource ? `${attributes.resource}/${attributes.subresource}` : attributes.resource;
  const target = attributes.name ? ` "${attributes.name}"` : '';
  return `${attributes.verb} ${resource}${target} in namespace "${attributes.namespace ?? ''}"`;
}
