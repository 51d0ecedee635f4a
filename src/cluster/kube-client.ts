import { PassThrough } from 'stream';
import * as k8s from '@kubernetes/client-node';
import {
  ClusterError,
  failure,
  success,
  type AccessAttributes,
  type ClusterClient,
  type ClusterErrorKind,
  type ClusterResult,
  type LogStream,
  type PodPhase,
  type PodSummary,
  type ServiceSummary,
  type WorkloadSummary,
} from './client-interface.js';

const TRANSIENT_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);
const TRANSIENT_SOCKET_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EAI_AGAIN', 'ENOTFOUND', 'EPIPE']);
const POD_PHASES: readonly PodPhase[] = ['Pending', 'Running', 'Succeeded', 'Failed', 'Unknown'];

/** ClusterClient backed by the Kubernetes API of the current kubeconfig context. */
export class KubeClusterClient implements ClusterClient {
  private apps: k8s.AppsV1Api;
  private core: k8s.CoreV1Api;
  private authorization: k8s.AuthorizationV1Api;
  private logs: k8s.Log;

  constructor(kc: k8s.KubeConfig) {
    this.apps = kc.makeApiClient(k8s.AppsV1Api);
    this.core = kc.makeApiClient(k8s.CoreV1Api);
    this.authorization = kc.makeApiClient(k8s.AuthorizationV1Api);
    this.logs = new k8s.Log(kc);
  }

  async getDeployment(namespace: string, name: string): Promise<ClusterResult<WorkloadSummary>> {
    try {
      const { body } = await this.apps.readNamespacedDeployment(name, namespace);
      return success({
        name: body.metadata?.name ?? name,
        namespace: body.metadata?.namespace ?? namespace,
        selector: body.spec?.selector.matchLabels ?? {},
      });
    } catch (err) {
      return failure(classifyError(err, `get deployment ${namespace}/${name}`));
    }
  }

  async getService(namespace: string, name: string): Promise<ClusterResult<ServiceSummary>> {
    try {
      const { body } = await this.core.readNamespacedService(name, namespace);
      return success({
        name: body.metadata?.name ?? name,
        namespace: body.metadata?.namespace ?? namespace,
        clusterIP: body.spec?.clusterIP,
      });
    } catch (err) {
      return failure(classifyError(err, `get service ${namespace}/${name}`));
    }
  }

  async listPods(namespace: string, selector: Record<string, string>): Promise<ClusterResult<PodSummary[]>> {
    const labelSelector = toLabelSelector(selector);
    debug(`listing pods in ${namespace} with selector "${labelSelector ?? ''}"`);

    try {
      const { body } = await this.core.listNamespacedPod(
        namespace,
        undefined, // pretty
        undefined, // allowWatchBookmarks
        undefined, // _continue
        undefined, // fieldSelector
        labelSelector,
      );
      return success(body.items.map(pod => toPodSummary(pod, namespace)));
    } catch (err) {
      return failure(classifyError(err, `list pods in ${namespace}`));
    }
  }

  async openPodLog(namespace: string, pod: string, container: string): Promise<ClusterResult<LogStream>> {
    const stream = new PassThrough();
    let request: Awaited<ReturnType<k8s.Log['log']>>;
    try {
      request = await this.logs.log(namespace, pod, container, stream, { follow: false });
    } catch (err) {
      stream.destroy();
      return failure(classifyError(err, `read logs of ${namespace}/${pod}/${container}`));
    }

    return success({
      stream,
      async close(): Promise<void> {
        // Destroying the PassThrough alone leaves the response paused on an open socket
        request.abort();
        stream.destroy();
      },
    });
  }

  async reviewAccess(attributes: AccessAttributes): Promise<ClusterResult<boolean>> {
    const review: k8s.V1SelfSubjectAccessReview = {
      apiVersion: 'authorization.k8s.io/v1',
      kind: 'SelfSubjectAccessReview',
      spec: {
        resourceAttributes: {
          namespace: attributes.namespace,
          verb: attributes.verb,
          group: attributes.group,
          resource: attributes.resource,
          subresource: attributes.subresource,
          name: attributes.name,
        },
      },
    };

    try {
      const { body } = await this.authorization.createSelfSubjectAccessReview(review);
      debug(`access review ${attributes.verb} ${attributes.resource}: ${JSON.stringify(body.status)}`);
      return success(body.status?.allowed ?? false);
    } catch (err) {
      return failure(classifyError(err, `review access to ${attributes.verb} ${attributes.resource}`));
    }
  }
}

export function toLabelSelector(matchLabels: Record<string, string>): string | undefined {
  const parts = Object.entries(matchLabels).map(([k, v]) => `${k}=${v}`);
  return parts.length ? parts.join(',') : undefined;
}

export function toPodSummary(pod: k8s.V1Pod, namespace: string): PodSummary {
  const phase = pod.status?.phase;
  return {
    name: pod.metadata?.name ?? '',
    namespace: pod.metadata?.namespace ?? namespace,
    phase: POD_PHASES.find(p => p === phase) ?? 'Unknown',
    containers: (pod.spec?.containers ?? []).map(c => c.name),
  };
}

/**
 * Sort a failed API call into the error kinds checks act on: a missing
 * resource, a permission problem, something worth retrying, or anything else.
 */
export function classifyError(err: unknown, action: string): ClusterError {
  const statusCode = statusCodeOf(err);
  const detail = err instanceof Error ? err.message : String(err);
  const message = `failed to ${action}: ${statusCode !== undefined ? `HTTP ${statusCode}` : detail}`;

  let kind: ClusterErrorKind = 'Other';
  if (statusCode === 404) {
    kind = 'NotFound';
  } else if (statusCode === 401 || statusCode === 403) {
    kind = 'Forbidden';
  } else if (statusCode !== undefined && TRANSIENT_STATUS_CODES.has(statusCode)) {
    kind = 'Transient';
  } else if (statusCode === undefined && TRANSIENT_SOCKET_CODES.has(socketCodeOf(err) ?? '')) {
    kind = 'Transient';
  }

  return new ClusterError(kind, message, { statusCode, cause: err });
}

function statusCodeOf(err: unknown): number | undefined {
  if (err instanceof k8s.HttpError) {
    return err.statusCode ?? err.response?.statusCode;
  }
  if (typeof err === 'object' && err !== null && 'statusCode' in err && typeof err.statusCode === 'number') {
    return err.statusCode;
  }
  return undefined;
}

function socketCodeOf(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function debug(message: string): void {
  if (process.env.DEBUG_DIAGNOSTICS) {
    console.error(`[DEBUG] ${message}`);
  }
}
