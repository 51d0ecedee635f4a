import type { Readable } from 'stream';

export type ClusterErrorKind = 'NotFound' | 'Forbidden' | 'Transient' | 'Other';

export class ClusterError extends Error {
  readonly kind: ClusterErrorKind;
  readonly statusCode?: number;

  constructor(kind: ClusterErrorKind, message: string, options: { statusCode?: number; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ClusterError';
    this.kind = kind;
    this.statusCode = options.statusCode;
  }
}

export type ClusterResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ClusterError };

export function success<T>(value: T): ClusterResult<T> {
  return { ok: true, value };
}

export function failure<T>(error: ClusterError): ClusterResult<T> {
  return { ok: false, error };
}

export type PodPhase = 'Pending' | 'Running' | 'Succeeded' | 'Failed' | 'Unknown';

export interface WorkloadSummary {
  name: string;
  namespace: string;
  // spec.selector.matchLabels
  selector: Record<string, string>;
}

export interface ServiceSummary {
  name: string;
  namespace: string;
  clusterIP?: string;
}

export interface PodSummary {
  name: string;
  namespace: string;
  phase: PodPhase;
  containers: string[];
}

/**
 * A single-use byte stream of pod log output. `close` releases the
 * underlying connection and must be called exactly once.
 */
export interface LogStream {
  stream: Readable;
  close(): Promise<void>;
}

export interface AccessAttributes {
  namespace?: string;
  verb: string;
  resource: string;
  group?: string;
  subresource?: string;
  name?: string;
}

export interface ClusterClient {
  getDeployment(namespace: string, name: string): Promise<ClusterResult<WorkloadSummary>>;
  getService(namespace: string, name: string): Promise<ClusterResult<ServiceSummary>>;
  listPods(namespace: string, selector: Record<string, string>): Promise<ClusterResult<PodSummary[]>>;

  // Non-following: the stream ends once the current log has been sent.
  openPodLog(namespace: string, pod: string, container: string): Promise<ClusterResult<LogStream>>;

  // Whether the acting identity may perform the given action.
  reviewAccess(attributes: AccessAttributes): Promise<ClusterResult<boolean>>;
}

// Turn a rejected client call into a failed result so callers only deal with one shape.
export async function guard<T>(call: () => Promise<ClusterResult<T>>): Promise<ClusterResult<T>> {
  try {
    return await call();
  } catch (err) {
    return failure(new ClusterError('Other', err instanceof Error ? err.message : String(err), { cause: err }));
  }
}
