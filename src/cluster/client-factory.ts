import * as os from 'os';
import * as path from 'path';
import * as k8s from '@kubernetes/client-node';
import type { ClusterClient } from './client-interface.js';
import { KubeClusterClient } from './kube-client.js';
import type { ClusterSettings } from '../runner/config.js';

/**
 * Build a cluster client from the cluster settings. Without an explicit
 * kubeconfig the standard loading rules apply: KUBECONFIG, ~/.kube/config,
 * then the in-cluster service account.
 */
export function createClusterClient(settings: ClusterSettings): ClusterClient {
  const kc = new k8s.KubeConfig();

  if (settings.kubeconfig) {
    kc.loadFromFile(expandHome(settings.kubeconfig));
  } else {
    kc.loadFromDefault();
  }

  if (settings.context) {
    if (!kc.getContextObject(settings.context)) {
      throw new Error(`Unknown kubeconfig context: ${settings.context}`);
    }
    kc.setCurrentContext(settings.context);
  }

  if (!kc.getCurrentCluster()) {
    throw new Error('No cluster is configured in the kubeconfig');
  }

  return new KubeClusterClient(kc);
}

function expandHome(p: string): string {
  return p === '~' || p.startsWith('~/') ? path.join(os.homedir(), p.slice(1)) : p;
}
