import * as fs from 'fs';
import * as yaml from 'yaml';
import { z } from 'zod';

const ClusterSettingsSchema = z.object({
  kubeconfig: z.string().min(1).optional(),
  context: z.string().min(1).optional(),
});

const HostSettingsSchema = z.object({
  nodeConfig: z.string().min(1).optional(),
  masterConfig: z.string().min(1).optional(),
});

const RouterSettingsSchema = z.object({
  name: z.string().min(1).default('router'),
  namespace: z.string().min(1).default('default'),
  recencySeconds: z.number().positive().default(30),
  logIdleTimeoutSeconds: z.number().nonnegative().default(60),
});

const RunSettingsSchema = z.object({
  level: z.enum(['debug', 'info', 'warning', 'error']).default('info'),
  checks: z.array(z.string().min(1)).default([]),
});

const DiagnosticsConfigSchema = z.object({
  // A missing cluster section disables the cluster checks
  cluster: ClusterSettingsSchema.optional(),
  host: HostSettingsSchema.default({}),
  router: RouterSettingsSchema.default({}),
  settings: RunSettingsSchema.default({}),
});

export type ClusterSettings = z.infer<typeof ClusterSettingsSchema>;
export type HostSettings = z.infer<typeof HostSettingsSchema>;
export type RouterSettings = z.infer<typeof RouterSettingsSchema>;
export type RunSettings = z.infer<typeof RunSettingsSchema>;
export type DiagnosticsConfig = z.infer<typeof DiagnosticsConfigSchema>;

export function loadConfig(configPath: string): DiagnosticsConfig {
  if (!fs.existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  return parseConfig(yaml.parse(content) ?? {});
}

export function parseConfig(raw: unknown): DiagnosticsConfig {
  const result = DiagnosticsConfigSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.issues
      .map(issue => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid config:\n${errors}`);
  }

  return result.data;
}
