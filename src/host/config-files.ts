import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { z } from 'zod';

export class ConfigReadError extends Error {
  constructor(readonly configPath: string, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ConfigReadError';
  }
}

export interface ConfigValidationError {
  field: string;
  message: string;
}

const HOST_PORT_PATTERN = /^[^\s:]*:\d{1,5}$/;

const ServingInfoSchema = z.object({
  bindAddress: z.string().regex(HOST_PORT_PATTERN, 'must be a host:port address'),
  certFile: z.string().min(1).optional(),
  keyFile: z.string().min(1).optional(),
  clientCA: z.string().min(1).optional(),
}).refine(info => Boolean(info.certFile) === Boolean(info.keyFile), {
  message: 'certFile and keyFile must be set together',
  path: ['certFile'],
});

const NodeConfigSchema = z.object({
  apiVersion: z.literal('v1'),
  kind: z.literal('NodeConfig'),
  nodeName: z.string().min(1),
  masterKubeConfig: z.string().min(1),
  servingInfo: ServingInfoSchema,
  dnsDomain: z.string().min(1).optional(),
  dnsIP: z.string().ip().optional(),
  volumeDirectory: z.string().min(1),
  networkConfig: z.object({
    networkPluginName: z.string().optional(),
    mtu: z.number().int().positive(),
  }).optional(),
});

const MasterConfigSchema = z.object({
  apiVersion: z.literal('v1'),
  kind: z.literal('MasterConfig'),
  masterPublicURL: z.string().url(),
  servingInfo: ServingInfoSchema,
  etcdClientInfo: z.object({
    urls: z.array(z.string().url()).min(1),
    ca: z.string().min(1).optional(),
  }),
  kubernetesMasterConfig: z.object({
    masterCount: z.number().int().positive(),
    servicesSubnet: z.string().min(1),
  }).optional(),
  projectConfig: z.object({
    defaultNodeSelector: z.string().optional(),
  }).optional(),
});

// Fields holding file references, resolved against the config file's directory
const NODE_FILE_FIELDS = [
  ['masterKubeConfig'],
  ['volumeDirectory'],
  ['servingInfo', 'certFile'],
  ['servingInfo', 'keyFile'],
  ['servingInfo', 'clientCA'],
];

const MASTER_FILE_FIELDS = [
  ['servingInfo', 'certFile'],
  ['servingInfo', 'keyFile'],
  ['servingInfo', 'clientCA'],
  ['etcdClientInfo', 'ca'],
];

export type RawConfig = Record<string, unknown>;

export function readAndResolveNodeConfig(configPath: string): RawConfig {
  return readAndResolve(configPath, 'NodeConfig', NODE_FILE_FIELDS);
}

export function readAndResolveMasterConfig(configPath: string): RawConfig {
  return readAndResolve(configPath, 'MasterConfig', MASTER_FILE_FIELDS);
}

export function validateNodeConfig(config: RawConfig): ConfigValidationError[] {
  return validate(NodeConfigSchema, config);
}

export function validateMasterConfig(config: RawConfig): ConfigValidationError[] {
  return validate(MasterConfigSchema, config);
}

function readAndResolve(configPath: string, kind: string, fileFields: string[][]): RawConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigReadError(configPath, `Config file not found: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = yaml.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigReadError(
      configPath,
      `Could not parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
      err,
    );
  }

  if (!isRecord(raw)) {
    throw new ConfigReadError(configPath, `${configPath} does not contain a ${kind} document`);
  }
  if (raw.kind !== kind) {
    throw new ConfigReadError(configPath, `${configPath} has kind "${String(raw.kind)}", expected "${kind}"`);
  }

  const baseDir = path.dirname(path.resolve(configPath));
  for (const field of fileFields) {
    resolveFileField(raw, field, baseDir);
  }
  return raw;
}

function resolveFileField(config: RawConfig, field: string[], baseDir: string): void {
  let target: RawConfig = config;
  for (const key of field.slice(0, -1)) {
    const next = target[key];
    if (!isRecord(next)) return;
    target = next;
  }

  const leaf = field[field.length - 1];
  const value = target[leaf];
  if (typeof value === 'string' && value.length > 0 && !path.isAbsolute(value)) {
    target[leaf] = path.join(baseDir, value);
  }
}

function validate(schema: z.ZodTypeAny, config: RawConfig): ConfigValidationError[] {
  const result = schema.safeParse(config);
  if (result.success) {
    return [];
  }
  return result.error.issues.map(issue => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
}

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
