import type { Check, CanRunResult } from './types.js';
import { RUNNABLE, cannotRun } from './types.js';
import { ResultRecorder, describeError, type DiagnosticResult } from './result.js';
import {
  readAndResolveNodeConfig,
  validateNodeConfig,
  type ConfigValidationError,
  type RawConfig,
} from '../host/config-files.js';

export const NODE_CONFIG_CHECK_NAME = 'NodeConfigCheck';

export interface ConfigFileCodes {
  looking: string;
  readFailed: string;
  found: string;
  invalid: string;
}

export interface ConfigFileSteps {
  label: string;
  codes: ConfigFileCodes;
  read(configPath: string): RawConfig;
  validate(config: RawConfig): ConfigValidationError[];
}

// Read, resolve and validate one config file, recording each step.
export function checkConfigFile(r: ResultRecorder, configPath: string, steps: ConfigFileSteps): void {
  r.debug(steps.codes.looking, null, "Looking for %s config file at '%s'", steps.label, configPath);

  let config: RawConfig;
  try {
    config = steps.read(configPath);
  } catch (err) {
    r.error(steps.codes.readFailed, err, "Could not read %s config file '%s':\n%s", steps.label, configPath, describeError(err));
    return;
  }

  r.info(steps.codes.found, null, 'Found a %s config file: %s', steps.label, configPath);

  for (const issue of steps.validate(config)) {
    r.error(
      steps.codes.invalid,
      issue,
      "Validation of %s config file '%s' failed:\n%s: %s",
      steps.label,
      configPath,
      issue.field || '(root)',
      issue.message,
    );
  }
}

/** Checks that the node config file exists, parses and validates. */
export class NodeConfigCheck implements Check {
  readonly name = NODE_CONFIG_CHECK_NAME;
  readonly description = 'Check the node config file';

  constructor(private nodeConfigFile: string | undefined) {}

  async canRun(): Promise<CanRunResult> {
    if (!this.nodeConfigFile) {
      return cannotRun('noNodeConfigFile', 'must have node config file');
    }
    return RUNNABLE;
  }

  async inspect(): Promise<DiagnosticResult> {
    const r = new ResultRecorder(this.name);
    if (!this.nodeConfigFile) {
      r.error('DH1000', null, 'No node config file was given; this check cannot run.');
      return r.seal();
    }

    checkConfigFile(r, this.nodeConfigFile, {
      label: 'node',
      codes: { looking: 'DH1001', readFailed: 'DH1002', found: 'DH1003', invalid: 'DH1004' },
      read: readAndResolveNodeConfig,
      validate: validateNodeConfig,
    });
    return r.seal();
  }
}
