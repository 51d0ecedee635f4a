import type { Check, CanRunResult } from './types.js';
import { RUNNABLE, cannotRun } from './types.js';
import { ResultRecorder, type DiagnosticResult } from './result.js';
import { checkConfigFile } from './node-config.js';
import { readAndResolveMasterConfig, validateMasterConfig } from '../host/config-files.js';

export const MASTER_CONFIG_CHECK_NAME = 'MasterConfigCheck';

export class MasterConfigCheck implements Check {
  readonly name = MASTER_CONFIG_CHECK_NAME;
  readonly description = 'Check the master config file';

  constructor(private masterConfigFile: string | undefined) {}

  async canRun(): Promise<CanRunResult> {
    if (!this.masterConfigFile) {
      return cannotRun('noMasterConfigFile', 'must have master config file');
    }
    return RUNNABLE;
  }

  async inspect(): Promise<DiagnosticResult> {
    const r = new ResultRecorder(this.name);
    if (!this.masterConfigFile) {
      r.error('DH0000', null, 'No master config file was given; this check cannot run.');
      return r.seal();
    }

    checkConfigFile(r, this.masterConfigFile, {
      label: 'master',
      codes: { looking: 'DH0001', readFailed: 'DH0002', found: 'DH0003', invalid: 'DH0004' },
      read: readAndResolveMasterConfig,
      validate: validateMasterConfig,
    });
    return r.seal();
  }
}
