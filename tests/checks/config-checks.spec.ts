import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { NodeConfigCheck } from '../../src/checks/node-config.js';
import { MasterConfigCheck } from '../../src/checks/master-config.js';
import { renderMessage, type DiagnosticResult } from '../../src/checks/result.js';
import { VALID_MASTER_CONFIG, VALID_NODE_CONFIG } from '../helpers/config-fixtures.js';

function codes(result: DiagnosticResult): string[] {
  return result.findings.map(f => f.code);
}

describe('config file checks', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-checks-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  }

  describe('NodeConfigCheck', () => {
    it('cannot run without a file path', async () => {
      const gate = await new NodeConfigCheck(undefined).canRun();
      expect(gate.canRun).toBe(false);
      if (!gate.canRun) {
        expect(gate.error.message).toBe('must have node config file');
      }
      expect(await new NodeConfigCheck('').canRun()).toMatchObject({ canRun: false });
    });

    it('can run with a file path, whether or not the file exists', async () => {
      expect(await new NodeConfigCheck('/nonexistent/node-config.yaml').canRun()).toEqual({ canRun: true });
    });

    it('passes a valid config', async () => {
      const file = write('node-config.yaml', VALID_NODE_CONFIG);
      const result = await new NodeConfigCheck(file).inspect();

      expect(result.name).toBe('NodeConfigCheck');
      expect(codes(result)).toEqual(['DH1001', 'DH1003']);
      expect(renderMessage(result.findings[1].message)).toBe(`Found a node config file: ${file}`);
      expect(result.passed()).toBe(true);
    });

    it('stops after a read failure', async () => {
      const file = path.join(dir, 'missing.yaml');
      const result = await new NodeConfigCheck(file).inspect();

      expect(codes(result)).toEqual(['DH1001', 'DH1002']);
      expect(renderMessage(result.findings[1].message)).toBe(
        `Could not read node config file '${file}':\n(ConfigReadError) Config file not found: ${file}`,
      );
    });

    it('reports one error per validation problem', async () => {
      const file = write('node-config.yaml', VALID_NODE_CONFIG
        .replace('nodeName: node-1.example.test', 'nodeName: ""')
        .replace('mtu: 1450', 'mtu: -1'));
      const result = await new NodeConfigCheck(file).inspect();

      expect(codes(result)).toEqual(['DH1001', 'DH1003', 'DH1004', 'DH1004']);
      expect(renderMessage(result.findings[3].message)).toBe(
        `Validation of node config file '${file}' failed:\nnetworkConfig.mtu: Number must be greater than 0`,
      );
      expect(result.findings[3].cause).toEqual({ field: 'networkConfig.mtu', message: 'Number must be greater than 0' });
    });

    it('reports an error rather than crashing when run without a path', async () => {
      const result = await new NodeConfigCheck(undefined).inspect();
      expect(codes(result)).toEqual(['DH1000']);
    });
  });

  describe('MasterConfigCheck', () => {
    it('cannot run without a file path', async () => {
      const gate = await new MasterConfigCheck(undefined).canRun();
      expect(gate.canRun).toBe(false);
      if (!gate.canRun) {
        expect(gate.error.message).toBe('must have master config file');
      }
    });

    it('passes a valid config', async () => {
      const result = await new MasterConfigCheck(write('master-config.yaml', VALID_MASTER_CONFIG)).inspect();
      expect(codes(result)).toEqual(['DH0001', 'DH0003']);
    });

    it('fails a config of the wrong kind', async () => {
      const result = await new MasterConfigCheck(write('master-config.yaml', VALID_NODE_CONFIG)).inspect();
      expect(codes(result)).toEqual(['DH0001', 'DH0002']);
      expect(result.passed()).toBe(false);
    });
  });
});
