/**
 * SSH Client Provider
 * Layer: infra
 *
 * Provided ports:
 *   - provider.getClients
 *   - provider.getClientsBatch
 *
 * Runs `mca-dump` on each access point through the system ssh binary.
 * Any failure to connect, authenticate, or run the command (including the
 * command timeout) is a transport failure; a reply that cannot be parsed is
 * malformed.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import * as core from '@actions/core';
import type { ClientInfoProvider, HostQueryOutcome, SshConfig } from '../types';
import { errorMessage } from '../utils';
import { parseMcaDump } from './mca-dump';

const DUMP_COMMAND = 'mca-dump';
const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

export interface ExecOptions {
  timeout: number;
  maxBuffer: number;
  signal?: AbortSignal;
}

export type ExecFn = (
  file: string,
  args: string[],
  options: ExecOptions,
) => Promise<{ stdout: string; stderr: string }>;

const execFileAsync = promisify(execFile);

const defaultExec: ExecFn = async (file, args, options) => {
  const { stdout, stderr } = await execFileAsync(file, args, { ...options, encoding: 'utf8' });
  return { stdout, stderr };
};

/**
 * Arguments for a non-interactive, key-only ssh invocation.
 */
export function buildSshArgs(config: SshConfig, host: string): string[] {
  return [
    '-i',
    config.privateKeyPath,
    '-o',
    'BatchMode=yes',
    '-o',
    `ConnectTimeout=${config.connectTimeoutSeconds}`,
    '-o',
    'StrictHostKeyChecking=accept-new',
    `${config.username}@${host}`,
    DUMP_COMMAND,
  ];
}

export class SshClientProvider implements ClientInfoProvider {
  constructor(
    private readonly config: SshConfig,
    private readonly maxIdleSeconds: number,
    private readonly exec: ExecFn = defaultExec,
  ) {}

  async getClients(host: string, signal?: AbortSignal): Promise<HostQueryOutcome> {
    core.debug(`Connecting to host ${host}`);
    let stdout: string;
    try {
      const result = await this.exec('ssh', buildSshArgs(this.config, host), {
        timeout: (this.config.connectTimeoutSeconds + this.config.commandTimeoutSeconds) * 1000,
        maxBuffer: MAX_OUTPUT_BYTES,
        signal,
      });
      stdout = result.stdout;
    } catch (err) {
      const error = `SSH connection failed for host ${host}: ${errorMessage(err)}`;
      core.error(error);
      return { status: 'transport-failure', host, error };
    }
    core.debug(`Command '${DUMP_COMMAND}' executed successfully on ${host}`);

    const outcome = parseMcaDump(stdout, host, this.maxIdleSeconds);
    if (outcome.status === 'malformed') {
      core.error(`Invalid response from host ${host}: ${outcome.error}`);
    }
    return outcome;
  }

  /**
   * Queries every host concurrently; one entry per requested host.
   */
  async getClientsBatch(hosts: string[], signal?: AbortSignal): Promise<Map<string, HostQueryOutcome>> {
    const outcomes = await Promise.all(hosts.map((host) => this.getClients(host, signal)));
    return new Map(outcomes.map((outcome): [string, HostQueryOutcome] => [outcome.host, outcome]));
  }
}
