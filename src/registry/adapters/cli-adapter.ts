/**
 * Subprocess executor adapter. Runs a listing command such as `ollama list`
 * and reads model names from the first column of its tabular output.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { ExecutorDescriptor } from '../../config.js';
import { ProbeError } from '../../errors.js';
import type { DiscoveredModel, ExecutorAdapter } from '../types.js';

const execFileAsync = promisify(execFile);

export type CommandRunner = (
  command: string,
  args: string[],
  signal: AbortSignal
) => Promise<{ stdout: string }>;

const defaultRunner: CommandRunner = async (command, args, signal) => {
  const { stdout } = await execFileAsync(command, args, { signal, encoding: 'utf8' });
  return { stdout };
};

/**
 * Parses a whitespace-aligned listing. The first non-empty line is a header.
 */
export function parseModelListing(output: string): string[] {
  const lines = output.split('\n').map(line => line.trim()).filter(line => line.length > 0);
  const names: string[] = [];
  for (const line of lines.slice(1)) {
    const [name] = line.split(/\s+/);
    if (name && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

export class CliExecutorAdapter implements ExecutorAdapter {
  readonly transport = 'cli' as const;
  private readonly command: string;
  private readonly args: string[];

  constructor(descriptor: ExecutorDescriptor, private readonly run: CommandRunner = defaultRunner) {
    if (!descriptor.command) {
      throw new ProbeError(descriptor.id, 'cli executor has no command');
    }
    this.command = descriptor.command;
    this.args = descriptor.args.length > 0 ? descriptor.args : ['list'];
  }

  /**
   * Healthy when the listing command exits 0
   */
  async healthCheck(signal: AbortSignal): Promise<boolean> {
    try {
      await this.run(this.command, this.args, signal);
      return true;
    } catch (error) {
      if (signal.aborted) throw error;
      return false;
    }
  }

  async listModels(signal: AbortSignal): Promise<DiscoveredModel[]> {
    const { stdout } = await this.run(this.command, this.args, signal);
    return parseModelListing(stdout).map(id => ({ id }));
  }
}
